import { ReportProfileNameZ } from "@earthwork/contracts";

import { LogLevelZ } from "../../server/src/config/env";
import type { LogLevel } from "../../server/src/config/env";

export type Args = { // CLI arguments parsed from process.argv.
  snapshot: string; // Path of a cross_section_document_v1 JSON file.
  alignmentId: string | null; // Selected alignment; null runs the command with nothing selected.
  profile: string; // Report profile name under config/report.
  logLevel: LogLevel; // pino level for stderr logs.
};

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): Args {
  const get = (k: string): string | undefined => { // Read --k value from argv.
    const idx = argv.indexOf(`--${k}`);
    if (idx === -1) return undefined;
    const v = argv[idx + 1];
    if (!v || v.startsWith("--")) return undefined; // flag present without a value
    return v;
  };

  const snapshot = get("snapshot") ?? env.EARTHWORK_SNAPSHOT ?? "";
  const alignmentId = get("alignment") ?? env.EARTHWORK_ALIGNMENT_ID ?? null;
  const profile = get("profile") ?? env.EARTHWORK_REPORT_PROFILE ?? "default";
  const logLevelRaw = get("log-level") ?? env.LOG_LEVEL ?? "warn";

  if (!snapshot) {
    throw new Error("missing snapshot (set --snapshot or EARTHWORK_SNAPSHOT)");
  }
  if (!ReportProfileNameZ.safeParse(profile).success) {
    throw new Error(`invalid profile name: ${profile}`);
  }
  const logLevel = LogLevelZ.safeParse(logLevelRaw);
  if (!logLevel.success) {
    throw new Error(`invalid log level: ${logLevelRaw}`);
  }

  return { snapshot, alignmentId, profile, logLevel: logLevel.data };
}

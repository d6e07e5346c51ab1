import fs from "node:fs";

import { parseCrossSectionDocumentV1 } from "@earthwork/contracts";
import type { CrossSectionDocumentV1 } from "@earthwork/contracts";
import { createSnapshotSource, describeError, runCrossSectionVolumeReport } from "@earthwork/volume-kernel";
import type { CommandLogger } from "@earthwork/volume-kernel";

import { loadReportProfile, toRenderOptions } from "../../server/src/config/report_profile";
import type { Args } from "./args";

export interface CliLogger extends CommandLogger {
  error(obj: Record<string, unknown>, msg: string): void;
}

export type RunDeps = {
  repoRoot: string;
  logger: CliLogger;
  write: (text: string) => void; // stdout sink for the report or the user message
};

/**
 * Runs the report once and returns the process exit code.
 *
 * 0: a report or a no-data notice was printed. 1: the command was cancelled,
 * failed, or its inputs could not be read.
 */
export function runOnce(args: Args, deps: RunDeps): number {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(args.snapshot, "utf8"));
  } catch (err) {
    deps.logger.error({ snapshot: args.snapshot, reason: describeError(err) }, "snapshot unreadable");
    deps.write(`Error: cannot read snapshot ${args.snapshot}\n`);
    return 1;
  }

  let doc: CrossSectionDocumentV1;
  try {
    doc = parseCrossSectionDocumentV1(raw);
  } catch (err) {
    deps.logger.error({ snapshot: args.snapshot, reason: describeError(err) }, "snapshot rejected");
    deps.write(`Error: ${args.snapshot} is not a cross_section_document_v1 snapshot\n`);
    return 1;
  }

  const profile = loadReportProfile(deps.repoRoot, args.profile);
  const outcome = runCrossSectionVolumeReport({
    source: createSnapshotSource(doc),
    alignmentId: args.alignmentId,
    profile: toRenderOptions(profile),
    logger: deps.logger
  });

  switch (outcome.kind) {
    case "report":
      deps.write(outcome.text);
      return 0;
    case "no_data":
      deps.write(`${outcome.message}\n`);
      return 0;
    case "cancelled":
    case "failed":
      deps.write(`${outcome.message}\n`);
      return 1;
  }
}

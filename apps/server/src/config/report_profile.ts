// Report profiles: config/report/<name>.json, validated by report_profile_v1.

import fs from "node:fs";
import path from "node:path";

import { ReportProfileNameZ, parseReportProfileV1 } from "@earthwork/contracts";
import type { ReportProfileV1 } from "@earthwork/contracts";
import type { RenderOptions } from "@earthwork/volume-kernel";

import { REPORT_CONFIG_DIR } from "./env";

export class ReportProfileRejected extends Error {
  public readonly status: number;
  public readonly profile: string;

  constructor(status: number, profile: string, message: string) {
    super(message);
    this.name = "ReportProfileRejected";
    this.status = status;
    this.profile = profile;
  }
}

export function loadReportProfile(repoRoot: string, name: string): ReportProfileV1 {
  if (!ReportProfileNameZ.safeParse(name).success) {
    throw new ReportProfileRejected(400, name, `invalid report profile name: ${name}`);
  }
  const p = path.join(repoRoot, REPORT_CONFIG_DIR, `${name}.json`);
  if (!fs.existsSync(p)) {
    throw new ReportProfileRejected(400, name, `unknown report profile: ${name}`);
  }
  const raw = fs.readFileSync(p, "utf8");
  // A malformed profile file is a deployment error, not a client error: let zod throw.
  return parseReportProfileV1(JSON.parse(raw));
}

export function toRenderOptions(profile: ReportProfileV1): RenderOptions {
  return { title: profile.title, volumeUnit: profile.volume_unit };
}

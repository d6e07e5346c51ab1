import assert from "node:assert/strict";
import path from "node:path";
import { test } from "node:test";
import { fileURLToPath } from "node:url";

import { ReportProfileRejected, loadReportProfile, toRenderOptions } from "../config/report_profile";
import { findRepoRoot } from "../util";

const REPO_ROOT = findRepoRoot(path.dirname(fileURLToPath(import.meta.url)), path.join("config", "report"));

test("default profile matches the built-in report title", () => {
  const p = loadReportProfile(REPO_ROOT, "default");
  assert.deepEqual(toRenderOptions(p), {
    title: "EXCAVATION AND FILLING VOLUME INFORMATION - CROSS SECTION",
    volumeUnit: "m³"
  });
});

test("unknown profile is rejected with 400", () => {
  assert.throws(
    () => loadReportProfile(REPO_ROOT, "missing"),
    (err: unknown) =>
      err instanceof ReportProfileRejected && err.status === 400 && err.message === "unknown report profile: missing"
  );
});

test("profile names with path separators are rejected", () => {
  assert.throws(
    () => loadReportProfile(REPO_ROOT, "../default"),
    (err: unknown) => err instanceof ReportProfileRejected && err.message === "invalid report profile name: ../default"
  );
});

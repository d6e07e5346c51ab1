// Negative acceptance: @earthwork/volume-kernel must stay free of IO.
//
// The kernel reads host data only through MaterialListSource; any import of a
// Node IO module or a network/HTTP library from its sources is a violation.

import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { test } from "node:test";
import { fileURLToPath } from "node:url";

const SRC_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

const FORBIDDEN_IMPORTS: RegExp[] = [
  /from\s+"node:(fs|net|http|https|child_process|worker_threads|dgram)(\/[a-z]+)?"/,
  /from\s+"(fs|net|http|https|child_process)"/,
  /from\s+"(fastify|pino|pg)"/
];

function walk(dir: string, out: string[]): void {
  for (const ent of fs.readdirSync(dir, { withFileTypes: true })) {
    if (ent.name === "__tests__") continue; // tests may read fixtures
    const full = path.join(dir, ent.name);
    if (ent.isDirectory()) walk(full, out);
    else if (ent.isFile() && ent.name.endsWith(".ts")) out.push(full);
  }
}

test("kernel sources import no IO modules", () => {
  const files: string[] = [];
  walk(SRC_ROOT, files);
  assert.ok(files.length > 0);

  const violations: string[] = [];
  for (const f of files) {
    const text = fs.readFileSync(f, "utf8");
    for (const re of FORBIDDEN_IMPORTS) {
      if (re.test(text)) violations.push(`${path.relative(SRC_ROOT, f)} ~ ${re.source}`);
    }
  }
  assert.deepEqual(violations, []);
});

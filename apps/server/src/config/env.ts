// Server configuration.
//
// .env files fill in variables that are not already set; the resulting env is
// validated once at startup and a bad value is fatal.

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { findRepoRoot } from "../util";

const HERE = path.dirname(fileURLToPath(import.meta.url));

export const REPORT_CONFIG_DIR = path.join("config", "report");

export function loadDotEnvFile(fp: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    // Strip surrounding quotes if present
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // Do not overwrite explicitly provided env vars
    if (env[key] == null) env[key] = val;
  }
}

/**
 * Loads the repo root .env first, then the server-local one.
 */
export function loadEnv(repoRoot: string, env: NodeJS.ProcessEnv = process.env): void {
  loadDotEnvFile(path.join(repoRoot, ".env"), env);
  loadDotEnvFile(path.join(HERE, "..", ".env"), env);
}

export const LogLevelZ = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export type LogLevel = z.infer<typeof LogLevelZ>;

const ServerEnvZ = z.object({
  HOST: z.string().min(1).default("127.0.0.1"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: LogLevelZ.default("info"),
  BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  EARTHWORK_REPORT_PROFILE: z.string().regex(/^[A-Za-z0-9_-]+$/).default("default"),
  EARTHWORK_REPO_ROOT: z.string().min(1).optional()
});

export type ServerConfig = {
  host: string;
  port: number;
  logLevel: LogLevel;
  bodyLimitBytes: number;
  defaultProfile: string;
  repoRoot: string;
};

/**
 * Resolves the repo root: EARTHWORK_REPO_ROOT when set, else the nearest
 * ancestor of this file that holds config/report.
 */
export function resolveRepoRoot(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.EARTHWORK_REPO_ROOT;
  if (override) return path.resolve(override);
  return findRepoRoot(HERE, REPORT_CONFIG_DIR);
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ServerEnvZ.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`INVALID_SERVER_ENV: ${detail}`);
  }
  const e = parsed.data;
  return {
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    bodyLimitBytes: e.BODY_LIMIT_BYTES,
    defaultProfile: e.EARTHWORK_REPORT_PROFILE,
    repoRoot: resolveRepoRoot(env)
  };
}

// policy-server configuration
//
// Environment first, then `.env` files (repo root, then this app) for anything the
// environment leaves unset. Policy blocks live in JSON files under the policy dir.

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export type ServerConfig = {
  port: number;
  host: string;
  policyDir: string;
  logLevel: "fatal" | "error" | "warn" | "info" | "debug" | "trace";
};

const ServerEnvZ = z.object({
  PORT: z.coerce.number().int().positive().default(3110),
  HOST: z.string().min(1).default("0.0.0.0"),
  POLICY_CONFIG_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info")
});

export function resolveRepoRoot(): string {
  // This file lives at: apps/policy-server/src/config/index.ts
  if (process.env.POLICY_REPO_ROOT) return path.resolve(process.env.POLICY_REPO_ROOT);
  return path.resolve(__dirname, "../../../..");
}

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

export function loadEnv(): void {
  const repoRoot = resolveRepoRoot();
  loadDotEnvFile(path.join(repoRoot, ".env"));
  loadDotEnvFile(path.resolve(__dirname, "../../.env"));
}

/**
 * Reads server settings from `env`. Throws a ZodError on malformed values.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ServerEnvZ.parse(env);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    policyDir: parsed.POLICY_CONFIG_DIR
      ? path.resolve(parsed.POLICY_CONFIG_DIR)
      : path.join(resolveRepoRoot(), "config", "policies"),
    logLevel: parsed.LOG_LEVEL
  };
}

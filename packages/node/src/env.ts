/**
 * packages/node/src/env.ts: Environment configuration.
 *
 *   NO_COLOR=<any>              disable colour (https://no-color.org)
 *   LS_LIVE_AUDIT=1             write NDJSON audit records
 *   LS_LIVE_AUDIT_LOG=<path>    audit log file (default <tmpdir>/ls-live-audit.ndjson)
 *   LS_LIVE_AUDIT_STDERR=1      mirror audit records to stderr
 *   LS_LIVE_CURSOR_PROBE=1      ask the terminal for the cursor row before painting
 */

import { tmpdir } from "node:os";
import { join } from "node:path";

export type Env = Readonly<Record<string, string | undefined>>;

export type LsLiveEnv = Readonly<{
  noColor: boolean;
  audit: boolean;
  auditLogPath: string | null;
  auditStderr: boolean;
  cursorProbe: boolean;
}>;

export const DEFAULT_AUDIT_LOG_NAME = "ls-live-audit.ndjson";

function readEnv(env: Env, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

function envFlag(env: Env, name: string, fallback = false): boolean {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const norm = value.toLowerCase();
  return norm === "1" || norm === "true" || norm === "yes" || norm === "on";
}

export function readLsLiveEnv(env: Env = process.env): LsLiveEnv {
  const audit = envFlag(env, "LS_LIVE_AUDIT");
  return Object.freeze({
    noColor: readEnv(env, "NO_COLOR") !== null,
    audit,
    auditLogPath:
      readEnv(env, "LS_LIVE_AUDIT_LOG") ?? (audit ? join(tmpdir(), DEFAULT_AUDIT_LOG_NAME) : null),
    auditStderr: envFlag(env, "LS_LIVE_AUDIT_STDERR"),
    cursorProbe: envFlag(env, "LS_LIVE_CURSOR_PROBE"),
  });
}

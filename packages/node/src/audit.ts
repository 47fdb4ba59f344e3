/**
 * packages/node/src/audit.ts: Optional NDJSON audit log.
 *
 * Enable with LS_LIVE_AUDIT=1. Records go to LS_LIVE_AUDIT_LOG (or the
 * default file in the OS temp directory) so they never interleave with the
 * listing on stdout; LS_LIVE_AUDIT_STDERR=1 mirrors them to stderr.
 *
 * Each line: { ts, tUs, pid, scope, stage, ...fields }.
 */

import { appendFileSync } from "node:fs";
import { performance } from "node:perf_hooks";
import type { AuditSink } from "@ls-live/core";
import { type LsLiveEnv, readLsLiveEnv } from "./env.js";

type AuditRecord = Readonly<Record<string, unknown>>;

export type AuditLoggerOptions = Readonly<{
  env?: LsLiveEnv;
  stderr?: { write(chunk: string): unknown };
}>;

function nowUs(): number {
  return Math.round(performance.now() * 1000);
}

const DISABLED: AuditSink = Object.freeze({
  enabled: false,
  emit: () => {},
});

export function createAuditLogger(scope: string, opts: AuditLoggerOptions = {}): AuditSink {
  const env = opts.env ?? readLsLiveEnv();
  if (!env.audit) return DISABLED;

  const logPath = env.auditLogPath;
  const stderr = env.auditStderr ? (opts.stderr ?? process.stderr) : null;

  const writeLine = (line: string): void => {
    try {
      if (logPath !== null) appendFileSync(logPath, `${line}\n`, "utf8");
      stderr?.write(`${line}\n`);
    } catch {
      // Optional diagnostics must never affect runtime behavior.
    }
  };

  return Object.freeze({
    enabled: true,
    emit: (stage: string, fields: AuditRecord = Object.freeze({})) => {
      try {
        writeLine(
          JSON.stringify({
            ts: new Date().toISOString(),
            tUs: nowUs(),
            pid: process.pid,
            scope,
            stage,
            ...fields,
          }),
        );
      } catch {
        // Optional diagnostics must never affect runtime behavior.
      }
    },
  });
}

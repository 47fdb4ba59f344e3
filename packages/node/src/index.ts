/**
 * @ls-live/node
 *
 * Node.js bindings for @ls-live/core: filesystem reader and enumeration
 * driver, ANSI terminal, cursor probe, environment configuration and the
 * audit log.
 */

export { createNodeEntry, nodeDirectoryReader } from "./fs/reader.js";
export { listDirectory, type ListDirectoryOptions } from "./fs/listDirectory.js";
export {
  NodeTerminal,
  resolveScreenColumns,
  resolveScreenRows,
  type NodeTerminalOptions,
  type TerminalStream,
} from "./terminal/nodeTerminal.js";
export {
  CURSOR_PROBE_TIMEOUT_MS,
  parseCursorReports,
  probeCursorRow,
  type CursorPosition,
  type ProbeInput,
  type ProbeOutput,
} from "./terminal/cursorProbe.js";
export { DEFAULT_AUDIT_LOG_NAME, readLsLiveEnv, type Env, type LsLiveEnv } from "./env.js";
export { createAuditLogger, type AuditLoggerOptions } from "./audit.js";

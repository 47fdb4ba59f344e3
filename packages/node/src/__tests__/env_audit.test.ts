import { readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { assert, describe, test, withTempDir } from "@ls-live/testkit";
import { createAuditLogger } from "../audit.js";
import { readLsLiveEnv } from "../env.js";

describe("readLsLiveEnv", () => {
  test("defaults with nothing set", () => {
    assert.deepEqual(readLsLiveEnv({}), {
      noColor: false,
      audit: false,
      auditLogPath: null,
      auditStderr: false,
      cursorProbe: false,
    });
  });

  test("NO_COLOR counts only when non-empty", () => {
    assert.equal(readLsLiveEnv({ NO_COLOR: "1" }).noColor, true);
    assert.equal(readLsLiveEnv({ NO_COLOR: "" }).noColor, false);
  });

  test("audit defaults its log to the temp directory", () => {
    assert.equal(
      readLsLiveEnv({ LS_LIVE_AUDIT: "1" }).auditLogPath,
      join(tmpdir(), "ls-live-audit.ndjson"),
    );
    const custom = readLsLiveEnv({ LS_LIVE_AUDIT: "yes", LS_LIVE_AUDIT_LOG: " /var/x.ndjson " });
    assert.equal(custom.audit, true);
    assert.equal(custom.auditLogPath, "/var/x.ndjson");
  });

  test("flags accept the usual truthy spellings", () => {
    assert.equal(readLsLiveEnv({ LS_LIVE_CURSOR_PROBE: "TRUE" }).cursorProbe, true);
    assert.equal(readLsLiveEnv({ LS_LIVE_CURSOR_PROBE: "on" }).cursorProbe, true);
    assert.equal(readLsLiveEnv({ LS_LIVE_CURSOR_PROBE: "0" }).cursorProbe, false);
  });
});

describe("createAuditLogger", () => {
  test("is a no-op unless enabled", () => {
    const logger = createAuditLogger("test", { env: readLsLiveEnv({}) });
    assert.equal(logger.enabled, false);
    logger.emit("repaint", { items: 1 });
  });

  test("appends one JSON record per event", async () => {
    await withTempDir((dir) => {
      const logPath = join(dir, "audit.ndjson");
      const env = readLsLiveEnv({ LS_LIVE_AUDIT: "1", LS_LIVE_AUDIT_LOG: logPath });
      const logger = createAuditLogger("session", { env });
      logger.emit("repaint", { items: 2 });
      logger.emit("finish");

      const lines = readFileSync(logPath, "utf8").trim().split("\n");
      assert.equal(lines.length, 2);
      const first: unknown = JSON.parse(lines[0] ?? "");
      assert.equal(typeof first === "object" && first !== null, true);
      if (typeof first !== "object" || first === null) return;
      assert.equal("scope" in first && first.scope, "session");
      assert.equal("stage" in first && first.stage, "repaint");
      assert.equal("items" in first && first.items, 2);
      assert.equal("pid" in first && first.pid, process.pid);
    });
  });

  test("mirrors to stderr when asked", async () => {
    await withTempDir((dir) => {
      const mirrored: string[] = [];
      const env = readLsLiveEnv({
        LS_LIVE_AUDIT: "1",
        LS_LIVE_AUDIT_LOG: join(dir, "audit.ndjson"),
        LS_LIVE_AUDIT_STDERR: "1",
      });
      const logger = createAuditLogger("cli", {
        env,
        stderr: { write: (chunk: string) => mirrored.push(chunk) },
      });
      logger.emit("start");
      assert.equal(mirrored.length, 1);
      assert.match(mirrored[0] ?? "", /"stage":"start"/u);
    });
  });

  test("write failures never reach the caller", async () => {
    await withTempDir((dir) => {
      const env = readLsLiveEnv({
        LS_LIVE_AUDIT: "1",
        LS_LIVE_AUDIT_LOG: join(dir, "missing", "deeper", "audit.ndjson"),
      });
      assert.doesNotThrow(() => createAuditLogger("cli", { env }).emit("start"));
    });
  });
});

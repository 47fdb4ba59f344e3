import { FakeTerminal, stripAnsiCodes } from "../fakeTerminal.js";
import { assert, describe, test } from "../nodeTest.js";

describe("FakeTerminal", () => {
  test("writes lines and tracks the cursor row", () => {
    const term = new FakeTerminal({ rows: 4 });
    term.write("one\ntwo\n");
    assert.equal(term.cursorRow(), 3);
    assert.deepEqual(term.transcript(), ["one", "two"]);
  });

  test("cursor-up stops at the top of the screen", () => {
    const term = new FakeTerminal({ rows: 3 });
    term.write("a\nb\nc\nd\n");
    assert.deepEqual(term.screen(), ["c", "d", ""]);
    assert.equal(term.moveCursorUp(10), 2);
    assert.deepEqual(term.ops.at(-1), { kind: "up", requested: 10, moved: 2 });
  });

  test("clearing then writing overwrites the line", () => {
    const term = new FakeTerminal();
    term.write("long line\n");
    term.moveCursorUp(1);
    term.clearCurrentLine();
    term.write("x\n");
    assert.deepEqual(term.transcript(), ["x"]);
    assert.equal(term.count("clear"), 1);
    assert.equal(term.count("write"), 2);
  });

  test("plain transcript drops colour codes", () => {
    const term = new FakeTerminal();
    term.write("\u001b[38;5;80mname\u001b[0m\n");
    assert.deepEqual(term.plainTranscript(), ["name"]);
    assert.equal(stripAnsiCodes("\u001b[1mbold\u001b[0m"), "bold");
  });
});

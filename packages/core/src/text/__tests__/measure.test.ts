import { assert, describe, test } from "@ls-live/testkit";
import { clearTextMeasureCache, measureTextCells, stripAnsi } from "../measure.js";

describe("measureTextCells", () => {
  test("ignores SGR sequences", () => {
    assert.equal(measureTextCells("\u001b[38;5;80mabc\u001b[0m"), 3);
    assert.equal(stripAnsi("\u001b[38;5;80mabc\u001b[0m"), "abc");
  });

  test("counts wide characters as two cells", () => {
    assert.equal(measureTextCells("日本"), 4);
    assert.equal(measureTextCells("a日b"), 4);
  });

  test("combining marks and control characters take no cells", () => {
    assert.equal(measureTextCells("e\u0301"), 1);
    assert.equal(measureTextCells("a\tb"), 2);
    assert.equal(measureTextCells(""), 0);
  });

  test("cached and uncached results agree", () => {
    const text = "\u001b[1mdir/\u001b[0m";
    const first = measureTextCells(text);
    clearTextMeasureCache();
    assert.equal(measureTextCells(text), first);
    assert.equal(first, 4);
  });
});

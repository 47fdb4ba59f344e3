import { assert, describe, test } from "@ls-live/testkit";
import { isQuotedPath, quotePath } from "../path.js";

describe("quotePath", () => {
  test("leaves ordinary names alone", () => {
    assert.equal(quotePath("plain.txt"), "plain.txt");
    assert.equal(quotePath("with space.txt"), "with space.txt");
    assert.equal(quotePath("a\\b"), "a\\b");
  });

  test("quotes names with spaces or quotes at either end", () => {
    assert.equal(quotePath(" lead"), "' lead'");
    assert.equal(quotePath('say "hi"'), `'say "hi"'`);
    assert.equal(quotePath("back\\slash "), "'back\\\\slash '");
  });

  test("switches to double quotes when the name holds a single quote", () => {
    assert.equal(quotePath("it's "), `"it's "`);
    assert.equal(quotePath(`'a"b`), `"'a\\"b"`);
  });

  test("control characters are quoted and made visible", () => {
    assert.equal(quotePath("a\nb"), "'a\\nb'");
    assert.equal(quotePath("tab\there"), "'tab\\there'");
    assert.equal(quotePath("\u001b[31m"), "'\\x1b[31m'");
    assert.equal(quotePath("x\u0085"), "'x\\x85'");
  });
});

describe("isQuotedPath", () => {
  test("recognises both quote styles", () => {
    assert.equal(isQuotedPath("' lead'"), true);
    assert.equal(isQuotedPath(`"it's "`), true);
    assert.equal(isQuotedPath("plain"), false);
    assert.equal(isQuotedPath("'"), false);
  });
});

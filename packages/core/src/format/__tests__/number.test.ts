import { assert, describe, test } from "@ls-live/testkit";
import { fixedLength } from "../fixedLength.js";
import { type NumberFormatOptions, formatNumber, numberWidth } from "../number.js";

describe("fixedLength", () => {
  test("keeps as many decimals as fit", () => {
    assert.equal(fixedLength(0, 3), "  0");
    assert.equal(fixedLength(5.123, 3), "5.1");
    assert.equal(fixedLength(12.34, 3), " 12");
    assert.equal(fixedLength(999.4, 3), "999");
  });

  test("strips trailing zeros after rounding", () => {
    assert.equal(fixedLength(1.99, 3), "  2");
    assert.equal(fixedLength(1.5, 5), "  1.5");
  });

  test("returns null when the integer part does not fit, before or after rounding", () => {
    assert.equal(fixedLength(1000, 3), null);
    assert.equal(fixedLength(999.7, 3), null);
    assert.equal(fixedLength(Number.POSITIVE_INFINITY, 3), null);
    assert.equal(fixedLength(Number.NaN, 3), null);
  });

  test("negative values keep the width", () => {
    assert.equal(fixedLength(-5, 3), " -5");
  });
});

describe("formatNumber - short", () => {
  test("uses the prefix cell as a fourth digit without a unit", () => {
    assert.equal(formatNumber(0), "   0");
    assert.equal(formatNumber(999), " 999");
  });

  test("scales by 1024 from 1000 upwards", () => {
    assert.equal(formatNumber(1000), "  1k");
    assert.equal(formatNumber(1023), "  1k");
    assert.equal(formatNumber(1024), "  1k");
    assert.equal(formatNumber(1536), "1.5k");
    assert.equal(formatNumber(1024 * 1024 - 1), "  1M");
    assert.equal(formatNumber(1024 * 1024), "  1M");
  });

  test("a single-character unit takes the empty prefix cell", () => {
    assert.equal(formatNumber(0, { unit: "B" }), "  0B");
    assert.equal(formatNumber(512, { unit: "B" }), "512B");
    assert.equal(formatNumber(2048, { unit: "B" }), "  2k");
  });

  test("rounding into a fourth digit moves to the next prefix", () => {
    assert.equal(formatNumber(999.7, { unit: "B" }), "  1k");
  });

  test("placeholders for failures and overflow", () => {
    assert.equal(formatNumber(-1), " ???");
    assert.equal(formatNumber(Number.NaN), " ???");
    assert.equal(formatNumber(2 ** 120), "lots");
    assert.equal(formatNumber(Number.POSITIVE_INFINITY), "lots");
  });
});

describe("formatNumber - long", () => {
  test("five numeral cells, then prefix and unit", () => {
    assert.equal(formatNumber(0, { long: true, unit: "B" }), "    0 B ");
    assert.equal(formatNumber(1023, { long: true, unit: "B" }), " 1023 B ");
    assert.equal(formatNumber(1024, { long: true, unit: "B" }), "    1 kB");
    assert.equal(formatNumber(1536, { long: true, unit: "B" }), "  1.5 kB");
    assert.equal(formatNumber(1024 * 1024 - 1, { long: true, unit: "B" }), " 1024 kB");
    assert.equal(formatNumber(5, { long: true }), "    5  ");
  });

  test("placeholders for failures and overflow", () => {
    assert.equal(formatNumber(-1, { long: true, unit: "B" }), " ???? ? ");
    assert.equal(formatNumber(-1, { long: true }), " ????  ");
    assert.equal(formatNumber(2 ** 120, { long: true, unit: "B" }), " lots B ");
    assert.equal(formatNumber(2 ** 120, { long: true }), " lots  ");
  });
});

describe("formatNumber - fixed width", () => {
  const values = [
    0,
    1,
    999,
    1000,
    1023,
    1024,
    1024 * 1024 - 1,
    1024 * 1024,
    123_456_789,
    2 ** 120,
    -1,
  ];
  const modes: NumberFormatOptions[] = [
    {},
    { unit: "B" },
    { long: true },
    { long: true, unit: "B" },
  ];

  test("every value renders in the documented width", () => {
    assert.deepEqual(
      modes.map((m) => numberWidth(m)),
      [4, 4, 7, 8],
    );
    for (const mode of modes) {
      for (const value of values) {
        const out = formatNumber(value, mode);
        assert.equal(out.length, numberWidth(mode), `${JSON.stringify(mode)} ${String(value)}`);
      }
    }
  });

  test("negative input never renders digits", () => {
    for (const mode of modes) {
      assert.equal(/\d/u.test(formatNumber(-42, mode)), false);
    }
  });
});

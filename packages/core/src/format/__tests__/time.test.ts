import { assert, describe, test } from "@ls-live/testkit";
import { LONG_TIME_WIDTH, SHORT_TIME_WIDTH, formatTime } from "../time.js";

const nowMs = new Date(2024, 5, 15, 12, 0, 0).getTime();
const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

function ago(ms: number): string {
  return formatTime(nowMs - ms, { nowMs });
}

describe("formatTime - relative", () => {
  test("seconds below two minutes", () => {
    assert.equal(ago(0), "  0s ago");
    assert.equal(ago(30 * SECOND), " 30s ago");
    assert.equal(ago(90.5 * SECOND), " 91s ago");
  });

  test("switches unit at each cutoff", () => {
    assert.equal(ago(5 * MINUTE), "  5m ago");
    assert.equal(ago(150 * MINUTE), "2.5h ago");
    assert.equal(ago(3 * DAY), "  3d ago");
  });

  test("falls back to year and month past a hundred days", () => {
    assert.equal(formatTime(new Date(2023, 0, 10).getTime(), { nowMs }), " 2023-01");
  });

  test("future timestamps render as negative ages", () => {
    assert.equal(ago(-10 * SECOND), "-10s ago");
  });

  test("always eight cells", () => {
    const offsets = [0, 59 * SECOND, 119 * SECOND, 2 * HOUR, 47 * HOUR, 99 * DAY, 400 * DAY];
    for (const offset of offsets) {
      assert.equal(ago(offset).length, SHORT_TIME_WIDTH);
    }
    assert.equal(SHORT_TIME_WIDTH, 8);
  });
});

describe("formatTime - long", () => {
  test("local timestamp with microseconds", () => {
    const t = new Date(2024, 0, 2, 3, 4, 5, 678).getTime();
    assert.equal(formatTime(t, { long: true, nowMs }), "2024-01-02 03:04:05.678000");
    assert.equal(formatTime(t + 0.25, { long: true, nowMs }), "2024-01-02 03:04:05.678250");
    assert.equal(formatTime(t, { long: true, nowMs }).length, LONG_TIME_WIDTH);
  });
});

describe("formatTime - unknown", () => {
  test("non-finite times render as padded placeholders", () => {
    assert.equal(formatTime(Number.NaN, { nowMs }), "     ???");
    assert.equal(formatTime(Number.NaN, { long: true, nowMs }).length, LONG_TIME_WIDTH);
  });
});

import { describe, expect, it } from "vitest";
import { cycleIndex, getOptionWindow } from "./option-window.js";

describe("getOptionWindow", () => {
  const options = Array.from({ length: 25 }, (_, index) => index);

  it("returns every option when they fit", () => {
    expect(getOptionWindow([1, 2, 3], 7)).toEqual({ startIndex: 0, activeIndex: 2, options: [1, 2, 3] });
  });

  it("centres the active option and clamps at both ends", () => {
    expect(getOptionWindow(options, 12).startIndex).toBe(7);
    expect(getOptionWindow(options, 12).options).toEqual([7, 8, 9, 10, 11, 12, 13, 14, 15, 16]);
    expect(getOptionWindow(options, 0).startIndex).toBe(0);
    expect(getOptionWindow(options, 24).startIndex).toBe(15);
  });
});

describe("cycleIndex", () => {
  it("wraps in both directions", () => {
    expect(cycleIndex(0, -1, 3)).toBe(2);
    expect(cycleIndex(2, 1, 3)).toBe(0);
    expect(cycleIndex(4, 1, 0)).toBe(0);
  });
});

import { describe, it, expect } from "vitest";
import { formatPageLabel, pageLabels, toRoman } from "@/lib/pipeline/numbering/labels";

describe("toRoman", () => {
  it("writes lowercase numerals", () => {
    expect([1, 2, 3, 4, 5, 9, 14, 40, 90, 400, 1994].map(toRoman)).toEqual([
      "i", "ii", "iii", "iv", "v", "ix", "xiv", "xl", "xc", "cd", "mcmxciv",
    ]);
  });

  it("falls back to arabic below one", () => {
    expect(toRoman(0)).toBe("0");
    expect(toRoman(-3)).toBe("-3");
  });
});

describe("pageLabels", () => {
  it("numbers consecutive pages in the requested style", () => {
    expect(pageLabels(4, "roman-lower")).toEqual(["i", "ii", "iii", "iv"]);
    expect(pageLabels(3, "arabic", 7)).toEqual(["7", "8", "9"]);
    expect(formatPageLabel(12, "arabic")).toBe("12");
  });

  it("returns nothing for an empty document", () => {
    expect(pageLabels(0, "arabic")).toEqual([]);
  });

  it("blanks or replaces overridden pages and keeps counting", () => {
    expect(pageLabels(4, "arabic", 1, { "0": null, "2": "Map" })).toEqual([
      null,
      "2",
      "Map",
      "4",
    ]);
  });
});

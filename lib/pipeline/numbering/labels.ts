import type { LabelOverrides, NumberingStyle } from "../types";

const ROMAN_DIGITS: [number, string][] = [
  [1000, "m"],
  [900, "cm"],
  [500, "d"],
  [400, "cd"],
  [100, "c"],
  [90, "xc"],
  [50, "l"],
  [40, "xl"],
  [10, "x"],
  [9, "ix"],
  [5, "v"],
  [4, "iv"],
  [1, "i"],
];

/** Lowercase roman numeral. Values below 1 fall back to arabic. */
export function toRoman(value: number): string {
  if (!Number.isInteger(value) || value < 1) return String(value);
  let rest = value;
  let out = "";
  for (const [n, digits] of ROMAN_DIGITS) {
    while (rest >= n) {
      out += digits;
      rest -= n;
    }
  }
  return out;
}

export function formatPageLabel(value: number, style: NumberingStyle): string {
  return style === "roman-lower" ? toRoman(value) : String(value);
}

/**
 * Labels for `count` consecutive pages. An override of null blanks the
 * page; a string replaces its label. Numbering still advances past
 * overridden pages.
 */
export function pageLabels(
  count: number,
  style: NumberingStyle,
  start = 1,
  overrides: LabelOverrides = {}
): (string | null)[] {
  const labels: (string | null)[] = [];
  for (let i = 0; i < count; i++) {
    const override = overrides[i];
    labels.push(override === undefined ? formatPageLabel(start + i, style) : override);
  }
  return labels;
}

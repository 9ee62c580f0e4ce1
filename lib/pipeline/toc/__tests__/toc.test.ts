import { describe, it, expect } from "vitest";
import { buildToc, paginateLines, tocLines } from "@/lib/pipeline/toc/toc";
import { countPageContainers } from "@/lib/pipeline/__tests__/fake-tools";
import type { OutlineEntry } from "@/lib/pipeline/types";

const entries: OutlineEntry[] = [
  { title: "Introduction", depth: 0, sourcePage: 0 },
  { title: "Background", depth: 1, sourcePage: 2 },
  { title: "Methods", depth: 0, sourcePage: 5 },
];

describe("tocLines", () => {
  it("labels entries with the body page number and targets the merged index", () => {
    expect(tocLines(entries, 3)).toEqual([
      { title: "Introduction", depth: 0, label: "1", targetPage: 3 },
      { title: "Background", depth: 1, label: "3", targetPage: 5 },
      { title: "Methods", depth: 0, label: "6", targetPage: 8 },
    ]);
  });

  it("keeps document order and duplicate titles", () => {
    const dupes = [
      { title: "Notes", depth: 0, sourcePage: 1 },
      { title: "Notes", depth: 0, sourcePage: 4 },
    ];
    expect(tocLines(dupes, 3).map((l) => l.targetPage)).toEqual([4, 7]);
  });
});

describe("paginateLines", () => {
  it("splits at the capacity", () => {
    expect(paginateLines([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it("keeps one empty page when there are no lines", () => {
    expect(paginateLines([], 10)).toEqual([[]]);
  });
});

describe("buildToc", () => {
  const options = {
    frontMatterPageCount: 3,
    direction: "LTR" as const,
    capacity: 2,
    heading: "Contents",
  };

  it("renders one page container per TOC page", async () => {
    const toc = await buildToc(entries, options);
    expect(toc.pageCount).toBe(2);
    expect(countPageContainers(toc.html)).toBe(2);
    expect(toc.html).toContain('<h2 class="toc-heading">Contents</h2>');
    expect(toc.html.split('class="toc-heading"').length - 1).toBe(2);
    expect(toc.html).toContain(
      '<div class="toc-line depth-1" data-target="5"><span class="toc-title">Background</span>'
    );
  });

  it("renders a heading-only page for an empty outline", async () => {
    const toc = await buildToc([], options);
    expect(toc.pageCount).toBe(1);
    expect(toc.lines).toEqual([]);
    expect(countPageContainers(toc.html)).toBe(1);
    expect(toc.html).not.toContain("toc-line");
  });

  it("escapes titles", async () => {
    const toc = await buildToc([{ title: "Salt & <Pepper>", depth: 0, sourcePage: 0 }], options);
    expect(toc.html).toContain(
      '<span class="toc-title">Salt &amp; &lt;Pepper&gt;</span>'
    );
  });

  it("marks the direction for right-to-left books", async () => {
    const toc = await buildToc(entries, { ...options, direction: "RTL" });
    expect(toc.html).toContain('<div class="toc" dir="rtl">');
  });

  it("rejects a non-positive capacity", async () => {
    await expect(buildToc(entries, { ...options, capacity: 0 })).rejects.toThrow(RangeError);
  });
});

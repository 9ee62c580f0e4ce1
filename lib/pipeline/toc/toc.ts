import { formatPageLabel } from "../numbering/labels";
import { tocPageCount } from "../plan";
import { renderTemplate } from "../templates";
import type { OutlineEntry, TextDirection } from "../types";

export interface TocOptions {
  /** Front matter length, fixed before anything is rendered */
  frontMatterPageCount: number;
  direction: TextDirection;
  /** Lines per TOC page */
  capacity: number;
  heading: string;
}

export interface TocLine {
  title: string;
  depth: number;
  /** Label printed in the TOC: the body page's own arabic label */
  label: string;
  /** Zero-based index of the page in the merged document */
  targetPage: number;
}

export interface TocResult {
  html: string;
  pageCount: number;
  lines: TocLine[];
}

export function tocLines(entries: OutlineEntry[], frontMatterPageCount: number): TocLine[] {
  return entries.map((entry) => ({
    title: entry.title,
    depth: entry.depth,
    label: formatPageLabel(entry.sourcePage + 1, "arabic"),
    targetPage: entry.sourcePage + frontMatterPageCount,
  }));
}

export function paginateLines<T>(lines: T[], capacity: number): T[][] {
  const pages: T[][] = [];
  for (let i = 0; i < lines.length; i += capacity) {
    pages.push(lines.slice(i, i + capacity));
  }
  return pages.length > 0 ? pages : [[]];
}

/**
 * Build the table-of-contents pages. Every page holds at most `capacity`
 * fixed-height lines, so the page count follows from the entry count
 * without rendering.
 */
export async function buildToc(entries: OutlineEntry[], options: TocOptions): Promise<TocResult> {
  if (!Number.isInteger(options.capacity) || options.capacity < 1) {
    throw new RangeError(`TOC capacity must be a positive integer, got ${options.capacity}`);
  }
  const lines = tocLines(entries, options.frontMatterPageCount);
  const pages = paginateLines(lines, options.capacity);
  const html = await renderTemplate("toc", {
    pages,
    heading: options.heading,
    dir: options.direction.toLowerCase(),
  });
  const pageCount = tocPageCount(entries.length, options.capacity);
  return { html, pageCount, lines };
}

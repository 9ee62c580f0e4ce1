import type { OutlineReader } from "../tools/types";
import type { OutlineEntry, RawDocument, RawOutlineNode } from "../types";

export interface ExtractOutlineOptions {
  /** Deepest level kept; 1 keeps chapters and their sections */
  maxDepth: number;
}

export interface SkippedOutlineEntry {
  title: string;
  depth: number;
  page?: number;
  reason: "no-page" | "out-of-range";
}

export interface OutlineExtraction {
  entries: OutlineEntry[];
  skipped: SkippedOutlineEntry[];
}

/**
 * Read a rendered document's bookmarks into a flat, document-ordered list.
 * Bookmarks without a usable page anchor are reported, not fatal. Reader
 * failures propagate as ExtractionError.
 */
export async function extractOutline(
  doc: RawDocument,
  reader: OutlineReader,
  options: ExtractOutlineOptions
): Promise<OutlineExtraction> {
  const tree = await reader.readOutline(doc);
  return flattenOutline(tree, doc.pageCount, options.maxDepth);
}

export function flattenOutline(
  tree: RawOutlineNode[],
  pageCount: number,
  maxDepth: number
): OutlineExtraction {
  const entries: OutlineEntry[] = [];
  const skipped: SkippedOutlineEntry[] = [];

  const visit = (nodes: RawOutlineNode[], depth: number) => {
    if (depth > maxDepth) return;
    for (const node of nodes) {
      const title = node.title.trim();
      if (node.page === undefined) {
        skipped.push({ title, depth, reason: "no-page" });
      } else if (node.page < 0 || node.page >= pageCount) {
        skipped.push({ title, depth, page: node.page, reason: "out-of-range" });
      } else {
        entries.push({ title, depth, sourcePage: node.page });
      }
      visit(node.children, depth + 1);
    }
  };

  visit(tree, 0);
  return { entries, skipped };
}

/** Newspaper mode: a column page's heading lands on the sheet holding it. */
export function mapToSheets(entries: OutlineEntry[], columns: number): OutlineEntry[] {
  return entries.map((entry) => ({
    ...entry,
    sourcePage: Math.floor(entry.sourcePage / columns),
  }));
}

export function describeSkipped(entry: SkippedOutlineEntry): string {
  return entry.reason === "no-page"
    ? `Outline entry "${entry.title}" has no page anchor`
    : `Outline entry "${entry.title}" points at page ${entry.page}, outside the document`;
}

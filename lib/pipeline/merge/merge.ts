import { ToolError } from "../errors";
import type { PdfMerger } from "../tools/types";
import type { PageLabelRange, RawDocument } from "../types";

export interface MergeOptions {
  reversedBinding: boolean;
  frontMatterPageCount: number;
  /** Path without extension for the files written, e.g. "/tmp/job/merged" */
  outputStem: string;
  /** Called once the merge is done and rotation is about to start */
  onRotate?: () => void;
}

export interface MergeResult {
  /** Merged document before rotation */
  merged: RawDocument;
  /** Final document; the rotated copy when binding is reversed */
  final: RawDocument;
}

export function mergedPageLabelRanges(frontMatterPageCount: number): PageLabelRange[] {
  const ranges: PageLabelRange[] = [];
  if (frontMatterPageCount > 0) ranges.push({ startIndex: 0, style: "roman-lower", start: 1 });
  ranges.push({ startIndex: frontMatterPageCount, style: "arabic", start: 1 });
  return ranges;
}

/**
 * Front matter then body, with a page label tree that restarts arabic
 * numbering at the first body page. Reversed binding turns every page
 * 180° without reordering.
 */
export async function mergeDocuments(
  front: RawDocument,
  body: RawDocument,
  options: MergeOptions,
  merger: PdfMerger
): Promise<MergeResult> {
  const concatenated = await merger.concat([front, body], `${options.outputStem}.concat.pdf`);
  const expected = front.pageCount + body.pageCount;
  if (concatenated.pageCount !== expected) {
    throw new ToolError(
      "merge",
      "failed",
      `merged document has ${concatenated.pageCount} pages, expected ${expected}`
    );
  }
  const merged = await merger.applyPageLabels(
    concatenated,
    mergedPageLabelRanges(options.frontMatterPageCount),
    `${options.outputStem}.pdf`
  );
  if (!options.reversedBinding) return { merged, final: merged };
  options.onRotate?.();
  const rotated = await merger.rotate180(merged, `${options.outputStem}.rotated.pdf`);
  return { merged, final: rotated };
}

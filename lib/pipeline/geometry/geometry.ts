import { GeometryError } from "../errors";
import { validateGutter } from "../plan";
import type { PdfEditor } from "../tools/types";
import type { BindingEdge, PageSize, RawDocument } from "../types";

export interface GeometryOptions {
  trimSize: PageSize;
  gutterOffset: number;
  bindingEdge: BindingEdge;
  /** Apply the alternating gutter shift (booklet mode) */
  shift: boolean;
  /** Index of this document's first page in the merged output */
  firstPageIndex: number;
  outputPath: string;
}

const EPSILON = 0.01;

/**
 * Signed shift per page. Even final indices move away from a left spine,
 * odd ones the other way; a right-hand spine flips both.
 */
export function gutterOffsets(
  pageCount: number,
  gutterOffset: number,
  bindingEdge: BindingEdge,
  firstPageIndex: number
): number[] {
  const offsets: number[] = [];
  for (let i = 0; i < pageCount; i++) {
    if (gutterOffset === 0) {
      offsets.push(0);
      continue;
    }
    let sign = (firstPageIndex + i) % 2 === 0 ? 1 : -1;
    if (bindingEdge === "right") sign = -sign;
    offsets.push(sign * gutterOffset);
  }
  return offsets;
}

export function checkGeometry(doc: RawDocument, options: GeometryOptions): void {
  const { trimSize, gutterOffset } = options;
  if (
    trimSize.width > doc.pageSize.width + EPSILON ||
    trimSize.height > doc.pageSize.height + EPSILON
  ) {
    throw new GeometryError(
      `Trim size ${trimSize.width}x${trimSize.height} exceeds the rendered page ${doc.pageSize.width}x${doc.pageSize.height}`
    );
  }
  if (!options.shift) return;
  validateGutter(gutterOffset, trimSize);
  const room = (doc.pageSize.width - trimSize.width) / 2;
  if (Math.abs(gutterOffset) > room + EPSILON) {
    throw new GeometryError(
      `Gutter offset ${gutterOffset}pt would move the trim box off the rendered page (${room}pt of room)`
    );
  }
}

/**
 * Crop every page to the trim box centred on the rendered page, then in
 * booklet mode apply the alternating gutter shift.
 */
export async function applyGeometry(
  doc: RawDocument,
  options: GeometryOptions,
  editor: PdfEditor
): Promise<RawDocument> {
  checkGeometry(doc, options);
  const shifting = options.shift && options.gutterOffset !== 0;
  const cropPath = shifting ? options.outputPath.replace(/\.pdf$/, "") + ".crop.pdf" : options.outputPath;
  const cropped = await editor.crop(doc, options.trimSize, cropPath);
  if (!shifting) return cropped;

  const offsets = gutterOffsets(
    cropped.pageCount,
    options.gutterOffset,
    options.bindingEdge,
    options.firstPageIndex
  );
  return editor.shift(cropped, offsets, options.outputPath);
}

import type { PdfEditor } from "../tools/types";
import type { LabelOverrides, NumberingStyle, RawDocument } from "../types";
import { pageLabels } from "./labels";

export interface NumberingOptions {
  style: NumberingStyle;
  start?: number;
  overrides?: LabelOverrides;
  fontSize: number;
  /** Bottom margin of the trimmed page; labels sit halfway up it */
  bottomMargin: number;
  outputPath: string;
}

export interface NumberedDocument {
  doc: RawDocument;
  labels: (string | null)[];
}

/** Stamp one label per page at the bottom centre. Page order and boxes are untouched. */
export async function numberPages(
  doc: RawDocument,
  options: NumberingOptions,
  editor: PdfEditor
): Promise<NumberedDocument> {
  const labels = pageLabels(doc.pageCount, options.style, options.start ?? 1, options.overrides);
  const stamped = await editor.stamp(
    doc,
    labels,
    { fontSize: options.fontSize, baseline: options.bottomMargin / 2 },
    options.outputPath
  );
  return { doc: stamped, labels };
}

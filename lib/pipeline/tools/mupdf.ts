import fs from "node:fs";
import mupdf, { type Document as MupdfDocument, type PDFDocument, type PDFObject } from "mupdf";
import { BookPressError, ExtractionError, GeometryError, ToolError, errorMessage } from "../errors";
import type { PageLabelRange, PageSize, RawDocument, RawOutlineNode } from "../types";
import type { OutlineReader, PdfEditor, PdfMerger, StampStyle } from "./types";

type Box = [number, number, number, number];

const BOX_KEYS = ["MediaBox", "CropBox", "TrimBox"] as const;
const STAMP_FONT = "BPNum";
const EPSILON = 0.01;

// Helvetica advance widths (1/1000 em) for the characters page labels use
const HELVETICA_WIDTHS: Record<string, number> = {
  " ": 278,
  "-": 333,
  ".": 278,
  i: 222,
  l: 222,
  v: 500,
  x: 500,
  c: 500,
  d: 556,
  m: 833,
};
const HELVETICA_DEFAULT_WIDTH = 556;

// ============================================================================
// Document access
// ============================================================================

export function openPdf(filePath: string): PDFDocument {
  const doc = mupdf.Document.openDocument(fs.readFileSync(filePath), "application/pdf");
  const pdf = doc.asPDF();
  if (!pdf) {
    throw new ToolError("mupdf", "failed", `${filePath} is not a PDF`);
  }
  return pdf;
}

function savePdf(pdf: PDFDocument, outputPath: string): RawDocument {
  fs.writeFileSync(outputPath, pdf.saveToBuffer("garbage,compress").asUint8Array());
  return describePdf(pdf, outputPath);
}

function describePdf(pdf: PDFDocument, filePath: string): RawDocument {
  const pageCount = pdf.countPages();
  if (pageCount === 0) {
    return { path: filePath, pageCount, pageSize: { width: 0, height: 0 } };
  }
  const [x0, y0, x1, y1] = readBox(pdf.findPage(0));
  return { path: filePath, pageCount, pageSize: { width: x1 - x0, height: y1 - y0 } };
}

/** Page count and first-page size of a PDF on disk. */
export function inspectPdf(filePath: string): RawDocument {
  return withMupdf(`inspect ${filePath}`, () => describePdf(openPdf(filePath), filePath));
}

function withMupdf<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof BookPressError) throw err;
    throw new ToolError("mupdf", "failed", `${operation}: ${errorMessage(err)}`);
  }
}

// ============================================================================
// Page boxes
// ============================================================================

export function readBox(page: PDFObject): Box {
  const box = page.getInheritable("MediaBox");
  if (!box.isArray()) {
    throw new ToolError("mupdf", "failed", "page has no MediaBox");
  }
  const a = box.get(0).asNumber();
  const b = box.get(1).asNumber();
  const c = box.get(2).asNumber();
  const d = box.get(3).asNumber();
  return [Math.min(a, c), Math.min(b, d), Math.max(a, c), Math.max(b, d)];
}

function writeBox(pdf: PDFDocument, page: PDFObject, box: Box): void {
  for (const key of BOX_KEYS) {
    const arr = pdf.newArray();
    for (const value of box) arr.push(value);
    page.put(key, arr);
  }
}

// ============================================================================
// Stamping
// ============================================================================

function textWidth(text: string, fontSize: number): number {
  let units = 0;
  for (const ch of text) units += HELVETICA_WIDTHS[ch] ?? HELVETICA_DEFAULT_WIDTH;
  return (units * fontSize) / 1000;
}

/** Escape a label for a PDF literal string. Non-ASCII characters become "?". */
export function pdfString(text: string): string {
  return text
    .replace(/[^\x20-\x7e]/g, "?")
    .replace(/\\/g, "\\\\")
    .replace(/\(/g, "\\(")
    .replace(/\)/g, "\\)");
}

function ensureFont(pdf: PDFDocument, page: PDFObject, font: PDFObject): void {
  let resources = page.getInheritable("Resources");
  if (resources.isNull()) {
    resources = pdf.newDictionary();
    page.put("Resources", resources);
  }
  let fonts = resources.get("Font");
  if (fonts.isNull()) {
    fonts = pdf.newDictionary();
    resources.put("Font", fonts);
  }
  fonts.put(STAMP_FONT, font);
}

/**
 * Wrap the existing content in q/Q so its transforms cannot leak into the
 * appended label stream.
 */
function appendContent(pdf: PDFDocument, page: PDFObject, content: string): void {
  const contents = pdf.newArray();
  contents.push(pdf.addStream("q\n", pdf.newDictionary()));
  const existing = page.get("Contents");
  if (existing.isArray()) {
    existing.forEach((stream) => {
      contents.push(stream);
    });
  } else if (!existing.isNull()) {
    contents.push(existing);
  }
  contents.push(pdf.addStream(`Q\n${content}`, pdf.newDictionary()));
  page.put("Contents", contents);
}

function createStampFont(pdf: PDFDocument): PDFObject {
  const dict = pdf.newDictionary();
  dict.put("Type", pdf.newName("Font"));
  dict.put("Subtype", pdf.newName("Type1"));
  dict.put("BaseFont", pdf.newName("Helvetica"));
  dict.put("Encoding", pdf.newName("WinAnsiEncoding"));
  return pdf.addObject(dict);
}

// ============================================================================
// Adapters
// ============================================================================

export class MupdfEditor implements PdfEditor {
  async crop(doc: RawDocument, trimSize: PageSize, outputPath: string): Promise<RawDocument> {
    return withMupdf("crop", () => {
      const pdf = openPdf(doc.path);
      const count = pdf.countPages();
      for (let i = 0; i < count; i++) {
        const page = pdf.findPage(i);
        const [x0, y0, x1, y1] = readBox(page);
        const width = x1 - x0;
        const height = y1 - y0;
        if (trimSize.width > width + EPSILON || trimSize.height > height + EPSILON) {
          throw new GeometryError(
            `Trim size ${trimSize.width}x${trimSize.height} exceeds page ${i} (${width}x${height})`
          );
        }
        const left = x0 + (width - trimSize.width) / 2;
        const bottom = y0 + (height - trimSize.height) / 2;
        writeBox(pdf, page, [left, bottom, left + trimSize.width, bottom + trimSize.height]);
      }
      return savePdf(pdf, outputPath);
    });
  }

  async shift(doc: RawDocument, offsets: number[], outputPath: string): Promise<RawDocument> {
    return withMupdf("shift", () => {
      const pdf = openPdf(doc.path);
      const count = pdf.countPages();
      if (offsets.length !== count) {
        throw new GeometryError(`Got ${offsets.length} shift offsets for ${count} pages`);
      }
      for (let i = 0; i < count; i++) {
        const page = pdf.findPage(i);
        const [x0, y0, x1, y1] = readBox(page);
        // Moving the content right is moving the visible box left
        writeBox(pdf, page, [x0 - offsets[i], y0, x1 - offsets[i], y1]);
      }
      return savePdf(pdf, outputPath);
    });
  }

  async stamp(
    doc: RawDocument,
    labels: (string | null)[],
    style: StampStyle,
    outputPath: string
  ): Promise<RawDocument> {
    return withMupdf("stamp", () => {
      const pdf = openPdf(doc.path);
      const count = pdf.countPages();
      if (labels.length !== count) {
        throw new ToolError("mupdf", "failed", `Got ${labels.length} labels for ${count} pages`);
      }
      const font = createStampFont(pdf);
      for (let i = 0; i < count; i++) {
        const label = labels[i];
        if (label === null) continue;
        const page = pdf.findPage(i);
        const [x0, y0, x1] = readBox(page);
        const text = pdfString(label);
        const x = x0 + (x1 - x0 - textWidth(text, style.fontSize)) / 2;
        const y = y0 + style.baseline;
        ensureFont(pdf, page, font);
        appendContent(
          pdf,
          page,
          `q BT /${STAMP_FONT} ${style.fontSize} Tf 1 0 0 1 ${x.toFixed(2)} ${y.toFixed(2)} Tm (${text}) Tj ET Q\n`
        );
      }
      return savePdf(pdf, outputPath);
    });
  }
}

export class MupdfMerger implements PdfMerger {
  async concat(docs: RawDocument[], outputPath: string): Promise<RawDocument> {
    return withMupdf("concat", () => {
      const out = new mupdf.PDFDocument();
      for (const doc of docs) {
        const src = openPdf(doc.path);
        const count = src.countPages();
        for (let i = 0; i < count; i++) {
          out.graftPage(-1, src, i);
        }
      }
      return savePdf(out, outputPath);
    });
  }

  async applyPageLabels(
    doc: RawDocument,
    ranges: PageLabelRange[],
    outputPath: string
  ): Promise<RawDocument> {
    return withMupdf("page labels", () => {
      const pdf = openPdf(doc.path);
      const nums = pdf.newArray();
      for (const range of ranges) {
        const label = pdf.newDictionary();
        label.put("S", pdf.newName(range.style === "roman-lower" ? "r" : "D"));
        if (range.start !== 1) label.put("St", pdf.newInteger(range.start));
        nums.push(pdf.newInteger(range.startIndex));
        nums.push(label);
      }
      const tree = pdf.newDictionary();
      tree.put("Nums", nums);
      pdf.getTrailer().get("Root").put("PageLabels", tree);
      return savePdf(pdf, outputPath);
    });
  }

  async rotate180(doc: RawDocument, outputPath: string): Promise<RawDocument> {
    return withMupdf("rotate", () => {
      const pdf = openPdf(doc.path);
      const count = pdf.countPages();
      for (let i = 0; i < count; i++) {
        const page = pdf.findPage(i);
        const current = page.getInheritable("Rotate");
        const rotation = current.isNull() ? 0 : current.asNumber();
        page.put("Rotate", pdf.newInteger((rotation + 180) % 360));
      }
      return savePdf(pdf, outputPath);
    });
  }
}

type MupdfOutlineItem = NonNullable<ReturnType<MupdfDocument["loadOutline"]>>[number];

function toOutlineNodes(items: MupdfOutlineItem[]): RawOutlineNode[] {
  return items.map((item) => ({
    title: item.title ?? "",
    page: typeof item.page === "number" && Number.isInteger(item.page) ? item.page : undefined,
    children: item.down ? toOutlineNodes(item.down) : [],
  }));
}

export class MupdfOutlineReader implements OutlineReader {
  async readOutline(doc: RawDocument): Promise<RawOutlineNode[]> {
    try {
      const source = mupdf.Document.openDocument(fs.readFileSync(doc.path), "application/pdf");
      return toOutlineNodes(source.loadOutline() ?? []);
    } catch (err) {
      throw new ExtractionError(`Cannot read outline of ${doc.path}: ${errorMessage(err)}`);
    }
  }
}

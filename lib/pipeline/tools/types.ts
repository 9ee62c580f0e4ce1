/**
 * Capability interfaces for the external tools the pipeline drives.
 *
 * Stages depend only on these. Production adapters wrap wkhtmltopdf, mupdf,
 * pdfjam and Xvfb; tests substitute in-process fakes.
 */

import type { ToolLog } from "../tool-log";
import type {
  PageLabelRange,
  PageSize,
  RawDocument,
  RawOutlineNode,
  TextDirection,
} from "../types";

/** Per-job invocation context handed to tools that spawn processes. */
export interface ToolContext {
  signal?: AbortSignal;
  /** X display for tools that need one, e.g. ":101" */
  display?: string;
  log: ToolLog;
}

export interface RenderMargins {
  top: number;
  bottom: number;
  left: number;
  right: number;
}

export interface RenderRequest {
  htmlPath: string;
  outputPath: string;
  pageSize: PageSize;
  margins: RenderMargins;
  /** Heading levels to record as bookmarks; 0 records none */
  outlineDepth: number;
  direction: TextDirection;
}

export interface HtmlRenderer {
  render(request: RenderRequest, ctx: ToolContext): Promise<RawDocument>;
}

export interface OutlineReader {
  readOutline(doc: RawDocument): Promise<RawOutlineNode[]>;
}

export interface StampStyle {
  fontSize: number;
  /** Distance between the trim edge and the text baseline */
  baseline: number;
}

export interface PdfEditor {
  /** Crop every page to `trimSize`, centred on the page. */
  crop(doc: RawDocument, trimSize: PageSize, outputPath: string): Promise<RawDocument>;
  /** Move the content of page i right by offsets[i] points. */
  shift(doc: RawDocument, offsets: number[], outputPath: string): Promise<RawDocument>;
  /** Stamp labels[i] at the bottom centre of page i; null leaves it blank. */
  stamp(
    doc: RawDocument,
    labels: (string | null)[],
    style: StampStyle,
    outputPath: string
  ): Promise<RawDocument>;
}

export interface PdfMerger {
  concat(docs: RawDocument[], outputPath: string): Promise<RawDocument>;
  applyPageLabels(
    doc: RawDocument,
    ranges: PageLabelRange[],
    outputPath: string
  ): Promise<RawDocument>;
  rotate180(doc: RawDocument, outputPath: string): Promise<RawDocument>;
}

export interface Imposer {
  /** Place `n` consecutive pages side by side on each sheet. */
  impose(
    doc: RawDocument,
    n: number,
    sheetSize: PageSize,
    outputPath: string,
    ctx: ToolContext
  ): Promise<RawDocument>;
}

export interface DisplayHandle {
  /** Value for the DISPLAY environment variable, if a display was started */
  display?: string;
  release(): Promise<void>;
}

export interface DisplayProvider {
  acquire(signal?: AbortSignal): Promise<DisplayHandle>;
}

export interface PipelineTools {
  renderer: HtmlRenderer;
  outlineReader: OutlineReader;
  editor: PdfEditor;
  merger: PdfMerger;
  imposer: Imposer;
  displays: DisplayProvider;
}

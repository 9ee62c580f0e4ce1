/**
 * Core types for the print pipeline.
 *
 * These describe the data that flows between stages. They carry no
 * behaviour and know nothing about the tools that produce them.
 */

import type { ErrorKind } from "./errors";

// ============================================================================
// Book package - caller-owned, read-only input
// ============================================================================

export type TextDirection = "LTR" | "RTL";

export interface Chapter {
  id: string;
  title: string;
  html: string;
}

export interface BookImage {
  /** Path the chapters use to reference the image, relative to the package */
  path: string;
  /** Absolute path of the image file */
  source: string;
}

export interface BookMetadata {
  title: string;
  author: string;
  language: string;
  direction: TextDirection;
  license?: string;
  copyright?: string;
  publisher?: string;
  isbn?: string;
}

export interface BookPackage {
  chapters: Chapter[];
  metadata: BookMetadata;
  images: BookImage[];
}

// ============================================================================
// Documents
// ============================================================================

/** Size in PDF points (1/72 inch). */
export interface PageSize {
  width: number;
  height: number;
}

export interface Margins {
  top: number;
  bottom: number;
  side: number;
}

/**
 * A PDF on disk. Pages are zero-indexed. Tools never modify a document in
 * place; each operation writes a new one.
 */
export interface RawDocument {
  path: string;
  pageCount: number;
  pageSize: PageSize;
}

/** Bookmark tree node as read from a PDF. */
export interface RawOutlineNode {
  title: string;
  /** Zero-based page index, absent when the bookmark has no usable anchor */
  page?: number;
  children: RawOutlineNode[];
}

export interface OutlineEntry {
  title: string;
  depth: number;
  sourcePage: number;
}

// ============================================================================
// Pagination
// ============================================================================

export type NumberingStyle = "roman-lower" | "arabic";

export type BindingEdge = "left" | "right";

export interface PaginationPlan {
  readonly frontMatterPageCount: number;
  readonly bodyPageCount: number;
  readonly frontNumbering: "roman-lower";
  readonly bodyNumbering: "arabic";
  readonly gutterOffset: number;
  readonly trimSize: Readonly<PageSize>;
  readonly bindingEdge: BindingEdge;
  readonly reversedBinding: boolean;
}

/** Page index → replacement label, or null to leave the page unstamped. */
export type LabelOverrides = Record<number, string | null>;

export interface PageLabelRange {
  startIndex: number;
  style: NumberingStyle;
  start: number;
}

// ============================================================================
// Jobs
// ============================================================================

export type OutputMode = "single" | "booklet" | "newspaper";

/** Office documents and e-books are produced outside this pipeline. */
export type ArtifactFormat =
  | "print-pdf"
  | "booklet-pdf"
  | "newspaper-pdf"
  | "office-document"
  | "epub";

export const ARTIFACT_FORMAT: Record<OutputMode, ArtifactFormat> = {
  single: "print-pdf",
  booklet: "booklet-pdf",
  newspaper: "newspaper-pdf",
};

export interface Artifact {
  path: string;
  format: ArtifactFormat;
  pageCount: number;
  /** Label stamped on each final page, null where the page was left blank */
  pageLabels: (string | null)[];
}

export type PipelineStage =
  | "START"
  | "RENDER_BODY"
  | "EXTRACT_OUTLINE"
  | "BUILD_TOC"
  | "RENDER_PRELIMINARY"
  | "GEOMETRY_BODY"
  | "IMPOSE"
  | "GEOMETRY_FRONT"
  | "NUMBER_FRONT"
  | "NUMBER_BODY"
  | "MERGE"
  | "ROTATE"
  | "DONE"
  | "FAILED";

export type JobStatus = "DONE" | "FAILED";

export interface JobFailure {
  /** "internal" for anything thrown that is not a BookPressError */
  kind: ErrorKind | "internal";
  stage: PipelineStage;
  message: string;
  diagnostic?: string;
}

export interface JobResult {
  status: JobStatus;
  /** Stages entered, in order, ending with DONE or FAILED */
  history: PipelineStage[];
  artifact?: Artifact;
  plan?: PaginationPlan;
  warnings: string[];
  /** JSONL log of the job's tool invocations, kept after the job ends */
  toolLog?: string;
  failure?: JobFailure;
}

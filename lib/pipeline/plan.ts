/**
 * Pagination planning: page sizes, margins, the TOC's fixed capacity and
 * the frozen PaginationPlan every later stage reads.
 */

import { z } from "zod/v4";
import type { AppConfig, PageSizeEntry } from "../config";
import { ConfigError, GeometryError } from "./errors";
import type {
  BindingEdge,
  BookMetadata,
  LabelOverrides,
  Margins,
  OutputMode,
  PageSize,
  PaginationPlan,
} from "./types";

export const MM_TO_POINT = 72 / 25.4;
export const INCH_TO_POINT = 72;

const UNIT_TO_POINT: Record<PageSizeEntry["unit"], number> = {
  pt: 1,
  mm: MM_TO_POINT,
  in: INCH_TO_POINT,
};

const PAGE_EXTREMA = {
  width: [1 * MM_TO_POINT, 1000 * MM_TO_POINT],
  height: [1 * MM_TO_POINT, 1414 * MM_TO_POINT],
  gutter: [-1000 * MM_TO_POINT, 1000 * MM_TO_POINT],
} as const;

// ============================================================================
// Request
// ============================================================================

const overridesSchema = z.record(z.string().regex(/^\d+$/), z.string().nullable());

export const conversionRequestSchema = z.object({
  mode: z.enum(["single", "booklet", "newspaper"]).optional(),
  /** A name from the page size table, or a custom size in points */
  pageSize: z
    .union([
      z.string(),
      z.object({ width: z.number().positive(), height: z.number().positive() }),
    ])
    .optional(),
  /** Binding gutter in points; derived from the page width when absent */
  gutter: z.number().optional(),
  reversedBinding: z.boolean().default(false),
  /** Pages imposed side by side per sheet in newspaper mode */
  columns: z.number().int().min(1).max(12).optional(),
  columnWidth: z.number().positive().optional(),
  contentsDepth: z.number().int().min(0).optional(),
  output: z.string().min(1),
  frontOverrides: overridesSchema.optional(),
  bodyOverrides: overridesSchema.optional(),
});

export type ConversionRequest = z.input<typeof conversionRequestSchema>;

export interface JobSettings {
  mode: OutputMode;
  /** Final page size; the sheet size in newspaper mode */
  trimSize: PageSize;
  margins: Margins;
  gutter: number;
  bindingEdge: BindingEdge;
  reversedBinding: boolean;
  columns: number;
  columnWidth: number;
  contentsDepth: number;
  tocCapacity: number;
  output: string;
  frontOverrides: LabelOverrides;
  bodyOverrides: LabelOverrides;
}

export function resolveJobSettings(
  request: ConversionRequest,
  config: AppConfig,
  metadata: Pick<BookMetadata, "direction">
): JobSettings {
  const parsed = conversionRequestSchema.safeParse(request);
  if (!parsed.success) {
    throw new ConfigError(`Invalid conversion request: ${z.prettifyError(parsed.error)}`);
  }
  const req = parsed.data;
  const mode = req.mode ?? config.defaults.mode;
  const trimSize = resolvePageSize(req.pageSize ?? config.defaults.page_size, config);
  const margins = computeMargins(trimSize, config);
  const gutter = mode === "booklet" ? (req.gutter ?? defaultGutter(trimSize, config)) : 0;
  validateGutter(gutter, trimSize);

  const newspaper = mode === "newspaper";
  const minColumnWidth = config.newspaper.min_column_width_mm * MM_TO_POINT;
  const columns = newspaper
    ? (req.columns ?? defaultColumnCount(trimSize.width, minColumnWidth, config.defaults.columns))
    : 1;
  const columnWidth = req.columnWidth ?? trimSize.width / columns;
  if (columnWidth * columns > trimSize.width + 0.01) {
    throw new GeometryError(
      `${columns} columns of ${columnWidth}pt do not fit a ${trimSize.width}pt sheet`
    );
  }
  if (newspaper && columnWidth < minColumnWidth - 0.01) {
    throw new GeometryError(
      `Columns of ${roundPt(columnWidth)}pt are narrower than the ${roundPt(minColumnWidth)}pt minimum`
    );
  }

  return {
    mode,
    trimSize,
    margins,
    gutter,
    bindingEdge: resolveBindingEdge(metadata.direction),
    reversedBinding: req.reversedBinding,
    columns,
    columnWidth,
    contentsDepth: req.contentsDepth ?? config.defaults.contents_depth,
    tocCapacity: tocCapacity(trimSize, margins, config),
    output: req.output,
    frontOverrides: req.frontOverrides ?? {},
    bodyOverrides: req.bodyOverrides ?? {},
  };
}

/** As many columns as fit at the minimum width, at least one. */
export function defaultColumnCount(
  sheetWidth: number,
  minColumnWidth: number,
  maxColumns: number
): number {
  return Math.max(1, Math.min(maxColumns, Math.floor(sheetWidth / minColumnWidth)));
}

function roundPt(value: number): number {
  return Math.round(value * 100) / 100;
}

// ============================================================================
// Sizes and margins
// ============================================================================

export function resolvePageSize(size: string | PageSize, config: AppConfig): PageSize {
  let resolved: PageSize;
  if (typeof size === "string") {
    const entry = config.page_sizes[size];
    if (!entry) {
      throw new ConfigError(`Unknown page size "${size}"`);
    }
    const scale = UNIT_TO_POINT[entry.unit];
    resolved = { width: entry.width * scale, height: entry.height * scale };
  } else {
    resolved = { width: size.width, height: size.height };
  }

  const [minW, maxW] = PAGE_EXTREMA.width;
  const [minH, maxH] = PAGE_EXTREMA.height;
  if (resolved.width < minW || resolved.width > maxW) {
    throw new ConfigError(`Page width ${resolved.width}pt is outside ${minW}..${maxW}pt`);
  }
  if (resolved.height < minH || resolved.height > maxH) {
    throw new ConfigError(`Page height ${resolved.height}pt is outside ${minH}..${maxH}pt`);
  }
  return resolved;
}

export function computeMargins(size: PageSize, config: AppConfig): Margins {
  const margin =
    config.margins.base + config.margins.proportional * Math.min(size.width, size.height);
  return { top: margin, bottom: margin, side: margin };
}

export function defaultGutter(size: PageSize, config: AppConfig): number {
  return config.gutter.base + config.gutter.proportional * size.width;
}

export function validateGutter(gutter: number, trimSize: PageSize): void {
  const [min, max] = PAGE_EXTREMA.gutter;
  if (!Number.isFinite(gutter) || gutter < min || gutter > max) {
    throw new GeometryError(`Invalid gutter offset ${gutter}`);
  }
  if (Math.abs(gutter) * 2 >= trimSize.width) {
    throw new GeometryError(
      `Gutter offset ${gutter}pt is too wide for a ${trimSize.width}pt page`
    );
  }
}

/**
 * The spine sits on the left of a recto page unless the book reads right to
 * left. Reversed binding only rotates the finished pages, so it never
 * changes the edge.
 */
export function resolveBindingEdge(direction: BookMetadata["direction"]): BindingEdge {
  return direction === "RTL" ? "right" : "left";
}

export interface RenderLayout {
  pageSize: PageSize;
  margins: { top: number; bottom: number; left: number; right: number };
}

/**
 * Oversized render page: the trim box plus bleed on every edge, plus room
 * for the gutter shift on both sides. Content is centred on it.
 */
export function renderLayout(
  trimSize: PageSize,
  margins: Margins,
  gutter: number,
  bleed: number
): RenderLayout {
  const shift = Math.abs(gutter);
  return {
    pageSize: {
      width: trimSize.width + 2 * (bleed + shift),
      height: trimSize.height + 2 * bleed,
    },
    margins: {
      top: bleed + margins.top,
      bottom: bleed + margins.bottom,
      left: bleed + shift + margins.side,
      right: bleed + shift + margins.side,
    },
  };
}

/** Narrow column pages for newspaper mode, rendered at their final size. */
export function columnLayout(settings: JobSettings): RenderLayout {
  const side = Math.min(settings.margins.side / 2, settings.columnWidth / 10);
  return {
    pageSize: { width: settings.columnWidth, height: settings.trimSize.height },
    margins: {
      top: settings.margins.top,
      bottom: settings.margins.bottom,
      left: side,
      right: side,
    },
  };
}

// ============================================================================
// Front matter length
// ============================================================================

/** Front matter page containers are this much shorter than the content area. */
export const PAGE_SLACK_PT = 2;

/** TOC lines that fit one page container at the fixed line height. */
export function tocCapacity(size: PageSize, margins: Margins, config: AppConfig): number {
  const lines = Math.floor(
    (size.height - margins.top - margins.bottom - PAGE_SLACK_PT) / config.toc.line_height
  );
  return Math.max(1, lines - config.toc.heading_lines);
}

export function tocPageCount(entryCount: number, capacity: number): number {
  return Math.max(1, Math.ceil(entryCount / capacity));
}

/** Title page and copyright page, one page each. */
export const PREAMBLE_PAGES = 2;

export function frontMatterPageCount(entryCount: number, capacity: number): number {
  return PREAMBLE_PAGES + tocPageCount(entryCount, capacity);
}

export function createPaginationPlan(input: {
  frontMatterPageCount: number;
  bodyPageCount: number;
  trimSize: PageSize;
  gutterOffset: number;
  bindingEdge: BindingEdge;
  reversedBinding: boolean;
}): PaginationPlan {
  return Object.freeze({
    frontMatterPageCount: input.frontMatterPageCount,
    bodyPageCount: input.bodyPageCount,
    frontNumbering: "roman-lower",
    bodyNumbering: "arabic",
    gutterOffset: input.gutterOffset,
    trimSize: Object.freeze({ ...input.trimSize }),
    bindingEdge: input.bindingEdge,
    reversedBinding: input.reversedBinding,
  });
}

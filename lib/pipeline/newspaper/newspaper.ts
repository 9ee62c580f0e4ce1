import { ToolError } from "../errors";
import type { RenderLayout } from "../plan";
import type { HtmlRenderer, Imposer, ToolContext } from "../tools/types";
import type { PageSize, RawDocument, TextDirection } from "../types";

export interface ColumnRenderOptions {
  /** Column page layout: columnWidth wide, sheet height high */
  layout: RenderLayout;
  outlineDepth: number;
  direction: TextDirection;
  outputPath: string;
}

export interface ImposeOptions {
  sheetSize: PageSize;
  columns: number;
  columnWidth: number;
  outputPath: string;
}

export function expectedSheetCount(rawPageCount: number, columns: number): number {
  return Math.ceil(rawPageCount / columns);
}

/** Render the body as narrow column pages at their final size. */
export async function renderColumns(
  bodyHtmlPath: string,
  options: ColumnRenderOptions,
  renderer: HtmlRenderer,
  ctx: ToolContext
): Promise<RawDocument> {
  return renderer.render(
    {
      htmlPath: bodyHtmlPath,
      outputPath: options.outputPath,
      pageSize: options.layout.pageSize,
      margins: options.layout.margins,
      outlineDepth: options.outlineDepth,
      direction: options.direction,
    },
    ctx
  );
}

/** Place `columns` consecutive column pages side by side on each sheet. */
export async function imposeColumns(
  columnsDoc: RawDocument,
  options: ImposeOptions,
  imposer: Imposer,
  ctx: ToolContext
): Promise<RawDocument> {
  if (options.columnWidth * options.columns > options.sheetSize.width + 0.01) {
    throw new ToolError(
      "impose",
      "failed",
      `${options.columns} columns of ${options.columnWidth}pt overflow a ${options.sheetSize.width}pt sheet`
    );
  }
  const sheets = await imposer.impose(
    columnsDoc,
    options.columns,
    options.sheetSize,
    options.outputPath,
    ctx
  );
  const expected = expectedSheetCount(columnsDoc.pageCount, options.columns);
  if (sheets.pageCount !== expected) {
    throw new ToolError(
      "impose",
      "failed",
      `imposed ${columnsDoc.pageCount} pages ${options.columns}-up into ${sheets.pageCount} sheets, expected ${expected}`
    );
  }
  return sheets;
}

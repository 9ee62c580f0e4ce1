import fs from "node:fs";
import { NumberingMismatchError } from "../errors";
import { PAGE_SLACK_PT, type RenderLayout } from "../plan";
import { PAGE_CLASS, renderTemplate } from "../templates";
import type { HtmlRenderer, ToolContext } from "../tools/types";
import type { BookMetadata, RawDocument } from "../types";

export interface PreliminaryParts {
  title: string;
  copyright: string;
  toc: string;
}

export interface PreliminaryOptions {
  metadata: BookMetadata;
  /** Page count the TOC was numbered for */
  expectedPageCount: number;
  layout: RenderLayout;
  lineHeight: number;
  headingLines: number;
  htmlPath: string;
  outputPath: string;
}

export async function renderTitlePage(metadata: BookMetadata): Promise<string> {
  return renderTemplate("title", { metadata });
}

export interface License {
  name: string;
  url?: string;
}

/** The book's license, or the default one, with a link where the table has one. */
export function resolveLicense(
  name: string | undefined,
  table: { default_license: string; licenses: Record<string, string | null> }
): License {
  const chosen = name?.trim() || table.default_license;
  const url = Object.hasOwn(table.licenses, chosen) ? table.licenses[chosen] : null;
  return url ? { name: chosen, url } : { name: chosen };
}

export async function renderCopyrightPage(
  metadata: BookMetadata,
  license: License
): Promise<string> {
  return renderTemplate("copyright", { metadata, license });
}

export async function composeFrontMatter(
  parts: PreliminaryParts,
  options: Pick<PreliminaryOptions, "metadata" | "layout" | "lineHeight" | "headingLines">
): Promise<string> {
  const { pageSize, margins } = options.layout;
  return renderTemplate("front", {
    ...parts,
    lang: options.metadata.language,
    dir: options.metadata.direction.toLowerCase(),
    page_class: PAGE_CLASS,
    content_height: pageSize.height - margins.top - margins.bottom - PAGE_SLACK_PT,
    line_height: options.lineHeight,
    heading_height: options.lineHeight * options.headingLines,
  });
}

/**
 * Render title, copyright and TOC pages, in that order, into one raw
 * document. Its length must match the count the TOC was numbered for.
 */
export async function assemblePreliminary(
  parts: PreliminaryParts,
  renderer: HtmlRenderer,
  ctx: ToolContext,
  options: PreliminaryOptions
): Promise<RawDocument> {
  const html = await composeFrontMatter(parts, options);
  fs.writeFileSync(options.htmlPath, html);

  const doc = await renderer.render(
    {
      htmlPath: options.htmlPath,
      outputPath: options.outputPath,
      pageSize: options.layout.pageSize,
      margins: options.layout.margins,
      outlineDepth: 0,
      direction: options.metadata.direction,
    },
    ctx
  );

  if (doc.pageCount !== options.expectedPageCount) {
    throw new NumberingMismatchError(options.expectedPageCount, doc.pageCount);
  }
  return doc;
}

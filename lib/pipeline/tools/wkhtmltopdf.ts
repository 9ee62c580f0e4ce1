import fs from "node:fs";
import { RenderError, ToolError } from "../errors";
import { MM_TO_POINT } from "../plan";
import type { RawDocument } from "../types";
import { runTool } from "./exec";
import { inspectPdf } from "./mupdf";
import type { HtmlRenderer, RenderRequest, ToolContext } from "./types";

export interface WkhtmltopdfOptions {
  command: string;
  extraArgs: string[];
  timeoutMs: number;
}

function mm(points: number): string {
  return `${(points / MM_TO_POINT).toFixed(2)}mm`;
}

export function wkhtmltopdfArgs(request: RenderRequest, extraArgs: string[] = []): string[] {
  const { pageSize, margins, outlineDepth } = request;
  return [
    "-q",
    "--page-width", mm(pageSize.width),
    "--page-height", mm(pageSize.height),
    "--margin-top", mm(margins.top),
    "--margin-bottom", mm(margins.bottom),
    "--margin-left", mm(margins.left),
    "--margin-right", mm(margins.right),
    "--encoding", "utf-8",
    "--enable-local-file-access",
    "--disable-smart-shrinking",
    "--print-media-type",
    ...(outlineDepth > 0
      ? ["--outline", "--outline-depth", String(outlineDepth)]
      : ["--no-outline"]),
    ...extraArgs,
    request.htmlPath,
    request.outputPath,
  ];
}

/**
 * Renders HTML through wkhtmltopdf. Its bookmark outline follows the
 * document's h1..hN headings, which is what the TOC is built from.
 */
export class WkhtmltopdfRenderer implements HtmlRenderer {
  constructor(private readonly options: WkhtmltopdfOptions) {}

  async render(request: RenderRequest, ctx: ToolContext): Promise<RawDocument> {
    const args = wkhtmltopdfArgs(request, this.options.extraArgs);
    const env = ctx.display ? { ...process.env, DISPLAY: ctx.display } : process.env;
    try {
      await runTool("wkhtmltopdf", this.options.command, args, {
        timeoutMs: this.options.timeoutMs,
        signal: ctx.signal,
        env,
        log: ctx.log,
      });
    } catch (err) {
      if (err instanceof ToolError && (err.reason === "exit" || err.reason === "spawn")) {
        throw new RenderError(`Rendering ${request.htmlPath} failed: ${err.message}`, err.stderr);
      }
      throw err;
    }

    if (!fs.existsSync(request.outputPath)) {
      throw new RenderError(`wkhtmltopdf wrote no output for ${request.htmlPath}`);
    }
    const doc = inspectPdf(request.outputPath);
    if (doc.pageCount === 0) {
      throw new RenderError(`${request.htmlPath} rendered to an empty document`);
    }
    return doc;
  }
}

import type { PageSize, RawDocument } from "../types";
import { runTool } from "./exec";
import { inspectPdf } from "./mupdf";
import type { Imposer, ToolContext } from "./types";

export interface PdfjamOptions {
  command: string;
  timeoutMs: number;
}

export function pdfjamArgs(
  inputPath: string,
  n: number,
  sheetSize: PageSize,
  outputPath: string
): string[] {
  return [
    "--quiet",
    "--nup", `${n}x1`,
    "--papersize", `{${sheetSize.width.toFixed(2)}bp,${sheetSize.height.toFixed(2)}bp}`,
    "--delta", "0 0",
    "--scale", "1",
    "--outfile", outputPath,
    inputPath,
  ];
}

/** N-up imposition through pdfjam: n consecutive pages side by side per sheet. */
export class PdfjamImposer implements Imposer {
  constructor(private readonly options: PdfjamOptions) {}

  async impose(
    doc: RawDocument,
    n: number,
    sheetSize: PageSize,
    outputPath: string,
    ctx: ToolContext
  ): Promise<RawDocument> {
    await runTool("pdfjam", this.options.command, pdfjamArgs(doc.path, n, sheetSize, outputPath), {
      timeoutMs: this.options.timeoutMs,
      signal: ctx.signal,
      log: ctx.log,
    });
    return inspectPdf(outputPath);
  }
}

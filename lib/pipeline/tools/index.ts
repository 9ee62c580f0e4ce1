import type { AppConfig } from "../../config";
import { MupdfEditor, MupdfMerger, MupdfOutlineReader } from "./mupdf";
import { PdfjamImposer } from "./pdfjam";
import type { PipelineTools } from "./types";
import { WkhtmltopdfRenderer } from "./wkhtmltopdf";
import { NullDisplayProvider, XvfbDisplayProvider } from "./xvfb";

export type * from "./types";
export { runTool } from "./exec";
export { inspectPdf } from "./mupdf";

/** Production tool set built from configuration. */
export function createDefaultTools(config: AppConfig): PipelineTools {
  const { tools, virtual_display: display } = config;
  return {
    renderer: new WkhtmltopdfRenderer({
      command: tools.wkhtmltopdf,
      extraArgs: tools.wkhtmltopdf_extra_args,
      timeoutMs: tools.timeout_ms,
    }),
    outlineReader: new MupdfOutlineReader(),
    editor: new MupdfEditor(),
    merger: new MupdfMerger(),
    imposer: new PdfjamImposer({ command: tools.pdfjam, timeoutMs: tools.timeout_ms }),
    displays: display.enabled
      ? new XvfbDisplayProvider({
          command: tools.xvfb,
          firstDisplay: display.first_display,
          displayCount: display.display_count,
          screen: display.screen,
        })
      : new NullDisplayProvider(),
  };
}

import { describe, it, expect } from "vitest";
import { pdfjamArgs } from "@/lib/pipeline/tools/pdfjam";
import { wkhtmltopdfArgs } from "@/lib/pipeline/tools/wkhtmltopdf";
import type { RenderRequest } from "@/lib/pipeline/tools/types";

const request: RenderRequest = {
  htmlPath: "/work/body.html",
  outputPath: "/work/body.raw.pdf",
  pageSize: { width: 595.2756, height: 841.8898 },
  margins: { top: 72, bottom: 72, left: 36, right: 36 },
  outlineDepth: 2,
  direction: "LTR",
};

describe("wkhtmltopdfArgs", () => {
  it("sizes the page in millimetres and enables the outline", () => {
    expect(wkhtmltopdfArgs(request)).toEqual([
      "-q",
      "--page-width", "210.00mm",
      "--page-height", "297.00mm",
      "--margin-top", "25.40mm",
      "--margin-bottom", "25.40mm",
      "--margin-left", "12.70mm",
      "--margin-right", "12.70mm",
      "--encoding", "utf-8",
      "--enable-local-file-access",
      "--disable-smart-shrinking",
      "--print-media-type",
      "--outline", "--outline-depth", "2",
      "/work/body.html",
      "/work/body.raw.pdf",
    ]);
  });

  it("turns the outline off at depth zero and passes extra arguments before the paths", () => {
    const args = wkhtmltopdfArgs({ ...request, outlineDepth: 0 }, ["--dpi", "300"]);
    expect(args).toContain("--no-outline");
    expect(args).not.toContain("--outline");
    expect(args.slice(-4)).toEqual(["--dpi", "300", "/work/body.html", "/work/body.raw.pdf"]);
  });
});

describe("pdfjamArgs", () => {
  it("imposes n pages across one sheet", () => {
    expect(pdfjamArgs("/work/columns.pdf", 4, { width: 400, height: 600 }, "/work/sheets.pdf")).toEqual([
      "--quiet",
      "--nup", "4x1",
      "--papersize", "{400.00bp,600.00bp}",
      "--delta", "0 0",
      "--scale", "1",
      "--outfile", "/work/sheets.pdf",
      "/work/columns.pdf",
    ]);
  });
});

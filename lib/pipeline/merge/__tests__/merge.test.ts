import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ToolError } from "@/lib/pipeline/errors";
import { mergeDocuments, mergedPageLabelRanges } from "@/lib/pipeline/merge/merge";
import type { PdfMerger } from "@/lib/pipeline/tools/types";
import { FakeMerger, createFakeDocument, readModel } from "@/lib/pipeline/__tests__/fake-tools";

const size = { width: 400, height: 600 };

describe("mergedPageLabelRanges", () => {
  it("starts roman at zero and arabic at the first body page", () => {
    expect(mergedPageLabelRanges(3)).toEqual([
      { startIndex: 0, style: "roman-lower", start: 1 },
      { startIndex: 3, style: "arabic", start: 1 },
    ]);
  });

  it("omits the roman range without front matter", () => {
    expect(mergedPageLabelRanges(0)).toEqual([{ startIndex: 0, style: "arabic", start: 1 }]);
  });
});

describe("mergeDocuments", () => {
  let tmpDir: string;
  let front: ReturnType<typeof createFakeDocument>;
  let body: ReturnType<typeof createFakeDocument>;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "merge-test-"));
    front = createFakeDocument(path.join(tmpDir, "front.pdf"), 2, size, "front");
    body = createFakeDocument(path.join(tmpDir, "body.pdf"), 3, size, "body");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("puts the front matter first and labels both ranges", async () => {
    const { merged, final } = await mergeDocuments(
      front,
      body,
      { reversedBinding: false, frontMatterPageCount: 2, outputStem: path.join(tmpDir, "merged") },
      new FakeMerger()
    );

    expect(final).toBe(merged);
    expect(final.path).toBe(path.join(tmpDir, "merged.pdf"));
    const model = readModel(final.path);
    expect(model.pages.map((p) => p.source)).toEqual([
      "front:0", "front:1", "body:0", "body:1", "body:2",
    ]);
    expect(model.pageLabels?.[1]).toEqual({ startIndex: 2, style: "arabic", start: 1 });
  });

  it("rotates every page for reversed binding", async () => {
    let rotateCalls = 0;
    const { final } = await mergeDocuments(
      front,
      body,
      {
        reversedBinding: true,
        frontMatterPageCount: 2,
        outputStem: path.join(tmpDir, "merged"),
        onRotate: () => rotateCalls++,
      },
      new FakeMerger()
    );

    expect(rotateCalls).toBe(1);
    const model = readModel(final.path);
    expect(model.pages.map((p) => p.rotate)).toEqual([180, 180, 180, 180, 180]);
    expect(model.pages.map((p) => p.source)[0]).toBe("front:0");
  });

  it("fails when pages go missing in concatenation", async () => {
    const lossy: PdfMerger = {
      concat: async () => ({ ...front, pageCount: 4 }),
      applyPageLabels: async (doc) => doc,
      rotate180: async (doc) => doc,
    };
    const err = await mergeDocuments(
      front,
      body,
      { reversedBinding: false, frontMatterPageCount: 2, outputStem: path.join(tmpDir, "merged") },
      lossy
    ).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolError);
    expect(err).toHaveProperty("message", "merge: merged document has 4 pages, expected 5");
  });
});

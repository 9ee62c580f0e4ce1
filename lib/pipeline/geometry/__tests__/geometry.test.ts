import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { GeometryError } from "@/lib/pipeline/errors";
import { applyGeometry, checkGeometry, gutterOffsets } from "@/lib/pipeline/geometry/geometry";
import { FakeEditor, createFakeDocument, readModel } from "@/lib/pipeline/__tests__/fake-tools";

describe("gutterOffsets", () => {
  it("alternates by final page index", () => {
    expect(gutterOffsets(4, 10, "left", 0)).toEqual([10, -10, 10, -10]);
    expect(gutterOffsets(3, 10, "left", 3)).toEqual([-10, 10, -10]);
  });

  it("mirrors for a right-hand spine", () => {
    expect(gutterOffsets(2, 10, "right", 0)).toEqual([-10, 10]);
  });

  it("is all zero without a gutter", () => {
    expect(gutterOffsets(3, 0, "left", 1)).toEqual([0, 0, 0]);
  });
});

describe("applyGeometry", () => {
  let tmpDir: string;
  const editor = new FakeEditor();
  const trimSize = { width: 400, height: 600 };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "geometry-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const options = (overrides: Partial<Parameters<typeof applyGeometry>[1]> = {}) => ({
    trimSize,
    gutterOffset: 10,
    bindingEdge: "left" as const,
    shift: true,
    firstPageIndex: 0,
    outputPath: path.join(tmpDir, "out.pdf"),
    ...overrides,
  });

  it("crops to the centred trim box and shifts alternate pages", async () => {
    const doc = createFakeDocument(path.join(tmpDir, "raw.pdf"), 3, { width: 492, height: 672 });
    const result = await applyGeometry(doc, options(), editor);

    expect(result.pageCount).toBe(3);
    expect(result.pageSize).toEqual(trimSize);
    expect(readModel(result.path).pages.map((p) => p.box)).toEqual([
      [36, 36, 436, 636],
      [56, 36, 456, 636],
      [36, 36, 436, 636],
    ]);
    expect(fs.existsSync(path.join(tmpDir, "out.crop.pdf"))).toBe(true);
  });

  it("only crops when shifting is off", async () => {
    const doc = createFakeDocument(path.join(tmpDir, "raw.pdf"), 2, { width: 492, height: 672 });
    const result = await applyGeometry(doc, options({ shift: false }), editor);

    expect(readModel(result.path).pages.map((p) => p.box[0])).toEqual([46, 46]);
    expect(fs.existsSync(path.join(tmpDir, "out.crop.pdf"))).toBe(false);
  });

  it("preserves page count for an empty document", async () => {
    const doc = createFakeDocument(path.join(tmpDir, "raw.pdf"), 0, { width: 492, height: 672 });
    const result = await applyGeometry(
      { ...doc, pageSize: { width: 492, height: 672 } },
      options(),
      editor
    );
    expect(result.pageCount).toBe(0);
  });

  it("rejects a trim box larger than the rendered page", () => {
    const doc = { path: "raw.pdf", pageCount: 1, pageSize: { width: 300, height: 672 } };
    expect(() => checkGeometry(doc, options())).toThrow(GeometryError);
  });

  it("rejects a shift with no room on the rendered page", () => {
    const doc = { path: "raw.pdf", pageCount: 1, pageSize: { width: 410, height: 672 } };
    expect(() => checkGeometry(doc, options())).toThrow(
      "Gutter offset 10pt would move the trim box off the rendered page (5pt of room)"
    );
  });
});

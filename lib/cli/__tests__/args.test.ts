import { describe, it, expect } from "vitest";
import { parseConvertArgs, parseSize } from "../args";

describe("parseSize", () => {
  it("reads WxH as a custom size in points", () => {
    expect(parseSize("400x600")).toEqual({ width: 400, height: 600 });
    expect(parseSize("420.5x595")).toEqual({ width: 420.5, height: 595 });
  });

  it("passes names through", () => {
    expect(parseSize("A4")).toBe("A4");
  });
});

describe("parseConvertArgs", () => {
  it("builds a request from the flags", () => {
    expect(
      parseConvertArgs([
        "books/sample",
        "out/sample.pdf",
        "--mode", "newspaper",
        "--size", "A3 (NZ Tabloid)",
        "--columns", "3",
        "--contents-depth", "2",
        "--reversed",
        "--config", "custom.yaml",
      ])
    ).toEqual({
      bookDir: "books/sample",
      configPath: "custom.yaml",
      request: {
        mode: "newspaper",
        pageSize: "A3 (NZ Tabloid)",
        columns: 3,
        contentsDepth: 2,
        reversedBinding: true,
        output: "out/sample.pdf",
      },
    });
  });

  it("reads a gutter and column width", () => {
    const { request } = parseConvertArgs(["b", "o.pdf", "--gutter", "-12", "--column-width", "90"]);
    expect(request.gutter).toBe(-12);
    expect(request.columnWidth).toBe(90);
  });

  it("rejects unknown options and bad values", () => {
    expect(() => parseConvertArgs(["b", "o.pdf", "--color"])).toThrow("Unknown option --color");
    expect(() => parseConvertArgs(["b", "o.pdf", "--gutter", "wide"])).toThrow(
      '--gutter expects a number, got "wide"'
    );
    expect(() => parseConvertArgs(["b", "o.pdf", "--mode", "scroll"])).toThrow(
      '--mode must be one of single, booklet, newspaper, got "scroll"'
    );
    expect(() => parseConvertArgs(["b", "o.pdf", "--size"])).toThrow("--size needs a value");
  });

  it("requires a book directory and an output path", () => {
    expect(() => parseConvertArgs(["b"])).toThrow("Expected <book_dir> <output.pdf>");
    expect(() => parseConvertArgs(["b", "o.pdf", "extra"])).toThrow(
      "Expected <book_dir> <output.pdf>"
    );
  });
});

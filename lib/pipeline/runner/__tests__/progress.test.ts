import { describe, it, expect } from "vitest";
import { createCallbackProgress, formatStageName } from "@/lib/pipeline/runner";

describe("formatStageName", () => {
  it("names stages for people", () => {
    expect(formatStageName("RENDER_PRELIMINARY")).toBe("front matter rendering");
    expect(formatStageName("IMPOSE")).toBe("imposition");
  });
});

describe("createCallbackProgress", () => {
  it("turns events into one-line messages", () => {
    const messages: string[] = [];
    const progress = createCallbackProgress((m) => messages.push(m));

    progress.emit({ type: "stage-start", stage: "RENDER_BODY" });
    progress.emit({ type: "warning", stage: "EXTRACT_OUTLINE", message: "no outline" });
    progress.emit({ type: "job-done", path: "/out/book.pdf", pageCount: 12 });
    progress.emit({ type: "job-failed", stage: "MERGE", error: "merge: failed" });

    expect(messages).toEqual([
      "Starting body rendering",
      "Warning: no outline",
      "Done: 12 pages",
      "Failed: merge: failed",
    ]);
  });
});

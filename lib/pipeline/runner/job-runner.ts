/**
 * Conversion job runner.
 *
 * Drives one book through the pipeline as a linear sequence of stages:
 * render the body, read its outline, fix the front matter length, render
 * the front matter, then geometry and numbering on both documents before
 * merging them. Any failure ends the job in FAILED; nothing is retried.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { composeBody } from "../body/compose-body";
import { BookPressError, CancelledError, ConfigError, ExtractionError, ToolError, errorMessage } from "../errors";
import { applyGeometry } from "../geometry/geometry";
import { mergeDocuments } from "../merge/merge";
import { expectedSheetCount, imposeColumns, renderColumns } from "../newspaper/newspaper";
import { numberPages } from "../numbering/numbering";
import { describeSkipped, extractOutline, mapToSheets } from "../outline/outline";
import {
  columnLayout,
  createPaginationPlan,
  frontMatterPageCount,
  renderLayout,
  resolveJobSettings,
  type ConversionRequest,
  type JobSettings,
} from "../plan";
import {
  assemblePreliminary,
  renderCopyrightPage,
  renderTitlePage,
  resolveLicense,
} from "../preliminary/preliminary";
import { buildToc } from "../toc/toc";
import { createFileToolLog, toolLogPath } from "../tool-log";
import type { DisplayHandle, ToolContext } from "../tools/types";
import {
  ARTIFACT_FORMAT,
  type BookPackage,
  type JobFailure,
  type JobResult,
  type OutlineEntry,
  type PaginationPlan,
  type PipelineStage,
  type RawDocument,
} from "../types";
import { nullProgress, type JobRunnerDeps } from "./types";

/** Outline depth 0 is h1; wkhtmltopdf counts levels from 1. */
function rendererOutlineDepth(contentsDepth: number): number {
  return contentsDepth + 1;
}

function stageImages(book: BookPackage, scratch: string): void {
  for (const image of book.images) {
    const relative = path.normalize(image.path);
    if (path.isAbsolute(relative) || relative.startsWith("..")) {
      throw new ConfigError(`Image path "${image.path}" must stay inside the book package`);
    }
    const dest = path.join(scratch, relative);
    fs.mkdirSync(path.dirname(dest), { recursive: true });
    fs.copyFileSync(image.source, dest);
  }
}

function toFailure(err: unknown, stage: PipelineStage, signal?: AbortSignal): JobFailure {
  if (signal?.aborted || err instanceof CancelledError) {
    return { kind: "cancelled", stage, message: "Job cancelled" };
  }
  if (err instanceof BookPressError) {
    return { kind: err.kind, stage, message: err.message, diagnostic: err.diagnostic };
  }
  return { kind: "internal", stage, message: errorMessage(err) };
}

export async function runConversionJob(
  book: BookPackage,
  request: ConversionRequest,
  deps: JobRunnerDeps
): Promise<JobResult> {
  const { config, tools, signal } = deps;
  const progress = deps.progress ?? nullProgress;
  const history: PipelineStage[] = [];
  const warnings: string[] = [];
  let stage: PipelineStage = "START";
  let plan: PaginationPlan | undefined;
  let scratch: string | undefined;
  let display: DisplayHandle | undefined;
  let toolLog: string | undefined;

  const enter = (next: PipelineStage) => {
    if (signal?.aborted) throw new CancelledError();
    if (history.length > 0) progress.emit({ type: "stage-complete", stage });
    stage = next;
    history.push(next);
    if (next !== "DONE") progress.emit({ type: "stage-start", stage: next });
  };

  const warn = (message: string) => {
    warnings.push(message);
    progress.emit({ type: "warning", stage, message });
  };

  history.push("START");
  progress.emit({ type: "stage-start", stage: "START" });

  try {
    if (signal?.aborted) throw new CancelledError();
    const settings = resolveJobSettings(request, config, book.metadata);
    // A rerun to the same output starts the log over
    toolLog = toolLogPath(settings.output, config.log_dir);
    fs.rmSync(toolLog, { force: true });
    const scratchRoot = config.scratch_root ?? os.tmpdir();
    fs.mkdirSync(scratchRoot, { recursive: true });
    scratch = fs.mkdtempSync(path.join(scratchRoot, "book-press-"));
    const work = scratch;
    const file = (name: string) => path.join(work, name);

    display = await tools.displays.acquire(signal);
    const ctx: ToolContext = {
      signal,
      display: display.display,
      log: createFileToolLog(toolLog, config.log_max_entries),
    };

    stageImages(book, work);
    fs.writeFileSync(file("body.html"), await composeBody(book));

    // --- Body ---
    enter("RENDER_BODY");
    const newspaper = settings.mode === "newspaper";
    const pageLayout = renderLayout(
      settings.trimSize,
      settings.margins,
      settings.gutter,
      config.render_bleed
    );
    const outlineDepth = rendererOutlineDepth(settings.contentsDepth);
    const rawBody: RawDocument = newspaper
      ? await renderColumns(
          file("body.html"),
          {
            layout: columnLayout(settings),
            outlineDepth,
            direction: book.metadata.direction,
            outputPath: file("body.raw.pdf"),
          },
          tools.renderer,
          ctx
        )
      : await tools.renderer.render(
          {
            htmlPath: file("body.html"),
            outputPath: file("body.raw.pdf"),
            pageSize: pageLayout.pageSize,
            margins: pageLayout.margins,
            outlineDepth,
            direction: book.metadata.direction,
          },
          ctx
        );

    // --- Outline ---
    enter("EXTRACT_OUTLINE");
    let entries: OutlineEntry[] = [];
    try {
      const outline = await extractOutline(rawBody, tools.outlineReader, {
        maxDepth: settings.contentsDepth,
      });
      entries = outline.entries;
      for (const skipped of outline.skipped) warn(describeSkipped(skipped));
    } catch (err) {
      if (!(err instanceof ExtractionError)) throw err;
      warn(`${err.message}; continuing without a table of contents`);
    }
    if (newspaper) entries = mapToSheets(entries, settings.columns);

    // --- Front matter length is fixed here ---
    enter("BUILD_TOC");
    const frontCount = frontMatterPageCount(entries.length, settings.tocCapacity);
    plan = createPaginationPlan({
      frontMatterPageCount: frontCount,
      bodyPageCount: newspaper
        ? expectedSheetCount(rawBody.pageCount, settings.columns)
        : rawBody.pageCount,
      trimSize: settings.trimSize,
      gutterOffset: settings.gutter,
      bindingEdge: settings.bindingEdge,
      reversedBinding: settings.reversedBinding,
    });
    const toc = await buildToc(entries, {
      frontMatterPageCount: plan.frontMatterPageCount,
      direction: book.metadata.direction,
      capacity: settings.tocCapacity,
      heading: config.front_matter.toc_heading,
    });

    enter("RENDER_PRELIMINARY");
    const rawFront = await assemblePreliminary(
      {
        title: await renderTitlePage(book.metadata),
        copyright: await renderCopyrightPage(
          book.metadata,
          resolveLicense(book.metadata.license, config.front_matter)
        ),
        toc: toc.html,
      },
      tools.renderer,
      ctx,
      {
        metadata: book.metadata,
        expectedPageCount: plan.frontMatterPageCount,
        layout: pageLayout,
        lineHeight: config.toc.line_height,
        headingLines: config.toc.heading_lines,
        htmlPath: file("front.html"),
        outputPath: file("front.raw.pdf"),
      }
    );

    // --- Geometry ---
    const geometry = (firstPageIndex: number, outputPath: string) => ({
      trimSize: settings.trimSize,
      gutterOffset: settings.gutter,
      bindingEdge: settings.bindingEdge,
      shift: settings.mode === "booklet",
      firstPageIndex,
      outputPath,
    });

    let body: RawDocument;
    if (newspaper) {
      enter("IMPOSE");
      body = await imposeColumns(
        rawBody,
        {
          sheetSize: settings.trimSize,
          columns: settings.columns,
          columnWidth: settings.columnWidth,
          outputPath: file("body.sheets.pdf"),
        },
        tools.imposer,
        ctx
      );
    } else {
      enter("GEOMETRY_BODY");
      body = await applyGeometry(
        rawBody,
        geometry(plan.frontMatterPageCount, file("body.trim.pdf")),
        tools.editor
      );
    }

    enter("GEOMETRY_FRONT");
    const front = await applyGeometry(rawFront, geometry(0, file("front.trim.pdf")), tools.editor);

    // --- Numbering ---
    enter("NUMBER_FRONT");
    const numberedFront = await numberPages(
      front,
      numberingOptions(settings, config.page_numbers.font_size, "roman-lower", file("front.pdf")),
      tools.editor
    );

    enter("NUMBER_BODY");
    const numberedBody = await numberPages(
      body,
      numberingOptions(settings, config.page_numbers.font_size, "arabic", file("body.pdf")),
      tools.editor
    );

    // --- Merge ---
    enter("MERGE");
    const { final } = await mergeDocuments(
      numberedFront.doc,
      numberedBody.doc,
      {
        reversedBinding: plan.reversedBinding,
        frontMatterPageCount: plan.frontMatterPageCount,
        outputStem: file("merged"),
        onRotate: () => enter("ROTATE"),
      },
      tools.merger
    );

    const expectedPages = plan.frontMatterPageCount + plan.bodyPageCount;
    if (final.pageCount !== expectedPages) {
      throw new ToolError(
        "merge",
        "failed",
        `final document has ${final.pageCount} pages, planned ${expectedPages}`
      );
    }

    const outputPath = path.resolve(settings.output);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.copyFileSync(final.path, outputPath);

    enter("DONE");
    progress.emit({ type: "job-done", path: outputPath, pageCount: final.pageCount });
    return {
      status: "DONE",
      history,
      plan,
      warnings,
      toolLog,
      artifact: {
        path: outputPath,
        format: ARTIFACT_FORMAT[settings.mode],
        pageCount: final.pageCount,
        pageLabels: [...numberedFront.labels, ...numberedBody.labels],
      },
    };
  } catch (err) {
    const failure = toFailure(err, stage, signal);
    progress.emit({ type: "stage-error", stage, error: failure.message });
    history.push("FAILED");
    progress.emit({ type: "job-failed", stage, error: failure.message });
    return { status: "FAILED", history, plan, warnings, toolLog, failure };
  } finally {
    if (display) {
      try {
        await display.release();
      } catch (err) {
        warnings.push(`Could not release display: ${errorMessage(err)}`);
      }
    }
    if (scratch && !config.keep_temp_files) {
      fs.rmSync(scratch, { recursive: true, force: true });
    }
  }
}

function numberingOptions(
  settings: JobSettings,
  fontSize: number,
  style: "roman-lower" | "arabic",
  outputPath: string
) {
  return {
    style,
    overrides: style === "roman-lower" ? settings.frontOverrides : settings.bodyOverrides,
    fontSize,
    bottomMargin: settings.margins.bottom,
    outputPath,
  };
}

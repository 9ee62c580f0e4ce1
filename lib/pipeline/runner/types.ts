/**
 * Runner layer types.
 *
 * These interfaces define the contracts between the pipeline stages and
 * the infrastructure around a job (tools, progress emission, scratch space).
 */

import type { AppConfig } from "../../config";
import type { PipelineTools } from "../tools/types";
import type { PipelineStage } from "../types";

// ============================================================================
// Progress Interface
// ============================================================================

export type ProgressEvent =
  | { type: "stage-start"; stage: PipelineStage }
  | { type: "stage-complete"; stage: PipelineStage; message?: string }
  | { type: "stage-error"; stage: PipelineStage; error: string }
  | { type: "warning"; stage: PipelineStage; message: string }
  | { type: "job-done"; path: string; pageCount: number }
  | { type: "job-failed"; stage: PipelineStage; error: string };

/**
 * Progress emitter interface.
 *
 * Implementations can log to console, update a job queue, etc.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

/**
 * Console-based progress emitter for CLI usage.
 */
export function createConsoleProgress(): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "stage-start":
          console.log(`Starting ${formatStageName(event.stage)}...`);
          break;
        case "stage-complete":
          console.log(
            event.message
              ? `Completed ${formatStageName(event.stage)}: ${event.message}`
              : `Completed ${formatStageName(event.stage)}`
          );
          break;
        case "stage-error":
          console.error(`Error in ${formatStageName(event.stage)}: ${event.error}`);
          break;
        case "warning":
          console.warn(`Warning (${formatStageName(event.stage)}): ${event.message}`);
          break;
        case "job-done":
          console.log(`Wrote ${event.path} (${event.pageCount} pages)`);
          break;
        case "job-failed":
          console.error(`Failed at ${formatStageName(event.stage)}: ${event.error}`);
          break;
      }
    },
  };
}

/**
 * Callback-based progress emitter for job queue integration.
 */
export function createCallbackProgress(callback: (message: string) => void): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "stage-start":
          callback(`Starting ${formatStageName(event.stage)}`);
          break;
        case "stage-complete":
          callback(`Completed ${formatStageName(event.stage)}`);
          break;
        case "stage-error":
          callback(`Error: ${event.error}`);
          break;
        case "warning":
          callback(`Warning: ${event.message}`);
          break;
        case "job-done":
          callback(`Done: ${event.pageCount} pages`);
          break;
        case "job-failed":
          callback(`Failed: ${event.error}`);
          break;
      }
    },
  };
}

export function formatStageName(stage: PipelineStage): string {
  switch (stage) {
    case "START":
      return "job setup";
    case "RENDER_BODY":
      return "body rendering";
    case "EXTRACT_OUTLINE":
      return "outline extraction";
    case "BUILD_TOC":
      return "table of contents";
    case "RENDER_PRELIMINARY":
      return "front matter rendering";
    case "GEOMETRY_BODY":
      return "body geometry";
    case "IMPOSE":
      return "imposition";
    case "GEOMETRY_FRONT":
      return "front matter geometry";
    case "NUMBER_FRONT":
      return "front matter numbering";
    case "NUMBER_BODY":
      return "body numbering";
    case "MERGE":
      return "merge";
    case "ROTATE":
      return "rotation";
    case "DONE":
      return "done";
    case "FAILED":
      return "failure";
  }
}

// ============================================================================
// Runner Configuration
// ============================================================================

export interface JobRunnerDeps {
  config: AppConfig;
  tools: PipelineTools;
  progress?: Progress;
  signal?: AbortSignal;
}

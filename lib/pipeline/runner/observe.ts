import { Observable, filter, lastValueFrom, map } from "rxjs";
import type { BookPackage, JobResult } from "../types";
import type { ConversionRequest } from "../plan";
import { runConversionJob } from "./job-runner";
import type { JobRunnerDeps, ProgressEvent } from "./types";

export type JobStreamEvent = ProgressEvent | { type: "result"; result: JobResult };

export function isResultEvent(
  event: JobStreamEvent
): event is { type: "result"; result: JobResult } {
  return event.type === "result";
}

/**
 * A conversion job as a stream of its progress events, ending with one
 * "result" event. Unsubscribing before the job ends cancels it.
 */
export function observeConversionJob(
  book: BookPackage,
  request: ConversionRequest,
  deps: JobRunnerDeps
): Observable<JobStreamEvent> {
  return new Observable<JobStreamEvent>((subscriber) => {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (deps.signal?.aborted) controller.abort();
    deps.signal?.addEventListener("abort", onAbort, { once: true });
    let settled = false;

    void runConversionJob(book, request, {
      ...deps,
      signal: controller.signal,
      progress: {
        emit(event) {
          deps.progress?.emit(event);
          subscriber.next(event);
        },
      },
    }).then(
      (result) => {
        settled = true;
        subscriber.next({ type: "result", result });
        subscriber.complete();
      },
      (err: unknown) => {
        settled = true;
        subscriber.error(err);
      }
    );

    return () => {
      deps.signal?.removeEventListener("abort", onAbort);
      if (!settled) controller.abort();
    };
  });
}

/** Wait for the result at the end of a job stream. */
export function jobResult(events$: Observable<JobStreamEvent>): Promise<JobResult> {
  return lastValueFrom(
    events$.pipe(
      filter(isResultEvent),
      map((event) => event.result)
    )
  );
}

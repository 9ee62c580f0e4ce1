import { loadBookConfig, loadConfig, type AppConfig } from "@/lib/config";
import { loadBookPackage } from "@/lib/books";
import { errorMessage } from "@/lib/pipeline/errors";
import type { ConversionRequest } from "@/lib/pipeline/plan";
import { createCallbackProgress, runConversionJob } from "@/lib/pipeline/runner";
import { createDefaultTools } from "@/lib/pipeline/tools";
import type { PipelineTools } from "@/lib/pipeline/tools/types";
import type { JobResult } from "@/lib/pipeline/types";

// --- Types ---

export type QueueJobStatus = "queued" | "running" | "completed" | "failed";

export interface ConversionJobParams {
  bookDir: string;
  request: ConversionRequest;
}

export interface Job {
  id: string;
  label: string;
  status: QueueJobStatus;
  params: ConversionJobParams;
  progress?: string;
  result?: JobResult;
  error?: string;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
}

export type JobExecutor = (
  job: Job,
  update: (patch: Partial<Job>) => void,
  signal: AbortSignal
) => Promise<JobResult>;

const PRUNE_AFTER_MS = 60 * 60 * 1000;

// --- Queue ---

export class JobQueue {
  private jobs = new Map<string, Job>();
  private pending: string[] = [];
  private running = new Map<string, AbortController>();
  private listeners = new Set<(job: Job) => void>();
  private nextId = 1;

  constructor(
    private readonly executor: JobExecutor,
    private readonly concurrency = 1
  ) {}

  enqueue(label: string, params: ConversionJobParams): string {
    const id = `job_${this.nextId++}`;
    const job: Job = {
      id,
      label,
      status: "queued",
      params,
      createdAt: Date.now(),
    };
    this.jobs.set(id, job);
    this.pending.push(id);
    this.notify(job);
    this.drain();
    return id;
  }

  /**
   * Fail a queued job, or abort a running one. The executor sees the abort
   * through its signal and the job fails once it returns.
   */
  cancel(id: string): boolean {
    const job = this.jobs.get(id);
    if (!job) return false;
    if (job.status === "queued") {
      this.pending = this.pending.filter((pendingId) => pendingId !== id);
      this.updateJob(job, { status: "failed", error: "Cancelled", completedAt: Date.now() });
      return true;
    }
    const controller = this.running.get(id);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  private drain() {
    while (this.running.size < this.concurrency && this.pending.length > 0) {
      const jobId = this.pending.shift();
      const job = jobId === undefined ? undefined : this.jobs.get(jobId);
      if (!job) continue;
      const controller = new AbortController();
      this.running.set(job.id, controller);
      this.updateJob(job, { status: "running", startedAt: Date.now() });
      void this.run(job, controller.signal);
    }
  }

  private async run(job: Job, signal: AbortSignal) {
    const update = (patch: Partial<Job>) => {
      if (job.status === "running") this.updateJob(job, patch);
    };
    try {
      const result = await this.executor(job, update, signal);
      this.updateJob(job, {
        status: result.status === "DONE" ? "completed" : "failed",
        result,
        error: result.failure?.message,
        completedAt: Date.now(),
      });
    } catch (err) {
      this.updateJob(job, {
        status: "failed",
        error: errorMessage(err),
        completedAt: Date.now(),
      });
    } finally {
      this.running.delete(job.id);
      this.prune();
      this.drain();
    }
  }

  private updateJob(job: Job, patch: Partial<Job>) {
    Object.assign(job, patch);
    this.notify(job);
  }

  subscribe(fn: (job: Job) => void) {
    this.listeners.add(fn);
  }

  unsubscribe(fn: (job: Job) => void) {
    this.listeners.delete(fn);
  }

  private notify(job: Job) {
    for (const fn of this.listeners) {
      try {
        fn(job);
      } catch (err) {
        console.error(`Job listener failed for ${job.id}: ${errorMessage(err)}`);
      }
    }
  }

  getStats(): { queued: number; running: number } {
    let queued = 0;
    let running = 0;
    for (const job of this.jobs.values()) {
      if (job.status === "queued") queued++;
      if (job.status === "running") running++;
    }
    return { queued, running };
  }

  getActiveJobs(): Job[] {
    return [...this.jobs.values()].filter(
      (j) => j.status === "queued" || j.status === "running"
    );
  }

  getJob(id: string): Job | undefined {
    return this.jobs.get(id);
  }

  private prune() {
    const cutoff = Date.now() - PRUNE_AFTER_MS;
    for (const [id, job] of this.jobs) {
      if (
        (job.status === "completed" || job.status === "failed") &&
        job.completedAt !== undefined &&
        job.completedAt < cutoff
      ) {
        this.jobs.delete(id);
      }
    }
  }
}

// --- Executor ---

export interface ConversionExecutorOptions {
  config?: AppConfig;
  /** Tool set per job configuration; production tools by default */
  createTools?: (config: AppConfig) => PipelineTools;
}

/**
 * Executor that loads the book directory (and its config overrides) and
 * runs the conversion pipeline on it.
 */
export function createConversionExecutor(options: ConversionExecutorOptions = {}): JobExecutor {
  const base = options.config ?? loadConfig();
  const createTools = options.createTools ?? createDefaultTools;
  return async (job, update, signal) => {
    const config = loadBookConfig(job.params.bookDir, base);
    const book = loadBookPackage(job.params.bookDir, config);
    return runConversionJob(book, job.params.request, {
      config,
      tools: createTools(config),
      progress: createCallbackProgress((message) => update({ progress: message })),
      signal,
    });
  };
}

/** Queue of conversion jobs, running as many at once as the config allows. */
export function createJobQueue(options: ConversionExecutorOptions = {}): JobQueue {
  const config = options.config ?? loadConfig();
  return new JobQueue(createConversionExecutor({ ...options, config }), config.concurrency);
}

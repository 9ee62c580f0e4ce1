export type ErrorKind =
  | "render"
  | "extraction"
  | "geometry"
  | "numbering-mismatch"
  | "tool"
  | "config"
  | "cancelled";

export abstract class BookPressError extends Error {
  abstract readonly kind: ErrorKind;

  /** Captured output of the failing tool, if there was one. */
  get diagnostic(): string | undefined {
    return undefined;
  }
}

/** The HTML renderer failed: bad markup, missing font, unreachable resource. */
export class RenderError extends BookPressError {
  readonly kind = "render";

  constructor(
    message: string,
    public readonly stderr = ""
  ) {
    super(message);
    this.name = "RenderError";
  }

  override get diagnostic(): string | undefined {
    return this.stderr || undefined;
  }
}

/** The outline could not be read. Callers downgrade this to an empty outline. */
export class ExtractionError extends BookPressError {
  readonly kind = "extraction";

  constructor(message: string) {
    super(message);
    this.name = "ExtractionError";
  }
}

export class GeometryError extends BookPressError {
  readonly kind = "geometry";

  constructor(message: string) {
    super(message);
    this.name = "GeometryError";
  }
}

export class NumberingMismatchError extends BookPressError {
  readonly kind = "numbering-mismatch";

  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `Front matter rendered to ${actual} pages but the table of contents was numbered for ${expected}`
    );
    this.name = "NumberingMismatchError";
  }
}

export type ToolFailureReason = "exit" | "timeout" | "cancelled" | "spawn" | "failed";

export class ToolError extends BookPressError {
  readonly kind = "tool";

  constructor(
    public readonly tool: string,
    public readonly reason: ToolFailureReason,
    message: string,
    public readonly stderr = "",
    public readonly exitCode: number | null = null
  ) {
    super(`${tool}: ${message}`);
    this.name = "ToolError";
  }

  override get diagnostic(): string | undefined {
    return this.stderr || undefined;
  }
}

export class ConfigError extends BookPressError {
  readonly kind = "config";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class CancelledError extends BookPressError {
  readonly kind = "cancelled";

  constructor(message = "Job cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

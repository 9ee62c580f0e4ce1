import { ConfigError } from "../pipeline/errors";
import type { ConversionRequest } from "../pipeline/plan";
import type { OutputMode } from "../pipeline/types";

export interface ConvertArgs {
  bookDir: string;
  request: ConversionRequest;
  configPath?: string;
}

const MODES: OutputMode[] = ["single", "booklet", "newspaper"];

function isMode(value: string): value is OutputMode {
  return MODES.some((mode) => mode === value);
}

function numberFlag(flag: string, value: string | undefined): number {
  const parsed = value === undefined ? NaN : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${flag} expects a number, got "${value ?? ""}"`);
  }
  return parsed;
}

/** "A4" names a configured size; "400x600" is a custom size in points. */
export function parseSize(value: string): ConversionRequest["pageSize"] {
  const custom = value.match(/^(\d+(?:\.\d+)?)x(\d+(?:\.\d+)?)$/);
  if (custom) return { width: Number(custom[1]), height: Number(custom[2]) };
  return value;
}

/** Parse the arguments after `convert`. */
export function parseConvertArgs(args: string[]): ConvertArgs {
  const positional: string[] = [];
  const request: Omit<ConversionRequest, "output"> = {};
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = () => {
      const next = args[++i];
      if (next === undefined) throw new ConfigError(`${arg} needs a value`);
      return next;
    };
    switch (arg) {
      case "--mode": {
        const mode = value();
        if (!isMode(mode)) {
          throw new ConfigError(`--mode must be one of ${MODES.join(", ")}, got "${mode}"`);
        }
        request.mode = mode;
        break;
      }
      case "--size":
        request.pageSize = parseSize(value());
        break;
      case "--gutter":
        request.gutter = numberFlag(arg, value());
        break;
      case "--reversed":
        request.reversedBinding = true;
        break;
      case "--columns":
        request.columns = numberFlag(arg, value());
        break;
      case "--column-width":
        request.columnWidth = numberFlag(arg, value());
        break;
      case "--contents-depth":
        request.contentsDepth = numberFlag(arg, value());
        break;
      case "--config":
        configPath = value();
        break;
      default:
        if (arg.startsWith("-")) throw new ConfigError(`Unknown option ${arg}`);
        positional.push(arg);
    }
  }

  const [bookDir, output, ...rest] = positional;
  if (!bookDir || !output || rest.length > 0) {
    throw new ConfigError("Expected <book_dir> <output.pdf>");
  }
  return { bookDir, request: { ...request, output }, configPath };
}

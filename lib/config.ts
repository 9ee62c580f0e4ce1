import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { z } from "zod/v4";
import { ConfigError } from "./pipeline/errors";

const pageSizeEntrySchema = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
  unit: z.enum(["pt", "mm", "in"]).default("pt"),
});

const configSchema = z.object({
  tools: z.object({
    wkhtmltopdf: z.string(),
    wkhtmltopdf_extra_args: z.array(z.string()).default([]),
    pdfjam: z.string(),
    xvfb: z.string(),
    timeout_ms: z.number().int().min(1),
  }),
  virtual_display: z.object({
    enabled: z.boolean(),
    first_display: z.number().int().min(1),
    display_count: z.number().int().min(1),
    screen: z.string(),
  }),
  scratch_root: z.string().optional(),
  keep_temp_files: z.boolean().default(false),
  log_dir: z.string().optional(),
  log_max_entries: z.number().int().min(1).default(500),
  concurrency: z.number().int().min(1).default(4),
  defaults: z.object({
    mode: z.enum(["single", "booklet", "newspaper"]),
    page_size: z.string(),
    columns: z.number().int().min(1).max(12),
    contents_depth: z.number().int().min(0),
  }),
  newspaper: z.object({
    min_column_width_mm: z.number().positive(),
  }),
  margins: z.object({
    base: z.number(),
    proportional: z.number(),
  }),
  gutter: z.object({
    base: z.number(),
    proportional: z.number(),
  }),
  render_bleed: z.number().min(0),
  front_matter: z.object({
    toc_heading: z.string(),
    default_license: z.string(),
    /** License name to the URL of its text; null when there is none */
    licenses: z.record(z.string(), z.string().nullable()).default({}),
  }),
  toc: z.object({
    line_height: z.number().positive(),
    heading_lines: z.number().int().min(0),
  }),
  page_numbers: z.object({
    font_size: z.number().positive(),
  }),
  rtl_languages: z.array(z.string()),
  page_sizes: z.record(z.string(), pageSizeEntrySchema),
});

export type AppConfig = z.infer<typeof configSchema>;
export type PageSizeEntry = z.infer<typeof pageSizeEntrySchema>;

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge<T extends Record<string, unknown>>(
  base: T,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else {
      result[key] = overVal;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readYaml(filePath: string): unknown {
  try {
    return yaml.load(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(
      `Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

export function parseConfig(raw: unknown, source = "config"): AppConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${z.prettifyError(result.error)}`);
  }
  return result.data;
}

export function defaultConfigPath(): string {
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../config.yaml");
}

export function loadConfig(configPath?: string): AppConfig {
  const resolved = configPath ?? defaultConfigPath();
  return parseConfig(readYaml(resolved), resolved);
}

/**
 * Load the defaults and apply the overrides a book directory carries in its
 * own config.yaml, if any.
 */
export function loadBookConfig(bookDir: string, base?: AppConfig): AppConfig {
  const defaults = base ?? loadConfig();
  const bookConfigPath = path.join(bookDir, "config.yaml");
  if (!fs.existsSync(bookConfigPath)) return defaults;
  const overrides = readYaml(bookConfigPath);
  if (!isPlainObject(overrides)) return defaults;
  return parseConfig(deepMerge(defaults, overrides), bookConfigPath);
}

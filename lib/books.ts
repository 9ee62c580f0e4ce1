import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import type { AppConfig } from "./config";
import { ConfigError, errorMessage } from "./pipeline/errors";
import { chapterSlug } from "./pipeline/slug";
import type { BookImage, BookPackage, Chapter, TextDirection } from "./pipeline/types";

export const BOOK_FILE = "book.yaml";
export const IMAGES_DIR = "images";

const chapterEntrySchema = z.object({
  id: z.string().min(1).optional(),
  title: z.string().min(1),
  file: z.string().min(1),
});

export const bookFileSchema = z.object({
  title: z.string().min(1),
  author: z.string().default(""),
  language: z.string().min(1).default("en"),
  direction: z.enum(["auto", "LTR", "RTL"]).default("auto"),
  license: z.string().optional(),
  copyright: z.string().optional(),
  publisher: z.string().optional(),
  isbn: z.coerce.string().optional(),
  chapters: z.array(chapterEntrySchema).min(1),
});

export type BookFile = z.infer<typeof bookFileSchema>;

/** "auto" reads right to left for the configured RTL languages (by primary subtag). */
export function resolveDirection(
  direction: BookFile["direction"],
  language: string,
  rtlLanguages: string[]
): TextDirection {
  if (direction !== "auto") return direction;
  const primary = language.toLowerCase().split(/[-_]/)[0];
  return rtlLanguages.includes(primary) ? "RTL" : "LTR";
}

function readBookFile(bookDir: string): BookFile {
  const filePath = path.join(bookDir, BOOK_FILE);
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`No ${BOOK_FILE} in ${bookDir}`);
  }
  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read ${filePath}: ${errorMessage(err)}`);
  }
  const result = bookFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid ${filePath}: ${z.prettifyError(result.error)}`);
  }
  return result.data;
}

function listImages(bookDir: string): BookImage[] {
  const root = path.join(bookDir, IMAGES_DIR);
  if (!fs.existsSync(root)) return [];
  const images: BookImage[] = [];
  const walk = (dir: string) => {
    const entries = fs.readdirSync(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (entry.isFile()) {
        images.push({
          path: path.relative(bookDir, full).split(path.sep).join("/"),
          source: full,
        });
      }
    }
  };
  walk(root);
  return images;
}

/**
 * Load a book package from a directory holding book.yaml, the chapter HTML
 * files it lists and an optional images/ directory.
 */
export function loadBookPackage(bookDir: string, config: AppConfig): BookPackage {
  const dir = path.resolve(bookDir);
  const book = readBookFile(dir);

  const seen = new Set<string>();
  const chapters: Chapter[] = book.chapters.map((entry, i) => {
    const file = path.resolve(dir, entry.file);
    if (!fs.existsSync(file)) {
      throw new ConfigError(`Chapter file not found: ${entry.file}`);
    }
    const id = entry.id ?? chapterSlug(entry.file, `chapter-${i + 1}`);
    if (seen.has(id)) {
      throw new ConfigError(`Duplicate chapter id "${id}"`);
    }
    seen.add(id);
    return { id, title: entry.title, html: fs.readFileSync(file, "utf-8") };
  });

  return {
    chapters,
    metadata: {
      title: book.title,
      author: book.author,
      language: book.language,
      direction: resolveDirection(book.direction, book.language, config.rtl_languages),
      license: book.license,
      copyright: book.copyright,
      publisher: book.publisher,
      isbn: book.isbn,
    },
    images: listImages(dir),
  };
}

import path from "node:path";

/** Lowercase, hyphen-separated identifier from free text. */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Chapter id from its file name, e.g. "chapters/01 Intro.html" -> "01-intro".
 * Falls back to `fallback` when nothing alphanumeric is left.
 */
export function chapterSlug(filePath: string, fallback: string): string {
  const slug = slugify(path.basename(filePath, path.extname(filePath)));
  return slug || fallback;
}

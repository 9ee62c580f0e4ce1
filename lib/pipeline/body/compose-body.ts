import { parseDocument } from "htmlparser2";
import { Element, Text, type Document, type ParentNode } from "domhandler";
import {
  appendChild,
  findAll,
  findOne,
  getInnerHTML,
  nextElementSibling,
  prepend,
  prependChild,
} from "domutils";
import { renderTemplate } from "../templates";
import type { BookPackage, Chapter } from "../types";

const KEEP_WITH_NEXT = new Set(["h2", "h3", "h4"]);
const HEADINGS = new Set(["h1", "h2", "h3", "h4", "h5", "h6"]);

export interface ComposeBodyOptions {
  /** Extra stylesheet appended after the base styles */
  css?: string;
}

function contentRoot(doc: Document): ParentNode {
  return findOne((el) => el.name === "body", doc.children) ?? doc;
}

/**
 * Normalize one chapter: take the body content, make sure it opens with an
 * h1 (the renderer's outline is built from headings), and keep each
 * subheading on the same page as the element after it.
 */
export function prepareChapter(chapter: Chapter): string {
  const doc = parseDocument(chapter.html);
  const root = contentRoot(doc);

  if (!findOne((el) => el.name === "h1", root.children)) {
    prependChild(root, new Element("h1", {}, [new Text(chapter.title)]));
  }

  for (const heading of findAll((el) => KEEP_WITH_NEXT.has(el.name), root.children)) {
    const next = nextElementSibling(heading);
    if (!next || HEADINGS.has(next.name)) continue;
    const wrapper = new Element("div", { class: "keep-with-next" });
    prepend(heading, wrapper);
    appendChild(wrapper, heading);
    appendChild(wrapper, next);
  }

  return getInnerHTML(root, { encodeEntities: "utf8" });
}

/** Join every chapter into the single HTML document the body is rendered from. */
export async function composeBody(
  book: BookPackage,
  options: ComposeBodyOptions = {}
): Promise<string> {
  const chapters = book.chapters.map((chapter) => ({
    id: chapter.id,
    html: prepareChapter(chapter),
  }));
  return renderTemplate("body", {
    title: book.metadata.title,
    lang: book.metadata.language,
    dir: book.metadata.direction.toLowerCase(),
    css: options.css ?? "",
    chapters,
  });
}

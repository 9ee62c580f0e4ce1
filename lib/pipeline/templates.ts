import path from "node:path";
import { fileURLToPath } from "node:url";
import { Liquid, Tag, type TagToken, type TopLevelToken, type Template } from "liquidjs";
import type { Context } from "liquidjs";
import type { Emitter } from "liquidjs";

/** Class every front-matter page container carries. */
export const PAGE_CLASS = "fm-page";

/**
 * Custom {% page class: "name" %} ... {% endpage %} tag.
 * Wraps its body in a page-break container, one printed page each.
 */
class PageTag extends Tag {
  private className: string;

  constructor(token: TagToken, remainTokens: TopLevelToken[], liquid: Liquid) {
    super(token, remainTokens, liquid);
    const match = token.args.match(/class:\s*"([\w-]+)"/);
    this.className = match ? ` ${match[1]}` : "";
    this.templates = [];
    const stream = liquid.parser
      .parseStream(remainTokens)
      .on("tag:endpage", () => stream.stop())
      .on("template", (tpl: Template) => this.templates.push(tpl))
      .on("end", () => {
        throw new Error("{% page %} missing {% endpage %}");
      });
    stream.start();
  }

  *render(ctx: Context, emitter: Emitter): Generator<unknown, void, unknown> {
    emitter.write(`<section class="${PAGE_CLASS}${this.className}">`);
    yield this.liquid.renderer.renderTemplates(this.templates, ctx, emitter);
    emitter.write(`</section>`);
  }

  private templates: Template[];
}

export const TEMPLATES_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../templates"
);

const engine = new Liquid({
  root: [TEMPLATES_DIR],
  extname: ".liquid",
  strictVariables: false,
  outputEscape: "escape",
});

engine.registerTag("page", PageTag);

/** Render a template from templates/. Output is HTML-escaped unless piped through `raw`. */
export async function renderTemplate(
  templateName: string,
  context: Record<string, unknown>
): Promise<string> {
  return engine.renderFile(templateName, context);
}

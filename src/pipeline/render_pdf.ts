import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import MarkdownIt from "markdown-it";
import sanitizeHtml from "sanitize-html";
import { silentLogger, type Logger } from "../logger.js";
import type { Renderer } from "../types.js";
import { extractTitle } from "../utils/filename.js";
import { runCommand, type CommandRunner } from "../utils/process.js";

const STYLESHEET_PATH = fileURLToPath(new URL("../../templates/transcript.css", import.meta.url));
const RENDER_TIMEOUT_MS = 5 * 60 * 1000;

// Raw HTML in the Markdown is escaped, not passed through
const markdown = new MarkdownIt({ html: false, linkify: false, typographer: false });

const TABLE_CELL_ALIGN = { "text-align": [/^(left|right|center)$/] };

const EXTERNAL_LINK = /^(?:https?:|mailto:)/i;
const DATA_URI = /^data:/i;

// Scheme-less hrefs resolve against the HTML file on disk
function keepExternalHref(tagName: string, attribs: sanitizeHtml.Attributes): sanitizeHtml.Tag {
  const { href, ...rest } = attribs;
  return { tagName, attribs: href && EXTERNAL_LINK.test(href.trim()) ? { ...rest, href } : rest };
}

/**
 * Allow-list for the rendered body. Images may only embed `data:` URIs and
 * no element can point the renderer at a stylesheet, font, remote file or
 * local path.
 */
export const SANITIZE_OPTIONS: sanitizeHtml.IOptions = {
  allowedTags: [...sanitizeHtml.defaults.allowedTags, "img", "del"],
  disallowedTagsMode: "discard",
  allowedAttributes: {
    a: ["href", "title"],
    img: ["src", "alt", "title"],
    code: ["class"],
    ol: ["start"],
    th: ["style"],
    td: ["style"],
  },
  allowedStyles: { th: TABLE_CELL_ALIGN, td: TABLE_CELL_ALIGN },
  allowedSchemes: ["http", "https", "mailto"],
  allowedSchemesByTag: { img: ["data"] },
  allowedSchemesAppliedToAttributes: ["href", "src", "cite"],
  allowProtocolRelative: false,
  transformTags: { a: keepExternalHref },
  exclusiveFilter: (frame) => frame.tag === "img" && !DATA_URI.test(frame.attribs.src?.trim() ?? ""),
};

let stylesheet: Promise<string> | null = null;

async function loadStylesheet(): Promise<string> {
  stylesheet ??= fs.readFile(STYLESHEET_PATH, "utf-8").then((css) => {
    if (/url\s*\(|@import/i.test(css)) {
      throw new Error("Transcript stylesheet must not reference external resources");
    }
    return css;
  });
  return stylesheet;
}

export function markdownToSafeHtml(source: string): string {
  return sanitizeHtml(markdown.render(source), SANITIZE_OPTIONS);
}

function escapeText(text: string): string {
  return sanitizeHtml(text, { allowedTags: [], allowedAttributes: {} });
}

/** Self-contained HTML document for the transcript; references nothing external. */
export async function buildHtmlDocument(source: string): Promise<string> {
  const css = await loadStylesheet();
  const title = escapeText(extractTitle(source) ?? "Transcript");
  return [
    "<!DOCTYPE html>",
    '<html lang="zh-CN">',
    "<head>",
    '<meta charset="UTF-8">',
    `<title>${title}</title>`,
    `<style>\n${css}</style>`,
    "</head>",
    "<body>",
    markdownToSafeHtml(source),
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

export interface HtmlPdfRendererOptions {
  command: string;
  runner?: CommandRunner;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Renders Markdown to PDF: sanitized HTML is written next to the target and
 * converted by an HTML-to-PDF command (`<command> <html> <pdf>`, WeasyPrint
 * by default) in a child process.
 */
export class HtmlPdfRenderer implements Renderer {
  private readonly runner: CommandRunner;
  private readonly log: Logger;

  constructor(private readonly options: HtmlPdfRendererOptions) {
    this.runner = options.runner ?? runCommand;
    this.log = (options.logger ?? silentLogger).child({ module: "render" });
  }

  async render(source: string, outputPath: string): Promise<string> {
    const dir = path.dirname(outputPath);
    const htmlPath = path.join(dir, `${path.basename(outputPath, path.extname(outputPath))}.html`);

    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(htmlPath, await buildHtmlDocument(source), "utf-8");
    await fs.rm(outputPath, { force: true });

    this.log.info({ outputPath }, "Generating PDF");
    await this.runner(this.options.command, [htmlPath, outputPath], {
      cwd: dir,
      timeoutMs: this.options.timeoutMs ?? RENDER_TIMEOUT_MS,
    });

    const stat = await fs.stat(outputPath).catch(() => null);
    if (!stat || stat.size === 0) {
      throw new Error(`PDF renderer produced no output at ${outputPath}`);
    }
    return outputPath;
  }
}

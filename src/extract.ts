/**
 * Reader text extraction
 *
 * Walks the tag/text events of one reader page and rebuilds its body text.
 * Only the content of the reading region (td.book-page-show) is kept; the
 * floating navigation menu and script/style blocks inside it are dropped, and
 * footnotes get a separator line before them. Hyperlinks are collected from
 * the whole page, since the pagination links live outside the reading region.
 */

import { Parser } from "htmlparser2";
import type { PageExtraction } from "./types.js";

/** Markup conventions of the reader pages */
export const READER_MARKUP = {
  readerTag: "td",
  readerClass: "book-page-show",
  stickyMenuTag: "div",
  stickyMenuClass: "sticky-menue",
  footnoteClass: "footnote",
  /** Substring of name/href that marks a footnote anchor (e.g. #_ftn3) */
  footnoteAnchorMarker: "_ftn",
  preformattedTag: "pre",
} as const;

/** Tag → classes that mark a special heading */
const HEADING_CLASSES = new Map<string, readonly string[]>([
  ["p", ["KalamateKhas", "KalamateKhas2"]],
  ["span", ["KalamateKhas"]],
]);

export const HEADING_MARKER = "##";
export const FOOTNOTE_SEPARATOR = "____________";

const MUTED_TAGS = new Set(["script", "style", "noscript"]);
const FORCED_BREAK_TAGS = new Set(["br", "hr"]);
const BLOCK_END_TAGS = new Set([
  "address", "article", "aside", "blockquote", "dd", "div", "dl", "dt",
  "fieldset", "figcaption", "figure", "footer", "form",
  "h1", "h2", "h3", "h4", "h5", "h6",
  "header", "li", "main", "nav", "ol", "p", "section", "table", "tr", "ul",
]);

export type Attributes = Record<string, string>;

function hasClass(attributes: Attributes, className: string): boolean {
  return (attributes.class ?? "").split(/\s+/).includes(className);
}

/**
 * Per-page extraction state. Create one per page and discard it after
 * reading the result; nothing is shared between pages.
 */
export class ReaderTextExtractor {
  private readonly hrefs: string[] = [];
  private readonly parts: string[] = [];
  private foundReader = false;
  private inReader = false;
  private readerDepth = 0;
  private stickyDepth = 0;
  private mutedDepth = 0;
  private footnoteDepth = 0;
  private inFootnoteSection = false;
  private footnoteSeparatorEmitted = false;
  private preDepth = 0;
  /** Last fragment is a newline produced by a block close */
  private softBreak = false;

  start(tag: string, attributes: Attributes): void {
    if (tag === "a" && attributes.href) {
      this.hrefs.push(attributes.href);
    }

    if (!this.inReader) {
      if (tag === READER_MARKUP.readerTag && hasClass(attributes, READER_MARKUP.readerClass)) {
        this.foundReader = true;
        this.inReader = true;
        this.readerDepth = 1;
      }
      return;
    }

    if (tag === READER_MARKUP.readerTag) {
      this.readerDepth++;
    }

    if (this.stickyDepth > 0) {
      this.stickyDepth++;
      return;
    }
    if (tag === READER_MARKUP.stickyMenuTag && hasClass(attributes, READER_MARKUP.stickyMenuClass)) {
      this.stickyDepth = 1;
      return;
    }

    if (this.mutedDepth > 0) {
      this.mutedDepth++;
      return;
    }
    if (MUTED_TAGS.has(tag)) {
      this.mutedDepth = 1;
      return;
    }

    if (HEADING_CLASSES.get(tag)?.some((className) => hasClass(attributes, className))) {
      this.appendText(HEADING_MARKER);
    }

    if (this.footnoteDepth > 0) {
      this.footnoteDepth++;
    } else if (hasClass(attributes, READER_MARKUP.footnoteClass)) {
      this.footnoteDepth = 1;
      this.inFootnoteSection = true;
    }

    if (tag === "hr") {
      this.inFootnoteSection = true;
    }

    if (tag === "a" && !this.footnoteSeparatorEmitted && this.isFootnoteAnchor(attributes)) {
      this.appendFootnoteSeparator();
      this.footnoteSeparatorEmitted = true;
    }

    if (tag === READER_MARKUP.preformattedTag) {
      this.preDepth++;
    }

    if (FORCED_BREAK_TAGS.has(tag)) {
      this.appendNewline(true);
    }
  }

  end(tag: string): void {
    if (!this.inReader) return;

    if (this.stickyDepth > 0) {
      this.stickyDepth--;
    } else if (this.mutedDepth > 0) {
      this.mutedDepth--;
    } else {
      if (this.footnoteDepth > 0) {
        this.footnoteDepth--;
      }
      if (tag === READER_MARKUP.preformattedTag && this.preDepth > 0) {
        this.preDepth--;
      }
      if (BLOCK_END_TAGS.has(tag)) {
        this.appendNewline(false);
      }
    }

    if (tag === READER_MARKUP.readerTag) {
      this.readerDepth--;
      if (this.readerDepth <= 0) {
        this.inReader = false;
        this.readerDepth = 0;
        this.footnoteDepth = 0;
        this.inFootnoteSection = false;
        this.footnoteSeparatorEmitted = false;
      }
    }
  }

  text(data: string): void {
    if (!this.inReader || this.stickyDepth > 0 || this.mutedDepth > 0) return;
    this.appendText(data);
  }

  result(): PageExtraction {
    return {
      text: this.parts.join("").replace(/^\n+|\n+$/g, ""),
      hrefs: [...this.hrefs],
      foundReader: this.foundReader,
    };
  }

  private isFootnoteAnchor(attributes: Attributes): boolean {
    if (this.footnoteDepth === 0 && !this.inFootnoteSection) return false;

    const marker = READER_MARKUP.footnoteAnchorMarker;
    const name = (attributes.name ?? "").toLowerCase();
    const href = (attributes.href ?? "").toLowerCase();
    return name.includes(marker) || href.includes(marker);
  }

  private appendFootnoteSeparator(): void {
    this.trimTrailingSpaces();
    const last = this.parts.at(-1);
    if (last !== undefined && !last.endsWith("\n")) {
      this.parts.push("\n");
    }
    this.parts.push(`${FOOTNOTE_SEPARATOR}\n`);
    this.softBreak = false;
  }

  private appendText(data: string): void {
    let text = this.preDepth === 0 ? data.replace(/\s+/g, " ") : data;

    const last = this.parts.at(-1);
    if (last === undefined || last.endsWith("\n") || last.endsWith(" ")) {
      text = text.replace(/^ +/, "");
    }
    if (!text) return;

    this.parts.push(text);
    this.softBreak = false;
  }

  private appendNewline(forced: boolean): void {
    this.trimTrailingSpaces();
    const last = this.parts.at(-1);
    if (last === undefined) return;

    if (forced) {
      // </p><br/> is one line break, not two
      if (this.softBreak) {
        this.softBreak = false;
        return;
      }
      this.parts.push("\n");
      return;
    }

    if (!last.endsWith("\n")) {
      this.parts.push("\n");
      this.softBreak = true;
    }
  }

  private trimTrailingSpaces(): void {
    const last = this.parts.at(-1);
    if (last === undefined) return;

    const trimmed = last.replace(/ +$/, "");
    if (trimmed) {
      this.parts[this.parts.length - 1] = trimmed;
    } else {
      this.parts.pop();
    }
  }
}

/**
 * Tokenize a page's HTML and run it through a fresh ReaderTextExtractor.
 *
 * @param html - Full page markup, already decoded to text
 */
export function extractPage(html: string): PageExtraction {
  const extractor = new ReaderTextExtractor();
  const parser = new Parser(
    {
      onopentag: (name, attribs) => extractor.start(name, attribs),
      onclosetag: (name) => extractor.end(name),
      ontext: (data) => extractor.text(data),
    },
    { decodeEntities: true },
  );
  parser.write(html);
  parser.end();
  return extractor.result();
}

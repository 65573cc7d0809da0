import fs from "node:fs";
import { MissingInputError } from "../../errors";

/** Page number (1-based) -> section text, keyed 0-based. */
export type PageMap = Map<number, string>;

export interface PageHeading {
  /** Offset of the heading's first character */
  offset: number;
  pageNumber: number;
}

const PAGE_HEADING_RE = /^#{1,6}[ \t]+Page[ \t]+(\d+)/gm;

/**
 * First pass: every page heading in document order.
 */
export function findPageHeadings(markdown: string): PageHeading[] {
  const headings: PageHeading[] = [];
  for (const match of markdown.matchAll(PAGE_HEADING_RE)) {
    headings.push({
      offset: match.index ?? 0,
      pageNumber: parseInt(match[1], 10),
    });
  }
  return headings;
}

/**
 * Second pass: slice the text between consecutive headings.
 *
 * Text before the first heading (the document title) belongs to no page.
 * A repeated page number overwrites the earlier section. Without any
 * heading the whole text is page 0.
 */
export function parsePageMap(markdown: string): PageMap {
  const headings = findPageHeadings(markdown);
  const pages: PageMap = new Map();

  if (headings.length === 0) {
    pages.set(0, markdown);
    return pages;
  }

  headings.forEach((heading, i) => {
    const end = i + 1 < headings.length ? headings[i + 1].offset : markdown.length;
    pages.set(heading.pageNumber - 1, markdown.slice(heading.offset, end).trim());
  });

  return pages;
}

export function loadPageMap(markdownPath: string): PageMap {
  if (!fs.existsSync(markdownPath)) {
    throw new MissingInputError("file", markdownPath);
  }
  return parsePageMap(fs.readFileSync(markdownPath, "utf-8"));
}

import path from "node:path";

/** Width of the zero-padded page number in file names and headings. */
export const PAGE_NUMBER_WIDTH = 4;

export const PAGE_IMAGE_PREFIX = "page_";
export const PAGE_IMAGE_EXTENSION = ".png";

export function formatPageNumber(pageNumber: number): string {
  return String(pageNumber).padStart(PAGE_NUMBER_WIDTH, "0");
}

/** "page_0007" for page 7 (1-based). */
export function pageId(pageNumber: number): string {
  return `${PAGE_IMAGE_PREFIX}${formatPageNumber(pageNumber)}`;
}

export function pageImageFileName(pageNumber: number): string {
  return `${pageId(pageNumber)}${PAGE_IMAGE_EXTENSION}`;
}

export function pageImagePath(dir: string, pageNumber: number): string {
  return path.join(dir, pageImageFileName(pageNumber));
}

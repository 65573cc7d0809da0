import { formatPageNumber } from "../page-naming";

export const MARKDOWN_TITLE = "# OCR Extracted Text";
export const SECTION_DELIMITER = "---";

export function formatDocumentHeader(): string {
  return `${MARKDOWN_TITLE}\n\n`;
}

export function formatPageHeading(pageNumber: number): string {
  return `## Page ${formatPageNumber(pageNumber)}`;
}

export function formatPageError(message: string): string {
  return `*Error processing this page: ${message}*`;
}

/**
 * One complete page record: heading, body, delimiter. Always written in a
 * single append so a crash never leaves half a section.
 */
export function formatPageSection(pageNumber: number, body: string): string {
  return `${formatPageHeading(pageNumber)}\n\n${body}\n\n${SECTION_DELIMITER}\n\n`;
}

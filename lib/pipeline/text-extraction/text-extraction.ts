import fs from "node:fs";
import { Observable } from "rxjs";
import { MissingInputError, errorMessage } from "../../errors";
import { consoleLogger, type Logger } from "../../logger";
import { getPngMetadata } from "../../images/png-utils";
import type { VisionClient } from "../core/llm";
import { pageId, pageImagePath } from "../page-naming";
import {
  formatDocumentHeader,
  formatPageError,
  formatPageSection,
} from "./markdown";

export const PAGE_IMAGE_MEDIA_TYPE = "image/png";

export interface TextExtractionOptions {
  imagesDir: string;
  markdownPath: string;
  client: VisionClient;
  logger?: Logger;
  onProgress?: (progress: TextExtractionProgress) => void;
}

export interface TextExtractionProgress {
  page: number;
  totalPages: number;
  status: "extracted" | "failed";
  /** Failed pages so far, including this one */
  failedCount: number;
}

export interface TextExtractionResult {
  attemptedCount: number;
  processedCount: number;
  failedCount: number;
  markdownPath: string;
}

/**
 * Count page images in the same way the extraction loop walks them:
 * page_0001.png, page_0002.png, ... up to the first missing number.
 */
export function countSequentialPages(imagesDir: string): number {
  let count = 0;
  while (fs.existsSync(pageImagePath(imagesDir, count + 1))) {
    count++;
  }
  return count;
}

/**
 * Walk page_0001.png, page_0002.png, ... and append one markdown section
 * per image to `markdownPath`.
 *
 * The directory is never listed: the run stops at the first missing page
 * number, so anything after a gap is not processed. Pages are sent one at
 * a time, in order. A page whose image cannot be read or whose extraction
 * call fails still gets a section (with an error note) so section N always
 * lines up with page_N.
 */
export async function runTextExtraction(
  options: TextExtractionOptions
): Promise<TextExtractionResult> {
  const { imagesDir, markdownPath, client } = options;
  const logger = options.logger ?? consoleLogger;

  if (!fs.existsSync(imagesDir)) {
    throw new MissingInputError("directory", imagesDir);
  }

  const totalPages = countSequentialPages(imagesDir);
  fs.writeFileSync(markdownPath, formatDocumentHeader(), "utf-8");

  let processedCount = 0;
  let failedCount = 0;

  for (let pageNumber = 1; ; pageNumber++) {
    const imagePath = pageImagePath(imagesDir, pageNumber);
    if (!fs.existsSync(imagePath)) break;

    logger.info(`Processing: ${imagePath}`);

    let body: string;
    let status: TextExtractionProgress["status"];
    try {
      const data = fs.readFileSync(imagePath);
      getPngMetadata(data);
      body = await client.extractText({
        data,
        mediaType: PAGE_IMAGE_MEDIA_TYPE,
        pageId: pageId(pageNumber),
      });
      status = "extracted";
      processedCount++;
    } catch (err) {
      const message = errorMessage(err);
      logger.error(`Error processing ${imagePath}: ${message}`);
      body = formatPageError(message);
      status = "failed";
      failedCount++;
    }

    fs.appendFileSync(markdownPath, formatPageSection(pageNumber, body), "utf-8");

    options.onProgress?.({
      page: pageNumber,
      totalPages: Math.max(totalPages, pageNumber),
      status,
      failedCount,
    });
  }

  logger.info(`Processing complete! ${processedCount} pages processed.`);
  logger.info(`Output saved to: ${markdownPath}`);

  return {
    attemptedCount: processedCount + failedCount,
    processedCount,
    failedCount,
    markdownPath,
  };
}

// Convenience wrapper for CLI usage
export function extractText(
  options: Omit<TextExtractionOptions, "onProgress">
): Observable<TextExtractionProgress> {
  return new Observable<TextExtractionProgress>((subscriber) => {
    runTextExtraction({ ...options, onProgress: (p) => subscriber.next(p) })
      .then(() => subscriber.complete())
      .catch((err: unknown) => subscriber.error(err));
  });
}

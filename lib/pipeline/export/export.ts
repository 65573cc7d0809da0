import fs from "node:fs";
import path from "node:path";
import { Observable } from "rxjs";
import type { ConversionConfig } from "../../config";
import { MissingInputError } from "../../errors";
import { consoleLogger, type Logger } from "../../logger";
import { enhancePageImage } from "../../images/enhance";
import { countPages, openPdf, renderPage } from "../../pdf/rasterize";
import { pageImagePath } from "../page-naming";

export interface ExportProgress {
  page: number;
  totalPages: number;
  filePath: string;
}

export interface ExportResult {
  pageCount: number;
  outputDir: string;
  /** Written files in page order */
  pageFiles: string[];
}

export interface ExportOptions {
  logger?: Logger;
  onProgress?: (progress: ExportProgress) => void;
}

const tick = () => new Promise<void>((r) => setImmediate(r));

/**
 * Render every page of `config.input_pdf`, enhance it and write
 * `page_####.png` into `config.output_dir`.
 *
 * Unlike text extraction, a failure on any page aborts the whole export.
 */
export async function convertPdfToPng(
  config: ConversionConfig,
  options: ExportOptions = {}
): Promise<ExportResult> {
  const logger = options.logger ?? consoleLogger;

  if (!fs.existsSync(config.input_pdf)) {
    throw new MissingInputError("pdf", config.input_pdf);
  }

  const doc = openPdf(config.input_pdf);
  fs.mkdirSync(config.output_dir, { recursive: true });

  const totalPages = countPages(doc);
  logger.info(`Processing ${totalPages} pages from ${config.input_pdf}`);

  const pageFiles: string[] = [];
  for (let i = 0; i < totalPages; i++) {
    const rendered = renderPage(doc, i, config.dpi);
    const enhanced = await enhancePageImage(rendered, {
      grayscale: config.grayscale,
      contrastFactor: config.contrast_factor,
    });

    const filePath = pageImagePath(config.output_dir, i + 1);
    fs.writeFileSync(filePath, enhanced);
    pageFiles.push(filePath);
    logger.info(`Saved: ${filePath}`);

    options.onProgress?.({ page: i + 1, totalPages, filePath });
    await tick();
  }

  logger.info(`Conversion complete! ${totalPages} pages processed.`);

  return {
    pageCount: totalPages,
    outputDir: path.resolve(config.output_dir),
    pageFiles,
  };
}

// Convenience wrapper for CLI usage
export function exportPages(
  config: ConversionConfig,
  options: Omit<ExportOptions, "onProgress"> = {}
): Observable<ExportProgress> {
  return new Observable<ExportProgress>((subscriber) => {
    convertPdfToPng(config, { ...options, onProgress: (p) => subscriber.next(p) })
      .then(() => subscriber.complete())
      .catch((err: unknown) => subscriber.error(err));
  });
}

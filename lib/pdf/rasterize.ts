/**
 * Thin adapter over mupdf: open a PDF and render single pages to PNG.
 */

import fs from "node:fs";
import mupdf, { type Document as MupdfDocument } from "mupdf";
import { MissingInputError } from "../errors";

/** PDF user space is 72 units per inch. */
export const PDF_UNITS_PER_INCH = 72;

export function openPdfFromBuffer(buffer: Buffer | Uint8Array): MupdfDocument {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(buffer, "application/pdf");
  } finally {
    process.stderr.write = origWrite;
  }
}

export function openPdf(pdfPath: string): MupdfDocument {
  if (!fs.existsSync(pdfPath)) {
    throw new MissingInputError("pdf", pdfPath);
  }
  return openPdfFromBuffer(fs.readFileSync(pdfPath));
}

export function countPages(doc: MupdfDocument): number {
  return doc.countPages();
}

export function renderScale(dpi: number): number {
  return dpi / PDF_UNITS_PER_INCH;
}

/**
 * Render one page (0-indexed) to an opaque RGB PNG at the given DPI.
 */
export function renderPage(
  doc: MupdfDocument,
  pageIndex: number,
  dpi: number
): Buffer {
  const page = doc.loadPage(pageIndex);
  const scale = renderScale(dpi);
  const pixmap = page.toPixmap(
    mupdf.Matrix.scale(scale, scale),
    mupdf.ColorSpace.DeviceRGB,
    false
  );
  return Buffer.from(pixmap.asPNG());
}

/**
 * Open, render one page and let go of the document. Used by the viewer,
 * which re-rasterizes on every request instead of reading exported PNGs.
 */
export function renderPagePreview(
  pdfPath: string,
  pageIndex: number,
  dpi: number
): Buffer {
  const doc = openPdf(pdfPath);
  const total = countPages(doc);
  if (pageIndex < 0 || pageIndex >= total) {
    throw new RangeError(
      `Page index ${pageIndex} out of range (document has ${total} pages)`
    );
  }
  return renderPage(doc, pageIndex, dpi);
}

/**
 * Helper to generate test PDFs in-process with mupdf so tests don't depend
 * on external files.
 */
import mupdf from "mupdf";

/** Page size in PDF points: 2in x 1in, so 144x72 px at 72 DPI. */
export const TEST_PAGE_WIDTH = 144;
export const TEST_PAGE_HEIGHT = 72;

/**
 * Create a PDF with `pageCount` white pages, each with a black rectangle
 * covering the middle (x 36..108, y 18..54 in points). Corners stay white.
 */
export function createTestPdf(pageCount: number): Buffer {
  const doc = new mupdf.PDFDocument();
  for (let i = 0; i < pageCount; i++) {
    const buf = new mupdf.Buffer();
    buf.writeLine("q");
    buf.writeLine("0 g");
    buf.writeLine("36 18 72 36 re f");
    buf.writeLine("Q");
    const resources = doc.addObject(doc.newDictionary());
    doc.insertPage(
      -1,
      doc.addPage([0, 0, TEST_PAGE_WIDTH, TEST_PAGE_HEIGHT], 0, resources, buf)
    );
  }
  return Buffer.from(doc.saveToBuffer("").asUint8Array());
}

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadViewerData } from "../viewer-data";
import { parseConfig } from "../../config";
import { MissingInputError } from "../../errors";
import { createTestPdf } from "../../pdf/__tests__/create-test-pdf";
import {
  formatDocumentHeader,
  formatPageSection,
} from "../../pipeline/text-extraction/markdown";

describe("loadViewerData", () => {
  let tmpDir: string;
  let pdfPath: string;
  let markdownPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "viewer-data-test-"));
    pdfPath = path.join(tmpDir, "doc.pdf");
    markdownPath = path.join(tmpDir, "output.md");
    fs.writeFileSync(pdfPath, createTestPdf(3));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const config = () =>
    parseConfig({
      conversion: { input_pdf: pdfPath },
      text_extraction: { markdown_path: markdownPath },
    });

  it("limits navigation to pages present in both inputs", () => {
    fs.writeFileSync(
      markdownPath,
      formatDocumentHeader() + formatPageSection(1, "One") + formatPageSection(2, "Two")
    );

    const data = loadViewerData(config());

    expect(data.pdfPath).toBe(pdfPath);
    expect(data.pdfPageCount).toBe(3);
    expect(data.pageCount).toBe(2);
    expect(data.sections).toEqual({
      0: "## Page 0001\n\nOne\n\n---",
      1: "## Page 0002\n\nTwo\n\n---",
    });
  });

  it("rereads the markdown on every call", () => {
    fs.writeFileSync(markdownPath, formatDocumentHeader() + formatPageSection(1, "One"));
    expect(loadViewerData(config()).pageCount).toBe(1);

    fs.appendFileSync(markdownPath, formatPageSection(2, "Two"));
    expect(loadViewerData(config()).pageCount).toBe(2);
  });

  it("fails when the markdown file is missing", () => {
    expect(() => loadViewerData(config())).toThrow(MissingInputError);
  });
});

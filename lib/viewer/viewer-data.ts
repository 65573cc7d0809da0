import path from "node:path";
import type { AppConfig } from "../config";
import { countPages, openPdf } from "../pdf/rasterize";
import { loadPageMap } from "../pipeline/page-map/page-map";
import { viewerPageCount } from "./navigation";

export interface ViewerData {
  pdfPath: string;
  pdfPageCount: number;
  /** Pages navigable in the viewer */
  pageCount: number;
  /** Page map as a plain record so it can cross the server/client boundary */
  sections: Record<number, string>;
}

/**
 * Load everything the viewer needs for one render. Nothing is cached:
 * the page map is rebuilt from the markdown file every time.
 */
export function loadViewerData(config: AppConfig): ViewerData {
  const pdfPath = path.resolve(config.conversion.input_pdf);
  const pdfPageCount = countPages(openPdf(pdfPath));
  const pageMap = loadPageMap(path.resolve(config.text_extraction.markdown_path));

  return {
    pdfPath,
    pdfPageCount,
    pageCount: viewerPageCount(pdfPageCount, pageMap.size),
    sections: Object.fromEntries(pageMap),
  };
}

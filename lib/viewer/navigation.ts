export type NavigationAction =
  | { type: "first" }
  | { type: "previous" }
  | { type: "next" }
  | { type: "last" }
  | { type: "goto"; index: number };

/**
 * Pages the viewer can show: only those present in both the PDF and the
 * extracted markdown.
 */
export function viewerPageCount(pdfPageCount: number, extractedPageCount: number): number {
  return Math.max(0, Math.min(pdfPageCount, extractedPageCount));
}

export function clampPageIndex(index: number, pageCount: number): number {
  if (pageCount <= 0) return 0;
  return Math.min(Math.max(index, 0), pageCount - 1);
}

export function navigate(
  index: number,
  action: NavigationAction,
  pageCount: number
): number {
  const current = clampPageIndex(index, pageCount);
  switch (action.type) {
    case "first":
      return 0;
    case "previous":
      return clampPageIndex(current - 1, pageCount);
    case "next":
      return clampPageIndex(current + 1, pageCount);
    case "last":
      return clampPageIndex(pageCount - 1, pageCount);
    case "goto":
      return clampPageIndex(action.index, pageCount);
  }
}

export function canGoPrevious(index: number, pageCount: number): boolean {
  return clampPageIndex(index, pageCount) > 0;
}

export function canGoNext(index: number, pageCount: number): boolean {
  return clampPageIndex(index, pageCount) < pageCount - 1;
}

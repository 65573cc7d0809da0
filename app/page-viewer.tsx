"use client";

import { useState } from "react";
import {
  canGoNext,
  canGoPrevious,
  clampPageIndex,
  navigate,
  type NavigationAction,
} from "@/lib/viewer/navigation";

type RightPane = "text" | "image";

export function PageViewer({
  pageCount,
  sections,
}: {
  pageCount: number;
  sections: Record<number, string>;
}) {
  const [pageIndex, setPageIndex] = useState(0);
  const [pane, setPane] = useState<RightPane>("text");

  const current = clampPageIndex(pageIndex, pageCount);
  const go = (action: NavigationAction) =>
    setPageIndex((index) => navigate(index, action, pageCount));

  const section = sections[current];

  return (
    <div>
      <div className="mb-4 grid grid-cols-[1fr_2fr_1fr] items-center gap-4">
        <button
          type="button"
          onClick={() => go({ type: "previous" })}
          disabled={!canGoPrevious(current, pageCount)}
          className="justify-self-start rounded border border-border px-3 py-1.5 text-sm hover:border-border-hover disabled:opacity-40"
        >
          ← Previous
        </button>
        <p className="text-center text-sm font-semibold">
          Page {current + 1} of {pageCount}
        </p>
        <button
          type="button"
          onClick={() => go({ type: "next" })}
          disabled={!canGoNext(current, pageCount)}
          className="justify-self-end rounded border border-border px-3 py-1.5 text-sm hover:border-border-hover disabled:opacity-40"
        >
          Next →
        </button>
      </div>

      <hr className="mb-6 border-border" />

      <div className="grid gap-6 lg:grid-cols-2">
        <div>
          <h2 className="mb-2 text-sm font-medium text-muted">PDF View</h2>
          {/* eslint-disable-next-line @next/next/no-img-element */}
          <img
            src={`/api/pages/${current}/preview`}
            alt={`PDF page ${current + 1}`}
            className="w-full rounded-lg border border-border bg-surface"
          />
        </div>

        <div>
          <div className="mb-2 flex gap-3 text-sm">
            <button
              type="button"
              onClick={() => setPane("text")}
              className={pane === "text" ? "font-medium text-foreground" : "text-muted hover:text-foreground"}
            >
              Extracted Text
            </button>
            <button
              type="button"
              onClick={() => setPane("image")}
              className={pane === "image" ? "font-medium text-foreground" : "text-muted hover:text-foreground"}
            >
              Enhanced PNG
            </button>
          </div>
          {pane === "text" ? (
            section !== undefined ? (
              <pre className="rounded-lg border border-border p-4 font-mono text-sm whitespace-pre-wrap">
                {section}
              </pre>
            ) : (
              <p className="text-muted">No extracted text for this page.</p>
            )
          ) : (
            // eslint-disable-next-line @next/next/no-img-element
            <img
              src={`/api/pages/${current}/image`}
              alt={`Enhanced page ${current + 1}`}
              className="w-full rounded-lg border border-border bg-surface"
            />
          )}
        </div>
      </div>
    </div>
  );
}

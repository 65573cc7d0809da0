import { describe, it, expect, afterEach, vi } from "vitest";
import { of, Subject, throwError } from "rxjs";
import {
  formatProgressLine,
  runWithProgress,
  type ProgressSnapshot,
  type ProgressStream,
} from "../progress";

function recordingStream(): ProgressStream & { chunks: string[] } {
  const chunks: string[] = [];
  return {
    chunks,
    write: (chunk) => {
      chunks.push(chunk);
      return true;
    },
  };
}

const identity = (s: ProgressSnapshot) => s;

describe("formatProgressLine", () => {
  it("draws a bar proportional to progress", () => {
    expect(formatProgressLine("✔", "ocr", { current: 1, total: 2 }, { barWidth: 4 })).toBe(
      "✔ ocr  ██░░  1/2 pages"
    );
  });

  it("appends the failure count when there are failures", () => {
    expect(
      formatProgressLine("⠋", "ocr", { current: 3, total: 4, failed: 2 }, { barWidth: 4 })
    ).toBe("⠋ ocr  ███░  3/4 pages  (2 failed)");
  });

  it("draws an empty bar for an unknown total", () => {
    expect(formatProgressLine("⠋", "convert", { current: 0, total: 0 }, { barWidth: 4 })).toBe(
      "⠋ convert  ░░░░  0/0 pages"
    );
  });
});

describe("runWithProgress", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("ends a clean run with a check mark", async () => {
    const stream = recordingStream();

    await runWithProgress(
      of({ current: 1, total: 2 }, { current: 2, total: 2 }),
      identity,
      { label: "ocr", barWidth: 4, stream }
    );

    expect(stream.chunks).toEqual(["\r✔ ocr  ████  2/2 pages\n"]);
  });

  it("ends a run with failures with a warning and the count", async () => {
    const stream = recordingStream();

    await runWithProgress(
      of({ current: 1, total: 2, failed: 1 }, { current: 2, total: 2, failed: 2 }),
      identity,
      { label: "ocr", barWidth: 4, stream }
    );

    expect(stream.chunks).toEqual(["\r⚠ ocr  ████  2/2 pages  (2 failed)\n"]);
  });

  it("reports an error and rejects", async () => {
    const stream = recordingStream();

    await expect(
      runWithProgress(throwError(() => new Error("boom")), identity, {
        label: "ocr",
        stream,
      })
    ).rejects.toThrow("boom");
    expect(stream.chunks).toEqual(["\n", "✗ ocr  Error: boom\n"]);
  });

  it("redraws the spinner line while running", async () => {
    vi.useFakeTimers();
    const stream = recordingStream();
    const source = new Subject<ProgressSnapshot>();

    const done = runWithProgress(source, identity, { label: "ocr", barWidth: 4, stream });
    source.next({ current: 1, total: 2, failed: 1 });
    vi.advanceTimersByTime(80);
    source.complete();
    await done;

    expect(stream.chunks).toEqual([
      "\r⠋ ocr  ██░░  1/2 pages  (1 failed)",
      "\r⚠ ocr  ██░░  1/2 pages  (1 failed)\n",
    ]);
  });
});

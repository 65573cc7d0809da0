/**
 * CLI progress display: a spinner and bar on stderr driven by an
 * Observable of progress values, with a failure count after the bar.
 */

import type { Observable } from "rxjs";

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const FRAME_INTERVAL_MS = 80;

export interface ProgressSnapshot {
  current: number;
  total: number;
  /** Items that finished with an error so far */
  failed?: number;
}

export interface ProgressStream {
  write(chunk: string): boolean;
}

export interface ProgressOptions {
  label: string;
  unit?: string;
  barWidth?: number;
  stream?: ProgressStream;
}

export function formatProgressLine(
  symbol: string,
  label: string,
  snapshot: ProgressSnapshot,
  { unit = "pages", barWidth = 20 }: Pick<ProgressOptions, "unit" | "barWidth"> = {}
): string {
  const { current, total, failed = 0 } = snapshot;
  const filled =
    total > 0 ? Math.min(barWidth, Math.round((current / total) * barWidth)) : 0;
  const bar = "█".repeat(filled) + "░".repeat(barWidth - filled);
  const failures = failed > 0 ? `  (${failed} failed)` : "";
  return `${symbol} ${label}  ${bar}  ${current}/${total} ${unit}${failures}`;
}

export function runWithProgress<T>(
  source: Observable<T>,
  mapper: (value: T) => ProgressSnapshot,
  options: ProgressOptions
): Promise<void> {
  const { label, stream = process.stderr } = options;
  let snapshot: ProgressSnapshot = { current: 0, total: 0 };
  let frame = 0;

  return new Promise<void>((resolve, reject) => {
    const timer = setInterval(() => {
      const spinner = SPINNER_FRAMES[frame % SPINNER_FRAMES.length];
      stream.write(`\r${formatProgressLine(spinner, label, snapshot, options)}`);
      frame++;
    }, FRAME_INTERVAL_MS);

    source.subscribe({
      next(value) {
        snapshot = mapper(value);
      },
      error(err) {
        clearInterval(timer);
        stream.write("\n");
        stream.write(`✗ ${label}  ${String(err)}\n`);
        reject(err);
      },
      complete() {
        clearInterval(timer);
        const symbol = (snapshot.failed ?? 0) > 0 ? "⚠" : "✔";
        stream.write(`\r${formatProgressLine(symbol, label, snapshot, options)}\n`);
        resolve();
      },
    });
  });
}

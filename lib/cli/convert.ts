#!/usr/bin/env node
/**
 * PDF → PNG conversion CLI
 *
 * Usage:
 *   npm run convert -- [options]
 */

import { getConversionConfig, loadConfig } from "../config";
import { errorMessage, isUserFacingError } from "../errors";
import { consoleLogger, nullLogger } from "../logger";
import { convertPdfToPng, exportPages } from "../pipeline/export/export";
import { runWithProgress } from "./progress";

const USAGE = `Usage: npm run convert -- [options]

Options:
  --config <file>        Config file (default: config.yaml)
  --input <pdf>          Input PDF
  --output-dir <dir>     Output directory for page images
  --contrast <n>         Contrast factor (>= 0)
  --dpi <n>              Render resolution
  --grayscale            Convert pages to grayscale
  --no-grayscale         Keep colour
  --progress             Show a progress bar instead of per-page log lines`;

interface ParsedFlags {
  configPath?: string;
  conversion: Record<string, unknown>;
  progress: boolean;
  help: boolean;
}

function parseFlags(args: string[]): ParsedFlags {
  const conversion: Record<string, unknown> = {};
  let configPath: string | undefined;
  let progress = false;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--config" && args[i + 1]) {
      configPath = args[++i];
    } else if (arg === "--input" && args[i + 1]) {
      conversion.input_pdf = args[++i];
    } else if (arg === "--output-dir" && args[i + 1]) {
      conversion.output_dir = args[++i];
    } else if (arg === "--contrast" && args[i + 1]) {
      conversion.contrast_factor = Number(args[++i]);
    } else if (arg === "--dpi" && args[i + 1]) {
      conversion.dpi = Number(args[++i]);
    } else if (arg === "--grayscale") {
      conversion.grayscale = true;
    } else if (arg === "--no-grayscale") {
      conversion.grayscale = false;
    } else if (arg === "--progress") {
      progress = true;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    }
  }

  return { configPath, conversion, progress, help };
}

async function main() {
  const flags = parseFlags(process.argv.slice(2));
  if (flags.help) {
    console.log(USAGE);
    return;
  }

  const config = getConversionConfig(
    loadConfig(flags.configPath, { conversion: flags.conversion })
  );

  if (flags.progress) {
    await runWithProgress(
      exportPages(config, { logger: nullLogger }),
      (p) => ({ current: p.page, total: p.totalPages }),
      { label: "convert" }
    );
  } else {
    await convertPdfToPng(config, { logger: consoleLogger });
  }
}

main().catch((err: unknown) => {
  if (isUserFacingError(err)) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error(`An error occurred: ${errorMessage(err)}`);
  }
  process.exit(1);
});

#!/usr/bin/env node
/**
 * Page image → markdown CLI
 *
 * Usage:
 *   npm run ocr -- [options]
 */

import path from "node:path";
import { loadConfig } from "../config";
import { errorMessage, isUserFacingError } from "../errors";
import { consoleLogger, nullLogger } from "../logger";
import { createVisionClient } from "../pipeline/core/llm";
import { appendLogEntry } from "../pipeline/llm-log";
import {
  extractText,
  runTextExtraction,
} from "../pipeline/text-extraction/text-extraction";
import { runWithProgress } from "./progress";

const USAGE = `Usage: npm run ocr -- [options]

Options:
  --config <file>        Config file (default: config.yaml)
  --images-dir <dir>     Directory of page_####.png files (default: conversion.output_dir)
  --output <file>        Markdown output file
  --provider <name>      openai | anthropic | google
  --model <id>           Model id, or provider:model-id
  --progress             Show a progress bar instead of per-page log lines`;

interface ParsedFlags {
  configPath?: string;
  imagesDir?: string;
  textExtraction: Record<string, unknown>;
  progress: boolean;
  help: boolean;
}

function parseFlags(args: string[]): ParsedFlags {
  const textExtraction: Record<string, unknown> = {};
  let configPath: string | undefined;
  let imagesDir: string | undefined;
  let progress = false;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--config" && args[i + 1]) {
      configPath = args[++i];
    } else if (arg === "--images-dir" && args[i + 1]) {
      imagesDir = args[++i];
    } else if (arg === "--output" && args[i + 1]) {
      textExtraction.markdown_path = args[++i];
    } else if (arg === "--provider" && args[i + 1]) {
      textExtraction.provider = args[++i];
    } else if (arg === "--model" && args[i + 1]) {
      textExtraction.model = args[++i];
    } else if (arg === "--progress") {
      progress = true;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    }
  }

  return { configPath, imagesDir, textExtraction, progress, help };
}

async function main() {
  const flags = parseFlags(process.argv.slice(2));
  if (flags.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig(flags.configPath, {
    text_extraction: flags.textExtraction,
  });
  const settings = config.text_extraction;
  const logFile = path.resolve(settings.log_file);

  const client = createVisionClient({
    provider: settings.provider,
    modelId: settings.model,
    onLog: (entry) => appendLogEntry(logFile, entry),
    logger: consoleLogger,
  });

  const options = {
    imagesDir: flags.imagesDir ?? config.conversion.output_dir,
    markdownPath: settings.markdown_path,
    client,
  };

  if (flags.progress) {
    await runWithProgress(
      extractText({ ...options, logger: nullLogger }),
      (p) => ({ current: p.page, total: p.totalPages, failed: p.failedCount }),
      { label: "text-extraction", unit: "pages" }
    );
  } else {
    await runTextExtraction({ ...options, logger: consoleLogger });
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

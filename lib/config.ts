import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import { ConfigurationError, MissingInputError } from "./errors";

export const llmProviderSchema = z.enum(["openai", "anthropic", "google"]);

export const conversionConfigSchema = z.object({
  input_pdf: z.string().min(1).default("document.pdf"),
  output_dir: z.string().min(1).default("png_output"),
  contrast_factor: z.number().min(0).default(2.0),
  dpi: z.number().int().positive().default(300),
  grayscale: z.boolean().default(true),
});

const configSchema = z.object({
  conversion: conversionConfigSchema.prefault({}),
  text_extraction: z
    .object({
      markdown_path: z.string().min(1).default("output.md"),
      provider: llmProviderSchema.default("google"),
      model: z.string().optional(),
      log_file: z.string().min(1).default("llm-log.jsonl"),
    })
    .prefault({}),
  viewer: z
    .object({
      preview_dpi: z.number().int().positive().default(150),
    })
    .prefault({}),
});

export type AppConfig = z.infer<typeof configSchema>;
export type ConversionConfig = Readonly<z.infer<typeof conversionConfigSchema>>;
export type LLMProvider = z.infer<typeof llmProviderSchema>;

const DEFAULT_CONFIG_FILE = "config.yaml";

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge<T extends Record<string, unknown>>(
  base: T,
  overrides: Record<string, unknown>
): T {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }
  return result as T;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.map(String).join(".");
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate conversion settings. Runs before any file is touched so a bad
 * contrast or DPI value never leaves partial output behind.
 */
export function createConversionConfig(input: unknown): ConversionConfig {
  const parsed = conversionConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }
  return Object.freeze(parsed.data);
}

export function parseConfig(raw: unknown): AppConfig {
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Load `config.yaml` (or an explicit path) and apply overrides on top.
 *
 * An explicit path that does not exist is an error; a missing default
 * file just means "use the defaults".
 */
export function loadConfig(
  configPath?: string,
  overrides: Record<string, unknown> = {}
): AppConfig {
  const resolved = path.resolve(configPath ?? DEFAULT_CONFIG_FILE);
  let raw: unknown = {};
  if (fs.existsSync(resolved)) {
    raw = yaml.load(fs.readFileSync(resolved, "utf-8")) ?? {};
  } else if (configPath) {
    throw new MissingInputError("file", resolved);
  }
  if (!isPlainObject(raw)) {
    throw new ConfigurationError([`${resolved}: expected a mapping at the top level`]);
  }
  return parseConfig(deepMerge(raw, overrides));
}

export function getConversionConfig(cfg: AppConfig): ConversionConfig {
  return createConversionConfig(cfg.conversion);
}

/**
 * Vision extraction client.
 *
 * Wraps the Vercel AI SDK so the rest of the pipeline sees one call:
 * image bytes in, markdown text out. One attempt per call; failures are
 * thrown to the caller after being logged.
 */

import { generateText, type LanguageModel, type ModelMessage } from "ai";
import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { llmProviderSchema, type LLMProvider } from "../../config";
import { errorMessage } from "../../errors";
import { consoleLogger, type Logger } from "../../logger";
import { renderPrompt, type PromptMessage } from "../prompt";
import { sanitizeMessages, type LlmLogEntry } from "../llm-log";

export type { LLMProvider };

// ============================================================================
// Provider types and model resolution
// ============================================================================

export const DEFAULT_PROVIDER: LLMProvider = "google";

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: "gpt-4o-mini",
  anthropic: "claude-sonnet-4-20250514",
  google: "gemini-2.5-flash-lite",
};

const MODEL_FACTORIES: Record<LLMProvider, (id: string) => LanguageModel> = {
  openai: (id) => openai(id),
  anthropic: (id) => anthropic(id),
  google: (id) => google(id),
};

export interface ResolvedModel {
  provider: LLMProvider;
  modelId: string;
}

/**
 * Resolve "model-id" (uses the given provider) or "provider:model-id".
 */
export function resolveModelId(
  provider: LLMProvider,
  modelId?: string
): ResolvedModel {
  if (modelId) {
    const colonIdx = modelId.indexOf(":");
    if (colonIdx !== -1) {
      const parsed = llmProviderSchema.safeParse(modelId.slice(0, colonIdx));
      if (!parsed.success) {
        throw new Error(`Unknown provider in model id: ${modelId}`);
      }
      return { provider: parsed.data, modelId: modelId.slice(colonIdx + 1) };
    }
    return { provider, modelId };
  }
  return { provider, modelId: DEFAULT_MODELS[provider] };
}

// ============================================================================
// Vision client
// ============================================================================

export const TEXT_EXTRACTION_PROMPT = "text_extraction";

export interface VisionInput {
  data: Uint8Array;
  mediaType: string;
  /** Used only for logging */
  pageId?: string;
}

export interface VisionClient {
  readonly modelId: string;
  extractText(input: VisionInput): Promise<string>;
}

export interface CreateVisionClientOptions {
  provider?: LLMProvider;
  modelId?: string;
  onLog?: (entry: LlmLogEntry) => void;
  /** Receives failures of `onLog`; the extraction result is kept regardless */
  logger?: Logger;
}

export function createVisionClient(
  options: CreateVisionClientOptions = {}
): VisionClient {
  const resolved = resolveModelId(
    options.provider ?? DEFAULT_PROVIDER,
    options.modelId
  );
  const languageModel = MODEL_FACTORIES[resolved.provider](resolved.modelId);
  const modelId = `${resolved.provider}:${resolved.modelId}`;
  const logger = options.logger ?? consoleLogger;

  return {
    modelId,
    async extractText(input: VisionInput): Promise<string> {
      const promptMessages = await renderPrompt(TEXT_EXTRACTION_PROMPT, {
        page_image: {
          data: Buffer.from(input.data).toString("base64"),
          media_type: input.mediaType,
        },
      });
      const { system, messages } = toModelMessages(promptMessages);
      const t0 = Date.now();

      const log = (extra: Pick<LlmLogEntry, "usage" | "error">) => {
        if (!options.onLog) return;
        try {
          options.onLog({
            timestamp: new Date().toISOString(),
            taskType: "text-extraction",
            pageId: input.pageId,
            promptName: TEXT_EXTRACTION_PROMPT,
            modelId,
            durationMs: Date.now() - t0,
            system,
            messages: sanitizeMessages(
              promptMessages.filter((m) => m.role !== "system")
            ),
            ...extra,
          });
        } catch (err) {
          logger.warn(`Failed to write LLM log entry: ${errorMessage(err)}`);
        }
      };

      const result = await generateText({
        model: languageModel,
        system,
        messages,
        maxRetries: 0,
      }).catch((err: unknown) => {
        log({ error: errorMessage(err) });
        throw err;
      });

      log({
        usage: {
          inputTokens: result.usage.inputTokens ?? 0,
          outputTokens: result.usage.outputTokens ?? 0,
        },
      });
      return result.text;
    },
  };
}

// ============================================================================
// Internal helpers
// ============================================================================

function toModelMessages(promptMessages: PromptMessage[]): {
  system?: string;
  messages: ModelMessage[];
} {
  let system: string | undefined;
  const messages: ModelMessage[] = [];

  for (const m of promptMessages) {
    if (m.role === "system") {
      system = typeof m.content === "string" ? m.content : textOf(m.content);
    } else if (m.role === "user") {
      messages.push({ role: "user", content: m.content });
    } else {
      messages.push({
        role: "assistant",
        content: typeof m.content === "string" ? m.content : textOf(m.content),
      });
    }
  }

  return { system, messages };
}

function textOf(parts: Exclude<PromptMessage["content"], string>): string {
  return parts
    .map((p) => (p.type === "text" ? p.text : ""))
    .filter(Boolean)
    .join("\n");
}

import { describe, it, expect, beforeEach, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createVisionClient, resolveModelId } from "../llm";
import type { LlmLogEntry } from "../../llm-log";
import { hashBase64 } from "../../llm-log";
import { encodePng } from "../../../images/png-utils";
import type { Logger } from "../../../logger";
import { pageImagePath } from "../../page-naming";
import { runTextExtraction } from "../../text-extraction/text-extraction";

interface FakeModel {
  provider: string;
  modelId: string;
}

interface GenerateTextCall {
  model: FakeModel;
  system?: string;
  messages: unknown[];
  maxRetries?: number;
}

const mocks = vi.hoisted(() => ({
  generateText: vi.fn<
    (call: GenerateTextCall) => Promise<{
      text: string;
      usage: { inputTokens?: number; outputTokens?: number };
    }>
  >(),
  openai: vi.fn((modelId: string) => ({ provider: "openai", modelId })),
  anthropic: vi.fn((modelId: string) => ({ provider: "anthropic", modelId })),
  google: vi.fn((modelId: string) => ({ provider: "google", modelId })),
}));

vi.mock("ai", () => ({ generateText: mocks.generateText }));
vi.mock("@ai-sdk/openai", () => ({ openai: mocks.openai }));
vi.mock("@ai-sdk/anthropic", () => ({ anthropic: mocks.anthropic }));
vi.mock("@ai-sdk/google", () => ({ google: mocks.google }));

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    info: () => {},
    warn: (m) => warnings.push(m),
    error: () => {},
  };
}

const failingLogWriter = () => {
  throw new Error("EACCES: llm-log.jsonl");
};

const SYSTEM_PROMPT =
  "Extract all text from the provided image. Return the extracted text in markdown format, preserving the structure and formatting as much as possible.";
const USER_PROMPT =
  "Extract all text from this image and format it in markdown. Preserve the structure, tables, and formatting as much as possible.";

describe("resolveModelId", () => {
  it("falls back to the provider's default model", () => {
    expect(resolveModelId("google")).toEqual({
      provider: "google",
      modelId: "gemini-2.5-flash-lite",
    });
    expect(resolveModelId("openai")).toEqual({ provider: "openai", modelId: "gpt-4o-mini" });
  });

  it("keeps a bare model id with the given provider", () => {
    expect(resolveModelId("anthropic", "claude-x")).toEqual({
      provider: "anthropic",
      modelId: "claude-x",
    });
  });

  it("lets a provider prefix override the provider", () => {
    expect(resolveModelId("google", "openai:gpt-4o")).toEqual({
      provider: "openai",
      modelId: "gpt-4o",
    });
  });

  it("rejects an unknown provider prefix", () => {
    expect(() => resolveModelId("google", "acme:model")).toThrow(
      "Unknown provider in model id: acme:model"
    );
  });
});

describe("createVisionClient", () => {
  const png = encodePng(Buffer.alloc(3 * 2 * 4, 255), 3, 2);
  const base64 = png.toString("base64");

  beforeEach(() => {
    mocks.generateText.mockReset();
    mocks.openai.mockClear();
    mocks.google.mockClear();
  });

  it("uses google's default model unless told otherwise", () => {
    const client = createVisionClient();
    expect(client.modelId).toBe("google:gemini-2.5-flash-lite");
    expect(mocks.google).toHaveBeenCalledWith("gemini-2.5-flash-lite");
  });

  it("resolves a prefixed model id to its provider", () => {
    const client = createVisionClient({ provider: "google", modelId: "openai:gpt-4o" });
    expect(client.modelId).toBe("openai:gpt-4o");
    expect(mocks.openai).toHaveBeenCalledWith("gpt-4o");
  });

  it("sends the prompt and image in a single attempt", async () => {
    mocks.generateText.mockResolvedValue({
      text: "# Heading\n\nBody",
      usage: { inputTokens: 10, outputTokens: 5 },
    });
    const client = createVisionClient({ provider: "google" });

    const text = await client.extractText({ data: png, mediaType: "image/png" });

    expect(text).toBe("# Heading\n\nBody");
    expect(mocks.generateText).toHaveBeenCalledTimes(1);
    expect(mocks.generateText).toHaveBeenCalledWith({
      model: { provider: "google", modelId: "gemini-2.5-flash-lite" },
      system: SYSTEM_PROMPT,
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: USER_PROMPT },
            { type: "image", image: base64, mediaType: "image/png" },
          ],
        },
      ],
      maxRetries: 0,
    });
  });

  it("logs usage and a sanitized copy of the request", async () => {
    mocks.generateText.mockResolvedValue({
      text: "ok",
      usage: { inputTokens: 10, outputTokens: 5 },
    });
    const entries: LlmLogEntry[] = [];
    const client = createVisionClient({ onLog: (e) => entries.push(e) });

    await client.extractText({ data: png, mediaType: "image/png", pageId: "page_0001" });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      taskType: "text-extraction",
      pageId: "page_0001",
      promptName: "text_extraction",
      modelId: "google:gemini-2.5-flash-lite",
      system: SYSTEM_PROMPT,
      usage: { inputTokens: 10, outputTokens: 5 },
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: USER_PROMPT },
            {
              type: "image",
              mediaType: "image/png",
              hash: hashBase64(base64),
              width: 3,
              height: 2,
            },
          ],
        },
      ],
    });
    expect(entries[0].error).toBeUndefined();
  });

  it("defaults missing token counts to zero", async () => {
    mocks.generateText.mockResolvedValue({ text: "ok", usage: {} });
    const entries: LlmLogEntry[] = [];
    const client = createVisionClient({ onLog: (e) => entries.push(e) });

    await client.extractText({ data: png, mediaType: "image/png" });

    expect(entries[0].usage).toEqual({ inputTokens: 0, outputTokens: 0 });
  });

  it("logs and rethrows a failed call", async () => {
    mocks.generateText.mockRejectedValue(new Error("quota exceeded"));
    const entries: LlmLogEntry[] = [];
    const client = createVisionClient({ onLog: (e) => entries.push(e) });

    await expect(
      client.extractText({ data: png, mediaType: "image/png" })
    ).rejects.toThrow("quota exceeded");
    expect(mocks.generateText).toHaveBeenCalledTimes(1);
    expect(entries).toHaveLength(1);
    expect(entries[0].error).toBe("quota exceeded");
    expect(entries[0].usage).toBeUndefined();
  });

  it("keeps the extracted text when the log writer fails", async () => {
    mocks.generateText.mockResolvedValue({
      text: "REAL TEXT",
      usage: { inputTokens: 1, outputTokens: 1 },
    });
    const logger = recordingLogger();
    const onLog = vi.fn(failingLogWriter);
    const client = createVisionClient({ onLog, logger });

    const text = await client.extractText({ data: png, mediaType: "image/png" });

    expect(text).toBe("REAL TEXT");
    expect(onLog).toHaveBeenCalledTimes(1);
    expect(logger.warnings).toEqual([
      "Failed to write LLM log entry: EACCES: llm-log.jsonl",
    ]);
  });

  it("rethrows the call error, not the log writer's, when both fail", async () => {
    mocks.generateText.mockRejectedValue(new Error("quota exceeded"));
    const logger = recordingLogger();
    const client = createVisionClient({ onLog: failingLogWriter, logger });

    await expect(
      client.extractText({ data: png, mediaType: "image/png" })
    ).rejects.toThrow("quota exceeded");
    expect(logger.warnings).toHaveLength(1);
  });

  it("writes the page text to markdown when the log file is unwritable", async () => {
    mocks.generateText.mockResolvedValue({
      text: "REAL TEXT",
      usage: { inputTokens: 1, outputTokens: 1 },
    });
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "llm-log-failure-test-"));
    try {
      const imagesDir = path.join(tmpDir, "png_output");
      fs.mkdirSync(imagesDir);
      fs.writeFileSync(pageImagePath(imagesDir, 1), png);
      const markdownPath = path.join(tmpDir, "output.md");
      const logger = recordingLogger();

      const result = await runTextExtraction({
        imagesDir,
        markdownPath,
        client: createVisionClient({ onLog: failingLogWriter, logger }),
        logger,
      });

      expect(result.processedCount).toBe(1);
      expect(result.failedCount).toBe(0);
      expect(fs.readFileSync(markdownPath, "utf-8")).toBe(
        "# OCR Extracted Text\n\n## Page 0001\n\nREAL TEXT\n\n---\n\n"
      );
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});

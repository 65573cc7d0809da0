import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { ImagePart } from "ai";
import type { PromptMessage } from "./prompt";

export interface LlmLogTokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LlmLogEntry {
  timestamp: string;
  taskType: string;
  pageId?: string;
  promptName: string;
  modelId: string;
  durationMs: number;
  usage?: LlmLogTokenUsage;
  error?: string;
  system?: string;
  messages: LlmLogMessage[];
}

export type LlmLogMessage = {
  role: string;
  content: (LlmLogTextPart | LlmLogImagePlaceholder)[];
};

type LlmLogTextPart = { type: "text"; text: string };
export type LlmLogImagePlaceholder = {
  type: "image";
  mediaType?: string;
  hash: string;
  byteLength: number;
  width: number;
  height: number;
};

/**
 * Strip image data from prompt messages, replacing it with a placeholder
 * that records hash, size and PNG dimensions.
 */
export function sanitizeMessages(messages: PromptMessage[]): LlmLogMessage[] {
  return messages.map((m) => {
    if (typeof m.content === "string") {
      return { role: m.role, content: [{ type: "text" as const, text: m.content }] };
    }
    const content: LlmLogMessage["content"] = [];
    for (const part of m.content) {
      if (part.type === "text") {
        content.push({ type: "text", text: part.text });
      } else if (part.type === "image") {
        const base64 = imageToBase64(part.image);
        content.push({
          type: "image",
          mediaType: part.mediaType,
          hash: hashBase64(base64),
          byteLength: Math.round((base64.length * 3) / 4),
          ...pngDimensions(base64),
        });
      } else {
        content.push({ type: "text", text: `[file ${part.mediaType}]` });
      }
    }
    return { role: m.role, content };
  });
}

function imageToBase64(image: ImagePart["image"]): string {
  if (typeof image === "string") return image;
  if (image instanceof URL) return image.href;
  if (image instanceof ArrayBuffer) return Buffer.from(image).toString("base64");
  return Buffer.from(image).toString("base64");
}

/**
 * Read PNG width and height from the IHDR chunk in a base64-encoded PNG.
 * Width is at byte offset 16, height at 20 (both big-endian uint32).
 * We only need to decode the first 24 bytes (32 base64 chars covers that).
 */
function pngDimensions(base64: string): { width: number; height: number } {
  const buf = Buffer.from(base64.slice(0, 32), "base64");
  if (buf.length < 24) return { width: 0, height: 0 };
  return { width: buf.readUInt32BE(16), height: buf.readUInt32BE(20) };
}

/**
 * Compute the same hash used in log entries for a base64 image string.
 */
export function hashBase64(base64: string): string {
  return createHash("sha256").update(base64).digest("hex").slice(0, 16);
}

export const MAX_LOG_ENTRIES = 250;

/**
 * Append a log entry to a JSONL log file, keeping at most
 * MAX_LOG_ENTRIES entries (oldest are dropped).
 */
export function appendLogEntry(filePath: string, entry: LlmLogEntry): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");

  const content = fs.readFileSync(filePath, "utf-8");
  const lines = content.split("\n").filter(Boolean);
  if (lines.length > MAX_LOG_ENTRIES) {
    fs.writeFileSync(filePath, lines.slice(lines.length - MAX_LOG_ENTRIES).join("\n") + "\n");
  }
}

import type { ToolCall } from "../types/tool-call.js";

// ```tool (or ```json) fence around a single JSON object
const TOOL_FENCE = /```(tool|json)[ \t]*\r?\n?\s*(\{[\s\S]*?\})\s*\r?\n?```/g;

// Bare {"tool": "...", "args": {...}} without a fence; args may not nest
const RAW_TOOL_OBJECT =
  /\{\s*"tool"\s*:\s*"(\w+)"\s*,\s*"args"\s*:\s*(\{[^}]*\})\s*\}/;

/**
 * Sanitize common LLM JSON quirks before parsing:
 * - { ...} or { ... } → {}
 * - [...] → []
 * - Trailing commas before } or ]
 */
export function sanitizeLlmJson(raw: string): string {
  return raw
    .replace(/\{\s*\.{3}\s*\}/g, "{}")
    .replace(/\[\s*\.{3}\s*\]/g, "[]")
    .replace(/,\s*([}\]])/g, "$1");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonObject(raw: string): Record<string, unknown> | null {
  for (const candidate of [raw, sanitizeLlmJson(raw)]) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      return isRecord(parsed) ? parsed : null;
    } catch {
      // try the sanitized text next
    }
  }
  return null;
}

function toToolCall(data: Record<string, unknown>): ToolCall | null {
  if (typeof data.tool !== "string" || !data.tool) {
    return null;
  }
  return { name: data.tool, args: isRecord(data.args) ? data.args : {} };
}

function fencedToolCall(body: string): ToolCall | null {
  const data = parseJsonObject(body);
  return data ? toToolCall(data) : null;
}

/**
 * Extract the first tool call from a model response, or null when the
 * response is a plain answer.
 */
export function parseToolCall(response: string): ToolCall | null {
  for (const fence of response.matchAll(TOOL_FENCE)) {
    const call = fencedToolCall(fence[2]);
    if (call) return call;
  }

  const raw = RAW_TOOL_OBJECT.exec(response);
  if (raw) {
    const args = parseJsonObject(raw[2]);
    if (args) {
      return { name: raw[1], args };
    }
  }

  return null;
}

/**
 * The response with its tool blocks removed: whatever the model said
 * around the call. A ```json fence only counts as a tool block when it
 * holds a tool call.
 */
export function stripToolBlocks(response: string): string {
  return response
    .replace(TOOL_FENCE, (block: string, tag: string, body: string) =>
      tag === "tool" || fencedToolCall(body) ? "" : block
    )
    .trim();
}

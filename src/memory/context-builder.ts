import type { SearchResult } from "./types.js";

// ── Context Builder: fold retrieved memories into the prompt ─

/** Characters of each memory shown in the preamble. */
export const MEMORY_PREVIEW_CHARS = 150;

/**
 * Render retrieved memories as a preamble, oldest first.
 * Returns an empty string when nothing was retrieved.
 */
export function buildMemoryContext(
  memories: SearchResult[],
  now: Date = new Date(),
): string {
  if (memories.length === 0) return "";

  const sorted = [...memories].sort((a, b) =>
    a.metadata.timestamp === b.metadata.timestamp
      ? 0
      : a.metadata.timestamp < b.metadata.timestamp
        ? -1
        : 1,
  );
  const lines = sorted.map((m) => {
    const ago = formatAgo(Date.parse(m.metadata.timestamp), now.getTime());
    const prefix = m.metadata.role === "user" ? "User said" : "You replied";
    return `• [${ago}] ${prefix}: "${preview(m.content)}"`;
  });
  return `RELEVANT PAST CONVERSATION:\n${lines.join("\n")}`;
}

/** The user message sent for completion: memory preamble, then the question. */
export function buildUserPrompt(
  question: string,
  memories: SearchResult[],
  now: Date = new Date(),
): string {
  const context = buildMemoryContext(memories, now);
  const current = `Current question: ${question}`;
  return context ? `${context}\n\n${current}` : current;
}

function preview(content: string): string {
  const flat = content.replace(/\s+/g, " ").trim();
  return flat.length > MEMORY_PREVIEW_CHARS
    ? `${flat.slice(0, MEMORY_PREVIEW_CHARS)}…`
    : flat;
}

/** Format the gap between two Unix ms timestamps as "X ago". */
export function formatAgo(ts: number, nowMs: number = Date.now()): string {
  if (Number.isNaN(ts)) return "earlier";
  const diffSec = Math.floor((nowMs - ts) / 1000);
  if (diffSec < 60) return "just now";
  const diffMin = Math.floor(diffSec / 60);
  if (diffMin < 60) return `${diffMin}m ago`;
  const diffHr = Math.floor(diffMin / 60);
  if (diffHr < 24) return `${diffHr}h ago`;
  const diffDay = Math.floor(diffHr / 24);
  if (diffDay < 30) return `${diffDay}d ago`;
  const diffMo = Math.floor(diffDay / 30);
  return `${diffMo}mo ago`;
}

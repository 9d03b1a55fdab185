import { describe, it, expect } from "vitest";
import {
  buildMemoryContext,
  buildUserPrompt,
  formatAgo,
} from "../src/memory/context-builder.js";
import type { MemoryRole, SearchResult } from "../src/memory/types.js";

const NOW = new Date("2024-06-01T12:00:00.000Z");

function makeMemory(
  role: MemoryRole,
  content: string,
  timestamp: string,
): SearchResult {
  return {
    content,
    metadata: { role, timestamp, type: "text" },
    distance: 0.2,
    relevanceScore: 0.8,
  };
}

describe("buildMemoryContext", () => {
  // ── Empty context ──────────────────────────────────────

  it("returns empty string when nothing was retrieved", () => {
    expect(buildMemoryContext([], NOW)).toBe("");
  });

  // ── Rendering ──────────────────────────────────────────

  it("renders memories oldest first with speaker and age", () => {
    const result = buildMemoryContext(
      [
        makeMemory("assistant", "Use git stash", "2024-06-01T11:00:00.000Z"),
        makeMemory("user", "How do I save work?", "2024-06-01T10:00:00.000Z"),
      ],
      NOW,
    );
    expect(result).toBe(
      [
        "RELEVANT PAST CONVERSATION:",
        '• [2h ago] User said: "How do I save work?"',
        '• [1h ago] You replied: "Use git stash"',
      ].join("\n"),
    );
  });

  it("flattens whitespace in previews", () => {
    const result = buildMemoryContext(
      [makeMemory("user", "line one\n\n  line two", "2024-06-01T11:59:30.000Z")],
      NOW,
    );
    expect(result).toBe(
      'RELEVANT PAST CONVERSATION:\n• [just now] User said: "line one line two"',
    );
  });

  it("truncates long memories to 150 characters", () => {
    const long = "a".repeat(200);
    const result = buildMemoryContext(
      [makeMemory("user", long, "2024-06-01T11:30:00.000Z")],
      NOW,
    );
    expect(result).toBe(
      `RELEVANT PAST CONVERSATION:\n• [30m ago] User said: "${"a".repeat(150)}…"`,
    );
  });

  it("keeps a memory of exactly 150 characters whole", () => {
    const exact = "b".repeat(150);
    const result = buildMemoryContext(
      [makeMemory("assistant", exact, "2024-05-30T12:00:00.000Z")],
      NOW,
    );
    expect(result).toBe(
      `RELEVANT PAST CONVERSATION:\n• [2d ago] You replied: "${exact}"`,
    );
  });
});

describe("buildUserPrompt", () => {
  it("sends only the question when there is no context", () => {
    expect(buildUserPrompt("what is rebase?", [], NOW)).toBe(
      "Current question: what is rebase?",
    );
  });

  it("puts the context before the question", () => {
    const prompt = buildUserPrompt(
      "and after that?",
      [makeMemory("user", "rebase onto main", "2024-06-01T11:55:00.000Z")],
      NOW,
    );
    expect(prompt).toBe(
      'RELEVANT PAST CONVERSATION:\n• [5m ago] User said: "rebase onto main"\n\nCurrent question: and after that?',
    );
  });
});

describe("formatAgo", () => {
  const now = NOW.getTime();

  it("buckets the gap into minutes, hours, days and months", () => {
    expect(formatAgo(now - 59_000, now)).toBe("just now");
    expect(formatAgo(now - 5 * 60_000, now)).toBe("5m ago");
    expect(formatAgo(now - 3 * 3_600_000, now)).toBe("3h ago");
    expect(formatAgo(now - 4 * 86_400_000, now)).toBe("4d ago");
    expect(formatAgo(now - 65 * 86_400_000, now)).toBe("2mo ago");
  });

  it("falls back for an unparseable timestamp", () => {
    expect(formatAgo(Date.parse("not a date"), now)).toBe("earlier");
  });
});

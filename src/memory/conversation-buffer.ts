import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { ConversationTurn, TurnRole } from "./types.js";

// ── Conversation Buffer: short-term working context ─────

const TURN_ROLES: readonly TurnRole[] = ["user", "assistant", "system"];

function isTurn(value: unknown): value is ConversationTurn {
  if (typeof value !== "object" || value === null) return false;
  const role: unknown = "role" in value ? value.role : undefined;
  const content: unknown = "content" in value ? value.content : undefined;
  return (
    TURN_ROLES.some((r) => r === role) && typeof content === "string"
  );
}

/**
 * Ordered, in-memory list of recent turns. A round is one user turn plus
 * one assistant turn; `trim(n)` keeps the newest `2 × n` entries.
 */
export class ConversationBuffer {
  private entries: ConversationTurn[] = [];

  constructor(turns: ConversationTurn[] = []) {
    this.entries = turns.map((t) => ({ role: t.role, content: t.content }));
  }

  get length(): number {
    return this.entries.length;
  }

  append(turn: ConversationTurn): void {
    this.entries.push({ role: turn.role, content: turn.content });
  }

  trim(maxRounds: number): void {
    const limit = Math.max(0, Math.floor(maxRounds)) * 2;
    if (this.entries.length > limit) {
      this.entries = this.entries.slice(this.entries.length - limit);
    }
  }

  clear(): void {
    this.entries = [];
  }

  /** A copy; mutating it leaves the buffer alone. */
  turns(): ConversationTurn[] {
    return this.entries.map((t) => ({ ...t }));
  }

  toJSON(): ConversationTurn[] {
    return this.turns();
  }

  /**
   * Rebuild a buffer from its serialized form and re-apply the bound.
   * Throws when `value` is not a list of `{role, content}` pairs.
   */
  static fromJSON(value: unknown, maxRounds: number): ConversationBuffer {
    if (!Array.isArray(value) || !value.every(isTurn)) {
      throw new TypeError("Conversation must be a list of {role, content} turns");
    }
    const buffer = new ConversationBuffer(value);
    buffer.trim(maxRounds);
    return buffer;
  }
}

// ── Persistence ──────────────────────────────────────────

/**
 * Restore the buffer saved by a previous run. A missing file starts an
 * empty conversation; an unreadable one is reported and also starts empty.
 */
export function loadConversation(
  path: string,
  maxRounds: number,
): ConversationBuffer {
  if (!existsSync(path)) return new ConversationBuffer();
  try {
    const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return ConversationBuffer.fromJSON(raw, maxRounds);
  } catch (err) {
    log.warn(
      { path, error: errorMessage(err) },
      "⚠️ Failed to load conversation context, starting fresh",
    );
    return new ConversationBuffer();
  }
}

/** Write the buffer to `path`. Failures are reported, not thrown. */
export function saveConversation(
  path: string,
  buffer: ConversationBuffer,
): boolean {
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(buffer.toJSON(), null, 2), "utf-8");
    return true;
  } catch (err) {
    log.warn(
      { path, error: errorMessage(err) },
      "⚠️ Failed to save conversation context",
    );
    return false;
  }
}

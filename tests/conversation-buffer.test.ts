import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ConversationBuffer,
  loadConversation,
  saveConversation,
} from "../src/memory/conversation-buffer.js";
import type { ConversationTurn } from "../src/memory/types.js";

function rounds(n: number): ConversationTurn[] {
  const turns: ConversationTurn[] = [];
  for (let i = 1; i <= n; i++) {
    turns.push({ role: "user", content: `q${i}` });
    turns.push({ role: "assistant", content: `a${i}` });
  }
  return turns;
}

describe("ConversationBuffer", () => {
  it("keeps the newest two entries per round", () => {
    const buffer = new ConversationBuffer(rounds(4));
    buffer.trim(2);
    expect(buffer.turns().map((t) => t.content)).toEqual(["q3", "a3", "q4", "a4"]);
  });

  it("trimming twice changes nothing more", () => {
    const buffer = new ConversationBuffer(rounds(4));
    buffer.trim(2);
    buffer.trim(2);
    expect(buffer.length).toBe(4);
  });

  it("trims to nothing for zero or negative rounds", () => {
    const buffer = new ConversationBuffer(rounds(2));
    buffer.trim(-1);
    expect(buffer.length).toBe(0);
  });

  it("hands out copies of its turns", () => {
    const buffer = new ConversationBuffer(rounds(1));
    const copy = buffer.turns();
    copy[0] = { role: "system", content: "changed" };
    expect(buffer.turns()[0]).toEqual({ role: "user", content: "q1" });
  });

  it("rebuilds from JSON and re-applies the bound", () => {
    const buffer = ConversationBuffer.fromJSON(rounds(3), 1);
    expect(buffer.turns()).toEqual([
      { role: "user", content: "q3" },
      { role: "assistant", content: "a3" },
    ]);
  });

  it("rejects JSON that is not a list of turns", () => {
    expect(() => ConversationBuffer.fromJSON({ role: "user" }, 5)).toThrow(TypeError);
    expect(() =>
      ConversationBuffer.fromJSON([{ role: "robot", content: "x" }], 5),
    ).toThrow(TypeError);
  });
});

describe("conversation persistence", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "shell-recall-context-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("starts empty when no file exists", () => {
    expect(loadConversation(join(dir, "missing.json"), 5).length).toBe(0);
  });

  it("saves and restores the buffer", () => {
    const path = join(dir, "sub", "context.json");
    expect(saveConversation(path, new ConversationBuffer(rounds(2)))).toBe(true);

    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual(rounds(2));
    expect(loadConversation(path, 5).turns()).toEqual(rounds(2));
  });

  it("restores only as many rounds as allowed", () => {
    const path = join(dir, "context.json");
    saveConversation(path, new ConversationBuffer(rounds(3)));
    expect(loadConversation(path, 1).turns().map((t) => t.content)).toEqual([
      "q3",
      "a3",
    ]);
  });

  it("starts empty when the file is corrupt", () => {
    const path = join(dir, "context.json");
    writeFileSync(path, "{not json", "utf-8");
    expect(loadConversation(path, 5).length).toBe(0);
  });

  it("reports a failed save instead of throwing", () => {
    const blocker = join(dir, "file");
    writeFileSync(blocker, "x", "utf-8");
    expect(saveConversation(join(blocker, "context.json"), new ConversationBuffer())).toBe(
      false,
    );
  });
});

import { describe, expect, it, vi } from "vitest";
import { MemoryAdapter } from "../../tests/harness/memory-adapter";
import { backgroundContext } from "../bot/context";
import { runHearsHandler } from "../bot/invoke";
import { Message } from "../bot/message";
import { newResponseWriter } from "../bot/response-writer";
import { FLIPPED_TABLE, newTableflipHandler, UNFLIPPED_TABLE } from "./tableflip";

vi.mock("../logger", () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

async function hear(text: string) {
  const adapter = new MemoryAdapter();
  const matched = await runHearsHandler(
    backgroundContext(),
    newTableflipHandler(),
    newResponseWriter(adapter, new Message({ channel: "general" }), adapter.id),
    new Message({ channel: "general", text }),
  );
  return { matched, texts: adapter.texts() };
}

describe("tableflip", () => {
  it("sets a flipped table back", async () => {
    expect(await hear(`ugh ${FLIPPED_TABLE}`)).toEqual({ matched: true, texts: [UNFLIPPED_TABLE] });
  });

  it("ignores everything else", async () => {
    expect(await hear("the table is fine")).toEqual({ matched: false, texts: [] });
  });
});

import { PassThrough } from "node:stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import { Message } from "../../bot/message";
import { ShellAdapter } from "./adapter";

vi.mock("../../logger", () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

const adapters: ShellAdapter[] = [];

function createShell(prompt = "") {
  const input = new PassThrough();
  const output = new PassThrough();
  let printed = "";
  output.on("data", (chunk: Buffer) => {
    printed += chunk.toString("utf8");
  });
  const shell = new ShellAdapter({ nick: "minion", user: "tester", prompt, input, output });
  adapters.push(shell);
  return { shell, input, printed: () => printed };
}

afterEach(async () => {
  for (const shell of adapters.splice(0)) {
    await shell.disconnect();
  }
});

describe("ShellAdapter", () => {
  it("turns each line into a private message to the bot", async () => {
    const { shell, input } = createShell();
    await shell.connect();
    const messages = shell.receive()[Symbol.asyncIterator]();

    input.write("   \n");
    input.write("ping  \n");
    const next = await messages.next();

    expect(next.done).toBe(false);
    expect(next.value).toBeInstanceOf(Message);
    expect(next.value).toMatchObject({
      channel: "shell",
      from: "tester",
      userId: "tester",
      private: true,
      toBot: true,
      text: "ping",
    });
    expect(shell.getStatus()).toBe("connected");
  });

  it("prints replies under the nick, one line at a time", async () => {
    const { shell, printed } = createShell();
    await shell.connect();

    await shell.send(new Message({ text: "PONG" }));
    await shell.send(new Message({ text: "first\nsecond" }));

    await vi.waitFor(() => {
      expect(printed()).toBe("minion: PONG\nminion: first\nminion: second\n");
    });
  });

  it("shows the prompt when connected and after each reply", async () => {
    const { shell, printed } = createShell("> ");
    await shell.connect();
    await shell.send(new Message({ text: "hi" }));

    await vi.waitFor(() => {
      expect(printed()).toBe("> minion: hi\n> ");
    });
  });

  it("ends the message stream when input closes", async () => {
    const { shell, input } = createShell();
    await shell.connect();
    const statuses: string[] = [];
    shell.on("status", (status: string) => statuses.push(status));
    const messages = shell.receive()[Symbol.asyncIterator]();

    input.end("last words\n");

    expect((await messages.next()).value?.text).toBe("last words");
    expect((await messages.next()).done).toBe(true);
    expect(statuses).toEqual(["disconnected"]);
    expect(shell.isConnected()).toBe(false);
  });
});

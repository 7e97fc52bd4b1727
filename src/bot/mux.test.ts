import { beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryAdapter } from "../../tests/harness/memory-adapter";
import { newPingHandler } from "../handlers/ping";
import { backgroundContext } from "./context";
import {
  newBackgroundHandler,
  newCommandHandler,
  newHearsHandler,
  newRawHandler,
  newWebHookHandler,
  type Handler,
} from "./handler";
import { Message } from "./message";
import { Mux } from "./mux";
import { newResponseWriter } from "./response-writer";

vi.mock("../logger", () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

function setup(mux: Mux) {
  const adapter = new MemoryAdapter();
  const ctx = backgroundContext();
  const send = (text: string, toBot = true) => {
    const message = new Message({ channel: "general", from: "alice", text, toBot });
    return mux.processMessage(ctx, newResponseWriter(adapter, message.copy(), adapter.id), message);
  };
  return { adapter, ctx, send };
}

describe("Mux", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("help", () => {
    it("lists every command with help first", async () => {
      const mux = new Mux().handle(newPingHandler());
      const { adapter, send } = setup(mux);

      await send("help");

      expect(adapter.texts()).toEqual([
        ["Available commands:", "  help  provides help on commands", "  ping  responds to ping with PONG"].join(
          "\n",
        ),
      ]);
    });

    it("renders the usage of a single command", async () => {
      const mux = new Mux().handle(newPingHandler());
      const { adapter, send } = setup(mux);

      await send("help ping");

      expect(adapter.texts()).toEqual([
        [
          "Usage: ping [options]",
          "",
          "responds to ping with PONG",
          "",
          "Options:",
          "  -h, --help  display help for command",
        ].join("\n"),
      ]);
    });

    it("does not let the probed command reply", async () => {
      const calls: string[] = [];
      const mux = new Mux().handle(
        newCommandHandler("noisy", "replies even to help", async (_ctx, w, m) => {
          calls.push(m.args.join(" "));
          await w.write("noise");
        }),
      );
      const { adapter, send } = setup(mux);

      await send("help noisy");

      expect(calls).toEqual(["noisy --help"]);
      expect(adapter.sent).toHaveLength(1);
      expect(adapter.texts()[0]).toContain("Usage: noisy [options]");
    });

    it("reports unknown help topics", async () => {
      const { adapter, send } = setup(new Mux());

      await send("help nothing");

      expect(adapter.texts()).toEqual(["error: unknown command: nothing"]);
    });
  });

  describe("processMessage", () => {
    it("runs commands only for messages addressed to the bot", async () => {
      const mux = new Mux().handle(newPingHandler());
      const { adapter, send } = setup(mux);

      await send("ping", false);
      await send("ping", true);

      expect(adapter.texts()).toEqual(["PONG"]);
    });

    it("writes command failures back as errors", async () => {
      const mux = new Mux()
        .handle(newCommandHandler("deploy", "ships it", async () => {}))
        .handle(newCommandHandler("delete", "removes it", async () => {}));
      const { adapter, send } = setup(mux);

      await send("bogus");
      await send("de");

      expect(adapter.texts()).toEqual([
        "error: unknown command: bogus",
        "error: ambiguous command, de: delete, deploy",
      ]);
    });

    it("stays quiet about unknown commands a hears handler picked up", async () => {
      const mux = new Mux().handle(
        newHearsHandler("listener", "hears bogus", /^bogus/, async (_ctx, w) => {
          await w.write("heard it");
        }),
      );
      const { adapter, send } = setup(mux);

      await send("bogus words");

      expect(adapter.texts()).toEqual(["heard it"]);
    });

    it("skips hears handlers once a command printed its usage", async () => {
      const mux = new Mux()
        .handle(newPingHandler())
        .handle(
          newHearsHandler("ping-listener", "hears ping", /ping/, async (_ctx, w) => {
            await w.write("heard ping");
          }),
        );
      const { adapter, send } = setup(mux);

      await send("ping --help");

      expect(adapter.sent).toHaveLength(1);
      expect(adapter.texts()[0]).toContain("Usage: ping [options]");
    });

    it("runs hears handlers alongside a successful command", async () => {
      const mux = new Mux()
        .handle(newPingHandler())
        .handle(
          newHearsHandler("ping-listener", "hears ping", /ping/, async (_ctx, w) => {
            await w.write("heard ping");
          }),
        );
      const { adapter, send } = setup(mux);

      await send("ping");

      expect(adapter.texts().sort()).toEqual(["PONG", "heard ping"]);
    });

    it("fires raw handlers for every message", async () => {
      const mux = new Mux().handle(
        newRawHandler("logger", "sees everything", async (_ctx, w, m) => {
          await w.write(`raw:${m.text}`);
        }),
      );
      const { adapter, send } = setup(mux);

      await send("just chatting", false);
      await adapter.waitForSent(1);

      expect(adapter.texts()).toEqual(["raw:just chatting"]);
    });
  });

  it("starts every background handler", async () => {
    const mux = new Mux()
      .handle(newBackgroundHandler("one", "first", async (_ctx, w) => w.write("bg1")))
      .handle(newBackgroundHandler("two", "second", async (_ctx, w) => w.write("bg2")));
    const adapter = new MemoryAdapter();

    await mux.startBackground(backgroundContext(), newResponseWriter(adapter, new Message(), adapter.id));

    expect(adapter.texts().sort()).toEqual(["bg1", "bg2"]);
  });

  describe("web hooks", () => {
    const hook = (name: string) => newWebHookHandler(name, `${name} hook`, async () => {});

    it("assigns each hook a URL under the prefix, including hooks added later", () => {
      const mux = new Mux().handle(hook("deploys"));
      mux.setUrl(new URL("http://bot.example.test:8080/"));
      mux.handle(hook("alerts"));

      expect(mux.url()?.href).toBe("http://bot.example.test:8080/hooks");
      expect(mux.listWebHooks().map((entry) => entry.url()?.href)).toEqual([
        "http://bot.example.test:8080/hooks/deploys",
        "http://bot.example.test:8080/hooks/alerts",
      ]);
    });

    it("honours a custom prefix", () => {
      const mux = new Mux({ webHookPrefix: "integrations/" }).handle(hook("ci"));
      mux.setUrl(new URL("https://chat.example.test/bot"));

      expect(mux.listWebHooks()[0].url()?.href).toBe("https://chat.example.test/bot/integrations/ci");
    });

    it("rejects a second hook with the same name", () => {
      const mux = new Mux().handle(hook("ci"));
      expect(() => mux.handle(hook("ci"))).toThrow("Web hook ci already registered");
    });
  });

  it("refuses handlers without any capability", () => {
    const inert: Handler = { name: "inert", description: "does nothing" };
    expect(() => new Mux().handle(inert)).toThrow("Handler inert implements no known capability");
  });
});

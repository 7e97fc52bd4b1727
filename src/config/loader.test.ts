import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BUNDLED_HANDLERS } from "../handlers";
import { CONFIG_ENV_VAR, loadConfig, resolveConfigPath } from "./loader";

vi.mock("../logger", () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

const NICK_KEY = "CHATMUX_LOADER_TEST_NICK";
const tempDirs: string[] = [];
const savedEnv: Record<string, string | undefined> = {};

function writeConfig(content: string, files: Record<string, string> = {}): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "chatmux-loader-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "config.jsonc");
  fs.writeFileSync(configPath, content, "utf-8");
  for (const [name, body] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), body, "utf-8");
  }
  return configPath;
}

beforeEach(() => {
  for (const key of [NICK_KEY, CONFIG_ENV_VAR, "HOME"]) {
    savedEnv[key] = process.env[key];
  }
  delete process.env[NICK_KEY];
  delete process.env[CONFIG_ENV_VAR];
});

afterEach(() => {
  for (const [key, value] of Object.entries(savedEnv)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("loadConfig", () => {
  it("reads JSONC, substitutes variables and applies defaults", () => {
    process.env[NICK_KEY] = "robo";
    const configPath = writeConfig(`{
      // who the bot is
      "bot": { "nick": "\${${NICK_KEY}}" },
      "http": { "enabled": true, "port": "\${CHATMUX_LOADER_TEST_PORT:-9090}", },
    }`);

    const result = loadConfig(configPath);

    expect(result.success).toBe(true);
    expect(result.path).toBe(configPath);
    expect(result.config).toEqual({
      logging: { level: "info" },
      bot: { name: "chatmux", nick: "robo" },
      adapters: { shell: { enabled: true, prompt: "> " } },
      http: {
        enabled: true,
        host: "127.0.0.1",
        port: 9090,
        webHookPrefix: "/hooks",
        metricsPath: "/metrics",
      },
      handlers: { enabled: [...BUNDLED_HANDLERS] },
    });
  });

  it("loads variables from a .env file beside the config", () => {
    const configPath = writeConfig(`{ "bot": { "nick": "\${${NICK_KEY}}" } }`, {
      ".env": `${NICK_KEY}=from-dotenv\n`,
    });

    const result = loadConfig(configPath);

    expect(result.config?.bot.nick).toBe("from-dotenv");
  });

  it("does not let .env override variables already set", () => {
    process.env[NICK_KEY] = "from-shell";
    const configPath = writeConfig(`{ "bot": { "nick": "\${${NICK_KEY}}" } }`, {
      ".env": `${NICK_KEY}=from-dotenv\n`,
    });

    expect(loadConfig(configPath).config?.bot.nick).toBe("from-shell");
  });

  it("rejects unknown keys", () => {
    const configPath = writeConfig(`{ "bogus": true }`);

    const result = loadConfig(configPath);

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["(root): Unrecognized key(s) in object: 'bogus'"]);
  });

  it("reports invalid values with their path", () => {
    const configPath = writeConfig(`{
      "logging": { "level": "loud" },
      "handlers": { "enabled": ["ping", "nope"] },
      "http": { "metricsPath": "/hooks" }
    }`);

    const result = loadConfig(configPath);

    expect(result.success).toBe(false);
    const errors = result.errors ?? [];
    expect(errors.some((error) => error.startsWith("logging.level: "))).toBe(true);
    expect(errors.some((error) => error.startsWith("handlers.enabled.1: "))).toBe(true);
    expect(errors).toContain("http.metricsPath: metricsPath must differ from webHookPrefix");
  });

  it("reports JSONC syntax errors", () => {
    const configPath = writeConfig(`{ "bot": }`);

    const result = loadConfig(configPath);

    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toMatch(/^JSONC \w+ at offset \d+$/);
  });

  it("fails when an explicitly named file is missing", () => {
    const missing = path.join(os.tmpdir(), "chatmux-missing", "config.jsonc");

    const result = loadConfig(missing);

    expect(result).toEqual({
      success: false,
      errors: [`Config file not found: ${missing}`],
      path: missing,
    });
  });

  it("falls back to defaults when the default location has no file", () => {
    const home = fs.mkdtempSync(path.join(os.tmpdir(), "chatmux-home-"));
    tempDirs.push(home);
    process.env.HOME = home;

    const result = loadConfig();

    expect(result.success).toBe(true);
    expect(result.path).toBe(path.join(home, ".chatmux", "config.jsonc"));
    expect(result.config?.adapters.shell.enabled).toBe(true);
    expect(result.config?.http.enabled).toBe(false);
  });
});

describe("resolveConfigPath", () => {
  it("prefers the argument, then the environment variable", () => {
    process.env[CONFIG_ENV_VAR] = "/etc/chatmux/from-env.jsonc";

    expect(resolveConfigPath("/srv/bot.jsonc")).toBe("/srv/bot.jsonc");
    expect(resolveConfigPath()).toBe("/etc/chatmux/from-env.jsonc");
  });
});

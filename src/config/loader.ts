import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { replaceEnvVars } from "./env";
import { ChatmuxConfigSchema, type ChatmuxConfig } from "./schema";

export const CONFIG_ENV_VAR = "CHATMUX_CONFIG";

export interface ConfigLoadResult {
  success: boolean;
  config?: ChatmuxConfig;
  errors?: string[];
  path: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function resolveConfigPath(customPath?: string): string {
  const envPath = process.env[CONFIG_ENV_VAR];
  if (customPath) {
    return path.resolve(customPath);
  }
  if (envPath) {
    return path.resolve(envPath);
  }
  return path.join(os.homedir(), ".chatmux", "config.jsonc");
}

export function applyConfigDefaults(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };

  if (!Object.hasOwn(obj, "logging")) {
    obj.logging = { level: "info" };
    return obj;
  }

  if (isRecord(obj.logging)) {
    const logging = { ...obj.logging };
    if (!Object.hasOwn(logging, "level")) {
      logging.level = "info";
    }
    obj.logging = logging;
  }

  return obj;
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const envPath = path.join(path.dirname(resolvedPath), ".env");
  if (!fs.existsSync(envPath)) {
    return;
  }
  const result = loadDotEnv({ path: envPath, override: false });
  if (result.error) {
    throw result.error;
  }
}

function parseConfigText(raw: string): { value: unknown; errors: string[] } {
  const parseErrors: ParseError[] = [];
  const value: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
  const errors = parseErrors.map(
    (error) => `JSONC ${printParseErrorCode(error.error)} at offset ${error.offset}`,
  );
  return { value, errors };
}

/** Applies defaults and validates an already parsed config object. */
export function validateConfigObject(raw: unknown, resolvedPath: string): ConfigLoadResult {
  const result = ChatmuxConfigSchema.safeParse(applyConfigDefaults(replaceEnvVars(raw)));
  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    return { success: false, errors, path: resolvedPath };
  }
  return { success: true, config: result.data, path: resolvedPath };
}

/**
 * Loads the config file. An explicitly named file (argument or
 * CHATMUX_CONFIG) must exist; when the default location has no file the
 * defaults are used.
 */
export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  if (!fs.existsSync(resolvedPath)) {
    if (configPath || process.env[CONFIG_ENV_VAR]) {
      return {
        success: false,
        errors: [`Config file not found: ${resolvedPath}`],
        path: resolvedPath,
      };
    }
    return validateConfigObject({}, resolvedPath);
  }

  try {
    loadConfigLocalEnv(resolvedPath);
    const { value, errors } = parseConfigText(fs.readFileSync(resolvedPath, "utf-8"));
    if (errors.length > 0) {
      return { success: false, errors, path: resolvedPath };
    }
    return validateConfigObject(value ?? {}, resolvedPath);
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
    };
  }
}

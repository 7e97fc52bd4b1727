// ${NAME} or ${NAME:-fallback}
const ENV_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Substitutes environment variables into every string of a parsed config.
 * References to unset variables without a fallback are left untouched.
 */
export function replaceEnvVars(
  config: unknown,
  env: Record<string, string | undefined> = process.env,
): unknown {
  if (typeof config === "string") {
    return config.replace(ENV_PATTERN, (match: string, key: string, fallback: string | undefined) => {
      const value = env[key];
      if (value !== undefined && value !== "") {
        return value;
      }
      return fallback ?? (value === undefined ? match : value);
    });
  }

  if (Array.isArray(config)) {
    return config.map((item) => replaceEnvVars(item, env));
  }

  if (isPlainObject(config)) {
    return Object.fromEntries(
      Object.entries(config).map(([key, value]) => [key, replaceEnvVars(value, env)]),
    );
  }

  return config;
}

import { loadConfig } from "../../config";

export async function validateConfig(configPath?: string): Promise<boolean> {
  const result = loadConfig(configPath);
  if (result.success) {
    console.log(`✅ Config check passed: ${result.path}`);
    return true;
  }
  console.error(`❌ Config check failed: ${result.path}`);
  for (const error of result.errors ?? []) {
    console.error(`- ${error}`);
  }
  process.exitCode = 1;
  return false;
}

/** Prints the config with defaults applied. */
export async function showConfig(configPath?: string): Promise<boolean> {
  const result = loadConfig(configPath);
  if (!result.success || !result.config) {
    return validateConfig(configPath);
  }
  console.log(JSON.stringify(result.config, null, 2));
  return true;
}

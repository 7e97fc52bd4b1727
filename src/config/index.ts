export {
  applyConfigDefaults,
  CONFIG_ENV_VAR,
  loadConfig,
  resolveConfigPath,
  validateConfigObject,
  type ConfigLoadResult,
} from "./loader";
export { replaceEnvVars } from "./env";
export { ChatmuxConfigSchema, type ChatmuxConfig, type ChatmuxConfigInput } from "./schema";

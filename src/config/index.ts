export { DEFAULT_API, DEFAULT_LADDER, DEFAULT_LOG_LEVEL, DEFAULT_RUNNER, DEFAULT_STREAM } from "./defaults.js";
export { BotConfigSchema, toLadderConfig, toRebalanceSettings, toRestSetup, toStreamSetup } from "./schema.js";
export type { BotConfig, BotConfigInput, LadderSettings, RunnerSettings } from "./schema.js";
export { configFromEnv, loadConfig } from "./load.js";
export type { ConfigOverrides } from "./load.js";

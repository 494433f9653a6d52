export type { ConfigData } from "./defaults";
export {
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  isConfigKey,
  parseOperators,
} from "./defaults";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile";
export {
  resolveConfig,
  resolveConfigWithSources,
  setCliOverride,
  clearCliOverrides,
  initConfig,
  getConfig,
} from "./resolve";
export type { ConfigSource } from "./resolve";

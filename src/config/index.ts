export { loadConfig } from './defaults';
export { loadPactCheckConfig, CONFIG_DEFAULTS, DEFAULT_CONFIG_PATH } from './loader';
export type { ConfigWarning, LoadConfigResult } from './loader';
export { pactCheckConfigSchema } from './schema';

export { loadEchoConfig, requireEnv, envSchema } from './config.js';
export type { EchoConfig, LogLevel } from './config.js';
export { applyEventDefaults, eventDefaultsFromConfig } from './event-defaults.js';
export type { EventDefaults } from './event-defaults.js';

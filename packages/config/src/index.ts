export { EnvSchema, loadConfig, loadEnv } from './env';
export type { AppConfig, Env } from './env';
export { initAppLogger } from './logger';

export { env, parseEnvironment, defaultHashWorkers, MAX_DEFAULT_HASH_WORKERS } from './env.js';
export type { AppEnvironment, RawEnvironment } from './env.js';

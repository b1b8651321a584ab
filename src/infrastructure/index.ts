export { createJsonSerializer } from './serialization/index.js';
export type { JsonSerializerOptions } from './serialization/index.js';
export { createLogReporter } from './errors/index.js';
export type { ErrorHandler } from './errors/index.js';
export { InMemoryPipeline, DEFAULT_MAX_EVENTS } from './pipeline/index.js';
export {
  MemoryIdentityStorage,
  FileIdentityStorage,
  hydrateIdentity,
  persistIdentity,
} from './identity/index.js';
export type { IdentityPersistence } from './identity/index.js';
export {
  enqueueEvent,
  encodeStreamFields,
  RedisStreamPipeline,
  DEFAULT_STREAM_KEY,
  RedisIdentityStorage,
  DEFAULT_IDENTITY_KEY,
} from './redis/index.js';
export { loadClientConfig, LOG_LEVELS } from './config.js';
export type { ClientConfig, LogLevel } from './config.js';

export { enqueueEvent, encodeStreamFields, RedisStreamPipeline, DEFAULT_STREAM_KEY } from './event-producer.js';
export { RedisIdentityStorage, DEFAULT_IDENTITY_KEY } from './identity-storage.js';

export { InMemoryPipeline, DEFAULT_MAX_EVENTS } from './in-memory-pipeline.js';

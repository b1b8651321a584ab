export { createJsonSerializer } from './json-serializer.js';
export type { JsonSerializerOptions } from './json-serializer.js';

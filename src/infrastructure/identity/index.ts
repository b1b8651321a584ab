export { MemoryIdentityStorage } from './memory-storage.js';
export { FileIdentityStorage } from './file-storage.js';
export { hydrateIdentity, persistIdentity } from './persistence.js';
export type { IdentityPersistence } from './persistence.js';

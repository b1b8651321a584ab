export { Analytics } from './analytics.js';
export type { AnalyticsDeps, DispatchOptions, Payload, UntypedPayload } from './analytics.js';
export { TypedPayload, typed } from './typed-payload.js';
export {
  EventFactory,
  createMonotonicClock,
  withPayload,
  freezeEvent,
  withContext,
  withIntegrations,
  payloadOf,
} from './event-builder.js';
export type { EventFactoryDeps, EnvelopeInput } from './event-builder.js';
export { IdentityStore } from './identity-store.js';
export type { IdentityListener } from './identity-store.js';
export { applyEnrichments, EnrichmentRegistry } from './enrichment-chain.js';
export type { ChainResult } from './enrichment-chain.js';
export {
  identifierSchema,
  requireIdentifier,
  canonicalValueSchema,
  identityStateSchema,
  parseIdentityState,
  formatIssuePath,
} from './event-schema.js';

export type {
  CanonicalPrimitive,
  CanonicalList,
  CanonicalMap,
  CanonicalValue,
} from './canonical-value.js';
export {
  EMPTY_MAP,
  isCanonicalList,
  isCanonicalMap,
  canonicalEquals,
  freezeCanonical,
} from './canonical-value.js';
export type {
  EventType,
  EventEnvelope,
  TrackEvent,
  IdentifyEvent,
  ScreenEvent,
  GroupEvent,
  AliasEvent,
  AnalyticsEvent,
  EventOfType,
} from './event.js';
export { EVENT_TYPES, isEventOfType } from './event.js';
export type { IdentityState, IdentitySnapshot, IdentityAction } from './identity.js';
export { reduceIdentity } from './identity.js';
export type {
  SerializeResult,
  Serializer,
  EventPipeline,
  ErrorReporter,
  IdentityStorage,
  EnrichmentClient,
  Enrichment,
} from './contracts.js';
export {
  AnalyticsError,
  SerializationError,
  InvalidEventError,
  EnrichmentError,
  ReentrantDispatchError,
  ConfigurationError,
  toError,
} from './errors.js';

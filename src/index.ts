/**
 * eventgate: event normalization and dispatch layer for an analytics
 * instrumentation client.
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 * import { createAnalytics, typed } from 'eventgate';
 *
 * const analytics = await createAnalytics();
 *
 * analytics.track('Signed Up', { plan: 'pro' });
 * analytics.track('Order Completed', typed(Order, order));
 * analytics.identify('user-42', { email: 'someone@example.com' });
 * analytics.alias('user-43');
 *
 * await analytics.shutdown();
 * ```
 */

// Domain
export * from './domain/index.js';

// Gateway + builders
export * from './application/index.js';

// Adapters
export * from './infrastructure/index.js';

// Composition root
export { createAnalytics } from './client.js';
export type { AnalyticsOptions } from './client.js';

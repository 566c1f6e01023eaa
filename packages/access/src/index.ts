// Types
export type {
  AccessContext,
  AccessDecisionEngine,
  AccessEngineConfig,
  Decision,
  DecisionReason,
  GeoAccessMiddlewareConfig,
  UserResolver,
} from './types.js';

// Middleware
export { createGeoAccessMiddleware, getClientIp } from './middleware.js';

// Factory
import { createLogger } from '@geowarden/core';
import type { AccessDecisionEngine, AccessEngineConfig } from './types.js';
import { createEngine } from './engine.js';

/**
 * Create the AccessDecisionEngine.
 *
 * @example
 * ```typescript
 * const engine = createAccessDecisionEngine({ policy, geo, exceptions, detector });
 * const decision = await engine.authorize('203.0.113.7', { id: 'u-42' });
 * if (!decision.allow) console.log(decision.reason);
 * ```
 */
export function createAccessDecisionEngine(config: AccessEngineConfig): AccessDecisionEngine {
  return createEngine({ ...config, logger: config.logger ?? createLogger('access') });
}

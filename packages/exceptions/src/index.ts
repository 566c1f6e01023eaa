// Types
export type {
  AccessException,
  ExceptionDecision,
  ExceptionListFilters,
  ExceptionManager,
  ExceptionManagerConfig,
  ExceptionRequest,
  ExceptionStatus,
  UserContactResolver,
} from './types.js';

// State machine
export { canTransition, effectiveStatus, isActive, isTerminal, OPEN_STATUSES } from './state.js';

// Migrations
export { exceptionMigrations } from './migrations/index.js';

// Model
export { defineAccessExceptionModel } from './models/accessException.js';

// Factory
import { createLogger, systemClock } from '@geowarden/core';
import type { ExceptionManager, ExceptionManagerConfig } from './types.js';
import { defineAccessExceptionModel } from './models/accessException.js';
import { createManager } from './manager.js';

/**
 * Create the ExceptionManager.
 *
 * @example
 * ```typescript
 * const exceptions = createExceptionManager({ database: sequelize, notifier });
 * const pending = await exceptions.request({
 *   userId: 'u-42',
 *   destinationCountry: 'FR',
 *   startsAt: new Date('2026-07-01'),
 *   endsAt: new Date('2026-07-15'),
 *   reason: 'Conference in Paris',
 * });
 * await exceptions.decide(pending.id, 'approve', { id: 'admin-1' });
 * ```
 */
export function createExceptionManager(config: ExceptionManagerConfig): ExceptionManager {
  return createManager({
    sequelize: config.database,
    AccessException: defineAccessExceptionModel(config.database),
    notifier: config.notifier,
    resolveUserContact: config.resolveUserContact ?? (async (userId) => userId),
    logger: config.logger ?? createLogger('exceptions'),
    clock: config.clock ?? systemClock,
  });
}

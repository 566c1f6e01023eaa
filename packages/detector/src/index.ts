// Types
export { AttemptType } from './types.js';
export type {
  AttemptInput,
  AttemptListFilters,
  DetectorConfig,
  EscalationDecision,
  EscalationReason,
  SuspiciousAccessAttempt,
  SuspiciousActivityDetector,
} from './types.js';

// Migrations
export { detectorMigrations } from './migrations/index.js';

// Model
export { defineSuspiciousAttemptModel, SUSPICIOUS_ATTEMPTS_TABLE } from './models/suspiciousAttempt.js';

// Factory
import { createLogger, systemClock } from '@geowarden/core';
import type { DetectorConfig, SuspiciousActivityDetector } from './types.js';
import { defineSuspiciousAttemptModel } from './models/suspiciousAttempt.js';
import { createDetector } from './detector.js';

const DEFAULT_THRESHOLD = 3;
const DEFAULT_WINDOW_MS = 24 * 60 * 60 * 1000;

/**
 * Create the SuspiciousActivityDetector.
 *
 * An attempt escalates when its user reached `threshold` blocked attempts
 * within the rolling window, or when it came through an anonymizer.
 * Escalations go to the security audience with URGENT priority.
 *
 * @example
 * ```typescript
 * const detector = createSuspiciousActivityDetector({
 *   database: sequelize,
 *   notifier,
 *   resolveContacts: async () => contactsFor(await policy.get(), 'SECURITY'),
 * });
 * ```
 */
export function createSuspiciousActivityDetector(config: DetectorConfig): SuspiciousActivityDetector {
  return createDetector({
    Attempt: defineSuspiciousAttemptModel(config.database),
    notifier: config.notifier,
    resolveContacts: config.resolveContacts,
    threshold: config.threshold ?? DEFAULT_THRESHOLD,
    windowMs: config.windowMs ?? DEFAULT_WINDOW_MS,
    logger: config.logger ?? createLogger('detector'),
    clock: config.clock ?? systemClock,
  });
}

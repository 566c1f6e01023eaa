// Types
export { POLICY_ID } from './types.js';
export type {
  ContactAudience,
  PolicyChanges,
  PolicyStore,
  PolicyStoreConfig,
  PolicyUpdateResult,
  PolicyWarning,
  SecurityPolicy,
} from './types.js';

// Migrations
export { policyMigrations } from './migrations/index.js';

// Model
export { defineSecurityPolicyModel } from './models/securityPolicy.js';

// Helpers
export { contactsFor, allowedCountries, isCountryAllowed } from './contacts.js';
export { DEFAULT_POLICY } from './store.js';

// Factory
import { createLogger, systemClock } from '@geowarden/core';
import type { PolicyStore, PolicyStoreConfig } from './types.js';
import { defineSecurityPolicyModel } from './models/securityPolicy.js';
import { createStore } from './store.js';

/**
 * Create the PolicyStore.
 *
 * @example
 * ```typescript
 * const policies = createPolicyStore({ database: sequelize, ledger, notifier });
 * await policies.initialize();
 *
 * const { auditEntries, warnings } = await policies.update(
 *   { secondaryCountry: 'CA' },
 *   { id: 'admin-1' },
 *   { reason: 'Toronto office opening', ipAddress: req.ip },
 * );
 * ```
 */
export function createPolicyStore(config: PolicyStoreConfig): PolicyStore {
  return createStore({
    sequelize: config.database,
    Policy: defineSecurityPolicyModel(config.database),
    ledger: config.ledger,
    notifier: config.notifier,
    cacheMs: config.cacheMs ?? 500,
    notifyTimeoutMs: config.notifyTimeoutMs ?? 5000,
    logger: config.logger ?? createLogger('policy'),
    clock: config.clock ?? systemClock,
  });
}

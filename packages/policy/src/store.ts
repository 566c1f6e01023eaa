import { Transaction, UniqueConstraintError } from 'sequelize';
import type { Sequelize } from 'sequelize';
import { z } from 'zod';
import {
  ConflictError,
  PolicyUnavailableError,
  ValidationError,
  deliver,
  normalizeCountryCode,
} from '@geowarden/core';
import type { Actor, Clock, Logger, Notifier, RequestContext } from '@geowarden/core';
import { AuditChangeType } from '@geowarden/audit';
import type { AuditEntry, AuditLedger } from '@geowarden/audit';
import { contactsFor } from './contacts.js';
import { POLICY_ID } from './types.js';
import type {
  PolicyChanges,
  PolicyStore,
  PolicyUpdateResult,
  PolicyWarning,
  SecurityPolicy,
  SecurityPolicyInstance,
  SecurityPolicyModel,
} from './types.js';

export const DEFAULT_POLICY = {
  primaryCountry: 'US',
  secondaryCountry: null,
  enforcementEnabled: false,
  adminEmail: null,
  itEmail: null,
  securityEmail: null,
} as const;

const blankToNull = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? null : v);

const country = z.string().transform((value, ctx) => {
  const code = normalizeCountryCode(value);
  if (!code) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a two-letter ISO 3166-1 country code' });
    return z.NEVER;
  }
  return code;
});

const contact = z.preprocess(blankToNull, z.string().trim().email().max(254).nullable());

const changesSchema = z
  .object({
    primaryCountry: country.optional(),
    secondaryCountry: z.preprocess(blankToNull, country.nullable()).optional(),
    enforcementEnabled: z.boolean().optional(),
    adminEmail: contact.optional(),
    itEmail: contact.optional(),
    securityEmail: contact.optional(),
  })
  .strict();

type ParsedChanges = z.infer<typeof changesSchema>;

/** Fields that produce an audit entry when they change, in entry order */
const AUDITED_FIELDS = [
  ['primaryCountry', AuditChangeType.PRIMARY_COUNTRY],
  ['secondaryCountry', AuditChangeType.SECONDARY_COUNTRY],
  ['enforcementEnabled', AuditChangeType.ENFORCEMENT_TOGGLE],
  ['adminEmail', AuditChangeType.ADMIN_CONTACT],
  ['itEmail', AuditChangeType.IT_CONTACT],
  ['securityEmail', AuditChangeType.SECURITY_CONTACT],
] as const;

type AuditedField = (typeof AUDITED_FIELDS)[number][0];

/** Changes to these fields are announced to leadership */
const ANNOUNCED_FIELDS: ReadonlySet<AuditedField> = new Set(['primaryCountry', 'secondaryCountry', 'enforcementEnabled']);

function toPolicy(row: SecurityPolicyInstance): SecurityPolicy {
  const data = row.get({ plain: true });
  const optionalDate = (value: Date | null | undefined) => (value ? new Date(value) : null);
  return {
    id: data.id,
    primaryCountry: data.primaryCountry,
    secondaryCountry: data.secondaryCountry ?? null,
    enforcementEnabled: Boolean(data.enforcementEnabled),
    adminEmail: data.adminEmail ?? null,
    itEmail: data.itEmail ?? null,
    securityEmail: data.securityEmail ?? null,
    setupCompleted: Boolean(data.setupCompleted),
    setupCompletedBy: data.setupCompletedBy ?? null,
    setupCompletedAt: optionalDate(data.setupCompletedAt),
    previousPrimaryCountry: data.previousPrimaryCountry ?? null,
    primaryCountryChangedAt: optionalDate(data.primaryCountryChangedAt),
    primaryCountryChangedBy: data.primaryCountryChangedBy ?? null,
    previousSecondaryCountry: data.previousSecondaryCountry ?? null,
    secondaryCountryChangedAt: optionalDate(data.secondaryCountryChangedAt),
    secondaryCountryChangedBy: data.secondaryCountryChangedBy ?? null,
    version: Number(data.version),
    createdAt: new Date(data.createdAt),
    updatedAt: new Date(data.updatedAt),
  };
}

function parseChanges(changes: PolicyChanges): ParsedChanges {
  const parsed = changesSchema.safeParse(changes);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid policy update',
      parsed.error.issues.map((i) => `${i.path.join('.') || 'changes'}: ${i.message}`),
    );
  }
  return parsed.data;
}

type PolicyFields = Pick<SecurityPolicy, AuditedField>;

/** Keep the current value wherever a change is absent or explicitly undefined */
function applyChanges(current: PolicyFields, changes: ParsedChanges): PolicyFields {
  const pick = <T>(change: T | undefined, fallback: T): T => (change === undefined ? fallback : change);
  return {
    primaryCountry: pick(changes.primaryCountry, current.primaryCountry),
    secondaryCountry: pick(changes.secondaryCountry, current.secondaryCountry),
    enforcementEnabled: pick(changes.enforcementEnabled, current.enforcementEnabled),
    adminEmail: pick(changes.adminEmail, current.adminEmail),
    itEmail: pick(changes.itEmail, current.itEmail),
    securityEmail: pick(changes.securityEmail, current.securityEmail),
  };
}

function display(value: string | boolean | null): string | null {
  if (value === null) return null;
  return typeof value === 'boolean' ? String(value) : value;
}

interface StoreDeps {
  sequelize: Sequelize;
  Policy: SecurityPolicyModel;
  ledger: AuditLedger;
  notifier: Notifier;
  cacheMs: number;
  notifyTimeoutMs: number;
  logger: Logger;
  clock: Clock;
}

/**
 * Create the policy store over the singleton `security_policies` row.
 */
export function createStore(deps: StoreDeps): PolicyStore {
  const { sequelize, Policy, ledger, notifier, cacheMs, notifyTimeoutMs, logger, clock } = deps;
  let snapshot: { policy: SecurityPolicy; readAt: number } | null = null;

  function remember(policy: SecurityPolicy): SecurityPolicy {
    snapshot = { policy, readAt: clock().getTime() };
    return policy;
  }

  async function insert(initial: PolicyChanges = {}, transaction?: Transaction): Promise<SecurityPolicyInstance> {
    const parsed = parseChanges(initial);
    try {
      return await Policy.create(
        {
          ...applyChanges(DEFAULT_POLICY, parsed),
          id: POLICY_ID,
        },
        { transaction },
      );
    } catch (err) {
      if (err instanceof UniqueConstraintError) {
        throw new ConflictError('A security policy already exists');
      }
      throw err;
    }
  }

  async function initialize(): Promise<SecurityPolicy> {
    const existing = await Policy.findByPk(POLICY_ID);
    if (existing) return remember(toPolicy(existing));

    try {
      const created = await insert();
      logger.info('default security policy created', { primaryCountry: DEFAULT_POLICY.primaryCountry });
      return remember(toPolicy(created));
    } catch (err) {
      // Lost the bootstrap race; the winner's row is the policy
      if (err instanceof ConflictError) {
        const row = await Policy.findByPk(POLICY_ID);
        if (row) return remember(toPolicy(row));
      }
      throw err;
    }
  }

  return {
    initialize,

    async get(): Promise<SecurityPolicy> {
      if (snapshot && clock().getTime() - snapshot.readAt <= cacheMs) {
        return snapshot.policy;
      }
      try {
        const row = await Policy.findByPk(POLICY_ID);
        return row ? remember(toPolicy(row)) : await initialize();
      } catch (err) {
        logger.error('security policy read failed', {
          error: err instanceof Error ? err.message : String(err),
        });
        throw new PolicyUnavailableError({ cause: err });
      }
    },

    async create(initial?: PolicyChanges): Promise<SecurityPolicy> {
      return remember(toPolicy(await insert(initial)));
    },

    invalidate(): void {
      snapshot = null;
    },

    async update(changes: PolicyChanges, actor: Actor, context: RequestContext = {}): Promise<PolicyUpdateResult> {
      const parsed = parseChanges(changes);
      const reason = context.reason?.trim() || null;

      const result = await sequelize.transaction(async (transaction): Promise<PolicyUpdateResult> => {
        const row =
          (await Policy.findByPk(POLICY_ID, { transaction, lock: Transaction.LOCK.UPDATE })) ??
          (await insert({}, transaction));
        const current = toPolicy(row);
        const next = applyChanges(current, parsed);

        if (next.secondaryCountry !== null && next.secondaryCountry === next.primaryCountry) {
          throw new ValidationError('Primary and secondary countries must differ');
        }
        if (next.enforcementEnabled && !next.securityEmail) {
          throw new ValidationError('A security contact is required before enforcement can be enabled');
        }

        const changed = AUDITED_FIELDS.filter(([field]) => next[field] !== current[field]);
        if (changed.length === 0) {
          return { policy: current, auditEntries: [], warnings: [] };
        }

        const countryChanged = changed.some(([field]) => field === 'primaryCountry' || field === 'secondaryCountry');
        if (countryChanged && !reason) {
          throw new ValidationError('A justification is required to change allowed countries');
        }

        const now = clock();
        const values: Partial<SecurityPolicy> = {
          primaryCountry: next.primaryCountry,
          secondaryCountry: next.secondaryCountry,
          enforcementEnabled: next.enforcementEnabled,
          adminEmail: next.adminEmail,
          itEmail: next.itEmail,
          securityEmail: next.securityEmail,
          version: current.version + 1,
        };
        if (next.primaryCountry !== current.primaryCountry) {
          values.previousPrimaryCountry = current.primaryCountry;
          values.primaryCountryChangedAt = now;
          values.primaryCountryChangedBy = actor.id;
        }
        if (next.secondaryCountry !== current.secondaryCountry) {
          values.previousSecondaryCountry = current.secondaryCountry;
          values.secondaryCountryChangedAt = now;
          values.secondaryCountryChangedBy = actor.id;
        }
        if (!current.setupCompleted) {
          values.setupCompleted = true;
          values.setupCompletedBy = actor.id;
          values.setupCompletedAt = now;
        }

        await row.update(values, { transaction });
        const policy = toPolicy(row);

        const warnings: PolicyWarning[] = [];
        let notificationSent = false;
        let recipientCount = 0;

        if (changed.some(([field]) => ANNOUNCED_FIELDS.has(field))) {
          const recipients = contactsFor(policy, 'LEADERSHIP');
          if (recipients.length === 0) {
            warnings.push('NO_LEADERSHIP_CONTACTS');
            logger.warn('policy change has no leadership contacts to notify', { version: policy.version });
          } else {
            const outcome = await deliver(
              notifier,
              {
                recipients,
                subject: 'Security policy changed',
                body: [
                  `${actor.username ?? actor.id} changed the geographic access policy.`,
                  '',
                  ...changed.map(
                    ([field]) => `${field}: ${display(current[field]) ?? '(none)'} -> ${display(next[field]) ?? '(none)'}`,
                  ),
                  '',
                  `Justification: ${reason ?? '(none given)'}`,
                ].join('\n'),
                priority: 'HIGH',
              },
              { timeoutMs: notifyTimeoutMs },
            );
            notificationSent = outcome.delivered;
            recipientCount = outcome.recipientCount;
            if (!outcome.delivered) {
              warnings.push('LEADERSHIP_NOT_NOTIFIED');
              logger.warn('leadership notification failed', { version: policy.version, error: outcome.error });
            }
          }
        }

        const auditEntries: AuditEntry[] = [];
        for (const [field, changeType] of changed) {
          auditEntries.push(
            await ledger.append(
              {
                actorId: actor.id,
                changeType,
                oldValue: display(current[field]),
                newValue: display(next[field]),
                justification: reason,
                ipAddress: context.ipAddress ?? null,
                userAgent: context.userAgent ?? null,
                notificationSent,
                recipientCount,
              },
              { transaction },
            ),
          );
        }

        return { policy, auditEntries, warnings };
      });

      remember(result.policy);
      if (result.auditEntries.length > 0) {
        logger.info('security policy updated', {
          actorId: actor.id,
          version: result.policy.version,
          changes: result.auditEntries.map((e) => e.changeType),
          warnings: result.warnings,
        });
      }
      return result;
    },
  };
}

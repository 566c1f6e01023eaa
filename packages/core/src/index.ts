// Errors
export {
  GeoWardenError,
  ValidationError,
  ConflictError,
  InvalidTransitionError,
  NotActiveError,
  NotFoundError,
  LookupUnavailableError,
  ImmutableRecordError,
  PolicyUnavailableError,
  toHttpStatus,
  toErrorBody,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Logging
export { createLogger } from './logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';

// Configuration
export { configSchema, loadConfig } from './config.js';
export type { GeoWardenConfig, RawConfig } from './config.js';

// Notifications
export { deliver, createLogNotifier } from './notifier.js';
export type {
  Notification,
  NotificationPriority,
  Notifier,
  DeliveryOutcome,
  DeliverOptions,
} from './notifier.js';

// Shared types
export { normalizeCountryCode, systemClock } from './types.js';
export type { Actor, RequestContext, CountryCode, Clock } from './types.js';

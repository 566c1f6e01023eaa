// Router factory
export { createAdminRouter } from './router.js';

// Service factory (for use without Express)
export { createAdminService, clampLimit, clampOffset } from './service.js';

// Request schemas
export { parseWith } from './schemas.js';

// Types
export type {
  ActorResolver,
  AdminConfig,
  AdminService,
  AttemptListParams,
  AuditListParams,
  AuthMiddleware,
  ExceptionListParams,
  GeoLookupResult,
  Page,
  PageParams,
  SelfExceptionRequest,
  SystemStatus,
} from './types.js';

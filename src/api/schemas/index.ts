// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS INDEX — API Request Validation Schemas
// ═══════════════════════════════════════════════════════════════════════════════

export {
  RenewQuerySchema,
  RenewBodySchema,
  AdminValidityBodySchema,
  type RenewQuery,
  type RenewBody,
  type AdminValidityBody,
} from './account-validity.js';

/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit event types (billing trail stored in DB).
 * - Keeps audit writes consistent across all modules.
 * - AuditContext groups the request-level fields that repeat on every event.
 * - AuditAction uses a union + escape hatch to catch typos early
 *   while still allowing new actions without touching this file.
 *
 * RULES:
 * - Metadata is a plain object (repo serializes to JSON for DB).
 * - Add known actions to the union as modules grow.
 * - Never import module types here (shared must stay module-agnostic).
 */

export type KnownAuditAction =
  // Memberships
  | 'membership.payment_intent.created'
  | 'membership.payment_failed'
  | 'membership.activated'
  | 'membership.upgraded'
  | 'membership.cancelled'
  | 'membership.expired'
  // Placements / invoices
  | 'placement.recorded'
  | 'invoice.payment_intent.created'
  | 'invoice.paid'
  | 'invoice.voided'
  // Marketplace
  | 'vacancy.created'
  | 'vacancy.closed'
  // Admin
  | 'team.approved';

export type AuditAction = KnownAuditAction | (string & {});

export type AuditMetadata = Record<string, unknown>;

/**
 * Request-level context that is identical across every audit event
 * within a single request.
 *
 * All fields are nullable: webhook and job callers have no user or request.
 */
export type AuditContext = {
  userId: string | null;

  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

/**
 * Full audit event shape for DB insertion.
 * Used by AuditRepo only (low-level).
 */
export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};

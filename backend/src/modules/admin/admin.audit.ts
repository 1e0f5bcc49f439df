/**
 * backend/src/modules/admin/admin.audit.ts
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { User } from '../users';

export function auditTeamApproved(writer: AuditWriter, team: User): Promise<void> {
  return writer.append('team.approved', { teamId: team.id, email: team.email });
}

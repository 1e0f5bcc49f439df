/**
 * backend/src/modules/vacancies/vacancy.audit.ts
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { Vacancy } from './vacancy.types';

export function auditVacancyCreated(writer: AuditWriter, vacancy: Vacancy): Promise<void> {
  return writer.append('vacancy.created', {
    vacancyId: vacancy.id,
    title: vacancy.title,
    status: vacancy.status,
  });
}

export function auditVacancyClosed(writer: AuditWriter, vacancy: Vacancy): Promise<void> {
  return writer.append('vacancy.closed', { vacancyId: vacancy.id });
}

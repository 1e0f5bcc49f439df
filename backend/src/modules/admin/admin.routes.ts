/**
 * backend/src/modules/admin/admin.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AdminController } from './admin.controller';

export function registerAdminRoutes(app: FastifyInstance, controller: AdminController) {
  app.get('/admin/teams/pending', controller.listPendingTeams.bind(controller));
  app.post('/admin/teams/:teamId/approve', controller.approveTeam.bind(controller));

  app.get('/admin/invoices/unpaid', controller.listUnpaidInvoices.bind(controller));
  app.post('/admin/invoices/:invoiceId/mark-paid', controller.markInvoicePaid.bind(controller));
  app.post('/admin/invoices/:invoiceId/void', controller.voidInvoice.bind(controller));

  app.post('/admin/memberships/expire', controller.expireMemberships.bind(controller));
}

/**
 * backend/src/modules/placements/placement.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { PlacementController } from './placement.controller';

export function registerPlacementRoutes(app: FastifyInstance, controller: PlacementController) {
  app.post('/placements', controller.recordPlacement.bind(controller));
  app.get('/placements', controller.listPlacements.bind(controller));
  app.post(
    '/invoices/:invoiceId/payment-intents',
    controller.createInvoicePaymentIntent.bind(controller),
  );
}

/**
 * backend/src/modules/payments/payment.routes.ts
 *
 * RULES:
 * - No business logic here.
 * - The webhook lives in its own encapsulated scope so only it receives
 *   application/json as a Buffer; every other route keeps the default parser.
 */

import type { FastifyInstance } from 'fastify';
import type { PaymentController } from './payment.controller';

export function registerPaymentRoutes(app: FastifyInstance, controller: PaymentController) {
  void app.register(async (scope) => {
    scope.removeContentTypeParser('application/json');
    scope.addContentTypeParser('application/json', { parseAs: 'buffer' }, (_req, body, done) => {
      done(null, body);
    });

    scope.post(
      '/payments/webhook',
      { config: { sessionless: true } },
      controller.webhook.bind(controller),
    );
  });
}

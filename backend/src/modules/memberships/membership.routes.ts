/**
 * backend/src/modules/memberships/membership.routes.ts
 *
 * WHY:
 * - Declares Memberships module endpoints.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { MembershipController } from './membership.controller';

export function registerMembershipRoutes(app: FastifyInstance, controller: MembershipController) {
  app.get('/memberships/plans', controller.listPlans.bind(controller));
  app.post('/memberships/payment-intents', controller.createPaymentIntent.bind(controller));
  app.post('/memberships/confirm-payment', controller.confirmPayment.bind(controller));
  app.post('/memberships/upgrade', controller.upgrade.bind(controller));
  app.post('/memberships/cancel', controller.cancel.bind(controller));
  app.get('/memberships/me', controller.me.bind(controller));
  app.get('/memberships/history', controller.history.bind(controller));
}

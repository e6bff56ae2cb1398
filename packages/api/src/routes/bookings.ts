import { type Router as IRouter, Router } from 'express';
import { z } from 'zod';
import {
  cancelBookingSchema,
  createBookingSchema,
  listBookingsSchema,
  pageSchema,
  updateBookingStatusSchema,
  uuidParam,
} from '@parkalot/shared';
import type { Services } from '../services/index.js';
import { actorOf } from '../middleware/actor.js';
import { asyncHandler, sendInvalid, sendResult } from '../lib/http.js';

const roleQuery = z.object({ role: z.enum(['renter', 'owner']).default('renter') });
const refundSchema = z.object({ amount: z.number().positive().optional() });

/** All booking routes run behind requireActor. */
export function createBookingsRouter(services: Services): IRouter {
  const router: IRouter = Router();
  const { bookings, payments } = services;

  /**
   * POST /api/bookings
   * Creates a pending booking; pay for it with POST /api/payments/intents.
   */
  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const parsed = createBookingSchema.safeParse(req.body);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      sendResult(res, await bookings.create(actorOf(res), parsed.data), 201);
    }),
  );

  /** GET /api/bookings?role=renter|owner&status= */
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const parsed = listBookingsSchema.safeParse(req.query);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      sendResult(res, await bookings.list(actorOf(res), parsed.data.role, parsed.data.status));
    }),
  );

  /** GET /api/bookings/owner-history?limit=&offset= */
  router.get(
    '/owner-history',
    asyncHandler(async (req, res) => {
      const parsed = pageSchema.safeParse(req.query);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      sendResult(res, await bookings.ownerHistory(actorOf(res), parsed.data.limit, parsed.data.offset));
    }),
  );

  router.get(
    '/upcoming-count',
    asyncHandler(async (req, res) => {
      const parsed = roleQuery.safeParse(req.query);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      sendResult(res, await bookings.upcomingCount(actorOf(res), parsed.data.role));
    }),
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const id = uuidParam.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid booking ID', code: 'VALIDATION_ERROR' });
        return;
      }
      sendResult(res, await bookings.get(actorOf(res), id.data));
    }),
  );

  /** PATCH /api/bookings/:id/status  { status, reason? } */
  router.patch(
    '/:id/status',
    asyncHandler(async (req, res) => {
      const id = uuidParam.safeParse(req.params.id);
      const body = updateBookingStatusSchema.safeParse(req.body);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid booking ID', code: 'VALIDATION_ERROR' });
        return;
      }
      if (!body.success) {
        sendInvalid(res, body.error);
        return;
      }
      sendResult(res, await bookings.updateStatus(actorOf(res), id.data, body.data.status, body.data.reason));
    }),
  );

  /**
   * POST /api/bookings/:id/cancel  { reason? }
   * The cancellation commits first; a refund that fails at the provider is
   * reported alongside it and can be retried with POST /:id/refund. An
   * unpaid booking's open payment intent is voided so it cannot be paid.
   */
  router.post(
    '/:id/cancel',
    asyncHandler(async (req, res) => {
      const id = uuidParam.safeParse(req.params.id);
      const body = cancelBookingSchema.safeParse(req.body ?? {});
      if (!id.success) {
        res.status(400).json({ error: 'Invalid booking ID', code: 'VALIDATION_ERROR' });
        return;
      }
      if (!body.success) {
        sendInvalid(res, body.error);
        return;
      }

      const actor = actorOf(res);
      const cancelled = await bookings.cancel(actor, id.data, body.data.reason);
      if (!cancelled.ok) {
        sendResult(res, cancelled);
        return;
      }

      const { booking, refundAmount, refundEligible } = cancelled.data;
      if (!refundEligible) {
        if (booking.paymentStatus !== 'pending' || !booking.providerPaymentId) {
          res.json({ booking, refundAmount, refundEligible, refund: { status: 'not_applicable' } });
          return;
        }
        const released = await payments.releaseCancelledIntent(booking.id);
        res.json({
          booking,
          refundAmount,
          refundEligible,
          refund: { status: 'not_applicable' },
          intent: released.ok
            ? { status: released.data.intentStatus }
            : { status: 'failed', error: released.error, code: released.code },
        });
        return;
      }

      const refund = await payments.refundCancelledBooking(actor, booking.id);
      if (!refund.ok) {
        res.json({
          booking,
          refundAmount,
          refundEligible,
          refund: { status: 'failed', error: refund.error, code: refund.code },
        });
        return;
      }

      res.json({
        booking: refund.data.booking,
        refundAmount,
        refundEligible,
        refund: { status: 'issued', refundId: refund.data.refundId, amount: refund.data.refundAmount },
      });
    }),
  );

  /** POST /api/bookings/:id/refund  { amount? }  (amount is admin-only) */
  router.post(
    '/:id/refund',
    asyncHandler(async (req, res) => {
      const id = uuidParam.safeParse(req.params.id);
      const body = refundSchema.safeParse(req.body ?? {});
      if (!id.success) {
        res.status(400).json({ error: 'Invalid booking ID', code: 'VALIDATION_ERROR' });
        return;
      }
      if (!body.success) {
        sendInvalid(res, body.error);
        return;
      }
      sendResult(res, await payments.refundCancelledBooking(actorOf(res), id.data, body.data.amount));
    }),
  );

  return router;
}

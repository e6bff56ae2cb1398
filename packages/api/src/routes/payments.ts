import { type Router as IRouter, Router } from 'express';
import { z } from 'zod';
import { confirmIntentSchema, createIntentSchema } from '@parkalot/shared';
import type { Services } from '../services/index.js';
import { actorOf } from '../middleware/actor.js';
import { asyncHandler, sendInvalid, sendResult } from '../lib/http.js';

const pageQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

/** All payment routes run behind requireActor. */
export function createPaymentsRouter(services: Services): IRouter {
  const router: IRouter = Router();
  const { payments } = services;

  /** POST /api/payments/intents  { bookingId } */
  router.post(
    '/intents',
    asyncHandler(async (req, res) => {
      const parsed = createIntentSchema.safeParse(req.body);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      sendResult(res, await payments.createBookingIntent(actorOf(res), parsed.data.bookingId), 201);
    }),
  );

  /** POST /api/payments/confirm  { intentId }: manual fallback for a missed webhook. */
  router.post(
    '/confirm',
    asyncHandler(async (req, res) => {
      const parsed = confirmIntentSchema.safeParse(req.body);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      sendResult(res, await payments.confirmIntent(actorOf(res), parsed.data.intentId));
    }),
  );

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const parsed = pageQuery.safeParse(req.query);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      sendResult(res, await payments.listMine(actorOf(res), parsed.data.limit, parsed.data.offset));
    }),
  );

  router.get(
    '/stats',
    asyncHandler(async (_req, res) => {
      sendResult(res, await payments.stats(actorOf(res)));
    }),
  );

  return router;
}

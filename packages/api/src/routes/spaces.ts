import { type Router as IRouter, Router } from 'express';
import {
  createReviewSchema,
  createSpaceSchema,
  earningsPeriodSchema,
  moderateSpaceSchema,
  pageSchema,
  searchSpacesSchema,
  timeRangeSchema,
  updateSpaceSchema,
  uuidParam,
} from '@parkalot/shared';
import type { Services } from '../services/index.js';
import { actorOf, maybeActorOf, type ActorMiddleware } from '../middleware/actor.js';
import { asyncHandler, sendInvalid, sendResult } from '../lib/http.js';

/**
 * Public reads (search, quote, availability) sit beside owner routes, so the
 * router takes the two actor middlewares from the app.
 */
export function createSpacesRouter(services: Services, auth: ActorMiddleware): IRouter {
  const router: IRouter = Router();
  const { spaces, bookings } = services;

  /**
   * GET /api/spaces?city=&postcode=&maxPricePerHour=&spaceType=&amenities=a,b&latitude=&longitude=&radius=&limit=&offset=
   */
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const parsed = searchSpacesSchema.safeParse(req.query);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      sendResult(res, await spaces.search(parsed.data));
    }),
  );

  router.get(
    '/mine',
    auth.required,
    asyncHandler(async (_req, res) => {
      sendResult(res, await spaces.listMine(actorOf(res)));
    }),
  );

  router.get(
    '/earnings',
    auth.required,
    asyncHandler(async (_req, res) => {
      sendResult(res, await spaces.getOwnerEarnings(actorOf(res)));
    }),
  );

  router.get(
    '/earnings/by-space',
    auth.required,
    asyncHandler(async (_req, res) => {
      sendResult(res, await spaces.getEarningsBySpace(actorOf(res)));
    }),
  );

  /** GET /api/spaces/earnings/periods?period=week|month|year */
  router.get(
    '/earnings/periods',
    auth.required,
    asyncHandler(async (req, res) => {
      const parsed = earningsPeriodSchema.safeParse(req.query);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      sendResult(res, await spaces.getEarningsByPeriod(actorOf(res), parsed.data.period));
    }),
  );

  router.post(
    '/',
    auth.required,
    asyncHandler(async (req, res) => {
      const parsed = createSpaceSchema.safeParse(req.body);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      sendResult(res, await spaces.create(actorOf(res), parsed.data), 201);
    }),
  );

  router.get(
    '/:id',
    auth.optional,
    asyncHandler(async (req, res) => {
      const id = uuidParam.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid space ID', code: 'VALIDATION_ERROR' });
        return;
      }
      sendResult(res, await spaces.get(id.data, maybeActorOf(res)));
    }),
  );

  router.patch(
    '/:id',
    auth.required,
    asyncHandler(async (req, res) => {
      const id = uuidParam.safeParse(req.params.id);
      const body = updateSpaceSchema.safeParse(req.body);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid space ID', code: 'VALIDATION_ERROR' });
        return;
      }
      if (!body.success) {
        sendInvalid(res, body.error);
        return;
      }
      sendResult(res, await spaces.update(actorOf(res), id.data, body.data));
    }),
  );

  router.delete(
    '/:id',
    auth.required,
    asyncHandler(async (req, res) => {
      const id = uuidParam.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid space ID', code: 'VALIDATION_ERROR' });
        return;
      }
      sendResult(res, await spaces.delete(actorOf(res), id.data));
    }),
  );

  router.patch(
    '/:id/moderation',
    auth.required,
    asyncHandler(async (req, res) => {
      const id = uuidParam.safeParse(req.params.id);
      const body = moderateSpaceSchema.safeParse(req.body);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid space ID', code: 'VALIDATION_ERROR' });
        return;
      }
      if (!body.success) {
        sendInvalid(res, body.error);
        return;
      }
      sendResult(res, await spaces.moderate(actorOf(res), id.data, body.data));
    }),
  );

  // ── Reviews ──────────────────────────────────────────────────────────────

  /** POST /api/spaces/:id/reviews  { bookingId, rating, reviewText? } */
  router.post(
    '/:id/reviews',
    auth.required,
    asyncHandler(async (req, res) => {
      const id = uuidParam.safeParse(req.params.id);
      const body = createReviewSchema.safeParse(req.body);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid space ID', code: 'VALIDATION_ERROR' });
        return;
      }
      if (!body.success) {
        sendInvalid(res, body.error);
        return;
      }
      sendResult(res, await spaces.review(actorOf(res), id.data, body.data), 201);
    }),
  );

  /** GET /api/spaces/:id/reviews?limit=&offset= */
  router.get(
    '/:id/reviews',
    asyncHandler(async (req, res) => {
      const parsed = pageSchema.extend({ id: uuidParam }).safeParse({ ...req.query, id: req.params.id });
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      const { id, limit, offset } = parsed.data;
      sendResult(res, await spaces.listReviews(id, limit, offset));
    }),
  );

  // ── Pricing & availability (public) ──────────────────────────────────────

  const rangeQuery = timeRangeSchema.extend({ id: uuidParam });

  /** GET /api/spaces/:id/quote?start=ISO&end=ISO */
  router.get(
    '/:id/quote',
    asyncHandler(async (req, res) => {
      const parsed = rangeQuery.safeParse({ ...req.query, id: req.params.id });
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      const { id, start, end } = parsed.data;
      sendResult(res, await bookings.calculatePrice(id, start, end));
    }),
  );

  /** GET /api/spaces/:id/availability?start=ISO&end=ISO */
  router.get(
    '/:id/availability',
    asyncHandler(async (req, res) => {
      const parsed = rangeQuery.safeParse({ ...req.query, id: req.params.id });
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      const { id, start, end } = parsed.data;
      sendResult(res, await bookings.isAvailable(id, start, end));
    }),
  );

  router.get(
    '/:id/schedule',
    asyncHandler(async (req, res) => {
      const id = uuidParam.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Invalid space ID', code: 'VALIDATION_ERROR' });
        return;
      }
      sendResult(res, await bookings.schedule(id.data));
    }),
  );

  return router;
}

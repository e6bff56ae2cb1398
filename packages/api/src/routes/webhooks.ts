import { type Router as IRouter, Router } from 'express';
import type { Services } from '../services/index.js';
import { asyncHandler } from '../lib/http.js';

/**
 * POST /api/webhooks/stripe
 *
 * Must be mounted with express.raw({ type: 'application/json' }) ahead of the
 * JSON body parser: the signature covers the exact bytes received.
 */
export function createWebhooksRouter(services: Services): IRouter {
  const router: IRouter = Router();
  const { webhooks } = services;

  router.post(
    '/stripe',
    asyncHandler(async (req, res) => {
      const raw: unknown = req.body;
      if (!Buffer.isBuffer(raw)) {
        res.status(400).end();
        return;
      }

      const verified = webhooks.verify(raw, req.header('stripe-signature'));
      if (!verified.ok) {
        // No detail for the sender; the reason is logged.
        res.status(400).end();
        return;
      }

      const applied = await webhooks.apply(verified.data);
      if (!applied.ok) {
        res.status(applied.status).json({ error: applied.error });
        return;
      }
      res.json({ received: true, handled: applied.data.handled });
    }),
  );

  return router;
}

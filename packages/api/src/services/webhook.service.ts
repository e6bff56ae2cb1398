/**
 * Signed payment-provider events.
 *
 * Signatures are checked by the Stripe SDK against the raw body. Freshness is
 * checked here against the injected clock: events signed more than five
 * minutes either side of it are refused.
 */

import Stripe from 'stripe';
import { z } from 'zod';
import type { ServiceResult } from '../types/db.js';
import { ok, fail } from '../types/db.js';
import { logger } from '../lib/logger.js';
import type { PaymentService, ReconcileResult } from './payment.service.js';

export const SIGNATURE_TOLERANCE_SECONDS = 300;

const eventSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  data: z.object({
    object: z.record(z.unknown()),
  }),
});

export type WebhookEvent = z.infer<typeof eventSchema>;

const intentObjectSchema = z.object({
  id: z.string().min(1),
  metadata: z.record(z.string()).default({}),
  last_payment_error: z
    .object({ message: z.string().optional() })
    .nullish(),
});

const chargeObjectSchema = z.object({
  payment_intent: z.string().min(1),
  amount: z.number().int().nonnegative(),
  amount_refunded: z.number().int().nonnegative(),
});

export interface ApplyResult extends ReconcileResult {
  handled: boolean;
}

function signedAt(header: string): number | null {
  const match = /(?:^|,)\s*t=(\d+)\s*(?:,|$)/.exec(header);
  return match ? Number(match[1]) : null;
}

/**
 * Check the signature header against the raw body and parse the event.
 * `now` is in seconds since the epoch. An empty secret verifies nothing.
 */
export function verifyWebhook(
  rawPayload: string | Buffer,
  signatureHeader: string | undefined,
  secret: string,
  now: number = Math.floor(Date.now() / 1000),
): ServiceResult<WebhookEvent> {
  if (!secret) {
    return fail(400, 'Webhook secret is not configured', 'INVALID_SIGNATURE');
  }

  const timestamp = signatureHeader ? signedAt(signatureHeader) : null;
  if (!signatureHeader || timestamp === null) {
    return fail(400, 'Invalid signature', 'INVALID_SIGNATURE');
  }
  if (Math.abs(now - timestamp) > SIGNATURE_TOLERANCE_SECONDS) {
    return fail(400, 'Signature timestamp outside tolerance', 'SIGNATURE_EXPIRED');
  }

  let body: unknown;
  try {
    // Freshness was settled above, so the SDK's wall-clock check is switched off.
    body = Stripe.webhooks.constructEvent(rawPayload, signatureHeader, secret, Number.POSITIVE_INFINITY);
  } catch (err) {
    if (err instanceof Stripe.errors.StripeSignatureVerificationError) {
      return fail(400, 'Invalid signature', 'INVALID_SIGNATURE');
    }
    return fail(400, 'Malformed event payload');
  }

  const event = eventSchema.safeParse(body);
  if (!event.success) {
    return fail(400, 'Malformed event payload');
  }
  return ok(event.data);
}

export interface WebhookServiceDeps {
  payments: PaymentService;
  secret: string;
  /** Seconds since the epoch. */
  now?: () => number;
}

export function createWebhookService({ payments, secret, now = () => Math.floor(Date.now() / 1000) }: WebhookServiceDeps) {
  function verify(rawPayload: string | Buffer, signatureHeader: string | undefined): ServiceResult<WebhookEvent> {
    const result = verifyWebhook(rawPayload, signatureHeader, secret, now());
    if (!result.ok) {
      logger.warn({ code: result.code, reason: result.error }, 'Webhook signature rejected');
    }
    return result;
  }

  /** Apply a verified event. Unknown event types succeed without effect. */
  async function apply(event: WebhookEvent): Promise<ServiceResult<ApplyResult>> {
    const object = event.data.object;
    let outcome: ServiceResult<ReconcileResult>;

    switch (event.type) {
      case 'payment_intent.succeeded': {
        const intent = intentObjectSchema.safeParse(object);
        if (!intent.success) return fail(400, 'Malformed payment intent');
        outcome = await payments.applyIntentSucceeded(intent.data.id, intent.data.metadata);
        break;
      }
      case 'payment_intent.payment_failed': {
        const intent = intentObjectSchema.safeParse(object);
        if (!intent.success) return fail(400, 'Malformed payment intent');
        const reason = intent.data.last_payment_error?.message ?? 'Unknown error';
        outcome = await payments.applyIntentFailed(intent.data.id, reason);
        break;
      }
      case 'charge.refunded': {
        const charge = chargeObjectSchema.safeParse(object);
        if (!charge.success) return fail(400, 'Malformed charge');
        outcome = await payments.applyChargeRefunded(
          charge.data.payment_intent,
          charge.data.amount_refunded,
          charge.data.amount,
        );
        break;
      }
      default:
        logger.debug({ eventId: event.id, type: event.type }, 'Webhook event type not handled');
        return ok({ handled: false, changed: false });
    }

    if (!outcome.ok) return outcome;
    logger.info({ eventId: event.id, type: event.type, changed: outcome.data.changed }, 'Webhook event applied');
    return ok({ handled: true, changed: outcome.data.changed });
  }

  return { verify, apply };
}

export type WebhookService = ReturnType<typeof createWebhookService>;

/**
 * Stripe implementation of the payment gateway.
 *
 * Card data never touches our server: the client confirms the intent with
 * Stripe.js using the returned client secret, and Stripe reports the outcome
 * through the webhook endpoint.
 */

import Stripe from 'stripe';
import type { RefundReason } from '@parkalot/shared';
import { logger } from '../lib/logger.js';
import { fromMinorUnits, splitPlatformFee, toMinorUnits } from './pricing.js';
import type {
  ConnectIntent,
  ConnectIntentRequest,
  GatewayResult,
  Intent,
  IntentRequest,
  IntentStatus,
  PaymentGateway,
  Refund,
} from './payment-gateway.js';

/** Card statement descriptors are capped at 22 characters. */
const MAX_DESCRIPTOR_LENGTH = 22;

export interface StripeGatewayOptions {
  secretKey: string;
  timeoutMs: number;
  statementDescriptor: string;
}

function toIntentStatus(status: Stripe.PaymentIntent.Status): IntentStatus {
  switch (status) {
    case 'succeeded':
      return 'succeeded';
    case 'canceled':
      return 'canceled';
    case 'processing':
      return 'processing';
    default:
      return 'pending';
  }
}

function toIntent(pi: Stripe.PaymentIntent): Intent {
  return {
    intentId: pi.id,
    clientSecret: pi.client_secret,
    amount: fromMinorUnits(pi.amount),
    currency: pi.currency,
    status: toIntentStatus(pi.status),
    metadata: pi.metadata,
  };
}

/** Safe message for the caller; the full error goes to the log. */
function describeError(err: unknown): string {
  if (err instanceof Stripe.errors.StripeCardError) {
    return err.message;
  }
  return 'Payment gateway unavailable';
}

export function createStripeGateway(options: StripeGatewayOptions): PaymentGateway {
  const stripe = new Stripe(options.secretKey, {
    timeout: options.timeoutMs,
    maxNetworkRetries: 1,
  });
  const descriptorSuffix = options.statementDescriptor.slice(0, MAX_DESCRIPTOR_LENGTH);

  function baseParams(request: IntentRequest): Stripe.PaymentIntentCreateParams {
    return {
      amount: toMinorUnits(request.amount),
      currency: request.currency,
      automatic_payment_methods: { enabled: true },
      metadata: { ...request.metadata, source: 'parkalot' },
      statement_descriptor_suffix: descriptorSuffix,
      ...(request.customerId ? { customer: request.customerId } : {}),
      ...(request.description ? { description: request.description } : {}),
    };
  }

  return {
    testMode: options.secretKey.startsWith('sk_test_'),

    async createIntent(request: IntentRequest): Promise<GatewayResult<Intent>> {
      try {
        const pi = await stripe.paymentIntents.create(baseParams(request));
        return { success: true, ...toIntent(pi) };
      } catch (err) {
        logger.error({ err }, 'Stripe createIntent error');
        return { success: false, error: describeError(err) };
      }
    },

    async createConnectIntent(request: ConnectIntentRequest): Promise<GatewayResult<ConnectIntent>> {
      const { platformFee, ownerPayout } = splitPlatformFee(request.amount);
      try {
        const pi = await stripe.paymentIntents.create({
          ...baseParams(request),
          application_fee_amount: toMinorUnits(platformFee),
          transfer_data: { destination: request.destinationAccountId },
        });
        return { success: true, ...toIntent(pi), platformFee, ownerPayout };
      } catch (err) {
        logger.error({ err }, 'Stripe createConnectIntent error');
        return { success: false, error: describeError(err) };
      }
    },

    async refund(
      intentId: string,
      amount?: number,
      reason: RefundReason = 'requested_by_customer',
    ): Promise<GatewayResult<Refund>> {
      try {
        // Same intent and amount collapse into one refund on retry.
        const idempotencyKey = `refund:${intentId}:${amount === undefined ? 'full' : toMinorUnits(amount)}`;
        const refund = await stripe.refunds.create(
          {
            payment_intent: intentId,
            reason,
            ...(amount !== undefined && { amount: toMinorUnits(amount) }),
          },
          { idempotencyKey },
        );
        return {
          success: true,
          refundId: refund.id,
          amount: fromMinorUnits(refund.amount),
          status: refund.status ?? 'pending',
        };
      } catch (err) {
        logger.error({ err, intentId }, 'Stripe refund error');
        return { success: false, error: describeError(err) };
      }
    },

    async getIntent(intentId: string): Promise<GatewayResult<Intent>> {
      try {
        const pi = await stripe.paymentIntents.retrieve(intentId);
        return { success: true, ...toIntent(pi) };
      } catch (err) {
        logger.error({ err, intentId }, 'Stripe getIntent error');
        return { success: false, error: describeError(err) };
      }
    },

    async cancelIntent(intentId: string): Promise<GatewayResult<Intent>> {
      try {
        const pi = await stripe.paymentIntents.cancel(intentId, { cancellation_reason: 'abandoned' });
        return { success: true, ...toIntent(pi) };
      } catch (err) {
        logger.error({ err, intentId }, 'Stripe cancelIntent error');
        return { success: false, error: describeError(err) };
      }
    },
  };
}

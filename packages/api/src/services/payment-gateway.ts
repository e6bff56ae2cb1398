/**
 * Provider-agnostic payment gateway.
 *
 * Flow:
 *   1. createIntent() → provider returns an intent id and a client secret
 *   2. Client confirms the card payment against the provider directly
 *   3. Provider reports the outcome by webhook (or getIntent() on manual confirm)
 *   4. refund() returns all or part of a captured payment
 *   5. cancelIntent() voids an intent nobody will pay, e.g. for a cancelled booking
 *
 * Implementations never throw for provider failures: they return
 * `{ success: false, error }` so callers can surface a retryable 502.
 */

import { randomBytes } from 'crypto';
import type { RefundReason } from '@parkalot/shared';
import { logger } from '../lib/logger.js';
import { roundCents, splitPlatformFee } from './pricing.js';

export type GatewayResult<T> = ({ success: true } & T) | { success: false; error: string };

export type IntentStatus = 'pending' | 'processing' | 'succeeded' | 'canceled';

export interface IntentRequest {
  /** Decimal amount in major units, e.g. 12.50. */
  amount: number;
  currency: string;
  metadata: Record<string, string>;
  customerId?: string;
  description?: string;
}

export interface ConnectIntentRequest extends IntentRequest {
  destinationAccountId: string;
}

export interface Intent {
  intentId: string;
  clientSecret: string | null;
  amount: number;
  currency: string;
  status: IntentStatus;
  metadata: Record<string, string>;
}

export interface ConnectIntent extends Intent {
  platformFee: number;
  ownerPayout: number;
}

export interface Refund {
  refundId: string;
  amount: number;
  status: string;
}

export interface PaymentGateway {
  /** True when intents are not real charges (demo mode or provider test keys). */
  readonly testMode: boolean;
  createIntent(request: IntentRequest): Promise<GatewayResult<Intent>>;
  createConnectIntent(request: ConnectIntentRequest): Promise<GatewayResult<ConnectIntent>>;
  /** Omitting `amount` refunds the full charge. */
  refund(intentId: string, amount?: number, reason?: RefundReason): Promise<GatewayResult<Refund>>;
  getIntent(intentId: string): Promise<GatewayResult<Intent>>;
  /** Fails once the intent has succeeded; refund it instead. */
  cancelIntent(intentId: string): Promise<GatewayResult<Intent>>;
}

// ── Demo gateway ─────────────────────────────────────────────────────────────

function demoId(prefix: string): string {
  return `${prefix}_demo_${randomBytes(12).toString('hex')}`;
}

/**
 * In-process stand-in used when no provider keys are configured. Intents
 * succeed as soon as they are looked up, so the manual confirm path works
 * end to end without a network.
 */
export function createDemoGateway(): PaymentGateway {
  const intents = new Map<string, Intent>();

  async function createIntent(request: IntentRequest): Promise<GatewayResult<Intent>> {
    const intentId = demoId('pi');
    const intent: Intent = {
      intentId,
      clientSecret: `${intentId}_secret_demo`,
      amount: roundCents(request.amount),
      currency: request.currency,
      status: 'pending',
      metadata: request.metadata,
    };
    intents.set(intentId, intent);
    logger.info({ intentId, amount: intent.amount.toFixed(2) }, 'Demo payment intent created');
    return { success: true, ...intent };
  }

  return {
    testMode: true,

    createIntent,

    async createConnectIntent(request) {
      const created = await createIntent(request);
      if (!created.success) return created;
      return { ...created, ...splitPlatformFee(created.amount) };
    },

    async refund(intentId, amount) {
      const intent = intents.get(intentId);
      const refunded = roundCents(amount ?? intent?.amount ?? 0);
      logger.info({ intentId, amount: refunded.toFixed(2) }, 'Demo refund issued');
      return { success: true, refundId: demoId('re'), amount: refunded, status: 'succeeded' };
    },

    async getIntent(intentId) {
      const intent = intents.get(intentId);
      if (!intent) {
        return { success: false, error: 'No such payment intent' };
      }
      if (intent.status === 'canceled') {
        return { success: true, ...intent };
      }
      const succeeded: Intent = { ...intent, status: 'succeeded' };
      intents.set(intentId, succeeded);
      return { success: true, ...succeeded };
    },

    async cancelIntent(intentId) {
      const intent = intents.get(intentId);
      if (!intent) {
        return { success: false, error: 'No such payment intent' };
      }
      if (intent.status === 'succeeded') {
        return { success: false, error: 'Payment intent has already succeeded' };
      }
      const canceled: Intent = { ...intent, status: 'canceled' };
      intents.set(intentId, canceled);
      logger.info({ intentId }, 'Demo payment intent cancelled');
      return { success: true, ...canceled };
    },
  };
}

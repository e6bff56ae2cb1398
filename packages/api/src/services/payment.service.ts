import {
  BOOKING_TYPES,
  type Booking,
  type BookingType,
  type Payment,
  type PaymentIntentResponse,
  type PaymentStats,
} from '@parkalot/shared';
import type { Repositories, Store } from '../repositories/types.js';
import type { ActorContext, ServiceResult } from '../types/db.js';
import { ok, fail } from '../types/db.js';
import { toServiceFailure } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { setBookingPaymentStatus } from './booking.service.js';
import type { IntentStatus, PaymentGateway } from './payment-gateway.js';
import { computeRefund, fromMinorUnits, roundCents } from './pricing.js';
import { CAPTURED_PAYMENT_STATUSES } from './status.js';

export interface PaymentServiceDeps {
  store: Store;
  gateway: PaymentGateway;
  currency: string;
}

export interface ReconcileResult {
  /** False when the event had already been applied or matched nothing. */
  changed: boolean;
}

export interface ConfirmResult extends ReconcileResult {
  intentStatus: IntentStatus;
}

export interface RefundResult {
  booking: Booking;
  refundId: string;
  refundAmount: number;
}

export interface ReleaseResult {
  intentStatus: IntentStatus;
}

interface PaymentTarget {
  bookingType: BookingType;
  bookingId: string;
}

function isBookingType(value: string | undefined): value is BookingType {
  return BOOKING_TYPES.some((t) => t === value);
}

/** The booking a payment pays for. Event metadata wins over the stored row. */
function targetOf(payment: Payment, metadata: Record<string, string>): PaymentTarget {
  const metaType = metadata.booking_type;
  return {
    bookingType: isBookingType(metaType) ? metaType : payment.bookingType,
    bookingId: metadata.booking_id || payment.bookingId,
  };
}

/**
 * Mark the booking behind a newly captured payment as paid. A customer
 * booking cancelled in the meantime is left unpaid; the caller refunds it.
 */
async function recordCapture(tx: Repositories, intentId: string, target: PaymentTarget): Promise<void> {
  const { bookingType, bookingId } = target;

  if (bookingType !== 'customer_space') {
    const updated = await tx.payments.markExternalBookingPaid(bookingType, bookingId, intentId);
    if (!updated) {
      logger.warn({ intentId, bookingType, bookingId }, 'Paid intent does not match its booking');
    }
    return;
  }

  const booking = await tx.bookings.findByIdForUpdate(bookingId);
  if (booking?.bookingStatus === 'cancelled') {
    logger.warn({ intentId, bookingId }, 'Payment received for a cancelled booking');
    return;
  }
  const paid = await setBookingPaymentStatus(tx, bookingId, 'paid', intentId);
  if (!paid.ok) {
    logger.warn({ intentId, bookingId, error: paid.error }, 'Paid intent does not match its booking');
  }
}

export function createPaymentService({ store, gateway, currency }: PaymentServiceDeps) {
  // ── Intents ──────────────────────────────────────────────────────────────

  /**
   * Create a provider intent for a pending booking. The provider call happens
   * outside any transaction; nothing is stored when it fails.
   */
  async function createBookingIntent(
    actor: ActorContext,
    bookingId: string,
  ): Promise<ServiceResult<PaymentIntentResponse>> {
    try {
      const booking = await store.bookings.findById(bookingId);
      if (!booking) return fail(404, 'Booking not found');
      if (booking.renterId !== actor.userId) {
        return fail(403, 'Only the renter can pay for this booking');
      }
      if (booking.bookingStatus !== 'pending' || booking.paymentStatus !== 'pending') {
        return fail(409, 'Booking is not awaiting payment');
      }

      const metadata = {
        booking_type: 'customer_space',
        booking_id: booking.id,
        user_id: actor.userId,
      };
      const intent = await gateway.createIntent({
        amount: booking.totalPrice,
        currency,
        metadata,
        description: `Parking booking ${booking.id}`,
      });

      if (!intent.success) {
        return fail(502, intent.error, 'PAYMENT_PROVIDER_ERROR');
      }

      const payment = await store.transaction(async (tx) => {
        const created = await tx.payments.insert({
          userId: actor.userId,
          bookingType: 'customer_space',
          bookingId: booking.id,
          amount: booking.totalPrice,
          currency,
          providerPaymentId: intent.intentId,
          status: 'pending',
          metadata,
        });
        await tx.bookings.setProviderPaymentId(booking.id, intent.intentId);
        return created;
      });

      logger.info({ bookingId, paymentId: payment.id, intentId: intent.intentId }, 'Payment intent created');

      return ok({
        paymentId: payment.id,
        intentId: intent.intentId,
        clientSecret: intent.clientSecret,
        amount: intent.amount,
        currency: intent.currency,
        status: intent.status,
        testMode: gateway.testMode,
      });
    } catch (err) {
      return toServiceFailure(err, 'Payment intent creation error');
    }
  }

  // ── Reconciliation ───────────────────────────────────────────────────────
  // Shared by the webhook and the manual confirm path. Every step is keyed on
  // the intent id and safe to repeat.

  /**
   * A captured payment whose booking was cancelled before it arrived is owed
   * back in full. Checked on every delivery, so a refund that failed here is
   * retried by the next one.
   */
  async function refundLateCapture(intentId: string, bookingId: string): Promise<ServiceResult<void>> {
    const [booking, payment] = await Promise.all([
      store.bookings.findById(bookingId),
      store.payments.findByIntentId(intentId),
    ]);
    if (
      !booking ||
      !payment ||
      booking.bookingStatus !== 'cancelled' ||
      booking.providerPaymentId !== intentId ||
      (booking.paymentStatus !== 'pending' && booking.paymentStatus !== 'failed') ||
      payment.status !== 'succeeded'
    ) {
      return ok(undefined);
    }

    const refund = await gateway.refund(intentId, undefined, 'requested_by_customer');
    if (!refund.success) {
      logger.warn({ bookingId, intentId, error: refund.error }, 'Refund of late payment failed');
      return fail(502, refund.error, 'PAYMENT_PROVIDER_ERROR');
    }

    const settled = await store.transaction(async (tx) => {
      await tx.payments.recordRefund(payment.id, refund.amount, 'refunded');
      const paid = await setBookingPaymentStatus(tx, bookingId, 'paid', intentId);
      if (!paid.ok) return paid;
      return setBookingPaymentStatus(tx, bookingId, 'refunded');
    }, intentId);
    if (!settled.ok) return settled;

    logger.info({ bookingId, refundId: refund.refundId, amount: refund.amount }, 'Late payment for cancelled booking refunded');
    return ok(undefined);
  }

  async function applyIntentSucceeded(
    intentId: string,
    metadata: Record<string, string>,
  ): Promise<ServiceResult<ReconcileResult>> {
    try {
      const outcome = await store.transaction(async (tx) => {
        const update = await tx.payments.updateStatusByIntent(intentId, 'succeeded');
        if (!update.payment) {
          logger.warn({ intentId }, 'Payment intent succeeded with no matching payment');
          return null;
        }

        const target = targetOf(update.payment, metadata);
        // Replays and late successes after a refund leave the booking alone.
        if (update.changed) {
          await recordCapture(tx, intentId, target);
        }
        return { changed: update.changed, target };
      }, intentId);

      if (!outcome) return ok({ changed: false });

      if (outcome.target.bookingType === 'customer_space') {
        const refunded = await refundLateCapture(intentId, outcome.target.bookingId);
        if (!refunded.ok) return refunded;
      }
      return ok({ changed: outcome.changed });
    } catch (err) {
      return toServiceFailure(err, 'Payment success reconciliation error');
    }
  }

  async function applyIntentFailed(intentId: string, failureReason: string): Promise<ServiceResult<ReconcileResult>> {
    try {
      const { payment, changed } = await store.payments.updateStatusByIntent(intentId, 'failed', { failureReason });
      if (!payment) {
        logger.warn({ intentId }, 'Payment intent failed with no matching payment');
      }
      return ok({ changed });
    } catch (err) {
      return toServiceFailure(err, 'Payment failure reconciliation error');
    }
  }

  /**
   * Amounts are the provider's minor units, as reported on the charge. A
   * refund can overtake the success event; the capture it implies is then
   * recorded here, and the success that follows changes nothing.
   */
  async function applyChargeRefunded(
    intentId: string,
    amountRefunded: number,
    amountCharged: number,
  ): Promise<ServiceResult<ReconcileResult>> {
    try {
      const status = amountRefunded >= amountCharged ? 'refunded' : 'partial_refund';
      const changed = await store.transaction(async (tx) => {
        const update = await tx.payments.updateStatusByIntent(intentId, status, {
          refundAmount: fromMinorUnits(amountRefunded),
        });
        if (!update.payment) {
          logger.warn({ intentId }, 'Charge refunded with no matching payment');
          return false;
        }

        const wasCaptured = update.previousStatus !== null && CAPTURED_PAYMENT_STATUSES.includes(update.previousStatus);
        if (update.changed && !wasCaptured) {
          await recordCapture(tx, intentId, targetOf(update.payment, update.payment.metadata));
        }
        return update.changed;
      }, intentId);

      return ok({ changed });
    } catch (err) {
      return toServiceFailure(err, 'Refund reconciliation error');
    }
  }

  /**
   * Manual confirm: ask the provider for the intent's status and, when it has
   * succeeded, reconcile exactly as the webhook would.
   */
  async function confirmIntent(actor: ActorContext, intentId: string): Promise<ServiceResult<ConfirmResult>> {
    try {
      const payment = await store.payments.findByIntentId(intentId);
      if (!payment) return fail(404, 'Payment not found');
      if (payment.userId !== actor.userId && actor.role !== 'admin') {
        return fail(403, 'You cannot confirm this payment');
      }

      const intent = await gateway.getIntent(intentId);
      if (!intent.success) {
        return fail(502, intent.error, 'PAYMENT_PROVIDER_ERROR');
      }
      if (intent.status !== 'succeeded') {
        return ok({ changed: false, intentStatus: intent.status });
      }

      const applied = await applyIntentSucceeded(intentId, intent.metadata);
      if (!applied.ok) return applied;
      return ok({ changed: applied.data.changed, intentStatus: intent.status });
    } catch (err) {
      return toServiceFailure(err, 'Payment confirmation error');
    }
  }

  // ── Refunds ──────────────────────────────────────────────────────────────

  /**
   * Refund a cancelled booking through the provider, then record it. The
   * amount defaults to the refund tier at the moment of cancellation, so a
   * retry after a provider failure refunds the same amount. Only admins may
   * override it.
   */
  async function refundCancelledBooking(
    actor: ActorContext,
    bookingId: string,
    amount?: number,
  ): Promise<ServiceResult<RefundResult>> {
    if (amount !== undefined && actor.role !== 'admin') {
      return fail(403, 'Only admins can set a refund amount');
    }

    try {
      const booking = await store.bookings.findById(bookingId);
      if (!booking) return fail(404, 'Booking not found');
      if (actor.role !== 'admin' && booking.renterId !== actor.userId && booking.ownerId !== actor.userId) {
        return fail(403, 'You are not a participant in this booking');
      }
      if (booking.bookingStatus !== 'cancelled' || !booking.cancelledAt) {
        return fail(409, 'Only cancelled bookings can be refunded', 'INVALID_TRANSITION');
      }
      if (booking.paymentStatus !== 'paid' || !booking.providerPaymentId) {
        return fail(409, 'Booking has no captured payment to refund');
      }

      const due = roundCents(
        amount ??
          computeRefund(booking.totalPrice, booking.paymentStatus, booking.startTime, booking.cancelledAt).refundAmount,
      );
      if (due <= 0) {
        return fail(409, 'Booking is not eligible for a refund');
      }
      if (due > booking.totalPrice) {
        return fail(400, 'Refund cannot exceed the booking total');
      }

      const intentId = booking.providerPaymentId;
      const payment = await store.payments.findByIntentId(intentId);
      if (!payment) return fail(404, 'Payment not found');

      const isFull = due >= booking.totalPrice;
      const refund = await gateway.refund(intentId, isFull ? undefined : due, 'requested_by_customer');
      if (!refund.success) {
        logger.warn({ bookingId, intentId, error: refund.error }, 'Refund failed; cancellation stands');
        return fail(502, refund.error, 'PAYMENT_PROVIDER_ERROR');
      }

      const status = isFull ? 'refunded' : 'partial_refund';
      const updated = await store.transaction(async (tx) => {
        await tx.payments.recordRefund(payment.id, refund.amount, status);
        return setBookingPaymentStatus(tx, bookingId, status);
      }, intentId);
      if (!updated.ok) return updated;

      logger.info({ bookingId, refundId: refund.refundId, amount: refund.amount }, 'Booking refunded');
      return ok({ booking: updated.data, refundId: refund.refundId, refundAmount: refund.amount });
    } catch (err) {
      return toServiceFailure(err, 'Booking refund error');
    }
  }

  /**
   * Void the open intent of a booking cancelled before it was paid. An intent
   * the provider reports as already succeeded is reconciled instead, which
   * refunds it in full.
   */
  async function releaseCancelledIntent(bookingId: string): Promise<ServiceResult<ReleaseResult>> {
    try {
      const booking = await store.bookings.findById(bookingId);
      if (!booking) return fail(404, 'Booking not found');
      if (booking.bookingStatus !== 'cancelled') {
        return fail(409, 'Only cancelled bookings release their payment intent', 'INVALID_TRANSITION');
      }
      const intentId = booking.providerPaymentId;
      if (booking.paymentStatus !== 'pending' || !intentId) {
        return fail(409, 'Booking has no open payment intent');
      }

      const cancelled = await gateway.cancelIntent(intentId);
      if (cancelled.success) {
        await store.payments.updateStatusByIntent(intentId, 'failed', { failureReason: 'Booking cancelled' });
        logger.info({ bookingId, intentId }, 'Payment intent released');
        return ok({ intentStatus: cancelled.status });
      }

      const intent = await gateway.getIntent(intentId);
      if (!intent.success || intent.status !== 'succeeded') {
        logger.warn({ bookingId, intentId, error: cancelled.error }, 'Payment intent release failed');
        return fail(502, cancelled.error, 'PAYMENT_PROVIDER_ERROR');
      }
      const applied = await applyIntentSucceeded(intentId, intent.metadata);
      if (!applied.ok) return applied;
      return ok({ intentStatus: intent.status });
    } catch (err) {
      return toServiceFailure(err, 'Payment intent release error');
    }
  }

  // ── Reads ────────────────────────────────────────────────────────────────

  async function listMine(actor: ActorContext, limit = 50, offset = 0): Promise<ServiceResult<Payment[]>> {
    try {
      return ok(await store.payments.listByUser(actor.userId, limit, offset));
    } catch (err) {
      return toServiceFailure(err, 'Payment list error');
    }
  }

  async function stats(actor: ActorContext): Promise<ServiceResult<PaymentStats>> {
    try {
      return ok(await store.payments.userStats(actor.userId));
    } catch (err) {
      return toServiceFailure(err, 'Payment stats error');
    }
  }

  return {
    createBookingIntent,
    confirmIntent,
    applyIntentSucceeded,
    applyIntentFailed,
    applyChargeRefunded,
    refundCancelledBooking,
    releaseCancelledIntent,
    listMine,
    stats,
  };
}

export type PaymentService = ReturnType<typeof createPaymentService>;

import type { ActorRole, BookingPaymentStatus, BookingStatus, PaymentStatus } from '@parkalot/shared';

/**
 * Booking lifecycle:
 *
 *   pending ──paid──▶ confirmed ──check-in──▶ active ──check-out──▶ completed
 *      └──────────────────┴───────────────────────┴──▶ cancelled | disputed
 *
 * `completed` and `cancelled` are terminal. `disputed` waits for an admin,
 * who may close it as completed or cancelled.
 */
const TRANSITIONS: Record<BookingStatus, readonly BookingStatus[]> = {
  pending: ['confirmed', 'cancelled', 'disputed'],
  confirmed: ['active', 'cancelled', 'disputed'],
  active: ['completed', 'cancelled', 'disputed'],
  completed: [],
  cancelled: [],
  disputed: [],
};

const ADMIN_DISPUTE_RESOLUTIONS: readonly BookingStatus[] = ['completed', 'cancelled'];

export function canTransition(from: BookingStatus, to: BookingStatus, role: ActorRole): boolean {
  if (from === 'disputed') {
    return role === 'admin' && ADMIN_DISPUTE_RESOLUTIONS.includes(to);
  }
  return TRANSITIONS[from].includes(to);
}

/**
 * Payment statuses a record may move to `target` from. Anything else is
 * either a replay or an out-of-order event and is left untouched.
 *
 * A refund may land on a record still `pending` or `failed`: the charge was
 * captured but the success event has not arrived yet.
 */
export const PAYMENT_STATUS_SOURCES: Record<PaymentStatus, readonly PaymentStatus[]> = {
  pending: [],
  succeeded: ['pending', 'failed'],
  failed: ['pending'],
  partial_refund: ['pending', 'failed', 'succeeded', 'partial_refund'],
  refunded: ['pending', 'failed', 'succeeded', 'partial_refund'],
};

/** Payment statuses that mean money was taken at some point. */
export const CAPTURED_PAYMENT_STATUSES: readonly PaymentStatus[] = ['succeeded', 'partial_refund', 'refunded'];

/** Same rule for the payment column on a booking. Refunds never go back to paid. */
export const BOOKING_PAYMENT_STATUS_SOURCES: Record<BookingPaymentStatus, readonly BookingPaymentStatus[]> = {
  pending: [],
  paid: ['pending', 'failed'],
  failed: ['pending'],
  partial_refund: ['paid', 'partial_refund'],
  refunded: ['paid', 'partial_refund'],
};

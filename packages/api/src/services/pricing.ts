/**
 * Booking price, platform fee and refund arithmetic.
 *
 * Everything here is pure: no storage, no clock. Callers pass `now` in.
 */

import {
  DAILY_RATE_MIN_HOURS,
  FULL_REFUND_HOURS,
  PARTIAL_REFUND_HOURS,
  PARTIAL_REFUND_RATE,
  PLATFORM_FEE_PERCENT,
  type BookingPaymentStatus,
  type PriceQuote,
} from '@parkalot/shared';
import { InvalidRangeError } from '../lib/errors.js';

const MS_PER_HOUR = 3_600_000;

/** Round half-up to 2 decimal places to keep money values exact in pence. */
export function roundCents(n: number): number {
  return Math.round((n + Number.EPSILON) * 100) / 100;
}

export function toMinorUnits(amount: number): number {
  return Math.round(roundCents(amount) * 100);
}

export function fromMinorUnits(amount: number): number {
  return roundCents(amount / 100);
}

/** Length of a booking in (fractional) hours. */
export function computeDuration(start: Date, end: Date): number {
  const ms = end.getTime() - start.getTime();
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new InvalidRangeError();
  }
  return ms / MS_PER_HOUR;
}

/**
 * Price a booking of `hours` at the space's rates.
 *
 * The daily rate applies to bookings of 8 hours or more when either the
 * leftover part-day exceeds 8 whole hours or a day costs less than 8 hours
 * at the hourly rate. Otherwise the booking is charged by the hour.
 */
export function computePrice(hours: number, hourlyRate: number, dailyRate: number): number {
  if (dailyRate > 0 && hours >= DAILY_RATE_MIN_HOURS) {
    const days = Math.ceil(hours / 24);
    const remainingHours = Math.trunc(hours) % 24;

    if (remainingHours > DAILY_RATE_MIN_HOURS || dailyRate < hourlyRate * DAILY_RATE_MIN_HOURS) {
      return roundCents(days * dailyRate);
    }
  }

  return roundCents(hours * hourlyRate);
}

export interface FeeSplit {
  platformFee: number;
  ownerPayout: number;
}

/** Split a booking total into the marketplace commission and the owner's share. */
export function splitPlatformFee(total: number, feePercent = PLATFORM_FEE_PERCENT): FeeSplit {
  const platformFee = roundCents(total * feePercent);
  return { platformFee, ownerPayout: roundCents(total - platformFee) };
}

export interface RefundDecision {
  refundAmount: number;
  eligible: boolean;
}

/** Tiered cancellation refund: full at 24h+ before start, half at 6h+, nothing later. */
export function computeRefund(
  totalPrice: number,
  paymentStatus: BookingPaymentStatus,
  startTime: Date,
  now: Date,
): RefundDecision {
  if (paymentStatus !== 'paid') {
    return { refundAmount: 0, eligible: false };
  }

  const hoursUntilStart = (startTime.getTime() - now.getTime()) / MS_PER_HOUR;
  let refundAmount = 0;

  if (hoursUntilStart >= FULL_REFUND_HOURS) {
    refundAmount = roundCents(totalPrice);
  } else if (hoursUntilStart >= PARTIAL_REFUND_HOURS) {
    refundAmount = roundCents(totalPrice * PARTIAL_REFUND_RATE);
  }

  return { refundAmount, eligible: refundAmount > 0 };
}

/**
 * Renter-facing price preview. The service fee is added on top of the
 * subtotal here, unlike booking creation which takes the fee out of the total.
 */
export function buildQuote(hours: number, hourlyRate: number, dailyRate: number): PriceQuote {
  const subtotal = computePrice(hours, hourlyRate, dailyRate);
  return {
    hours: roundCents(hours),
    hourlyRate,
    dailyRate,
    subtotal,
    serviceFee: roundCents(subtotal * PLATFORM_FEE_PERCENT),
    quotedRenterTotal: roundCents(subtotal * (1 + PLATFORM_FEE_PERCENT)),
    bookingTotalPrice: subtotal,
  };
}

/**
 * Shared constants for the ParkaLot booking system.
 * Used by both the API and any client that talks to it.
 */

export const TIMEZONE = 'Europe/London';

export const CURRENCY = 'gbp';

// ── Fees and refunds ─────────────────────────────────────────────────────

/** Marketplace commission taken from a booking's total price. */
export const PLATFORM_FEE_PERCENT = 0.15;

/** Hours before start at which a paid booking still gets a full refund. */
export const FULL_REFUND_HOURS = 24;

/** Hours before start at which a paid booking still gets a partial refund. */
export const PARTIAL_REFUND_HOURS = 6;

export const PARTIAL_REFUND_RATE = 0.5;

/** Bookings at least this long may be priced at the daily rate. */
export const DAILY_RATE_MIN_HOURS = 8;

// ── Spaces ───────────────────────────────────────────────────────────────

export const SPACE_TYPES = ['driveway', 'garage', 'parking_spot', 'car_park'] as const;
export type SpaceType = (typeof SPACE_TYPES)[number];

export const SPACE_STATUSES = ['pending', 'active', 'paused', 'rejected'] as const;
export type SpaceStatus = (typeof SPACE_STATUSES)[number];

export const AMENITIES = [
  'covered',
  'cctv',
  'ev_charging',
  '24_7_access',
  'disabled_access',
  'security_lighting',
] as const;
export type Amenity = (typeof AMENITIES)[number];

export const MAX_PHOTOS = 6;

export const DEFAULT_MIN_BOOKING_HOURS = 1;
export const DEFAULT_MAX_BOOKING_DAYS = 30;

export const SEARCH_DEFAULT_LIMIT = 20;
export const SEARCH_MAX_LIMIT = 100;
export const SEARCH_DEFAULT_RADIUS_MILES = 10;

export const EARNINGS_PERIODS = ['week', 'month', 'year'] as const;
export type EarningsPeriod = (typeof EARNINGS_PERIODS)[number];

/** Earnings-by-period reports cover at most this many of the latest periods. */
export const EARNINGS_PERIOD_LIMIT = 12;

export const HISTORY_DEFAULT_LIMIT = 20;

// ── Booking statuses ─────────────────────────────────────────────────────

export const BOOKING_STATUSES = ['pending', 'confirmed', 'active', 'completed', 'cancelled', 'disputed'] as const;
export type BookingStatus = (typeof BOOKING_STATUSES)[number];

/** Statuses that still occupy a space's calendar. */
export const BLOCKING_STATUSES: readonly BookingStatus[] = ['pending', 'confirmed', 'active', 'disputed'];

export const BOOKING_PAYMENT_STATUSES = ['pending', 'paid', 'partial_refund', 'refunded', 'failed'] as const;
export type BookingPaymentStatus = (typeof BOOKING_PAYMENT_STATUSES)[number];

export type CancelledBy = 'renter' | 'owner' | 'system';

// ── Payments ─────────────────────────────────────────────────────────────

export const BOOKING_TYPES = ['garage', 'customer_space', 'airport'] as const;
export type BookingType = (typeof BOOKING_TYPES)[number];

export const PAYMENT_STATUSES = ['pending', 'succeeded', 'failed', 'refunded', 'partial_refund'] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const REFUND_REASONS = ['requested_by_customer', 'duplicate', 'fraudulent'] as const;
export type RefundReason = (typeof REFUND_REASONS)[number];

// ── Actors ───────────────────────────────────────────────────────────────

export const ACTOR_ROLES = ['customer', 'admin'] as const;
export type ActorRole = (typeof ACTOR_ROLES)[number];

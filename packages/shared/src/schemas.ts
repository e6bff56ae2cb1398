/**
 * Shared Zod schemas for request validation.
 * Used by the API for input validation. Clients can also import
 * these for their own validation if desired.
 */

import { z } from 'zod';
import {
  AMENITIES,
  BOOKING_STATUSES,
  EARNINGS_PERIODS,
  HISTORY_DEFAULT_LIMIT,
  MAX_PHOTOS,
  SEARCH_DEFAULT_LIMIT,
  SEARCH_MAX_LIMIT,
  SPACE_TYPES,
} from './constants.js';

// ── Primitives ───────────────────────────────────────────────────────────

export const uuidParam = z.string().uuid();
export const instant = z.coerce.date();
export const money = z.coerce.number().positive().max(100_000);

const amenitiesList = z.array(z.enum(AMENITIES)).max(AMENITIES.length);

/** Accepts `covered,cctv` from a query string as well as an array. */
const amenitiesQuery = z.preprocess(
  (value) => (typeof value === 'string' ? value.split(',').map((s) => s.trim()).filter(Boolean) : value),
  amenitiesList,
);

// ── Time ranges ──────────────────────────────────────────────────────────

export const timeRangeSchema = z.object({
  start: instant,
  end: instant,
});

// ── Spaces ───────────────────────────────────────────────────────────────

export const createSpaceSchema = z.object({
  spaceName: z.string().min(1).max(255),
  spaceType: z.enum(SPACE_TYPES).default('driveway'),
  addressLine1: z.string().min(1).max(255),
  addressLine2: z.string().max(255).optional(),
  city: z.string().min(1).max(100),
  postcode: z.string().min(2).max(20),
  latitude: z.number().min(-90).max(90).optional(),
  longitude: z.number().min(-180).max(180).optional(),
  description: z.string().max(5000).optional(),
  instructions: z.string().max(5000).optional(),
  amenities: amenitiesList.default([]),
  pricePerHour: money,
  pricePerDay: money.optional(),
  minBookingHours: z.number().int().min(1).max(24).optional(),
  maxBookingDays: z.number().int().min(1).max(365).optional(),
  photos: z.array(z.string().url().max(2000)).max(MAX_PHOTOS).default([]),
});

export const updateSpaceSchema = createSpaceSchema
  .partial()
  .extend({ status: z.enum(['active', 'paused']).optional() });

export const moderateSpaceSchema = z.object({
  status: z.enum(['active', 'paused', 'rejected']),
  reason: z.string().max(500).optional(),
});

export const searchSpacesSchema = z
  .object({
    city: z.string().max(100).optional(),
    postcode: z.string().max(20).optional(),
    maxPricePerHour: z.coerce.number().positive().optional(),
    spaceType: z.enum(SPACE_TYPES).optional(),
    amenities: amenitiesQuery.optional(),
    latitude: z.coerce.number().min(-90).max(90).optional(),
    longitude: z.coerce.number().min(-180).max(180).optional(),
    radius: z.coerce.number().positive().max(500).optional(),
    limit: z.coerce.number().int().min(1).default(SEARCH_DEFAULT_LIMIT).transform((n) => Math.min(n, SEARCH_MAX_LIMIT)),
    offset: z.coerce.number().int().min(0).default(0),
  })
  .refine(
    (data) => (data.latitude === undefined) === (data.longitude === undefined),
    { message: 'latitude and longitude must be given together' },
  );

export const createReviewSchema = z.object({
  bookingId: z.string().uuid(),
  rating: z.number().int().min(1).max(5),
  reviewText: z.string().trim().min(1).max(2000).optional(),
});

export const earningsPeriodSchema = z.object({
  period: z.enum(EARNINGS_PERIODS).default('month'),
});

/** limit/offset paging from a query string. */
export const pageSchema = z.object({
  limit: z.coerce.number().int().min(1).max(SEARCH_MAX_LIMIT).default(HISTORY_DEFAULT_LIMIT),
  offset: z.coerce.number().int().min(0).default(0),
});

// ── Bookings ─────────────────────────────────────────────────────────────

export const vehicleSchema = z.object({
  reg: z.string().min(1).max(20).optional(),
  make: z.string().max(100).optional(),
  model: z.string().max(100).optional(),
  color: z.string().max(50).optional(),
});

export const createBookingSchema = z.object({
  spaceId: z.string().uuid(),
  start: instant,
  end: instant,
  vehicle: vehicleSchema.optional(),
  notes: z.string().max(2000).optional(),
});

export const updateBookingStatusSchema = z.object({
  status: z.enum(BOOKING_STATUSES),
  reason: z.string().max(500).optional(),
});

export const cancelBookingSchema = z.object({
  reason: z.string().max(500).optional(),
});

export const listBookingsSchema = z.object({
  role: z.enum(['renter', 'owner']).default('renter'),
  status: z.enum(BOOKING_STATUSES).optional(),
});

// ── Payments ─────────────────────────────────────────────────────────────

export const createIntentSchema = z.object({
  bookingId: z.string().uuid(),
});

export const confirmIntentSchema = z.object({
  intentId: z.string().min(1).max(255),
});

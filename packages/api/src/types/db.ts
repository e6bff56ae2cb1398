import type { Pool } from 'pg';
import type {
  ActorRole,
  Amenity,
  BookingPaymentStatus,
  BookingStatus,
  BookingType,
  CancelledBy,
  PaymentStatus,
  SpaceStatus,
  SpaceType,
} from '@parkalot/shared';

// ── Row types (match database columns) ─────────────────────────────────────

export interface SpaceRow {
  id: string;
  owner_id: string;
  space_name: string;
  space_type: SpaceType;
  address_line1: string;
  address_line2: string | null;
  city: string;
  postcode: string;
  latitude: string | null; // numeric comes as string from pg
  longitude: string | null;
  description: string | null;
  instructions: string | null;
  amenities: Amenity[]; // jsonb
  photos: string[]; // jsonb
  price_per_hour: string;
  price_per_day: string | null;
  min_booking_hours: number;
  max_booking_days: number;
  status: SpaceStatus;
  rejection_reason: string | null;
  total_earnings: string;
  total_bookings: number;
  average_rating: string | null;
  review_count: number;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
}

export interface SpaceSearchRow extends SpaceRow {
  distance_miles: number | null;
}

export interface BookingRow {
  id: string;
  space_id: string;
  renter_id: string;
  owner_id: string;
  start_time: Date;
  end_time: Date;
  vehicle_reg: string | null;
  vehicle_make: string | null;
  vehicle_model: string | null;
  vehicle_color: string | null;
  total_price: string;
  platform_fee: string;
  owner_payout: string;
  booking_status: BookingStatus;
  payment_status: BookingPaymentStatus;
  provider_payment_id: string | null;
  cancelled_by: CancelledBy | null;
  cancelled_at: Date | null;
  cancellation_reason: string | null;
  check_in_time: Date | null;
  check_out_time: Date | null;
  renter_notes: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface PaymentRow {
  id: string;
  user_id: string;
  booking_type: BookingType;
  booking_id: string;
  amount: string;
  currency: string;
  provider_payment_id: string | null;
  status: PaymentStatus;
  refund_amount: string | null;
  failure_reason: string | null;
  metadata: Record<string, string> | null;
  refunded_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface ReviewRow {
  id: string;
  space_id: string;
  booking_id: string;
  reviewer_id: string;
  rating: number;
  review_text: string | null;
  created_at: Date;
}

// ── Actor ──────────────────────────────────────────────────────────────────

/** Who is acting on a request, as forwarded by the session layer. */
export interface ActorContext {
  userId: string;
  role: ActorRole;
}

// ── Service result ─────────────────────────────────────────────────────────

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_RANGE'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'SPACE_UNAVAILABLE'
  | 'OVERLAP'
  | 'INVALID_TRANSITION'
  | 'HAS_ACTIVE_BOOKINGS'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'PAYMENT_PROVIDER_ERROR'
  | 'INVALID_SIGNATURE'
  | 'SIGNATURE_EXPIRED'
  | 'INTERNAL_ERROR';

export type ServiceResult<T> =
  | { ok: true; data: T }
  | { ok: false; status: number; error: string; code: ErrorCode };

export function ok<T>(data: T): ServiceResult<T> {
  return { ok: true, data };
}

const DEFAULT_CODES: Record<number, ErrorCode> = {
  400: 'VALIDATION_ERROR',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  409: 'CONFLICT',
  502: 'PAYMENT_PROVIDER_ERROR',
};

export function fail<T = never>(status: number, error: string, code?: ErrorCode): ServiceResult<T> {
  return { ok: false, status, error, code: code ?? DEFAULT_CODES[status] ?? 'INTERNAL_ERROR' };
}

// ── Database client type ───────────────────────────────────────────────────

/** A pg Pool or PoolClient — both support .query() */
export type DbClient = Pick<Pool, 'query'>;

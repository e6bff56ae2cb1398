/**
 * Shared TypeScript interfaces for API request/response contracts.
 * Money values are decimal pounds; instants are ISO-8601 strings on the wire.
 */

import type {
  Amenity,
  BookingPaymentStatus,
  BookingStatus,
  BookingType,
  CancelledBy,
  PaymentStatus,
  SpaceStatus,
  SpaceType,
} from './constants.js';

// ── Spaces ───────────────────────────────────────────────────────────────

export interface Space {
  id: string;
  ownerId: string;
  spaceName: string;
  spaceType: SpaceType;
  addressLine1: string;
  addressLine2: string | null;
  city: string;
  postcode: string;
  latitude: number | null;
  longitude: number | null;
  description: string | null;
  instructions: string | null;
  amenities: Amenity[];
  photos: string[];
  pricePerHour: number;
  pricePerDay: number | null;
  minBookingHours: number;
  maxBookingDays: number;
  status: SpaceStatus;
  rejectionReason: string | null;
  totalEarnings: number;
  totalBookings: number;
  averageRating: number | null;
  reviewCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface SpaceSearchResult extends Space {
  distanceMiles: number | null;
}

export interface OwnerEarnings {
  totalEarnings: number;
  totalBookings: number;
  totalSpaces: number;
  pendingPayout: number;
  monthEarnings: number;
}

export interface SpaceEarnings {
  spaceId: string;
  spaceName: string;
  city: string;
  status: SpaceStatus;
  totalEarnings: number;
  totalBookings: number;
  averageRating: number | null;
  monthEarnings: number;
  activeBookings: number;
}

export interface Review {
  id: string;
  spaceId: string;
  bookingId: string;
  reviewerId: string;
  rating: number;
  reviewText: string | null;
  createdAt: Date;
}

/** Paid bookings of one owner grouped into a week, month or year. */
export interface PeriodEarnings {
  /** First day of the period in the reporting time zone, YYYY-MM-DD. */
  periodStart: string;
  /** e.g. `2030 W23`, `Jun 2030`, `2030`. */
  label: string;
  earnings: number;
  bookings: number;
  platformFees: number;
}

// ── Bookings ─────────────────────────────────────────────────────────────

export interface VehicleInfo {
  reg?: string;
  make?: string;
  model?: string;
  color?: string;
}

export interface Booking {
  id: string;
  spaceId: string;
  renterId: string;
  ownerId: string;
  startTime: Date;
  endTime: Date;
  vehicle: VehicleInfo | null;
  totalPrice: number;
  platformFee: number;
  ownerPayout: number;
  bookingStatus: BookingStatus;
  paymentStatus: BookingPaymentStatus;
  providerPaymentId: string | null;
  cancelledBy: CancelledBy | null;
  cancelledAt: Date | null;
  cancellationReason: string | null;
  checkInTime: Date | null;
  checkOutTime: Date | null;
  renterNotes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Pre-booking price preview. `quotedRenterTotal` adds the service fee on top of
 * the subtotal; `bookingTotalPrice` is what a booking created now would store.
 */
export interface PriceQuote {
  hours: number;
  hourlyRate: number;
  dailyRate: number;
  subtotal: number;
  serviceFee: number;
  quotedRenterTotal: number;
  bookingTotalPrice: number;
}

export interface OwnerBookingHistoryEntry extends Booking {
  spaceName: string;
}

export interface CancellationResult {
  booking: Booking;
  refundAmount: number;
  refundEligible: boolean;
}

// ── Payments ─────────────────────────────────────────────────────────────

export interface Payment {
  id: string;
  userId: string;
  bookingType: BookingType;
  bookingId: string;
  amount: number;
  currency: string;
  providerPaymentId: string | null;
  status: PaymentStatus;
  refundAmount: number | null;
  failureReason: string | null;
  metadata: Record<string, string>;
  refundedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface PaymentIntentResponse {
  paymentId: string;
  intentId: string;
  clientSecret: string | null;
  amount: number;
  currency: string;
  status: string;
  testMode: boolean;
}

export interface PaymentStats {
  totalPayments: number;
  totalSpent: number;
  totalRefunded: number;
  successfulPayments: number;
  failedPayments: number;
}

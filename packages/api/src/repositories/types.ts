import type {
  Amenity,
  Booking,
  BookingPaymentStatus,
  BookingStatus,
  BookingType,
  CancelledBy,
  EarningsPeriod,
  OwnerBookingHistoryEntry,
  OwnerEarnings,
  Payment,
  PaymentStats,
  PaymentStatus,
  PeriodEarnings,
  Review,
  Space,
  SpaceEarnings,
  SpaceSearchResult,
  SpaceStatus,
  SpaceType,
  VehicleInfo,
} from '@parkalot/shared';

// ── Spaces ─────────────────────────────────────────────────────────────────

export interface NewSpace {
  ownerId: string;
  spaceName: string;
  spaceType: SpaceType;
  addressLine1: string;
  addressLine2?: string;
  city: string;
  postcode: string;
  latitude?: number;
  longitude?: number;
  description?: string;
  instructions?: string;
  amenities: Amenity[];
  photos: string[];
  pricePerHour: number;
  pricePerDay?: number;
  minBookingHours: number;
  maxBookingDays: number;
}

export type SpacePatch = Partial<Omit<NewSpace, 'ownerId'>> & { status?: SpaceStatus };

export interface SpaceSearchFilters {
  city?: string;
  postcode?: string;
  maxPricePerHour?: number;
  spaceType?: SpaceType;
  amenities?: Amenity[];
  latitude?: number;
  longitude?: number;
  radius: number;
  limit: number;
  offset: number;
}

/** Period totals as stored; the service adds the display label. */
export type PeriodTotals = Omit<PeriodEarnings, 'label'>;

export interface SpaceRepository {
  insert(space: NewSpace): Promise<Space>;
  update(spaceId: string, patch: SpacePatch): Promise<Space | null>;
  /** Non-deleted space by id. */
  findById(spaceId: string): Promise<Space | null>;
  /** Same as findById, locking the row for the rest of the transaction. */
  findByIdForUpdate(spaceId: string): Promise<Space | null>;
  listByOwner(ownerId: string): Promise<Space[]>;
  search(filters: SpaceSearchFilters): Promise<SpaceSearchResult[]>;
  ownerEarnings(ownerId: string, timezone: string): Promise<OwnerEarnings>;
  earningsBySpace(ownerId: string, timezone: string): Promise<SpaceEarnings[]>;
  /** The latest `limit` periods with paid bookings, oldest first. */
  earningsByPeriod(ownerId: string, period: EarningsPeriod, timezone: string, limit: number): Promise<PeriodTotals[]>;
  /** Recompute average_rating and review_count from the space's reviews. */
  updateRating(spaceId: string): Promise<Space | null>;
  creditCompletedBooking(spaceId: string, ownerPayout: number): Promise<void>;
  setStatus(spaceId: string, status: SpaceStatus, rejectionReason: string | null): Promise<Space | null>;
  /** Hard delete; only valid while no booking references the space. */
  remove(spaceId: string): Promise<boolean>;
  softDelete(spaceId: string): Promise<boolean>;
}

// ── Bookings ───────────────────────────────────────────────────────────────

export interface NewBooking {
  spaceId: string;
  renterId: string;
  ownerId: string;
  startTime: Date;
  endTime: Date;
  vehicle: VehicleInfo | null;
  totalPrice: number;
  platformFee: number;
  ownerPayout: number;
  renterNotes: string | null;
}

/** Columns written together with a booking status change. */
export interface StatusChange {
  status: BookingStatus;
  checkInTime?: Date;
  checkOutTime?: Date;
  cancelledBy?: CancelledBy;
  cancelledAt?: Date;
  cancellationReason?: string | null;
}

export interface BookingRepository {
  insert(booking: NewBooking): Promise<Booking>;
  findById(bookingId: string): Promise<Booking | null>;
  findByIdForUpdate(bookingId: string): Promise<Booking | null>;
  listByRenter(renterId: string, status?: BookingStatus): Promise<Booking[]>;
  listByOwner(ownerId: string, status?: BookingStatus): Promise<Booking[]>;
  /** Every booking on the owner's spaces, newest first, with the space name. */
  listOwnerHistory(ownerId: string, limit: number, offset: number): Promise<OwnerBookingHistoryEntry[]>;
  /** Bookings still blocking the space's calendar, optionally ending after `from`. */
  listBySpace(spaceId: string, from?: Date): Promise<Booking[]>;
  /** True when a non-cancelled, non-completed booking overlaps [start, end). */
  hasOverlap(spaceId: string, start: Date, end: Date, excludeBookingId?: string): Promise<boolean>;
  countBySpace(spaceId: string, statuses?: readonly BookingStatus[]): Promise<number>;
  countUpcoming(userId: string, role: 'renter' | 'owner', now: Date): Promise<number>;
  applyStatus(bookingId: string, change: StatusChange): Promise<Booking | null>;
  /**
   * Set the payment status. `paid` also confirms a pending booking.
   * Returns null when no row matched: a missing booking, an intent mismatch
   * or a current status `status` may not follow.
   */
  setPaymentStatus(
    bookingId: string,
    status: BookingPaymentStatus,
    providerPaymentId?: string,
  ): Promise<Booking | null>;
  setProviderPaymentId(bookingId: string, providerPaymentId: string): Promise<void>;
}

// ── Reviews ────────────────────────────────────────────────────────────────

export interface NewReview {
  spaceId: string;
  bookingId: string;
  reviewerId: string;
  rating: number;
  reviewText: string | null;
}

export interface ReviewRepository {
  insert(review: NewReview): Promise<Review>;
  findByBooking(bookingId: string): Promise<Review | null>;
  listBySpace(spaceId: string, limit: number, offset: number): Promise<Review[]>;
}

// ── Payments ───────────────────────────────────────────────────────────────

export interface NewPayment {
  userId: string;
  bookingType: BookingType;
  bookingId: string;
  amount: number;
  currency: string;
  providerPaymentId: string;
  status: PaymentStatus;
  metadata: Record<string, string>;
}

export interface PaymentUpdate {
  failureReason?: string;
  refundAmount?: number;
}

export interface PaymentStatusUpdate {
  payment: Payment | null;
  changed: boolean;
  /** Status before this call; null when no payment carries the intent. */
  previousStatus: PaymentStatus | null;
}

export interface PaymentRepository {
  insert(payment: NewPayment): Promise<Payment>;
  findById(paymentId: string): Promise<Payment | null>;
  findByIntentId(intentId: string): Promise<Payment | null>;
  listByUser(userId: string, limit: number, offset: number): Promise<Payment[]>;
  listByBooking(bookingType: BookingType, bookingId: string): Promise<Payment[]>;
  /**
   * Update by provider intent id. Rows already in `status`, rows `status`
   * may not follow, and refund amounts lower than the one stored are left
   * alone and report `changed: false`.
   */
  updateStatusByIntent(intentId: string, status: PaymentStatus, extra?: PaymentUpdate): Promise<PaymentStatusUpdate>;
  recordRefund(paymentId: string, refundAmount: number, status: 'refunded' | 'partial_refund'): Promise<Payment | null>;
  /**
   * Garage and airport bookings only carry the columns reconciliation needs.
   * A booking already refunded is left alone.
   */
  markExternalBookingPaid(bookingType: Exclude<BookingType, 'customer_space'>, bookingId: string, intentId: string): Promise<boolean>;
  userStats(userId: string): Promise<PaymentStats>;
}

// ── Store ──────────────────────────────────────────────────────────────────

export interface Repositories {
  spaces: SpaceRepository;
  bookings: BookingRepository;
  payments: PaymentRepository;
  reviews: ReviewRepository;
}

export interface Store extends Repositories {
  /**
   * Run `fn` inside one database transaction. When `lockKey` is given, writers
   * sharing that key are serialized until the transaction ends.
   */
  transaction<T>(fn: (tx: Repositories) => Promise<T>, lockKey?: string): Promise<T>;
}

import type {
  Booking,
  BookingPaymentStatus,
  BookingStatus,
  CancellationResult,
  OwnerBookingHistoryEntry,
  PriceQuote,
  VehicleInfo,
} from '@parkalot/shared';
import type { Repositories, StatusChange, Store } from '../repositories/types.js';
import type { ActorContext, ServiceResult } from '../types/db.js';
import { ok, fail } from '../types/db.js';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError, toServiceFailure } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { buildQuote, computeDuration, computePrice, computeRefund, splitPlatformFee } from './pricing.js';
import { BOOKING_PAYMENT_STATUS_SOURCES, canTransition } from './status.js';
import { startsInPast } from './time-range.js';

export interface CreateBookingInput {
  spaceId: string;
  start: Date;
  end: Date;
  vehicle?: VehicleInfo;
  notes?: string;
}

export interface BookingServiceDeps {
  store: Store;
  now?: () => Date;
}

function isParticipant(booking: Booking, actor: ActorContext): boolean {
  return actor.role === 'admin' || booking.renterId === actor.userId || booking.ownerId === actor.userId;
}

async function loadForActor(tx: Repositories, bookingId: string, actor: ActorContext): Promise<Booking> {
  const booking = await tx.bookings.findByIdForUpdate(bookingId);
  if (!booking) throw new NotFoundError('Booking');
  if (!isParticipant(booking, actor)) {
    throw new ForbiddenError('You are not a participant in this booking');
  }
  return booking;
}

/**
 * Record a payment outcome on a booking inside `tx`. `paid` confirms a
 * pending booking and leaves any later status alone. When
 * `providerPaymentId` is given the booking must carry that intent or none.
 * Setting the status a booking already has is a no-op; a refunded booking
 * never goes back to paid.
 */
export async function setBookingPaymentStatus(
  tx: Repositories,
  bookingId: string,
  status: BookingPaymentStatus,
  providerPaymentId?: string,
): Promise<ServiceResult<Booking>> {
  const current = await tx.bookings.findByIdForUpdate(bookingId);
  if (!current) return fail(404, 'Booking not found');

  if (providerPaymentId && current.providerPaymentId && current.providerPaymentId !== providerPaymentId) {
    logger.warn(
      { bookingId, providerPaymentId, storedIntent: current.providerPaymentId },
      'Payment intent does not match booking',
    );
    return fail(409, 'Payment intent does not match booking');
  }
  if (current.paymentStatus === status) return ok(current);
  if (!BOOKING_PAYMENT_STATUS_SOURCES[status].includes(current.paymentStatus)) {
    return fail(409, `Cannot change payment from ${current.paymentStatus} to ${status}`, 'INVALID_TRANSITION');
  }

  const updated = await tx.bookings.setPaymentStatus(bookingId, status, providerPaymentId);
  if (!updated) return fail(409, 'Booking payment changed concurrently');
  return ok(updated);
}

export function createBookingService({ store, now = () => new Date() }: BookingServiceDeps) {
  /** Columns that accompany a move into `status`. */
  function statusChange(booking: Booking, status: BookingStatus, actor: ActorContext, reason?: string): StatusChange {
    const at = now();
    switch (status) {
      case 'active':
        return { status, checkInTime: at };
      case 'completed':
        return { status, checkOutTime: at };
      case 'cancelled':
        return {
          status,
          cancelledAt: at,
          cancellationReason: reason ?? null,
          cancelledBy: actor.role === 'admin' ? 'system' : booking.renterId === actor.userId ? 'renter' : 'owner',
        };
      default:
        return { status };
    }
  }

  async function transition(
    tx: Repositories,
    booking: Booking,
    status: BookingStatus,
    actor: ActorContext,
    reason?: string,
  ): Promise<Booking> {
    if (!canTransition(booking.bookingStatus, status, actor.role)) {
      throw new ConflictError(
        `Cannot change booking from ${booking.bookingStatus} to ${status}`,
        'INVALID_TRANSITION',
      );
    }

    const updated = await tx.bookings.applyStatus(booking.id, statusChange(booking, status, actor, reason));
    if (!updated) throw new NotFoundError('Booking');

    if (status === 'completed') {
      await tx.spaces.creditCompletedBooking(booking.spaceId, booking.ownerPayout);
    }
    return updated;
  }

  // ── Creation ─────────────────────────────────────────────────────────────

  /**
   * Create a pending booking. Space status and availability are re-checked
   * inside the transaction, which holds an advisory lock on the space so two
   * overlapping requests cannot both pass the check.
   */
  async function create(actor: ActorContext, input: CreateBookingInput): Promise<ServiceResult<Booking>> {
    const { spaceId, start, end } = input;

    try {
      const hours = computeDuration(start, end);
      if (startsInPast({ start, end }, now())) {
        return fail(400, 'Booking cannot start in the past');
      }

      const booking = await store.transaction(async (tx) => {
        const space = await tx.spaces.findByIdForUpdate(spaceId);
        if (!space) throw new NotFoundError('Space');
        if (space.status !== 'active') {
          throw new ConflictError('Space is not available for booking', 'SPACE_UNAVAILABLE');
        }
        if (space.ownerId === actor.userId) {
          throw new ConflictError('You cannot book your own space');
        }
        if (hours < space.minBookingHours) {
          throw new ValidationError(`Minimum booking is ${space.minBookingHours} hour(s)`);
        }
        if (hours > space.maxBookingDays * 24) {
          throw new ValidationError(`Maximum booking is ${space.maxBookingDays} day(s)`);
        }
        if (await tx.bookings.hasOverlap(spaceId, start, end)) {
          throw new ConflictError('Space is already booked for the selected time', 'OVERLAP');
        }

        const totalPrice = computePrice(hours, space.pricePerHour, space.pricePerDay ?? 0);
        const { platformFee, ownerPayout } = splitPlatformFee(totalPrice);

        return tx.bookings.insert({
          spaceId,
          renterId: actor.userId,
          ownerId: space.ownerId,
          startTime: start,
          endTime: end,
          vehicle: input.vehicle ?? null,
          totalPrice,
          platformFee,
          ownerPayout,
          renterNotes: input.notes ?? null,
        });
      }, spaceId);

      logger.info({ bookingId: booking.id, spaceId, totalPrice: booking.totalPrice }, 'Booking created');
      return ok(booking);
    } catch (err) {
      return toServiceFailure(err, 'Booking creation error');
    }
  }

  // ── Status ───────────────────────────────────────────────────────────────

  async function updateStatus(
    actor: ActorContext,
    bookingId: string,
    status: BookingStatus,
    reason?: string,
  ): Promise<ServiceResult<Booking>> {
    try {
      const booking = await store.transaction(async (tx) => {
        const current = await loadForActor(tx, bookingId, actor);
        return transition(tx, current, status, actor, reason);
      });

      logger.info({ bookingId, status, actor: actor.userId }, 'Booking status changed');
      return ok(booking);
    } catch (err) {
      return toServiceFailure(err, 'Booking status update error');
    }
  }

  /**
   * Cancel a booking and work out the refund it is owed. The refund itself is
   * issued by the payment service once this has committed.
   */
  async function cancel(actor: ActorContext, bookingId: string, reason?: string): Promise<ServiceResult<CancellationResult>> {
    try {
      const result = await store.transaction(async (tx) => {
        const current = await loadForActor(tx, bookingId, actor);
        if (current.bookingStatus === 'cancelled' || current.bookingStatus === 'completed') {
          throw new ConflictError(`Booking is already ${current.bookingStatus}`, 'INVALID_TRANSITION');
        }

        const refund = computeRefund(current.totalPrice, current.paymentStatus, current.startTime, now());
        const booking = await transition(tx, current, 'cancelled', actor, reason);
        return { booking, refundAmount: refund.refundAmount, refundEligible: refund.eligible };
      });

      logger.info(
        { bookingId, refundAmount: result.refundAmount, cancelledBy: result.booking.cancelledBy },
        'Booking cancelled',
      );
      return ok(result);
    } catch (err) {
      return toServiceFailure(err, 'Booking cancellation error');
    }
  }

  async function updatePaymentStatus(
    bookingId: string,
    status: BookingPaymentStatus,
    providerPaymentId?: string,
  ): Promise<ServiceResult<Booking>> {
    try {
      return await store.transaction((tx) => setBookingPaymentStatus(tx, bookingId, status, providerPaymentId), bookingId);
    } catch (err) {
      return toServiceFailure(err, 'Booking payment status error');
    }
  }

  // ── Reads ────────────────────────────────────────────────────────────────

  async function get(actor: ActorContext, bookingId: string): Promise<ServiceResult<Booking>> {
    try {
      const booking = await store.bookings.findById(bookingId);
      if (!booking) return fail(404, 'Booking not found');
      if (!isParticipant(booking, actor)) {
        return fail(403, 'You are not a participant in this booking');
      }
      return ok(booking);
    } catch (err) {
      return toServiceFailure(err, 'Booking lookup error');
    }
  }

  async function list(
    actor: ActorContext,
    role: 'renter' | 'owner',
    status?: BookingStatus,
  ): Promise<ServiceResult<Booking[]>> {
    try {
      const bookings =
        role === 'owner'
          ? await store.bookings.listByOwner(actor.userId, status)
          : await store.bookings.listByRenter(actor.userId, status);
      return ok(bookings);
    } catch (err) {
      return toServiceFailure(err, 'Booking list error');
    }
  }

  /** Every booking on the owner's spaces, newest first, each with its space name. */
  async function ownerHistory(
    actor: ActorContext,
    limit: number,
    offset: number,
  ): Promise<ServiceResult<OwnerBookingHistoryEntry[]>> {
    try {
      return ok(await store.bookings.listOwnerHistory(actor.userId, limit, offset));
    } catch (err) {
      return toServiceFailure(err, 'Owner booking history error');
    }
  }

  async function upcomingCount(actor: ActorContext, role: 'renter' | 'owner'): Promise<ServiceResult<{ count: number }>> {
    try {
      const count = await store.bookings.countUpcoming(actor.userId, role, now());
      return ok({ count });
    } catch (err) {
      return toServiceFailure(err, 'Upcoming booking count error');
    }
  }

  /** Occupied ranges on a space from now on, for calendar display. */
  async function schedule(spaceId: string): Promise<ServiceResult<Array<{ start: Date; end: Date }>>> {
    try {
      const space = await store.spaces.findById(spaceId);
      if (!space) return fail(404, 'Space not found');
      const bookings = await store.bookings.listBySpace(spaceId, now());
      return ok(bookings.map((b) => ({ start: b.startTime, end: b.endTime })));
    } catch (err) {
      return toServiceFailure(err, 'Space schedule error');
    }
  }

  // ── Pricing & availability ───────────────────────────────────────────────

  async function calculatePrice(spaceId: string, start: Date, end: Date): Promise<ServiceResult<PriceQuote>> {
    try {
      const hours = computeDuration(start, end);
      const space = await store.spaces.findById(spaceId);
      if (!space) return fail(404, 'Space not found');
      return ok(buildQuote(hours, space.pricePerHour, space.pricePerDay ?? 0));
    } catch (err) {
      return toServiceFailure(err, 'Price calculation error');
    }
  }

  async function isAvailable(spaceId: string, start: Date, end: Date): Promise<ServiceResult<{ available: boolean }>> {
    try {
      computeDuration(start, end);
      const space = await store.spaces.findById(spaceId);
      if (!space) return fail(404, 'Space not found');
      const overlap = await store.bookings.hasOverlap(spaceId, start, end);
      return ok({ available: !overlap });
    } catch (err) {
      return toServiceFailure(err, 'Availability check error');
    }
  }

  return {
    create,
    updateStatus,
    cancel,
    updatePaymentStatus,
    get,
    list,
    ownerHistory,
    upcomingCount,
    schedule,
    calculatePrice,
    isAvailable,
  };
}

export type BookingService = ReturnType<typeof createBookingService>;

import type { z } from 'zod';
import {
  DEFAULT_MAX_BOOKING_DAYS,
  DEFAULT_MIN_BOOKING_HOURS,
  EARNINGS_PERIOD_LIMIT,
  SEARCH_DEFAULT_RADIUS_MILES,
  type BookingStatus,
  type EarningsPeriod,
  type OwnerEarnings,
  type PeriodEarnings,
  type Review,
  type Space,
  type SpaceEarnings,
  type SpaceSearchResult,
  type createReviewSchema,
  type createSpaceSchema,
  type moderateSpaceSchema,
  type searchSpacesSchema,
  type updateSpaceSchema,
} from '@parkalot/shared';
import type { Store } from '../repositories/types.js';
import type { ActorContext, ServiceResult } from '../types/db.js';
import { ok, fail } from '../types/db.js';
import { ConflictError, ForbiddenError, NotFoundError, toServiceFailure } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { periodLabel } from './periods.js';

export type CreateSpaceInput = z.infer<typeof createSpaceSchema>;
export type UpdateSpaceInput = z.infer<typeof updateSpaceSchema>;
export type SearchSpacesInput = z.infer<typeof searchSpacesSchema>;
export type ModerateSpaceInput = z.infer<typeof moderateSpaceSchema>;
export type CreateReviewInput = z.infer<typeof createReviewSchema>;

/** Bookings that keep a space from being deleted. */
const UNFINISHED_STATUSES: readonly BookingStatus[] = ['pending', 'confirmed', 'active'];

export interface SpaceServiceDeps {
  store: Store;
  timezone: string;
}

export interface ReviewResult {
  review: Review;
  space: Space;
}

export interface DeleteSpaceResult {
  deleted: true;
  /** False when the row was removed outright; true when kept for its booking history. */
  soft: boolean;
}

export function createSpaceService({ store, timezone }: SpaceServiceDeps) {
  async function create(actor: ActorContext, input: CreateSpaceInput): Promise<ServiceResult<Space>> {
    try {
      const space = await store.spaces.insert({
        ...input,
        ownerId: actor.userId,
        minBookingHours: input.minBookingHours ?? DEFAULT_MIN_BOOKING_HOURS,
        maxBookingDays: input.maxBookingDays ?? DEFAULT_MAX_BOOKING_DAYS,
      });
      logger.info({ spaceId: space.id, ownerId: actor.userId }, 'Space listed');
      return ok(space);
    } catch (err) {
      return toServiceFailure(err, 'Space creation error');
    }
  }

  async function update(actor: ActorContext, spaceId: string, patch: UpdateSpaceInput): Promise<ServiceResult<Space>> {
    if (Object.values(patch).every((v) => v === undefined)) {
      return fail(400, 'No fields to update');
    }

    try {
      const space = await store.transaction(async (tx) => {
        const current = await tx.spaces.findByIdForUpdate(spaceId);
        if (!current || current.ownerId !== actor.userId) throw new NotFoundError('Space');

        // Owners may pause and resume an approved listing, not approve it themselves.
        if (patch.status && current.status !== 'active' && current.status !== 'paused') {
          throw new ConflictError(`Space is ${current.status} and awaiting moderation`);
        }

        const updated = await tx.spaces.update(spaceId, patch);
        if (!updated) throw new NotFoundError('Space');
        return updated;
      });
      return ok(space);
    } catch (err) {
      return toServiceFailure(err, 'Space update error');
    }
  }

  /** Listings that are not active are only visible to their owner and admins. */
  async function get(spaceId: string, actor?: ActorContext): Promise<ServiceResult<Space>> {
    try {
      const space = await store.spaces.findById(spaceId);
      const visible =
        space !== null &&
        (space.status === 'active' || actor?.role === 'admin' || actor?.userId === space.ownerId);
      if (!space || !visible) return fail(404, 'Space not found');
      return ok(space);
    } catch (err) {
      return toServiceFailure(err, 'Space lookup error');
    }
  }

  async function listMine(actor: ActorContext): Promise<ServiceResult<Space[]>> {
    try {
      return ok(await store.spaces.listByOwner(actor.userId));
    } catch (err) {
      return toServiceFailure(err, 'Space list error');
    }
  }

  async function search(filters: SearchSpacesInput): Promise<ServiceResult<SpaceSearchResult[]>> {
    try {
      const results = await store.spaces.search({
        ...filters,
        radius: filters.radius ?? SEARCH_DEFAULT_RADIUS_MILES,
      });
      return ok(results);
    } catch (err) {
      return toServiceFailure(err, 'Space search error');
    }
  }

  async function getOwnerEarnings(actor: ActorContext): Promise<ServiceResult<OwnerEarnings>> {
    try {
      return ok(await store.spaces.ownerEarnings(actor.userId, timezone));
    } catch (err) {
      return toServiceFailure(err, 'Owner earnings error');
    }
  }

  async function getEarningsBySpace(actor: ActorContext): Promise<ServiceResult<SpaceEarnings[]>> {
    try {
      return ok(await store.spaces.earningsBySpace(actor.userId, timezone));
    } catch (err) {
      return toServiceFailure(err, 'Space earnings error');
    }
  }

  /** Paid earnings per week, month or year, oldest first, covering the latest periods with any. */
  async function getEarningsByPeriod(
    actor: ActorContext,
    period: EarningsPeriod,
  ): Promise<ServiceResult<PeriodEarnings[]>> {
    try {
      const totals = await store.spaces.earningsByPeriod(actor.userId, period, timezone, EARNINGS_PERIOD_LIMIT);
      return ok(totals.map((t) => ({ ...t, label: periodLabel(period, t.periodStart) })));
    } catch (err) {
      return toServiceFailure(err, 'Period earnings error');
    }
  }

  /**
   * Rate a space after a completed stay. One review per booking, written by
   * its renter; the space's average rating and review count are recomputed
   * in the same transaction.
   */
  async function review(
    actor: ActorContext,
    spaceId: string,
    input: CreateReviewInput,
  ): Promise<ServiceResult<ReviewResult>> {
    try {
      const result = await store.transaction(async (tx) => {
        const booking = await tx.bookings.findById(input.bookingId);
        if (!booking || booking.spaceId !== spaceId) throw new NotFoundError('Booking');
        if (booking.renterId !== actor.userId) throw new ForbiddenError('Only the renter can review this booking');
        if (booking.bookingStatus !== 'completed') {
          throw new ConflictError('Only completed bookings can be reviewed', 'INVALID_TRANSITION');
        }
        if (await tx.reviews.findByBooking(booking.id)) {
          throw new ConflictError('This booking has already been reviewed');
        }

        const created = await tx.reviews.insert({
          spaceId,
          bookingId: booking.id,
          reviewerId: actor.userId,
          rating: input.rating,
          reviewText: input.reviewText ?? null,
        });
        const space = await tx.spaces.updateRating(spaceId);
        if (!space) throw new NotFoundError('Space');
        return { review: created, space };
      }, spaceId);

      logger.info(
        { spaceId, bookingId: input.bookingId, rating: input.rating, averageRating: result.space.averageRating },
        'Space reviewed',
      );
      return ok(result);
    } catch (err) {
      return toServiceFailure(err, 'Review error');
    }
  }

  async function listReviews(spaceId: string, limit: number, offset: number): Promise<ServiceResult<Review[]>> {
    try {
      const space = await store.spaces.findById(spaceId);
      if (!space) return fail(404, 'Space not found');
      return ok(await store.reviews.listBySpace(spaceId, limit, offset));
    } catch (err) {
      return toServiceFailure(err, 'Review list error');
    }
  }

  /**
   * Delete a listing. Refused while any booking on it is unfinished. A space
   * with booking history is soft-deleted so those bookings keep their space.
   */
  async function remove(actor: ActorContext, spaceId: string): Promise<ServiceResult<DeleteSpaceResult>> {
    try {
      const result = await store.transaction(async (tx) => {
        const space = await tx.spaces.findByIdForUpdate(spaceId);
        if (!space || (space.ownerId !== actor.userId && actor.role !== 'admin')) {
          throw new NotFoundError('Space');
        }

        const unfinished = await tx.bookings.countBySpace(spaceId, UNFINISHED_STATUSES);
        if (unfinished > 0) {
          throw new ConflictError('Cannot delete a space with active bookings', 'HAS_ACTIVE_BOOKINGS');
        }

        const history = await tx.bookings.countBySpace(spaceId);
        if (history === 0) {
          await tx.spaces.remove(spaceId);
          return { deleted: true as const, soft: false };
        }
        await tx.spaces.softDelete(spaceId);
        return { deleted: true as const, soft: true };
      }, spaceId);

      logger.info({ spaceId, soft: result.soft }, 'Space deleted');
      return ok(result);
    } catch (err) {
      return toServiceFailure(err, 'Space deletion error');
    }
  }

  async function moderate(
    actor: ActorContext,
    spaceId: string,
    input: ModerateSpaceInput,
  ): Promise<ServiceResult<Space>> {
    if (actor.role !== 'admin') {
      return fail(403, 'Only admins can moderate spaces');
    }

    try {
      const rejectionReason = input.status === 'rejected' ? (input.reason ?? null) : null;
      const space = await store.spaces.setStatus(spaceId, input.status, rejectionReason);
      if (!space) return fail(404, 'Space not found');
      logger.info({ spaceId, status: input.status, admin: actor.userId }, 'Space moderated');
      return ok(space);
    } catch (err) {
      return toServiceFailure(err, 'Space moderation error');
    }
  }

  return {
    create,
    update,
    get,
    listMine,
    search,
    getOwnerEarnings,
    getEarningsBySpace,
    getEarningsByPeriod,
    review,
    listReviews,
    delete: remove,
    moderate,
  };
}

export type SpaceService = ReturnType<typeof createSpaceService>;

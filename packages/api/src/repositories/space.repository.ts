import type { EarningsPeriod, OwnerEarnings, Space, SpaceEarnings, SpaceSearchResult, SpaceStatus } from '@parkalot/shared';
import type { DbClient, SpaceRow, SpaceSearchRow } from '../types/db.js';
import type { NewSpace, PeriodTotals, SpacePatch, SpaceRepository, SpaceSearchFilters } from './types.js';
import { EARTH_RADIUS_MILES } from '../services/geo.js';

function toNumberOrNull(value: string | null): number | null {
  return value === null ? null : Number(value);
}

export function toSpace(row: SpaceRow): Space {
  return {
    id: row.id,
    ownerId: row.owner_id,
    spaceName: row.space_name,
    spaceType: row.space_type,
    addressLine1: row.address_line1,
    addressLine2: row.address_line2,
    city: row.city,
    postcode: row.postcode,
    latitude: toNumberOrNull(row.latitude),
    longitude: toNumberOrNull(row.longitude),
    description: row.description,
    instructions: row.instructions,
    amenities: row.amenities ?? [],
    photos: row.photos ?? [],
    pricePerHour: Number(row.price_per_hour),
    pricePerDay: toNumberOrNull(row.price_per_day),
    minBookingHours: row.min_booking_hours,
    maxBookingDays: row.max_booking_days,
    status: row.status,
    rejectionReason: row.rejection_reason,
    totalEarnings: Number(row.total_earnings),
    totalBookings: row.total_bookings,
    averageRating: toNumberOrNull(row.average_rating),
    reviewCount: row.review_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/** Escape LIKE wildcards so user input matches literally. */
function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/** Patch field → column. jsonb columns are serialized before binding. */
const PATCH_COLUMNS: Record<keyof SpacePatch, string> = {
  spaceName: 'space_name',
  spaceType: 'space_type',
  addressLine1: 'address_line1',
  addressLine2: 'address_line2',
  city: 'city',
  postcode: 'postcode',
  latitude: 'latitude',
  longitude: 'longitude',
  description: 'description',
  instructions: 'instructions',
  amenities: 'amenities',
  photos: 'photos',
  pricePerHour: 'price_per_hour',
  pricePerDay: 'price_per_day',
  minBookingHours: 'min_booking_hours',
  maxBookingDays: 'max_booking_days',
  status: 'status',
};

function isPatchKey(key: string): key is keyof SpacePatch {
  return Object.prototype.hasOwnProperty.call(PATCH_COLUMNS, key);
}

export function createSpaceRepository(db: DbClient): SpaceRepository {
  async function findOne(sql: string, spaceId: string): Promise<Space | null> {
    const result = await db.query<SpaceRow>(sql, [spaceId]);
    const row = result.rows[0];
    return row ? toSpace(row) : null;
  }

  const findById = (spaceId: string): Promise<Space | null> =>
    findOne('SELECT * FROM spaces WHERE id = $1 AND deleted_at IS NULL', spaceId);

  return {
    async insert(space: NewSpace): Promise<Space> {
      const result = await db.query<SpaceRow>(
        `INSERT INTO spaces (
           owner_id, space_name, space_type, address_line1, address_line2,
           city, postcode, latitude, longitude, description, instructions,
           amenities, photos, price_per_hour, price_per_day,
           min_booking_hours, max_booking_days, status
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12::jsonb, $13::jsonb, $14, $15, $16, $17, 'pending')
         RETURNING *`,
        [
          space.ownerId,
          space.spaceName,
          space.spaceType,
          space.addressLine1,
          space.addressLine2 ?? null,
          space.city,
          space.postcode,
          space.latitude ?? null,
          space.longitude ?? null,
          space.description ?? null,
          space.instructions ?? null,
          JSON.stringify(space.amenities),
          JSON.stringify(space.photos),
          space.pricePerHour,
          space.pricePerDay ?? null,
          space.minBookingHours,
          space.maxBookingDays,
        ],
      );
      return toSpace(result.rows[0]);
    },

    async update(spaceId: string, patch: SpacePatch): Promise<Space | null> {
      const sets: string[] = [];
      const params: unknown[] = [spaceId];

      for (const [key, value] of Object.entries(patch)) {
        if (!isPatchKey(key) || value === undefined) continue;
        const column = PATCH_COLUMNS[key];
        const isJson = key === 'amenities' || key === 'photos';
        params.push(isJson ? JSON.stringify(value) : value);
        sets.push(`${column} = $${params.length}${isJson ? '::jsonb' : ''}`);
      }

      if (sets.length === 0) {
        return findById(spaceId);
      }

      const result = await db.query<SpaceRow>(
        `UPDATE spaces SET ${sets.join(', ')}, updated_at = NOW()
         WHERE id = $1 AND deleted_at IS NULL
         RETURNING *`,
        params,
      );
      const row = result.rows[0];
      return row ? toSpace(row) : null;
    },

    findById,

    findByIdForUpdate(spaceId: string): Promise<Space | null> {
      return findOne('SELECT * FROM spaces WHERE id = $1 AND deleted_at IS NULL FOR UPDATE', spaceId);
    },

    async listByOwner(ownerId: string): Promise<Space[]> {
      const result = await db.query<SpaceRow>(
        `SELECT * FROM spaces
         WHERE owner_id = $1 AND deleted_at IS NULL
         ORDER BY created_at DESC`,
        [ownerId],
      );
      return result.rows.map(toSpace);
    },

    async search(filters: SpaceSearchFilters): Promise<SpaceSearchResult[]> {
      const conditions = [`s.status = 'active'`, 's.deleted_at IS NULL'];
      const params: unknown[] = [];
      const bind = (value: unknown): string => {
        params.push(value);
        return `$${params.length}`;
      };

      if (filters.city) {
        conditions.push(`s.city ILIKE ${bind(`%${escapeLike(filters.city)}%`)}`);
      }
      if (filters.postcode) {
        conditions.push(`s.postcode ILIKE ${bind(`${escapeLike(filters.postcode)}%`)}`);
      }
      if (filters.maxPricePerHour !== undefined) {
        conditions.push(`s.price_per_hour <= ${bind(filters.maxPricePerHour)}`);
      }
      if (filters.spaceType) {
        conditions.push(`s.space_type = ${bind(filters.spaceType)}`);
      }
      if (filters.amenities && filters.amenities.length > 0) {
        conditions.push(`s.amenities @> ${bind(JSON.stringify(filters.amenities))}::jsonb`);
      }

      let distanceSql = 'NULL::float8';
      let orderBy = 's.average_rating DESC NULLS LAST, s.total_bookings DESC, s.created_at DESC';

      if (filters.latitude !== undefined && filters.longitude !== undefined) {
        const lat = bind(filters.latitude);
        const lng = bind(filters.longitude);
        distanceSql = `(${EARTH_RADIUS_MILES} * acos(LEAST(1, GREATEST(-1,
            cos(radians(${lat}::float8)) * cos(radians(s.latitude::float8))
            * cos(radians(s.longitude::float8) - radians(${lng}::float8))
            + sin(radians(${lat}::float8)) * sin(radians(s.latitude::float8))
          ))))`;
        conditions.push('s.latitude IS NOT NULL', 's.longitude IS NOT NULL');
        conditions.push(`${distanceSql} <= ${bind(filters.radius)}`);
        orderBy = 'distance_miles ASC';
      }

      const limit = bind(filters.limit);
      const offset = bind(filters.offset);

      const result = await db.query<SpaceSearchRow>(
        `SELECT s.*, ${distanceSql} AS distance_miles
         FROM spaces s
         WHERE ${conditions.join(' AND ')}
         ORDER BY ${orderBy}
         LIMIT ${limit} OFFSET ${offset}`,
        params,
      );

      return result.rows.map((row) => ({ ...toSpace(row), distanceMiles: row.distance_miles }));
    },

    async ownerEarnings(ownerId: string, timezone: string): Promise<OwnerEarnings> {
      const result = await db.query<{
        total_earnings: string;
        total_bookings: number;
        total_spaces: number;
        pending_payout: string;
        month_earnings: string;
      }>(
        `SELECT
          (SELECT COALESCE(SUM(total_earnings), 0) FROM spaces WHERE owner_id = $1) AS total_earnings,
          (SELECT COALESCE(SUM(total_bookings), 0)::int FROM spaces WHERE owner_id = $1) AS total_bookings,
          (SELECT COUNT(*)::int FROM spaces WHERE owner_id = $1 AND deleted_at IS NULL) AS total_spaces,
          (SELECT COALESCE(SUM(owner_payout), 0) FROM space_bookings
           WHERE owner_id = $1 AND payment_status = 'paid'
             AND booking_status IN ('completed', 'active')
          ) AS pending_payout,
          (SELECT COALESCE(SUM(owner_payout), 0) FROM space_bookings
           WHERE owner_id = $1 AND payment_status = 'paid'
             AND DATE_TRUNC('month', created_at AT TIME ZONE $2) = DATE_TRUNC('month', NOW() AT TIME ZONE $2)
          ) AS month_earnings`,
        [ownerId, timezone],
      );

      const row = result.rows[0];
      return {
        totalEarnings: Number(row.total_earnings),
        totalBookings: row.total_bookings,
        totalSpaces: row.total_spaces,
        pendingPayout: Number(row.pending_payout),
        monthEarnings: Number(row.month_earnings),
      };
    },

    async earningsBySpace(ownerId: string, timezone: string): Promise<SpaceEarnings[]> {
      const result = await db.query<{
        id: string;
        space_name: string;
        city: string;
        status: SpaceStatus;
        total_earnings: string;
        total_bookings: number;
        average_rating: string | null;
        month_earnings: string;
        active_bookings: number;
      }>(
        `SELECT
          s.id, s.space_name, s.city, s.status, s.total_earnings, s.total_bookings, s.average_rating,
          (SELECT COALESCE(SUM(b.owner_payout), 0) FROM space_bookings b
           WHERE b.space_id = s.id AND b.payment_status = 'paid'
             AND DATE_TRUNC('month', b.created_at AT TIME ZONE $2) = DATE_TRUNC('month', NOW() AT TIME ZONE $2)
          ) AS month_earnings,
          (SELECT COUNT(*)::int FROM space_bookings b
           WHERE b.space_id = s.id AND b.booking_status IN ('pending', 'confirmed', 'active')
          ) AS active_bookings
        FROM spaces s
        WHERE s.owner_id = $1 AND s.deleted_at IS NULL
        ORDER BY s.total_earnings DESC`,
        [ownerId, timezone],
      );

      return result.rows.map((row) => ({
        spaceId: row.id,
        spaceName: row.space_name,
        city: row.city,
        status: row.status,
        totalEarnings: Number(row.total_earnings),
        totalBookings: row.total_bookings,
        averageRating: toNumberOrNull(row.average_rating),
        monthEarnings: Number(row.month_earnings),
        activeBookings: row.active_bookings,
      }));
    },

    async earningsByPeriod(
      ownerId: string,
      period: EarningsPeriod,
      timezone: string,
      limit: number,
    ): Promise<PeriodTotals[]> {
      // DATE_TRUNC('week') starts weeks on Monday.
      const result = await db.query<{
        period_start: string;
        earnings: string;
        bookings: number;
        platform_fees: string;
      }>(
        `SELECT * FROM (
           SELECT
             TO_CHAR(DATE_TRUNC($2::text, created_at AT TIME ZONE $3), 'YYYY-MM-DD') AS period_start,
             SUM(owner_payout) AS earnings,
             COUNT(*)::int AS bookings,
             SUM(platform_fee) AS platform_fees
           FROM space_bookings
           WHERE owner_id = $1 AND payment_status = 'paid'
           GROUP BY 1
           ORDER BY 1 DESC
           LIMIT $4
         ) latest
         ORDER BY period_start`,
        [ownerId, period, timezone, limit],
      );

      return result.rows.map((row) => ({
        periodStart: row.period_start,
        earnings: Number(row.earnings),
        bookings: row.bookings,
        platformFees: Number(row.platform_fees),
      }));
    },

    async updateRating(spaceId: string): Promise<Space | null> {
      const result = await db.query<SpaceRow>(
        `UPDATE spaces s
         SET average_rating = (SELECT ROUND(AVG(rating), 2) FROM space_reviews WHERE space_id = s.id),
             review_count = (SELECT COUNT(*)::int FROM space_reviews WHERE space_id = s.id),
             updated_at = NOW()
         WHERE s.id = $1
         RETURNING *`,
        [spaceId],
      );
      const row = result.rows[0];
      return row ? toSpace(row) : null;
    },

    async creditCompletedBooking(spaceId: string, ownerPayout: number): Promise<void> {
      await db.query(
        `UPDATE spaces
         SET total_earnings = total_earnings + $2,
             total_bookings = total_bookings + 1,
             updated_at = NOW()
         WHERE id = $1`,
        [spaceId, ownerPayout],
      );
    },

    async setStatus(spaceId: string, status: SpaceStatus, rejectionReason: string | null): Promise<Space | null> {
      const result = await db.query<SpaceRow>(
        `UPDATE spaces SET status = $2, rejection_reason = $3, updated_at = NOW()
         WHERE id = $1 AND deleted_at IS NULL
         RETURNING *`,
        [spaceId, status, rejectionReason],
      );
      const row = result.rows[0];
      return row ? toSpace(row) : null;
    },

    async remove(spaceId: string): Promise<boolean> {
      const result = await db.query('DELETE FROM spaces WHERE id = $1', [spaceId]);
      return (result.rowCount ?? 0) > 0;
    },

    async softDelete(spaceId: string): Promise<boolean> {
      const result = await db.query(
        `UPDATE spaces SET deleted_at = NOW(), status = 'paused', updated_at = NOW()
         WHERE id = $1 AND deleted_at IS NULL`,
        [spaceId],
      );
      return (result.rowCount ?? 0) > 0;
    },
  };
}

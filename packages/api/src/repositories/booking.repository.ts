import type {
  Booking,
  BookingPaymentStatus,
  BookingStatus,
  OwnerBookingHistoryEntry,
  VehicleInfo,
} from '@parkalot/shared';
import type { BookingRow, DbClient } from '../types/db.js';
import type { BookingRepository, NewBooking, StatusChange } from './types.js';
import { BOOKING_PAYMENT_STATUS_SOURCES } from '../services/status.js';

function toVehicle(row: BookingRow): VehicleInfo | null {
  if (!row.vehicle_reg && !row.vehicle_make && !row.vehicle_model && !row.vehicle_color) {
    return null;
  }
  return {
    ...(row.vehicle_reg && { reg: row.vehicle_reg }),
    ...(row.vehicle_make && { make: row.vehicle_make }),
    ...(row.vehicle_model && { model: row.vehicle_model }),
    ...(row.vehicle_color && { color: row.vehicle_color }),
  };
}

export function toBooking(row: BookingRow): Booking {
  return {
    id: row.id,
    spaceId: row.space_id,
    renterId: row.renter_id,
    ownerId: row.owner_id,
    startTime: row.start_time,
    endTime: row.end_time,
    vehicle: toVehicle(row),
    totalPrice: Number(row.total_price),
    platformFee: Number(row.platform_fee),
    ownerPayout: Number(row.owner_payout),
    bookingStatus: row.booking_status,
    paymentStatus: row.payment_status,
    providerPaymentId: row.provider_payment_id,
    cancelledBy: row.cancelled_by,
    cancelledAt: row.cancelled_at,
    cancellationReason: row.cancellation_reason,
    checkInTime: row.check_in_time,
    checkOutTime: row.check_out_time,
    renterNotes: row.renter_notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function firstOrNull(rows: BookingRow[]): Booking | null {
  const row = rows[0];
  return row ? toBooking(row) : null;
}

export function createBookingRepository(db: DbClient): BookingRepository {
  async function listWhere(column: 'renter_id' | 'owner_id', userId: string, status?: BookingStatus) {
    const params: unknown[] = [userId];
    let statusFilter = '';
    if (status) {
      params.push(status);
      statusFilter = 'AND booking_status = $2';
    }
    const result = await db.query<BookingRow>(
      `SELECT * FROM space_bookings
       WHERE ${column} = $1 ${statusFilter}
       ORDER BY start_time DESC`,
      params,
    );
    return result.rows.map(toBooking);
  }

  return {
    async insert(booking: NewBooking): Promise<Booking> {
      const result = await db.query<BookingRow>(
        `INSERT INTO space_bookings (
           space_id, renter_id, owner_id, start_time, end_time,
           vehicle_reg, vehicle_make, vehicle_model, vehicle_color,
           total_price, platform_fee, owner_payout,
           booking_status, payment_status, renter_notes
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, 'pending', 'pending', $13)
         RETURNING *`,
        [
          booking.spaceId,
          booking.renterId,
          booking.ownerId,
          booking.startTime,
          booking.endTime,
          booking.vehicle?.reg ?? null,
          booking.vehicle?.make ?? null,
          booking.vehicle?.model ?? null,
          booking.vehicle?.color ?? null,
          booking.totalPrice,
          booking.platformFee,
          booking.ownerPayout,
          booking.renterNotes,
        ],
      );
      return toBooking(result.rows[0]);
    },

    async findById(bookingId: string): Promise<Booking | null> {
      const result = await db.query<BookingRow>('SELECT * FROM space_bookings WHERE id = $1', [bookingId]);
      return firstOrNull(result.rows);
    },

    async findByIdForUpdate(bookingId: string): Promise<Booking | null> {
      const result = await db.query<BookingRow>('SELECT * FROM space_bookings WHERE id = $1 FOR UPDATE', [
        bookingId,
      ]);
      return firstOrNull(result.rows);
    },

    listByRenter(renterId: string, status?: BookingStatus): Promise<Booking[]> {
      return listWhere('renter_id', renterId, status);
    },

    listByOwner(ownerId: string, status?: BookingStatus): Promise<Booking[]> {
      return listWhere('owner_id', ownerId, status);
    },

    async listOwnerHistory(ownerId: string, limit: number, offset: number): Promise<OwnerBookingHistoryEntry[]> {
      const result = await db.query<BookingRow & { space_name: string }>(
        `SELECT b.*, s.space_name
         FROM space_bookings b
         JOIN spaces s ON s.id = b.space_id
         WHERE b.owner_id = $1
         ORDER BY b.created_at DESC, b.id
         LIMIT $2 OFFSET $3`,
        [ownerId, limit, offset],
      );
      return result.rows.map((row) => ({ ...toBooking(row), spaceName: row.space_name }));
    },

    async listBySpace(spaceId: string, from?: Date): Promise<Booking[]> {
      const result = await db.query<BookingRow>(
        `SELECT * FROM space_bookings
         WHERE space_id = $1
           AND booking_status NOT IN ('cancelled', 'completed')
           AND ($2::timestamptz IS NULL OR end_time > $2)
         ORDER BY start_time`,
        [spaceId, from ?? null],
      );
      return result.rows.map(toBooking);
    },

    async hasOverlap(spaceId: string, start: Date, end: Date, excludeBookingId?: string): Promise<boolean> {
      // Half-open ranges: back-to-back bookings do not conflict.
      const result = await db.query<{ overlap: boolean }>(
        `SELECT EXISTS (
           SELECT 1 FROM space_bookings
           WHERE space_id = $1
             AND booking_status NOT IN ('cancelled', 'completed')
             AND NOT (end_time <= $2 OR start_time >= $3)
             AND ($4::uuid IS NULL OR id <> $4)
         ) AS overlap`,
        [spaceId, start, end, excludeBookingId ?? null],
      );
      return result.rows[0]?.overlap ?? false;
    },

    async countBySpace(spaceId: string, statuses?: readonly BookingStatus[]): Promise<number> {
      const result = await db.query<{ count: number }>(
        `SELECT COUNT(*)::int AS count FROM space_bookings
         WHERE space_id = $1 AND ($2::varchar[] IS NULL OR booking_status = ANY($2))`,
        [spaceId, statuses ? [...statuses] : null],
      );
      return result.rows[0]?.count ?? 0;
    },

    async countUpcoming(userId: string, role: 'renter' | 'owner', now: Date): Promise<number> {
      const column = role === 'owner' ? 'owner_id' : 'renter_id';
      const result = await db.query<{ count: number }>(
        `SELECT COUNT(*)::int AS count FROM space_bookings
         WHERE ${column} = $1
           AND booking_status IN ('pending', 'confirmed')
           AND start_time > $2`,
        [userId, now],
      );
      return result.rows[0]?.count ?? 0;
    },

    async applyStatus(bookingId: string, change: StatusChange): Promise<Booking | null> {
      const result = await db.query<BookingRow>(
        `UPDATE space_bookings
         SET booking_status = $2,
             check_in_time = COALESCE($3::timestamptz, check_in_time),
             check_out_time = COALESCE($4::timestamptz, check_out_time),
             cancelled_by = COALESCE($5::varchar, cancelled_by),
             cancelled_at = COALESCE($6::timestamptz, cancelled_at),
             cancellation_reason = COALESCE($7::varchar, cancellation_reason),
             updated_at = NOW()
         WHERE id = $1
         RETURNING *`,
        [
          bookingId,
          change.status,
          change.checkInTime ?? null,
          change.checkOutTime ?? null,
          change.cancelledBy ?? null,
          change.cancelledAt ?? null,
          change.cancellationReason ?? null,
        ],
      );
      return firstOrNull(result.rows);
    },

    async setPaymentStatus(
      bookingId: string,
      status: BookingPaymentStatus,
      providerPaymentId?: string,
    ): Promise<Booking | null> {
      // A stored intent id must match the one reporting in; a booking without
      // one adopts it.
      const result = await db.query<BookingRow>(
        `UPDATE space_bookings
         SET payment_status = $2::varchar,
             provider_payment_id = COALESCE(provider_payment_id, $3::varchar),
             booking_status = CASE
               WHEN $2::varchar = 'paid' AND booking_status = 'pending' THEN 'confirmed'
               ELSE booking_status
             END,
             updated_at = NOW()
         WHERE id = $1
           AND ($3::varchar IS NULL OR provider_payment_id IS NULL OR provider_payment_id = $3::varchar)
           AND (payment_status = $2::varchar OR payment_status = ANY($4::varchar[]))
         RETURNING *`,
        [bookingId, status, providerPaymentId ?? null, [...BOOKING_PAYMENT_STATUS_SOURCES[status]]],
      );
      return firstOrNull(result.rows);
    },

    async setProviderPaymentId(bookingId: string, providerPaymentId: string): Promise<void> {
      await db.query(
        'UPDATE space_bookings SET provider_payment_id = $2, updated_at = NOW() WHERE id = $1',
        [bookingId, providerPaymentId],
      );
    },
  };
}

import type { BookingType, Payment, PaymentStats, PaymentStatus } from '@parkalot/shared';
import type { DbClient, PaymentRow } from '../types/db.js';
import type { NewPayment, PaymentRepository, PaymentStatusUpdate, PaymentUpdate } from './types.js';
import { PAYMENT_STATUS_SOURCES } from '../services/status.js';

export function toPayment(row: PaymentRow): Payment {
  return {
    id: row.id,
    userId: row.user_id,
    bookingType: row.booking_type,
    bookingId: row.booking_id,
    amount: Number(row.amount),
    currency: row.currency,
    providerPaymentId: row.provider_payment_id,
    status: row.status,
    refundAmount: row.refund_amount === null ? null : Number(row.refund_amount),
    failureReason: row.failure_reason,
    metadata: row.metadata ?? {},
    refundedAt: row.refunded_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function firstOrNull(rows: PaymentRow[]): Payment | null {
  const row = rows[0];
  return row ? toPayment(row) : null;
}

/** Tables holding the booking kinds this service does not own. */
const EXTERNAL_BOOKING_TABLES = {
  garage: 'garage_reservations',
  airport: 'airport_bookings',
} as const satisfies Record<Exclude<BookingType, 'customer_space'>, string>;

export function createPaymentRepository(db: DbClient): PaymentRepository {
  async function findByIntentId(intentId: string): Promise<Payment | null> {
    const result = await db.query<PaymentRow>('SELECT * FROM payments WHERE provider_payment_id = $1', [intentId]);
    return firstOrNull(result.rows);
  }

  return {
    async insert(payment: NewPayment): Promise<Payment> {
      const result = await db.query<PaymentRow>(
        `INSERT INTO payments (
           user_id, booking_type, booking_id, amount, currency,
           provider_payment_id, status, metadata
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb)
         RETURNING *`,
        [
          payment.userId,
          payment.bookingType,
          payment.bookingId,
          payment.amount,
          payment.currency,
          payment.providerPaymentId,
          payment.status,
          JSON.stringify(payment.metadata),
        ],
      );
      return toPayment(result.rows[0]);
    },

    async findById(paymentId: string): Promise<Payment | null> {
      const result = await db.query<PaymentRow>('SELECT * FROM payments WHERE id = $1', [paymentId]);
      return firstOrNull(result.rows);
    },

    findByIntentId,

    async listByUser(userId: string, limit: number, offset: number): Promise<Payment[]> {
      const result = await db.query<PaymentRow>(
        `SELECT * FROM payments
         WHERE user_id = $1
         ORDER BY created_at DESC
         LIMIT $2 OFFSET $3`,
        [userId, limit, offset],
      );
      return result.rows.map(toPayment);
    },

    async listByBooking(bookingType: BookingType, bookingId: string): Promise<Payment[]> {
      const result = await db.query<PaymentRow>(
        `SELECT * FROM payments
         WHERE booking_type = $1 AND booking_id = $2
         ORDER BY created_at DESC`,
        [bookingType, bookingId],
      );
      return result.rows.map(toPayment);
    },

    async updateStatusByIntent(
      intentId: string,
      status: PaymentStatus,
      extra: PaymentUpdate = {},
    ): Promise<PaymentStatusUpdate> {
      const isRefund = status === 'refunded' || status === 'partial_refund';
      const result = await db.query<PaymentRow & { previous_status: PaymentStatus }>(
        `WITH locked AS (
           SELECT id, status AS previous_status FROM payments
           WHERE provider_payment_id = $1
           FOR UPDATE
         )
         UPDATE payments p
         SET status = $2::varchar,
             failure_reason = COALESCE($3::varchar, p.failure_reason),
             refund_amount = COALESCE($4::numeric, p.refund_amount),
             refunded_at = CASE WHEN $5::boolean THEN COALESCE(p.refunded_at, NOW()) ELSE p.refunded_at END,
             updated_at = NOW()
         FROM locked
         WHERE p.id = locked.id
           AND p.status = ANY($6::varchar[])
           AND NOT (p.status = $2::varchar AND p.refund_amount IS NOT DISTINCT FROM COALESCE($4::numeric, p.refund_amount))
           AND ($4::numeric IS NULL OR p.refund_amount IS NULL OR $4::numeric >= p.refund_amount)
         RETURNING p.*, locked.previous_status`,
        [
          intentId,
          status,
          extra.failureReason ?? null,
          extra.refundAmount ?? null,
          isRefund,
          [...PAYMENT_STATUS_SOURCES[status]],
        ],
      );

      const row = result.rows[0];
      if (row) {
        return { payment: toPayment(row), changed: true, previousStatus: row.previous_status };
      }
      const payment = await findByIntentId(intentId);
      return { payment, changed: false, previousStatus: payment?.status ?? null };
    },

    async recordRefund(
      paymentId: string,
      refundAmount: number,
      status: 'refunded' | 'partial_refund',
    ): Promise<Payment | null> {
      const result = await db.query<PaymentRow>(
        `UPDATE payments
         SET status = $3, refund_amount = $2, refunded_at = NOW(), updated_at = NOW()
         WHERE id = $1
         RETURNING *`,
        [paymentId, refundAmount, status],
      );
      return firstOrNull(result.rows);
    },

    async markExternalBookingPaid(
      bookingType: Exclude<BookingType, 'customer_space'>,
      bookingId: string,
      intentId: string,
    ): Promise<boolean> {
      const table = EXTERNAL_BOOKING_TABLES[bookingType];
      const result = await db.query(
        `UPDATE ${table}
         SET payment_status = 'paid',
             booking_status = CASE WHEN booking_status = 'pending' THEN 'confirmed' ELSE booking_status END,
             provider_payment_id = COALESCE(provider_payment_id, $2),
             updated_at = NOW()
         WHERE id = $1
           AND (provider_payment_id IS NULL OR provider_payment_id = $2)
           AND payment_status NOT IN ('partial_refund', 'refunded')`,
        [bookingId, intentId],
      );
      return (result.rowCount ?? 0) > 0;
    },

    async userStats(userId: string): Promise<PaymentStats> {
      const result = await db.query<{
        total_payments: number;
        total_spent: string;
        total_refunded: string;
        successful_payments: number;
        failed_payments: number;
      }>(
        `SELECT
           COUNT(*)::int AS total_payments,
           COALESCE(SUM(CASE WHEN status IN ('succeeded', 'partial_refund', 'refunded') THEN amount ELSE 0 END), 0) AS total_spent,
           COALESCE(SUM(refund_amount), 0) AS total_refunded,
           COUNT(*) FILTER (WHERE status IN ('succeeded', 'partial_refund', 'refunded'))::int AS successful_payments,
           COUNT(*) FILTER (WHERE status = 'failed')::int AS failed_payments
         FROM payments
         WHERE user_id = $1`,
        [userId],
      );

      const row = result.rows[0];
      return {
        totalPayments: row.total_payments,
        totalSpent: Number(row.total_spent),
        totalRefunded: Number(row.total_refunded),
        successfulPayments: row.successful_payments,
        failedPayments: row.failed_payments,
      };
    },
  };
}

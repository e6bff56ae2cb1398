import type pg from 'pg';
import type { DbClient } from '../types/db.js';
import type { Repositories, Store } from './types.js';
import { createBookingRepository } from './booking.repository.js';
import { createPaymentRepository } from './payment.repository.js';
import { createReviewRepository } from './review.repository.js';
import { createSpaceRepository } from './space.repository.js';
import { ConflictError } from '../lib/errors.js';

/** exclusion_violation: space_bookings_no_overlap rejected the row. */
const EXCLUSION_VIOLATION = '23P01';
/** unique_violation on the one-review-per-booking key. */
const UNIQUE_VIOLATION = '23505';
const REVIEW_BOOKING_KEY = 'space_reviews_booking_id_key';

function hasPgCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

function violates(err: unknown, constraint: string): boolean {
  return typeof err === 'object' && err !== null && 'constraint' in err && err.constraint === constraint;
}

function createRepositories(db: DbClient): Repositories {
  return {
    spaces: createSpaceRepository(db),
    bookings: createBookingRepository(db),
    payments: createPaymentRepository(db),
    reviews: createReviewRepository(db),
  };
}

export function createPgStore(pool: pg.Pool): Store {
  return {
    ...createRepositories(pool),

    async transaction<T>(fn: (tx: Repositories) => Promise<T>, lockKey?: string): Promise<T> {
      const client = await pool.connect();

      try {
        await client.query('BEGIN');
        if (lockKey) {
          // Held until COMMIT/ROLLBACK; serializes writers on the same key.
          await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [lockKey]);
        }

        const result = await fn(createRepositories(client));

        await client.query('COMMIT');
        return result;
      } catch (err) {
        await client.query('ROLLBACK');
        if (hasPgCode(err, EXCLUSION_VIOLATION)) {
          throw new ConflictError('Space is already booked for the selected time', 'OVERLAP');
        }
        if (hasPgCode(err, UNIQUE_VIOLATION) && violates(err, REVIEW_BOOKING_KEY)) {
          throw new ConflictError('This booking has already been reviewed');
        }
        throw err;
      } finally {
        client.release();
      }
    },
  };
}

import type { Review } from '@parkalot/shared';
import type { DbClient, ReviewRow } from '../types/db.js';
import type { NewReview, ReviewRepository } from './types.js';

export function toReview(row: ReviewRow): Review {
  return {
    id: row.id,
    spaceId: row.space_id,
    bookingId: row.booking_id,
    reviewerId: row.reviewer_id,
    rating: row.rating,
    reviewText: row.review_text,
    createdAt: row.created_at,
  };
}

export function createReviewRepository(db: DbClient): ReviewRepository {
  return {
    async insert(review: NewReview): Promise<Review> {
      const result = await db.query<ReviewRow>(
        `INSERT INTO space_reviews (space_id, booking_id, reviewer_id, rating, review_text)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING *`,
        [review.spaceId, review.bookingId, review.reviewerId, review.rating, review.reviewText],
      );
      return toReview(result.rows[0]);
    },

    async findByBooking(bookingId: string): Promise<Review | null> {
      const result = await db.query<ReviewRow>('SELECT * FROM space_reviews WHERE booking_id = $1', [bookingId]);
      const row = result.rows[0];
      return row ? toReview(row) : null;
    },

    async listBySpace(spaceId: string, limit: number, offset: number): Promise<Review[]> {
      const result = await db.query<ReviewRow>(
        `SELECT * FROM space_reviews
         WHERE space_id = $1
         ORDER BY created_at DESC
         LIMIT $2 OFFSET $3`,
        [spaceId, limit, offset],
      );
      return result.rows.map(toReview);
    },
  };
}

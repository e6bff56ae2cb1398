import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import {
  ADMIN_ID,
  asUser,
  bookSpace,
  buildTestApp,
  OTHER_ID,
  payFor,
  RENTER_ID,
  seedSpace,
  unwrap,
  type TestContext,
} from './setup.js';

let ctx: TestContext;
let spaceId: string;

beforeEach(async () => {
  ctx = buildTestApp();
  spaceId = await seedSpace(ctx.store);
});

// ── Intents ──────────────────────────────────────────────────────────────

describe('POST /api/payments/intents', () => {
  it('creates an intent for the booking total and links it to the booking', async () => {
    const booking = await bookSpace(ctx, spaceId, 26, 4);

    const res = await request(ctx.app)
      .post('/api/payments/intents')
      .set(asUser(RENTER_ID))
      .send({ bookingId: booking.id });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({
      paymentId: expect.any(String),
      intentId: 'pi_test_1',
      clientSecret: 'pi_test_1_secret',
      amount: 10,
      currency: 'gbp',
      status: 'pending',
      testMode: true,
    });
    expect(ctx.gateway.intentRequests).toEqual([
      {
        amount: 10,
        currency: 'gbp',
        metadata: { booking_type: 'customer_space', booking_id: booking.id, user_id: RENTER_ID },
        description: `Parking booking ${booking.id}`,
      },
    ]);

    const payment = await ctx.store.payments.findByIntentId('pi_test_1');
    expect(payment).toMatchObject({ status: 'pending', amount: 10, bookingId: booking.id, userId: RENTER_ID });
    expect(ctx.store.state.bookings.get(booking.id)?.providerPaymentId).toBe('pi_test_1');
  });

  it('stores nothing when the provider fails', async () => {
    const booking = await bookSpace(ctx, spaceId, 26, 4);
    ctx.gateway.failNext('createIntent');

    const res = await request(ctx.app)
      .post('/api/payments/intents')
      .set(asUser(RENTER_ID))
      .send({ bookingId: booking.id });

    expect(res.status).toBe(502);
    expect(res.body).toEqual({ error: 'Payment gateway unavailable', code: 'PAYMENT_PROVIDER_ERROR' });
    expect(ctx.store.state.payments.size).toBe(0);
    expect(ctx.store.state.bookings.get(booking.id)?.providerPaymentId).toBeNull();
  });

  it('only lets the renter pay', async () => {
    const booking = await bookSpace(ctx, spaceId, 26, 4);

    const res = await request(ctx.app)
      .post('/api/payments/intents')
      .set(asUser(OTHER_ID))
      .send({ bookingId: booking.id });

    expect(res.status).toBe(403);
  });

  it('refuses a booking that is already paid', async () => {
    const booking = await bookSpace(ctx, spaceId, 26, 4);
    await payFor(ctx, booking);

    const res = await request(ctx.app)
      .post('/api/payments/intents')
      .set(asUser(RENTER_ID))
      .send({ bookingId: booking.id });

    expect(res.status).toBe(409);
    expect(res.body).toEqual({ error: 'Booking is not awaiting payment', code: 'CONFLICT' });
  });

  it('returns 404 for an unknown booking', async () => {
    const res = await request(ctx.app)
      .post('/api/payments/intents')
      .set(asUser(RENTER_ID))
      .send({ bookingId: '99999999-9999-4999-8999-999999999999' });

    expect(res.status).toBe(404);
  });
});

// ── Manual confirm ───────────────────────────────────────────────────────

describe('POST /api/payments/confirm', () => {
  it('leaves the booking alone until the provider reports success', async () => {
    const booking = await bookSpace(ctx, spaceId, 26, 4);
    unwrap(await ctx.services.payments.createBookingIntent({ userId: RENTER_ID, role: 'customer' }, booking.id));

    const pending = await request(ctx.app)
      .post('/api/payments/confirm')
      .set(asUser(RENTER_ID))
      .send({ intentId: 'pi_test_1' });

    expect(pending.status).toBe(200);
    expect(pending.body).toEqual({ changed: false, intentStatus: 'pending' });
    expect(ctx.store.state.bookings.get(booking.id)?.bookingStatus).toBe('pending');

    ctx.gateway.setIntentStatus('pi_test_1', 'succeeded');
    const succeeded = await request(ctx.app)
      .post('/api/payments/confirm')
      .set(asUser(RENTER_ID))
      .send({ intentId: 'pi_test_1' });

    expect(succeeded.body).toEqual({ changed: true, intentStatus: 'succeeded' });
    expect(ctx.store.state.bookings.get(booking.id)).toMatchObject({ bookingStatus: 'confirmed', paymentStatus: 'paid' });
    expect((await ctx.store.payments.findByIntentId('pi_test_1'))?.status).toBe('succeeded');

    const again = await request(ctx.app)
      .post('/api/payments/confirm')
      .set(asUser(RENTER_ID))
      .send({ intentId: 'pi_test_1' });

    expect(again.body).toEqual({ changed: false, intentStatus: 'succeeded' });
  });

  it('is a no-op after the webhook got there first', async () => {
    const booking = await bookSpace(ctx, spaceId, 26, 4);
    const intentId = await payFor(ctx, booking);
    ctx.gateway.setIntentStatus(intentId, 'succeeded');

    const res = await request(ctx.app).post('/api/payments/confirm').set(asUser(RENTER_ID)).send({ intentId });

    expect(res.body).toEqual({ changed: false, intentStatus: 'succeeded' });
    expect(ctx.store.state.bookings.get(booking.id)?.bookingStatus).toBe('confirmed');
  });

  it('reports a provider outage as 502', async () => {
    const booking = await bookSpace(ctx, spaceId, 26, 4);
    unwrap(await ctx.services.payments.createBookingIntent({ userId: RENTER_ID, role: 'customer' }, booking.id));
    ctx.gateway.failNext('getIntent');

    const res = await request(ctx.app)
      .post('/api/payments/confirm')
      .set(asUser(RENTER_ID))
      .send({ intentId: 'pi_test_1' });

    expect(res.status).toBe(502);
    expect(res.body.code).toBe('PAYMENT_PROVIDER_ERROR');
  });

  it('only lets the payer or an admin confirm', async () => {
    const booking = await bookSpace(ctx, spaceId, 26, 4);
    unwrap(await ctx.services.payments.createBookingIntent({ userId: RENTER_ID, role: 'customer' }, booking.id));

    const stranger = await request(ctx.app)
      .post('/api/payments/confirm')
      .set(asUser(OTHER_ID))
      .send({ intentId: 'pi_test_1' });
    const admin = await request(ctx.app)
      .post('/api/payments/confirm')
      .set(asUser(ADMIN_ID, 'admin'))
      .send({ intentId: 'pi_test_1' });

    expect(stranger.status).toBe(403);
    expect(admin.status).toBe(200);
  });

  it('returns 404 for an unknown intent', async () => {
    const res = await request(ctx.app)
      .post('/api/payments/confirm')
      .set(asUser(RENTER_ID))
      .send({ intentId: 'pi_unknown' });

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Payment not found', code: 'NOT_FOUND' });
  });
});

// ── History ──────────────────────────────────────────────────────────────

describe('GET /api/payments', () => {
  it('lists the caller’s payments and sums them up', async () => {
    const paid = await bookSpace(ctx, spaceId, 26, 4); // £10
    await payFor(ctx, paid);
    const declined = await bookSpace(ctx, spaceId, 50, 2); // £5
    unwrap(await ctx.services.payments.createBookingIntent({ userId: RENTER_ID, role: 'customer' }, declined.id));
    unwrap(await ctx.services.payments.applyIntentFailed('pi_test_2', 'Your card was declined.'));

    const list = await request(ctx.app).get('/api/payments').set(asUser(RENTER_ID));
    const stats = await request(ctx.app).get('/api/payments/stats').set(asUser(RENTER_ID));
    const others = await request(ctx.app).get('/api/payments').set(asUser(OTHER_ID));

    expect(list.status).toBe(200);
    expect(list.body.map((p: { providerPaymentId: string }) => p.providerPaymentId).sort()).toEqual([
      'pi_test_1',
      'pi_test_2',
    ]);
    expect(stats.body).toEqual({
      totalPayments: 2,
      totalSpent: 10,
      totalRefunded: 0,
      successfulPayments: 1,
      failedPayments: 1,
    });
    expect(others.body).toEqual([]);

    const failed = await ctx.store.payments.findByIntentId('pi_test_2');
    expect(failed).toMatchObject({ status: 'failed', failureReason: 'Your card was declined.' });
    expect(ctx.store.state.bookings.get(declined.id)?.paymentStatus).toBe('pending');
  });

  it('rejects a page size over 100', async () => {
    const res = await request(ctx.app).get('/api/payments?limit=500').set(asUser(RENTER_ID));

    expect(res.status).toBe(400);
  });
});

// ── Booking payment status ───────────────────────────────────────────────

describe('bookings.updatePaymentStatus', () => {
  const unknownBooking = '99999999-9999-4999-8999-999999999999';

  it('confirms a pending booking when it is paid and adopts the intent', async () => {
    const booking = await bookSpace(ctx, spaceId, 26, 4);

    const paid = unwrap(await ctx.services.bookings.updatePaymentStatus(booking.id, 'paid', 'pi_external'));

    expect(paid).toMatchObject({ bookingStatus: 'confirmed', paymentStatus: 'paid', providerPaymentId: 'pi_external' });
  });

  it('treats setting the current status again as a no-op', async () => {
    const booking = await bookSpace(ctx, spaceId, 26, 4);
    unwrap(await ctx.services.bookings.updatePaymentStatus(booking.id, 'paid'));

    const again = unwrap(await ctx.services.bookings.updatePaymentStatus(booking.id, 'paid'));

    expect(again.paymentStatus).toBe('paid');
  });

  it('refuses an intent other than the one on the booking', async () => {
    const booking = await bookSpace(ctx, spaceId, 26, 4);
    unwrap(await ctx.services.payments.createBookingIntent({ userId: RENTER_ID, role: 'customer' }, booking.id));

    const result = await ctx.services.bookings.updatePaymentStatus(booking.id, 'paid', 'pi_someone_else');

    expect(result).toEqual({ ok: false, status: 409, error: 'Payment intent does not match booking', code: 'CONFLICT' });
    expect(ctx.store.state.bookings.get(booking.id)).toMatchObject({ bookingStatus: 'pending', paymentStatus: 'pending' });
  });

  it('never moves a refunded booking back to paid', async () => {
    const booking = await bookSpace(ctx, spaceId, 26, 4);
    const intentId = await payFor(ctx, booking);
    unwrap(await ctx.services.bookings.updatePaymentStatus(booking.id, 'refunded'));

    const result = await ctx.services.bookings.updatePaymentStatus(booking.id, 'paid', intentId);

    expect(result).toEqual({
      ok: false,
      status: 409,
      error: 'Cannot change payment from refunded to paid',
      code: 'INVALID_TRANSITION',
    });
    expect(await ctx.store.bookings.setPaymentStatus(booking.id, 'paid', intentId)).toBeNull();
  });

  it('returns 404 for an unknown booking', async () => {
    const result = await ctx.services.bookings.updatePaymentStatus(unknownBooking, 'paid');

    expect(result).toEqual({ ok: false, status: 404, error: 'Booking not found', code: 'NOT_FOUND' });
  });
});

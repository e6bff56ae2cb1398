import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Booking } from '@parkalot/shared';
import { verifyWebhook } from '../services/webhook.service.js';
import {
  ADMIN_ID,
  asUser,
  bookSpace,
  buildTestApp,
  nowSeconds,
  OWNER_ID,
  RENTER_ID,
  seedSpace,
  signWebhook,
  unwrap,
  WEBHOOK_SECRET,
  type TestContext,
} from './setup.js';

function eventPayload(type: string, object: Record<string, unknown>, id = 'evt_1'): string {
  return JSON.stringify({ id, type, data: { object } });
}

// ── Signature verification ───────────────────────────────────────────────

describe('verifyWebhook', () => {
  const t = 1_906_000_000;
  const payload = eventPayload('payment_intent.succeeded', { id: 'pi_1', metadata: {} });

  it('accepts a correctly signed event and parses it', () => {
    const result = verifyWebhook(payload, signWebhook(payload, t), WEBHOOK_SECRET, t + 10);

    expect(result).toEqual({
      ok: true,
      data: { id: 'evt_1', type: 'payment_intent.succeeded', data: { object: { id: 'pi_1', metadata: {} } } },
    });
  });

  it('accepts a raw Buffer body', () => {
    const result = verifyWebhook(Buffer.from(payload), signWebhook(payload, t), WEBHOOK_SECRET, t);

    expect(result.ok).toBe(true);
  });

  it('rejects a body that differs from what was signed', () => {
    const result = verifyWebhook(payload.replace('pi_1', 'pi_2'), signWebhook(payload, t), WEBHOOK_SECRET, t);

    expect(result).toMatchObject({ ok: false, status: 400, code: 'INVALID_SIGNATURE' });
  });

  it('rejects a signature made with another secret', () => {
    const result = verifyWebhook(payload, signWebhook(payload, t, 'other-secret'), WEBHOOK_SECRET, t);

    expect(result).toMatchObject({ ok: false, code: 'INVALID_SIGNATURE' });
  });

  it('accepts any one matching v1 signature', () => {
    const header = `${signWebhook(payload, t, 'old-secret')},${signWebhook(payload, t).split(',')[1]}`;

    expect(verifyWebhook(payload, header, WEBHOOK_SECRET, t).ok).toBe(true);
  });

  it('allows up to five minutes of clock skew either way', () => {
    const header = signWebhook(payload, t);

    expect(verifyWebhook(payload, header, WEBHOOK_SECRET, t + 300).ok).toBe(true);
    expect(verifyWebhook(payload, header, WEBHOOK_SECRET, t - 300).ok).toBe(true);
    expect(verifyWebhook(payload, header, WEBHOOK_SECRET, t + 301)).toMatchObject({ ok: false, code: 'SIGNATURE_EXPIRED' });
    expect(verifyWebhook(payload, header, WEBHOOK_SECRET, t - 301)).toMatchObject({ ok: false, code: 'SIGNATURE_EXPIRED' });
  });

  it('rejects a missing or unparseable header', () => {
    expect(verifyWebhook(payload, undefined, WEBHOOK_SECRET, t)).toMatchObject({ code: 'INVALID_SIGNATURE' });
    expect(verifyWebhook(payload, 'garbage', WEBHOOK_SECRET, t)).toMatchObject({ code: 'INVALID_SIGNATURE' });
    expect(verifyWebhook(payload, `t=${t}`, WEBHOOK_SECRET, t)).toMatchObject({ code: 'INVALID_SIGNATURE' });
  });

  it('rejects a signed body that is not an event', () => {
    const body = '{"hello":"world"}';

    expect(verifyWebhook(body, signWebhook(body, t), WEBHOOK_SECRET, t)).toEqual({
      ok: false,
      status: 400,
      error: 'Malformed event payload',
      code: 'VALIDATION_ERROR',
    });
  });

  it('rejects a signed body that is not JSON', () => {
    const body = 'not json';

    expect(verifyWebhook(body, signWebhook(body, t), WEBHOOK_SECRET, t)).toEqual({
      ok: false,
      status: 400,
      error: 'Malformed event payload',
      code: 'VALIDATION_ERROR',
    });
  });

  it('verifies nothing when no secret is configured', () => {
    const forged = signWebhook(payload, t, '');

    expect(verifyWebhook(payload, forged, '', t)).toEqual({
      ok: false,
      status: 400,
      error: 'Webhook secret is not configured',
      code: 'INVALID_SIGNATURE',
    });
  });
});

// ── Reconciliation ───────────────────────────────────────────────────────

describe('POST /api/webhooks/stripe', () => {
  let ctx: TestContext;
  let booking: Booking;

  beforeEach(async () => {
    ctx = buildTestApp();
    const spaceId = await seedSpace(ctx.store);
    booking = await bookSpace(ctx, spaceId, 26, 4); // £10
    unwrap(await ctx.services.payments.createBookingIntent({ userId: RENTER_ID, role: 'customer' }, booking.id));
  });

  const deliver = (payload: string, signature?: string, path = '/api/webhooks/stripe') =>
    request(ctx.app)
      .post(path)
      .set('Content-Type', 'application/json')
      .set('Stripe-Signature', signature ?? signWebhook(payload, nowSeconds(ctx.clock)))
      .send(payload);

  const succeeded = (): string =>
    eventPayload('payment_intent.succeeded', {
      id: 'pi_test_1',
      metadata: { booking_type: 'customer_space', booking_id: booking.id, user_id: RENTER_ID },
    });

  it('marks the payment succeeded and confirms the booking', async () => {
    const res = await deliver(succeeded());

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ received: true, handled: true });
    expect(ctx.store.state.bookings.get(booking.id)).toMatchObject({ bookingStatus: 'confirmed', paymentStatus: 'paid' });
    expect((await ctx.store.payments.findByIntentId('pi_test_1'))?.status).toBe('succeeded');
  });

  it('is also served on the versioned path', async () => {
    const res = await deliver(succeeded(), undefined, '/api/v1/webhooks/stripe');

    expect(res.status).toBe(200);
  });

  it('applies a repeated delivery only once', async () => {
    const event = unwrap(verifyWebhook(succeeded(), signWebhook(succeeded(), 100), WEBHOOK_SECRET, 100));

    const first = unwrap(await ctx.services.webhooks.apply(event));
    const second = unwrap(await ctx.services.webhooks.apply(event));

    expect(first).toEqual({ handled: true, changed: true });
    expect(second).toEqual({ handled: true, changed: false });
    expect(ctx.store.state.bookings.get(booking.id)).toMatchObject({ bookingStatus: 'confirmed', paymentStatus: 'paid' });
  });

  it('does not reopen or re-credit a completed booking on replay', async () => {
    await deliver(succeeded());
    const owner = { userId: OWNER_ID, role: 'customer' as const };
    unwrap(await ctx.services.bookings.updateStatus(owner, booking.id, 'active'));
    unwrap(await ctx.services.bookings.updateStatus(owner, booking.id, 'completed'));

    const res = await deliver(succeeded());

    expect(res.status).toBe(200);
    expect(ctx.store.state.bookings.get(booking.id)?.bookingStatus).toBe('completed');
    const space = await ctx.store.spaces.findById(booking.spaceId);
    expect(space?.totalEarnings).toBe(8.5);
    expect(space?.totalBookings).toBe(1);
  });

  it('falls back to the stored payment when metadata is missing', async () => {
    const res = await deliver(eventPayload('payment_intent.succeeded', { id: 'pi_test_1' }));

    expect(res.status).toBe(200);
    expect(ctx.store.state.bookings.get(booking.id)?.paymentStatus).toBe('paid');
  });

  it('records a failed payment without touching the booking', async () => {
    const res = await deliver(
      eventPayload('payment_intent.payment_failed', {
        id: 'pi_test_1',
        last_payment_error: { message: 'Your card was declined.' },
      }),
    );

    expect(res.status).toBe(200);
    expect(await ctx.store.payments.findByIntentId('pi_test_1')).toMatchObject({
      status: 'failed',
      failureReason: 'Your card was declined.',
    });
    expect(ctx.store.state.bookings.get(booking.id)).toMatchObject({ bookingStatus: 'pending', paymentStatus: 'pending' });
  });

  it('ignores a failure that arrives after success', async () => {
    await deliver(succeeded());
    await deliver(eventPayload('payment_intent.payment_failed', { id: 'pi_test_1', last_payment_error: null }, 'evt_2'));

    expect((await ctx.store.payments.findByIntentId('pi_test_1'))?.status).toBe('succeeded');
  });

  it('lets a retried card succeed after a failure', async () => {
    await deliver(eventPayload('payment_intent.payment_failed', { id: 'pi_test_1' }, 'evt_0'));
    await deliver(succeeded());

    expect((await ctx.store.payments.findByIntentId('pi_test_1'))?.status).toBe('succeeded');
    expect(ctx.store.state.bookings.get(booking.id)?.bookingStatus).toBe('confirmed');
  });

  it('tracks partial then full refunds from charge events', async () => {
    await deliver(succeeded());

    await deliver(
      eventPayload('charge.refunded', { payment_intent: 'pi_test_1', amount: 1000, amount_refunded: 500 }, 'evt_3'),
    );
    expect(await ctx.store.payments.findByIntentId('pi_test_1')).toMatchObject({
      status: 'partial_refund',
      refundAmount: 5,
    });

    const full = eventPayload('charge.refunded', { payment_intent: 'pi_test_1', amount: 1000, amount_refunded: 1000 }, 'evt_4');
    await deliver(full);
    expect(await ctx.store.payments.findByIntentId('pi_test_1')).toMatchObject({ status: 'refunded', refundAmount: 10 });

    const replay = unwrap(await ctx.services.webhooks.apply(unwrap(ctx.services.webhooks.verify(full, signWebhook(full, nowSeconds(ctx.clock))))));
    expect(replay).toEqual({ handled: true, changed: false });

    // Booking payment state is owned by the refund call, not the charge event.
    expect(ctx.store.state.bookings.get(booking.id)?.paymentStatus).toBe('paid');
  });

  it('marks a garage reservation paid from its metadata', async () => {
    const reservationId = '55555555-5555-4555-8555-555555555555';
    ctx.store.state.garage.set(reservationId, { bookingStatus: 'pending', paymentStatus: 'pending', providerPaymentId: null });
    await ctx.store.payments.insert({
      userId: RENTER_ID,
      bookingType: 'garage',
      bookingId: reservationId,
      amount: 12,
      currency: 'gbp',
      providerPaymentId: 'pi_garage',
      status: 'pending',
      metadata: {},
    });

    const res = await deliver(
      eventPayload('payment_intent.succeeded', {
        id: 'pi_garage',
        metadata: { booking_type: 'garage', booking_id: reservationId },
      }),
    );

    expect(res.status).toBe(200);
    expect(ctx.store.state.garage.get(reservationId)).toEqual({
      bookingStatus: 'confirmed',
      paymentStatus: 'paid',
      providerPaymentId: 'pi_garage',
    });
  });

  it('acknowledges success for an intent it does not know', async () => {
    const res = await deliver(eventPayload('payment_intent.succeeded', { id: 'pi_elsewhere' }));

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ received: true, handled: true });
  });

  it('acknowledges event types it does not handle', async () => {
    const res = await deliver(eventPayload('customer.created', { id: 'cus_1' }));

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ received: true, handled: false });
  });

  it('rejects a bad signature with an empty 400', async () => {
    const payload = succeeded();

    const res = await deliver(payload, signWebhook(payload, nowSeconds(ctx.clock), 'wrong-secret'));

    expect(res.status).toBe(400);
    expect(res.text).toBe('');
    expect(ctx.store.state.bookings.get(booking.id)?.paymentStatus).toBe('pending');
  });

  it('rejects a stale signature', async () => {
    const payload = succeeded();

    const res = await deliver(payload, signWebhook(payload, nowSeconds(ctx.clock) - 600));

    expect(res.status).toBe(400);
    expect(res.text).toBe('');
  });

  it('leaves a refunded booking alone when success is delivered again', async () => {
    await deliver(succeeded());
    const renter = { userId: RENTER_ID, role: 'customer' as const };
    unwrap(await ctx.services.bookings.cancel(renter, booking.id));
    unwrap(await ctx.services.payments.refundCancelledBooking(renter, booking.id));

    const res = await deliver(succeeded().replace('evt_1', 'evt_9'));

    expect(res.status).toBe(200);
    expect(ctx.store.state.bookings.get(booking.id)).toMatchObject({ bookingStatus: 'cancelled', paymentStatus: 'refunded' });
    expect((await ctx.store.payments.findByIntentId('pi_test_1'))?.status).toBe('refunded');
    expect(ctx.gateway.refundCalls).toHaveLength(1);

    const again = await request(ctx.app)
      .post(`/api/bookings/${booking.id}/refund`)
      .set(asUser(ADMIN_ID, 'admin'))
      .send({});
    expect(again.status).toBe(409);
  });

  it('reaches the same state when the refund overtakes the success event', async () => {
    const refund = eventPayload('charge.refunded', { payment_intent: 'pi_test_1', amount: 1000, amount_refunded: 500 }, 'evt_5');

    await deliver(refund);
    expect(ctx.store.state.bookings.get(booking.id)).toMatchObject({ bookingStatus: 'confirmed', paymentStatus: 'paid' });

    const late = unwrap(ctx.services.webhooks.verify(succeeded(), signWebhook(succeeded(), nowSeconds(ctx.clock))));
    expect(unwrap(await ctx.services.webhooks.apply(late))).toEqual({ handled: true, changed: false });

    expect(await ctx.store.payments.findByIntentId('pi_test_1')).toMatchObject({ status: 'partial_refund', refundAmount: 5 });
    expect(ctx.store.state.bookings.get(booking.id)).toMatchObject({ bookingStatus: 'confirmed', paymentStatus: 'paid' });
  });

  it('keeps the larger refund when an older charge event arrives late', async () => {
    await deliver(succeeded());
    await deliver(eventPayload('charge.refunded', { payment_intent: 'pi_test_1', amount: 1000, amount_refunded: 700 }, 'evt_6'));

    await deliver(eventPayload('charge.refunded', { payment_intent: 'pi_test_1', amount: 1000, amount_refunded: 500 }, 'evt_5'));

    expect(await ctx.store.payments.findByIntentId('pi_test_1')).toMatchObject({ status: 'partial_refund', refundAmount: 7 });
  });

  it('does not mark a refunded garage reservation paid on replay', async () => {
    const reservationId = '66666666-6666-4666-8666-666666666666';
    ctx.store.state.garage.set(reservationId, { bookingStatus: 'pending', paymentStatus: 'pending', providerPaymentId: null });
    await ctx.store.payments.insert({
      userId: RENTER_ID,
      bookingType: 'garage',
      bookingId: reservationId,
      amount: 12,
      currency: 'gbp',
      providerPaymentId: 'pi_garage',
      status: 'pending',
      metadata: { booking_type: 'garage', booking_id: reservationId },
    });
    const garageSucceeded = eventPayload('payment_intent.succeeded', {
      id: 'pi_garage',
      metadata: { booking_type: 'garage', booking_id: reservationId },
    });
    await deliver(garageSucceeded);
    await deliver(eventPayload('charge.refunded', { payment_intent: 'pi_garage', amount: 1200, amount_refunded: 1200 }, 'evt_7'));
    // The garage system settles its own side of the refund.
    ctx.store.state.garage.set(reservationId, { bookingStatus: 'cancelled', paymentStatus: 'refunded', providerPaymentId: 'pi_garage' });

    const res = await deliver(garageSucceeded);

    expect(res.status).toBe(200);
    expect(ctx.store.state.garage.get(reservationId)).toEqual({
      bookingStatus: 'cancelled',
      paymentStatus: 'refunded',
      providerPaymentId: 'pi_garage',
    });
    expect(await ctx.store.payments.findByIntentId('pi_garage')).toMatchObject({ status: 'refunded', refundAmount: 12 });
  });

  it('rejects an intent event without an id', async () => {
    const res = await deliver(eventPayload('payment_intent.succeeded', { metadata: {} }));

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Malformed payment intent' });
  });
});

describe('POST /api/webhooks/stripe without a webhook secret', () => {
  it('answers every event with an empty 400 and changes nothing', async () => {
    const ctx = buildTestApp(undefined, '');
    const spaceId = await seedSpace(ctx.store);
    const booking = await bookSpace(ctx, spaceId, 26, 4);
    unwrap(await ctx.services.payments.createBookingIntent({ userId: RENTER_ID, role: 'customer' }, booking.id));
    const payload = eventPayload('payment_intent.succeeded', {
      id: 'pi_test_1',
      metadata: { booking_type: 'customer_space', booking_id: booking.id },
    });

    const res = await request(ctx.app)
      .post('/api/webhooks/stripe')
      .set('Content-Type', 'application/json')
      .set('Stripe-Signature', signWebhook(payload, nowSeconds(ctx.clock), ''))
      .send(payload);

    expect(res.status).toBe(400);
    expect(res.text).toBe('');
    expect(ctx.store.state.bookings.get(booking.id)).toMatchObject({ bookingStatus: 'pending', paymentStatus: 'pending' });
    expect((await ctx.store.payments.findByIntentId('pi_test_1'))?.status).toBe('pending');
  });
});

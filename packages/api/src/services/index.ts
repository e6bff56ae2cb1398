import type { Store } from '../repositories/types.js';
import type { AppConfig } from '../lib/config.js';
import { createBookingService, type BookingService } from './booking.service.js';
import { createPaymentService, type PaymentService } from './payment.service.js';
import { createSpaceService, type SpaceService } from './space.service.js';
import { createWebhookService, type WebhookService } from './webhook.service.js';
import type { PaymentGateway } from './payment-gateway.js';

export interface Services {
  spaces: SpaceService;
  bookings: BookingService;
  payments: PaymentService;
  webhooks: WebhookService;
}

export interface ServiceDeps {
  store: Store;
  gateway: PaymentGateway;
  config: Pick<AppConfig, 'PAYMENT_CURRENCY' | 'STRIPE_WEBHOOK_SECRET' | 'TIMEZONE'>;
  now?: () => Date;
}

export function createServices({ store, gateway, config, now = () => new Date() }: ServiceDeps): Services {
  const payments = createPaymentService({ store, gateway, currency: config.PAYMENT_CURRENCY });

  return {
    spaces: createSpaceService({ store, timezone: config.TIMEZONE }),
    bookings: createBookingService({ store, now }),
    payments,
    webhooks: createWebhookService({
      payments,
      secret: config.STRIPE_WEBHOOK_SECRET,
      now: () => Math.floor(now().getTime() / 1000),
    }),
  };
}

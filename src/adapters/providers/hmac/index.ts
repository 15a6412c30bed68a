export * from './hmac-provider.adapter';
export * from './payment-webhook.dto';

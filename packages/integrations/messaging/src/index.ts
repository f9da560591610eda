export * from './types.js';
export { ConsoleDeliveryAdapter } from './adapters/console.js';
export { LineMessagingAdapter, LineApiError, type LineMessagingConfig } from './adapters/line-messaging.js';
export { verifyLineSignature, signLineBody } from './signature.js';

export { WebhookSignatureGuard } from './webhook-signature.guard';

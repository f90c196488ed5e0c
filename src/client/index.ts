export * from './dwf-webhook.client';

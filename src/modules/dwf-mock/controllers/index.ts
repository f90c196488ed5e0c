/**
 * DWF mock controllers
 */

export { WebhookController } from './webhook.controller';
export { RecordController } from './record.controller';
export { HealthController } from './health.controller';

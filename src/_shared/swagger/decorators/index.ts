/**
 * Centralized Swagger decorators for the DWF mock API
 *
 * Keeps the controllers focused on request handling
 */

export * from './webhook.decorators';
export * from './record.decorators';
export * from './health.decorators';

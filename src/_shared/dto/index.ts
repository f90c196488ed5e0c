/**
 * Centralized DTOs for the DWF mock API
 */

export * from './webhook.dto';
export * from './record.dto';
export * from './health.dto';

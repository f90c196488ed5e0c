/**
 * DWF Webhook Mock
 *
 * Stand-in for the Departmental Workflow webhooks a PACS integration posts
 * IAN, MPPS and UPS messages to. Every accepted payload is stored as-is.
 */

// Core payload model, codec and storage contract
export * from './core';

// Payload stores
export * from './adapters/storage/filesystem';
export * from './adapters/storage/memory';
export * from './adapters/storage/typeorm';

// NestJS module
export * from './modules';

// HTTP client
export * from './client';

// DTOs, Swagger decorators and sample payloads
export * from './_shared';

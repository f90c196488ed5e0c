/**
 * DWF webhook mock core - payload model, codec and storage contract
 * Independent of NestJS and of any storage backend
 */

// Domain
export * from './domain/enums';
export * from './domain/models';
export * from './domain/json';
export * from './domain/endpoints';

// Errors
export * from './errors';

// Body decoding and stored documents
export * from './codec';

// Webhook signatures
export * from './security';

// Storage contract
export * from './interfaces';

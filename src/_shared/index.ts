/**
 * Shared resources
 *
 * Centralized exports for components used across the application
 */

// DTOs
export * from './dto';

// Swagger decorators for clean controllers
export * from './swagger';

// Testing utilities
export * from './testing/sample-payloads';

export * from './memory-payload-store';

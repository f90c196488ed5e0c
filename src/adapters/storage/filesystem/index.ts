export * from './filesystem-payload-store';

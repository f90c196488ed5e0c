export * from './dwf-mock';

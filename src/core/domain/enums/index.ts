export * from './webhook-endpoint.enum';

export * from './stored-record.model';

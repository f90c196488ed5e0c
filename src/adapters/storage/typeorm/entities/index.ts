export * from './stored-record.entity';

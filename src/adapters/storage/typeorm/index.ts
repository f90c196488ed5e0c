export * from './typeorm-payload-store';
export * from './typeorm.config';
export * from './entities';

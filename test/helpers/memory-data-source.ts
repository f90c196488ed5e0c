import { DataType, newDb } from 'pg-mem';
import { DataSource } from 'typeorm';
import { createTypeORMConfig } from '../../src';

/**
 * In-process PostgreSQL for the typeorm store. The returned data source
 * is not initialized yet.
 */
export function createMemoryDataSource(): DataSource {
  const db = newDb({ autoCreateForeignKeyIndices: true });

  // Queried by the typeorm postgres driver on connect
  db.public.registerFunction({
    name: 'current_database',
    implementation: () => 'dwf_mock',
  });
  db.public.registerFunction({
    name: 'version',
    implementation: () => 'PostgreSQL 14.0',
  });
  db.public.registerFunction({
    name: 'obj_description',
    args: [DataType.regclass, DataType.text],
    returns: DataType.text,
    implementation: () => null,
  });

  const dataSource: DataSource = db.adapters.createTypeormDataSource(
    createTypeORMConfig({ url: 'postgres://localhost:5432/dwf_mock', logging: false }),
  );
  return dataSource;
}

import 'dotenv/config';
import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { join } from 'path';
import { validateEnv } from '../config/env.schema';

const env = validateEnv(process.env);

export default new DataSource({
  type: 'postgres',
  url: env.DATABASE_URL,

  // migrations own the schema; never synchronize from the CLI
  synchronize: false,
  logging: env.DB_LOG,

  entities: [join(__dirname, '..', '**', '*.entity.{ts,js}')],
  migrations: [join(__dirname, '..', 'migrations', '*.{ts,js}')],

  ssl: env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : false,
});

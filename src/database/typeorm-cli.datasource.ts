import 'dotenv/config';
import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { join } from 'path';
import { validateEnv } from '../config/env.schema';

const env = validateEnv(process.env);

const isProduction = env.NODE_ENV === 'production';

export default new DataSource({
  type: 'postgres',
  url: env.DATABASE_URL,

  // schema changes only go through migrations
  synchronize: false,
  logging: env.DB_LOG === true,

  entities: [join(__dirname, '..', '**', '*.entity.{ts,js}')],
  migrations: [join(__dirname, '..', 'migrations', '*.{ts,js}')],

  ssl: isProduction ? { rejectUnauthorized: false } : false,
});

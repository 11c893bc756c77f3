import { validateEnv } from './env.schema';

export type LadderConfig = {
  timezone: string;
  enableCrons: boolean;
  replayBatchSize: number;
};

export default () => {
  const env = validateEnv(process.env);

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    databaseUrl: env.DATABASE_URL,
    db: {
      sync: env.DB_SYNC,
      log: env.DB_LOG,
    },
    ladder: {
      timezone: env.LADDER_TIMEZONE,
      enableCrons: env.ENABLE_CRONS,
      replayBatchSize: env.REPLAY_BATCH_SIZE,
    } satisfies LadderConfig,
  };
};

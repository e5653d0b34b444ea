import { sql } from 'drizzle-orm';
import { buildApp } from './app';
import { config } from './config';
import { createDatabase } from './db';
import { LocalBlobStore } from './services/blob-storage.service';
import { systemClock } from './services/clock';
import { DrizzleProposalStore } from './store/drizzle-proposal-store';
import { errorMessage } from './utils/errors';
import { logger, loggerOptions } from './utils/logger';

const start = async () => {
  const { client, db } = createDatabase();

  const verifyDb = async (): Promise<boolean> => {
    try {
      await db.execute(sql`select 1`);
      return true;
    } catch (err) {
      logger.warn({ err }, `[Database] Health check failed: ${errorMessage(err)}`);
      return false;
    }
  };

  const app = buildApp(
    {
      store: new DrizzleProposalStore(db, logger.child({ component: 'store' })),
      blobs: new LocalBlobStore(config.mediaRoot),
      clock: systemClock,
      verifyDb,
    },
    { logger: loggerOptions() },
  );

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'Shutting down...');
    try {
      await app.close();
      await client.end({ timeout: 5 });
      process.exit(0);
    } catch (err) {
      app.log.error({ err }, 'Graceful shutdown failed');
      process.exit(1);
    }
  };
  process.once('SIGINT', signal => void shutdown(signal));
  process.once('SIGTERM', signal => void shutdown(signal));

  try {
    app.log.info('Verifying database connection...');
    if (await verifyDb()) {
      app.log.info('database connected');
    } else {
      app.log.warn('database unreachable; requests touching it will fail until it is back');
    }

    await app.listen({ port: config.port, host: config.host });
    app.log.info({ port: config.port, host: config.host }, 'proposal-service started successfully');
  } catch (err) {
    app.log.error({ err }, `failed to start proposal-service: ${errorMessage(err)}`);
    await client.end({ timeout: 5 });
    process.exit(1);
  }
};

start().catch(err => {
  logger.error({ err }, `failed to start proposal-service: ${errorMessage(err)}`);
  process.exit(1);
});

import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { createDatabase } from '../db';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

async function main() {
    const { client, db } = createDatabase();
    try {
        logger.info('[Migrate] Running migrations...');
        await migrate(db, { migrationsFolder: 'drizzle' });
        logger.info('[Migrate] Migrations complete');
    } finally {
        await client.end({ timeout: 5 });
    }
}

main().catch((err) => {
    logger.error({ err }, `[Migrate] Migration failed: ${errorMessage(err)}`);
    process.exit(1);
});

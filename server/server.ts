import { createApp } from './app.js';
import { loadConfig } from './config/env.config.js';
import { RECONCILED_FIELDS, validateFieldTable } from './config/fields.config.js';
import { MongoSession } from './services/mongo.service.js';
import { errorMessage } from './utils/errors.js';

async function start(): Promise<void> {
    validateFieldTable(RECONCILED_FIELDS);
    const config = loadConfig();
    const session = await MongoSession.open(config.mongo);

    const app = createApp({
        store: session,
        repository: session.admissions,
        spreadsheetPath: config.spreadsheetPath
    });

    const server = app.listen(config.port, () => {
        console.log(`[SERVER] Reconciliation API running on http://localhost:${config.port}`);
    });

    const shutdown = (signal: string) => {
        console.log(`[SERVER] ${signal} received, shutting down`);
        server.close(() => {
            session.close()
                .catch((error: unknown) => console.error('[SERVER] Error closing database session:', errorMessage(error)))
                .finally(() => process.exit(0));
        });
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((error: unknown) => {
    console.error('[SERVER] Failed to start:', errorMessage(error));
    process.exit(1);
});

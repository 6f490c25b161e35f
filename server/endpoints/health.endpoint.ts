import type { Request, Response } from 'express';
import type { DescribableStore } from '../workflows/database.workflow.js';
import { errorMessage } from '../utils/errors.js';

export function createHealthHandler(store: DescribableStore) {
    return async function handleHealth(_req: Request, res: Response) {
        try {
            const info = await store.describe();
            res.json({
                success: true,
                database: {
                    name: info.database,
                    version: info.version,
                    collections: info.collections
                }
            });
        } catch (error) {
            console.error('[GET /api/health] Database unavailable:', errorMessage(error));
            res.status(503).json({ success: false, error: errorMessage(error) });
        }
    };
}

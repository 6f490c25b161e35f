import cors from 'cors';
import express from 'express';
import { createHealthHandler } from './endpoints/health.endpoint.js';
import { createReconciliationHandlers } from './endpoints/reconciliation.endpoint.js';
import type { AdmissionRepository } from './services/admission.types.js';
import type { DescribableStore } from './workflows/database.workflow.js';

export interface AppDeps {
    store: DescribableStore;
    repository: AdmissionRepository;
    spreadsheetPath: string;
}

/**
 * Read-only API over the reconciliation. Nothing here writes to storage.
 */
export function createApp(deps: AppDeps): express.Express {
    const app = express();
    app.use(cors());
    app.use(express.json({ limit: '1mb' }));

    const reconciliation = createReconciliationHandlers(deps);

    app.get('/api/health', createHealthHandler(deps.store));
    app.get('/api/reconciliation', reconciliation.handleReconciliation);
    app.get('/api/reconciliation/report.csv', reconciliation.handleReportCsv);

    return app;
}

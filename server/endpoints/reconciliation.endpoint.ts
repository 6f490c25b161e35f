import type { Request, Response } from 'express';
import type { AdmissionRepository } from '../services/admission.types.js';
import { discrepantRecords, scanRecords, type ScanReport } from '../services/reconciliation/index.js';
import { renderReportCsv } from '../services/report.service.js';
import { loadSpreadsheet } from '../services/spreadsheet.service.js';
import { errorMessage } from '../utils/errors.js';

export interface ReconciliationEndpointDeps {
    repository: AdmissionRepository;
    spreadsheetPath: string;
}

async function scan(deps: ReconciliationEndpointDeps): Promise<ScanReport | null> {
    const rows = await loadSpreadsheet(deps.spreadsheetPath);
    if (rows.size === 0) return null;
    return scanRecords(await deps.repository.findAll(), rows);
}

export function createReconciliationHandlers(deps: ReconciliationEndpointDeps) {
    async function handleReconciliation(_req: Request, res: Response) {
        try {
            console.log('[GET /api/reconciliation] Scanning admissions...');
            const report = await scan(deps);
            if (!report) {
                res.status(404).json({ success: false, error: 'No spreadsheet data available' });
                return;
            }

            res.json({
                success: true,
                summary: {
                    total: report.total,
                    perfectMatches: report.perfectMatches,
                    withDiscrepancies: report.withDiscrepancies,
                    unmatched: report.unmatched,
                    mismatchedFieldCount: report.mismatchedFieldCount
                },
                fieldStats: report.fieldStats,
                discrepancies: discrepantRecords(report).map(result => ({
                    admissionNumber: result.admissionNumber,
                    fields: result.fields
                        .filter(field => !field.match)
                        .map(field => ({
                            field: field.field,
                            path: field.path,
                            storedValue: field.storedValue,
                            externalValue: field.externalValue
                        }))
                }))
            });
        } catch (error) {
            console.error('[GET /api/reconciliation] Error:', error);
            res.status(500).json({ success: false, error: errorMessage(error) });
        }
    }

    async function handleReportCsv(_req: Request, res: Response) {
        try {
            const report = await scan(deps);
            if (!report) {
                res.status(404).json({ success: false, error: 'No spreadsheet data available' });
                return;
            }

            res.setHeader('Content-Type', 'text/csv; charset=utf-8');
            res.setHeader('Content-Disposition', 'attachment; filename="data_validation_report.csv"');
            res.send(renderReportCsv(report));
        } catch (error) {
            console.error('[GET /api/reconciliation/report.csv] Error:', error);
            res.status(500).json({ success: false, error: errorMessage(error) });
        }
    }

    return { handleReconciliation, handleReportCsv };
}

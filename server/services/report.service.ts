import fs from 'fs/promises';
import path from 'path';
import { Parser } from 'json2csv';
import { RECONCILED_FIELDS, type FieldDescriptor } from '../config/fields.config.js';
import type { ScanReport } from './reconciliation/reconciliation.types.js';

export type ReportRow = Record<string, string>;

export function reportColumns(fields: readonly FieldDescriptor[] = RECONCILED_FIELDS): string[] {
    const columns = ['numero_internamento', 'status'];
    for (const field of fields) {
        columns.push(`${field.name}_match`, `${field.name}_db`, `${field.name}_csv`);
    }
    return columns;
}

/**
 * One row per stored record. Per-field columns stay blank for records that
 * are not in the spreadsheet.
 */
export function buildReportRows(report: ScanReport, fields: readonly FieldDescriptor[] = RECONCILED_FIELDS): ReportRow[] {
    return report.results.map(result => {
        const row: ReportRow = {
            numero_internamento: result.admissionNumber === null ? '' : String(result.admissionNumber),
            status: result.status
        };
        for (const field of fields) {
            const compared = result.fields.find(f => f.field === field.name);
            row[`${field.name}_match`] = compared ? String(compared.match) : '';
            row[`${field.name}_db`] = compared?.storedValue ?? '';
            row[`${field.name}_csv`] = compared?.externalValue ?? '';
        }
        return row;
    });
}

export function renderReportCsv(report: ScanReport, fields: readonly FieldDescriptor[] = RECONCILED_FIELDS): string {
    const parser = new Parser<ReportRow>({ fields: reportColumns(fields) });
    return parser.parse(buildReportRows(report, fields));
}

export async function exportReport(report: ScanReport, outputPath: string): Promise<string> {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, renderReportCsv(report), 'utf-8');
    console.log(`[REPORT] Reconciliation report written to ${outputPath}`);
    return outputPath;
}

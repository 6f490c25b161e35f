import { KEY_PATH, RECONCILED_FIELDS, type FieldDescriptor } from '../../config/fields.config.js';
import { readPath } from '../../utils/objectPath.js';
import type { AdmissionRecord } from '../admission.types.js';
import { compareRecord } from './comparator.js';
import { normalizeInteger } from './normalizer.js';
import type { FieldStat, RecordComparison, ScanReport, SpreadsheetIndex } from './reconciliation.types.js';

export function admissionNumberOf(record: AdmissionRecord): number | null {
    return normalizeInteger(readPath(record, KEY_PATH));
}

export function classifyRecord(
    record: AdmissionRecord,
    rowsByKey: SpreadsheetIndex,
    fields: readonly FieldDescriptor[] = RECONCILED_FIELDS
): RecordComparison {
    const admissionNumber = admissionNumberOf(record);
    const row = admissionNumber === null ? undefined : rowsByKey.get(admissionNumber);

    if (!row) {
        return { admissionNumber, status: 'unmatched', fields: [] };
    }

    const compared = compareRecord(record, row, fields);
    const status = compared.some(field => !field.match) ? 'discrepant' : 'perfect';
    return { admissionNumber, status, fields: compared, row };
}

function percentage(count: number, total: number): number {
    return total > 0 ? Math.round((count / total) * 1000) / 10 : 0;
}

/**
 * One pass over the stored records against a prebuilt spreadsheet index.
 * Records without a matching row are counted as unmatched and never compared.
 */
export function scanRecords(
    records: Iterable<AdmissionRecord>,
    rowsByKey: SpreadsheetIndex,
    fields: readonly FieldDescriptor[] = RECONCILED_FIELDS
): ScanReport {
    const results: RecordComparison[] = [];
    const mismatchesByField = new Map<string, number>(fields.map(field => [field.name, 0]));
    let perfectMatches = 0;
    let withDiscrepancies = 0;
    let unmatched = 0;
    let mismatchedFieldCount = 0;

    for (const record of records) {
        const result = classifyRecord(record, rowsByKey, fields);
        results.push(result);

        if (result.status === 'unmatched') {
            unmatched++;
            continue;
        }
        if (result.status === 'perfect') {
            perfectMatches++;
            continue;
        }

        withDiscrepancies++;
        for (const field of result.fields) {
            if (field.match) continue;
            mismatchedFieldCount++;
            mismatchesByField.set(field.field, (mismatchesByField.get(field.field) ?? 0) + 1);
        }
    }

    const fieldStats: FieldStat[] = fields
        .map(field => {
            const mismatches = mismatchesByField.get(field.name) ?? 0;
            return {
                field: field.name,
                label: field.label,
                mismatches,
                percentage: percentage(mismatches, withDiscrepancies)
            };
        })
        .sort((a, b) => b.mismatches - a.mismatches);

    console.log(`[SCANNER] ${results.length} records: ${perfectMatches} perfect, ${withDiscrepancies} with discrepancies, ${unmatched} unmatched.`);

    return {
        total: results.length,
        perfectMatches,
        withDiscrepancies,
        unmatched,
        mismatchedFieldCount,
        fieldStats,
        results
    };
}

export function discrepantRecords(report: ScanReport): RecordComparison[] {
    return report.results.filter(result => result.status === 'discrepant');
}

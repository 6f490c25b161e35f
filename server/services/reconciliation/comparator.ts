import { KEY_PATH, RECONCILED_FIELDS, type FieldDescriptor, type FieldKind } from '../../config/fields.config.js';
import { readPath } from '../../utils/objectPath.js';
import type { AdmissionRecord } from '../admission.types.js';
import { normalizeDate, normalizeInteger, normalizeText } from './normalizer.js';
import type { FieldDiscrepancy, SpreadsheetRow } from './reconciliation.types.js';

export function normalizeByKind(kind: FieldKind, raw: unknown): string | null {
    switch (kind) {
        case 'date':
            return normalizeDate(raw);
        case 'text':
            return normalizeText(raw);
        case 'integer': {
            const value = normalizeInteger(raw);
            return value === null ? null : String(value);
        }
    }
}

/**
 * Year encoded in the first two digits of an admission number:
 * 2401 -> 2024, 24101 -> 2024.
 */
export function yearFromAdmissionNumber(admissionNumber: number): number | null {
    if (admissionNumber < 0) return null;
    const digits = String(admissionNumber);
    return digits.length >= 2 ? 2000 + Number(digits.slice(0, 2)) : null;
}

/**
 * Admission year stored on the document, or derived from the admission
 * number when the document has none.
 */
export function admissionYearOf(record: AdmissionRecord): unknown {
    const stored = record.ano_internamento;
    if (stored !== undefined && stored !== null) return stored;

    const admissionNumber = normalizeInteger(readPath(record, KEY_PATH));
    return admissionNumber === null ? null : yearFromAdmissionNumber(admissionNumber);
}

function comparedValueOf(record: AdmissionRecord, field: FieldDescriptor, storedRaw: unknown): unknown {
    return field.path === 'ano_internamento' ? admissionYearOf(record) : storedRaw;
}

/**
 * Compares one stored admission against its spreadsheet row, field by field.
 * Fields are evaluated independently; the result follows the table order.
 */
export function compareRecord(
    record: AdmissionRecord,
    row: SpreadsheetRow,
    fields: readonly FieldDescriptor[] = RECONCILED_FIELDS
): FieldDiscrepancy[] {
    return fields.map(field => {
        const storedRaw = readPath(record, field.path);
        const externalRaw = row.columns[field.column];
        const storedValue = normalizeByKind(field.kind, comparedValueOf(record, field, storedRaw));
        const externalValue = normalizeByKind(field.kind, externalRaw);

        return {
            field: field.name,
            label: field.label,
            path: field.path,
            column: field.column,
            kind: field.kind,
            storeAs: field.storeAs,
            storedValue,
            externalValue,
            storedRaw,
            externalRaw,
            match: storedValue === externalValue
        };
    });
}

// ============================================================================
// RECONCILIATION LAYER - Type Definitions
// ============================================================================

import type { FieldKind, SpreadsheetColumn, StorageKind } from '../../config/fields.config.js';

/**
 * One row of the authoritative spreadsheet, keyed by admission number.
 */
export interface SpreadsheetRow {
    admissionNumber: number;
    columns: Readonly<Partial<Record<SpreadsheetColumn, string>>>;
}

export type SpreadsheetIndex = ReadonlyMap<number, SpreadsheetRow>;

/**
 * Outcome of comparing one field. `match` is set for every field, matching or
 * not, so callers can compute percentages.
 */
export interface FieldDiscrepancy {
    field: string;
    label: string;
    path: string;
    column: SpreadsheetColumn;
    kind: FieldKind;
    storeAs: StorageKind;
    storedValue: string | null;
    externalValue: string | null;
    /** Value as read from storage; used to guard the write. */
    storedRaw: unknown;
    externalRaw: string | undefined;
    match: boolean;
}

export type RecordStatus = 'perfect' | 'discrepant' | 'unmatched';

export interface RecordComparison {
    admissionNumber: number | null;
    status: RecordStatus;
    fields: FieldDiscrepancy[];
    row?: SpreadsheetRow;
}

export interface FieldStat {
    field: string;
    label: string;
    mismatches: number;
    /** Share of records with discrepancies, 0..100. */
    percentage: number;
}

export interface ScanReport {
    total: number;
    perfectMatches: number;
    withDiscrepancies: number;
    unmatched: number;
    mismatchedFieldCount: number;
    fieldStats: FieldStat[];
    results: RecordComparison[];
}

/**
 * Fields an operator chose to overwrite on one record.
 */
export interface UpdateSelection {
    admissionNumber: number;
    fields: FieldDiscrepancy[];
}

export type ReviewDecision =
    | { kind: 'all' }
    | { kind: 'subset'; indices: number[] }
    | { kind: 'skip' }
    | { kind: 'quit' };

export interface CommitFailure {
    admissionNumber: number;
    message: string;
}

export interface CommitSummary {
    total: number;
    updated: number;
    failed: number;
    skipped: number;
    failures: CommitFailure[];
}

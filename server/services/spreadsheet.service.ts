import fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { KEY_COLUMN, SPREADSHEET_COLUMNS, type SpreadsheetColumn } from '../config/fields.config.js';
import { errorMessage } from '../utils/errors.js';
import { normalizeInteger } from './reconciliation/normalizer.js';
import type { SpreadsheetRow } from './reconciliation/reconciliation.types.js';

const rawRowSchema = z.record(z.string(), z.string());

/**
 * Parses spreadsheet CSV text into an index keyed by admission number.
 * Rows without an integer ID are skipped; a repeated ID keeps the last row.
 */
export function parseSpreadsheet(text: string): Map<number, SpreadsheetRow> {
    const records: unknown = parse(text, {
        columns: true,
        bom: true,
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true
    });

    const index = new Map<number, SpreadsheetRow>();
    if (!Array.isArray(records)) return index;

    records.forEach((record: unknown, i: number) => {
        const line = i + 2;
        const parsed = rawRowSchema.safeParse(record);
        if (!parsed.success) {
            console.warn(`[SPREADSHEET] Line ${line}: unreadable row, skipped.`);
            return;
        }

        const admissionNumber = normalizeInteger(parsed.data[KEY_COLUMN]);
        if (admissionNumber === null) {
            console.warn(`[SPREADSHEET] Line ${line}: invalid ${KEY_COLUMN} "${parsed.data[KEY_COLUMN] ?? ''}", skipped.`);
            return;
        }

        const columns: Partial<Record<SpreadsheetColumn, string>> = {};
        for (const column of SPREADSHEET_COLUMNS) {
            const value = parsed.data[column];
            if (value !== undefined) columns[column] = value;
        }

        if (index.has(admissionNumber)) {
            console.warn(`[SPREADSHEET] Line ${line}: duplicate ${KEY_COLUMN} ${admissionNumber}, replacing earlier row.`);
        }
        index.set(admissionNumber, { admissionNumber, columns });
    });

    return index;
}

/**
 * Loads the authoritative spreadsheet once per run. A missing file yields an
 * empty index; callers treat that as "no spreadsheet data".
 */
export async function loadSpreadsheet(filePath: string): Promise<Map<number, SpreadsheetRow>> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        console.error(`[SPREADSHEET] Could not read ${filePath}:`, errorMessage(error));
        return new Map();
    }

    const index = parseSpreadsheet(text);
    console.log(`[SPREADSHEET] Loaded ${index.size} rows from ${filePath}`);
    return index;
}

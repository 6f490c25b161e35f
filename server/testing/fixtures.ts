import type { SpreadsheetColumn } from '../config/fields.config.js';
import type { AdmissionRecord } from '../services/admission.types.js';
import type { SpreadsheetRow } from '../services/reconciliation/reconciliation.types.js';

/**
 * Admission 2401 with every reconciled field filled in.
 */
export function admission(overrides: Partial<AdmissionRecord> = {}): AdmissionRecord {
    return {
        ano_internamento: 2024,
        internamento: {
            numero_internamento: 2401,
            data_entrada: '2024-01-05',
            data_alta: '2024-02-10',
            destino_alta: 'Domicilio'
        },
        doente: {
            numero_processo: 123456,
            nome: 'Maria Silva',
            data_nascimento: '1950-03-15'
        },
        queimaduras: [{ data: '2024-01-04' }],
        ...overrides
    };
}

/**
 * Spreadsheet row that agrees with `admission()` on every field once normalized.
 */
export function matchingRow(
    admissionNumber = 2401,
    overrides: Partial<Record<SpreadsheetColumn, string>> = {}
): SpreadsheetRow {
    return {
        admissionNumber,
        columns: {
            year: '2024',
            processo: '123456',
            nome: 'MARIA SILVA ',
            data_ent: '05/01/2024',
            data_alta: '10-02-2024',
            destino: 'domicilio',
            data_nasc: '15/03/1950',
            data_queim: '04/01/2024',
            ...overrides
        }
    };
}

export function indexRows(...rows: SpreadsheetRow[]): Map<number, SpreadsheetRow> {
    return new Map(rows.map(row => [row.admissionNumber, row]));
}

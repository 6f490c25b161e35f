import { ConfigurationError } from '../utils/errors.js';

// ============================================================================
// RECONCILED FIELDS - Single table of comparable fields
// ============================================================================
// Adding or removing a comparable field is one entry here.

/** Column holding the natural key (admission number) in the spreadsheet. */
export const KEY_COLUMN = 'ID';

/** Storage path of the natural key in an admission document. */
export const KEY_PATH = 'internamento.numero_internamento';

export const SPREADSHEET_COLUMNS = [
    'year',
    'processo',
    'nome',
    'data_ent',
    'data_alta',
    'destino',
    'data_nasc',
    'data_queim'
] as const;

export type SpreadsheetColumn = typeof SPREADSHEET_COLUMNS[number];

/** How both sides are canonicalized before comparison. */
export type FieldKind = 'date' | 'text' | 'integer';

/** How the spreadsheet value is converted when written back to storage. */
export type StorageKind = 'date' | 'integer' | 'raw';

export interface FieldDescriptor {
    name: string;
    label: string;
    path: string;
    column: SpreadsheetColumn;
    kind: FieldKind;
    storeAs: StorageKind;
}

export const RECONCILED_FIELDS = [
    { name: 'ano_internamento', label: 'Admission year', path: 'ano_internamento', column: 'year', kind: 'integer', storeAs: 'integer' },
    { name: 'numero_processo', label: 'Process number', path: 'doente.numero_processo', column: 'processo', kind: 'integer', storeAs: 'raw' },
    { name: 'nome', label: 'Patient name', path: 'doente.nome', column: 'nome', kind: 'text', storeAs: 'raw' },
    { name: 'data_entrada', label: 'Admission date', path: 'internamento.data_entrada', column: 'data_ent', kind: 'date', storeAs: 'date' },
    { name: 'data_alta', label: 'Discharge date', path: 'internamento.data_alta', column: 'data_alta', kind: 'date', storeAs: 'date' },
    { name: 'destino_alta', label: 'Discharge destination', path: 'internamento.destino_alta', column: 'destino', kind: 'text', storeAs: 'raw' },
    { name: 'data_nascimento', label: 'Birth date', path: 'doente.data_nascimento', column: 'data_nasc', kind: 'date', storeAs: 'date' },
    { name: 'data_queimadura', label: 'Burn date', path: 'queimaduras.0.data', column: 'data_queim', kind: 'date', storeAs: 'date' }
] as const satisfies readonly FieldDescriptor[];

const PATH_SEGMENT = /^(?:[A-Za-z_][A-Za-z0-9_]*|\d+)$/;
const AUDIT_PATHS = ['updated_at', 'updated_from_csv'];

/**
 * Checks the field table once at start-up. Throws ConfigurationError listing
 * every problem found.
 */
export function validateFieldTable(fields: readonly FieldDescriptor[]): void {
    const issues: string[] = [];
    const names = new Set<string>();
    const paths = new Set<string>();
    const known = new Set<string>(SPREADSHEET_COLUMNS);

    if (fields.length === 0) {
        issues.push('no fields declared');
    }

    for (const field of fields) {
        if (names.has(field.name)) issues.push(`duplicate field name "${field.name}"`);
        names.add(field.name);

        if (paths.has(field.path)) issues.push(`duplicate storage path "${field.path}"`);
        paths.add(field.path);

        if (!field.path.split('.').every(segment => PATH_SEGMENT.test(segment))) {
            issues.push(`malformed storage path "${field.path}" for "${field.name}"`);
        }
        if (/^\d+$/.test(field.path.split('.')[0])) {
            issues.push(`storage path "${field.path}" cannot start with an index`);
        }
        if (field.path === KEY_PATH || AUDIT_PATHS.includes(field.path)) {
            issues.push(`storage path "${field.path}" is reserved`);
        }
        if (!known.has(field.column)) {
            issues.push(`unknown spreadsheet column "${field.column}" for "${field.name}"`);
        }
        if (field.storeAs === 'date' && field.kind !== 'date') {
            issues.push(`"${field.name}" is stored as a date but compared as ${field.kind}`);
        }
    }

    if (issues.length > 0) {
        throw new ConfigurationError('Invalid reconciled field table', issues);
    }
}

import { KEY_PATH } from '../config/fields.config.js';
import type {
    AdmissionRecord,
    AdmissionRepository,
    AdmissionUpdate,
    AuditStatus,
    UpdateOutcome
} from '../services/admission.types.js';
import { normalizeDate, normalizeInteger } from '../services/reconciliation/normalizer.js';
import { isPlainRecord, readPath } from '../utils/objectPath.js';

function sameValue(a: unknown, b: unknown): boolean {
    if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
    return a === b;
}

function writePath(target: Record<string, unknown>, path: string, value: unknown): void {
    const segments = path.split('.');
    let current: Record<string, unknown> | unknown[] = target;

    for (let i = 0; i < segments.length - 1; i++) {
        const key = segments[i];
        const child: unknown = Array.isArray(current) ? current[Number(key)] : current[key];

        let container: Record<string, unknown> | unknown[];
        if (isPlainRecord(child) || Array.isArray(child)) {
            container = child;
        } else {
            container = /^\d+$/.test(segments[i + 1]) ? [] : {};
        }

        if (Array.isArray(current)) current[Number(key)] = container;
        else current[key] = container;
        current = container;
    }

    const lastKey = segments[segments.length - 1];
    if (Array.isArray(current)) current[Number(lastKey)] = value;
    else current[lastKey] = value;
}

/**
 * In-process stand-in for the Mongo-backed repository.
 */
export class InMemoryAdmissionRepository implements AdmissionRepository {
    readonly updates: AdmissionUpdate[] = [];
    private records: AdmissionRecord[];
    private failingAdmissions = new Set<number>();

    constructor(records: AdmissionRecord[] = []) {
        this.records = records.map(record => structuredClone(record));
    }

    failWritesFor(admissionNumber: number): void {
        this.failingAdmissions.add(admissionNumber);
    }

    snapshot(): AdmissionRecord[] {
        return this.records.map(record => structuredClone(record));
    }

    private indexOf(admissionNumber: number): number {
        return this.records.findIndex(record => normalizeInteger(readPath(record, KEY_PATH)) === admissionNumber);
    }

    async findAll(): Promise<AdmissionRecord[]> {
        return this.snapshot();
    }

    async findByAdmissionNumber(admissionNumber: number): Promise<AdmissionRecord | null> {
        const index = this.indexOf(admissionNumber);
        return index >= 0 ? structuredClone(this.records[index]) : null;
    }

    async findByProcessNumber(processNumber: number): Promise<AdmissionRecord[]> {
        const admittedOn = (record: AdmissionRecord) => normalizeDate(record.internamento?.data_entrada) ?? '';
        return this.records
            .filter(record => normalizeInteger(record.doente?.numero_processo) === processNumber)
            .sort((a, b) => admittedOn(b).localeCompare(admittedOn(a)))
            .map(record => structuredClone(record));
    }

    async applyUpdate(update: AdmissionUpdate): Promise<UpdateOutcome> {
        this.updates.push(update);
        if (this.failingAdmissions.has(update.admissionNumber)) {
            throw new Error('write concern error');
        }

        const index = this.indexOf(update.admissionNumber);
        if (index < 0) return { matched: false, modified: false };

        const record = this.records[index];
        const guarded = Object.entries(update.guard).every(([path, expected]) =>
            sameValue(readPath(record, path) ?? null, expected)
        );
        if (!guarded) return { matched: false, modified: false };

        for (const [path, value] of Object.entries(update.set)) {
            writePath(record, path, value);
        }
        return { matched: true, modified: true };
    }

    async insert(record: AdmissionRecord): Promise<string> {
        const admissionNumber = normalizeInteger(readPath(record, KEY_PATH));
        if (admissionNumber !== null && this.indexOf(admissionNumber) >= 0) {
            throw new Error(`E11000 duplicate key error: ${admissionNumber}`);
        }
        this.records.push(structuredClone(record));
        return `mem-${this.records.length}`;
    }

    async replace(admissionNumber: number, record: AdmissionRecord): Promise<boolean> {
        const index = this.indexOf(admissionNumber);
        if (index < 0) return false;
        this.records[index] = structuredClone(record);
        return true;
    }

    async ensureIndexes(): Promise<string[]> {
        return ['idx_numero_internamento'];
    }

    async auditStatus(sampleSize = 5): Promise<AuditStatus> {
        const flagged = this.records.filter(record => record.updated_from_csv === true);
        return {
            flagged: flagged.length,
            timestamped: flagged.filter(record => record.updated_at !== undefined).length,
            sample: flagged.slice(0, sampleSize).map(record => ({
                admissionNumber: record.internamento?.numero_internamento ?? null,
                updatedAt: record.updated_at ?? null
            }))
        };
    }
}

import type { OperatorIO } from '../../operator/operator.types.js';
import { errorMessage } from '../../utils/errors.js';
import type { AdmissionRepository, AdmissionUpdate } from '../admission.types.js';
import { normalizeDate, normalizeInteger } from './normalizer.js';
import type { CommitFailure, CommitSummary, FieldDiscrepancy, UpdateSelection } from './reconciliation.types.js';

export interface UpdatePayload {
    update: AdmissionUpdate;
    /** Fields written, in selection order. */
    fields: string[];
    /** Selected fields left out because the spreadsheet has no usable value. */
    omitted: string[];
}

export interface CommitOptions {
    io?: OperatorIO;
    dryRun?: boolean;
    now?: () => Date;
}

/**
 * Spreadsheet value in the type it is stored as, or null when there is
 * nothing to write.
 */
export function convertForStorage(field: FieldDiscrepancy): string | number | Date | null {
    const raw = field.externalRaw;
    switch (field.storeAs) {
        case 'date': {
            const day = normalizeDate(raw);
            return day === null ? null : new Date(`${day}T00:00:00.000Z`);
        }
        case 'integer':
            return normalizeInteger(raw);
        case 'raw':
            return raw !== undefined && raw.trim() !== '' ? raw : null;
    }
}

/**
 * Builds the single `$set` for one record. The guard pins every selected path
 * to the value read during the scan, so a concurrent change turns the write
 * into a no-match instead of overwriting it.
 */
export function buildUpdatePayload(selection: UpdateSelection, now: Date): UpdatePayload | null {
    const set: AdmissionUpdate['set'] = {};
    const guard: AdmissionUpdate['guard'] = {};
    const fields: string[] = [];
    const omitted: string[] = [];

    for (const field of selection.fields) {
        const value = convertForStorage(field);
        if (value === null) {
            omitted.push(field.field);
            continue;
        }
        set[field.path] = value;
        guard[field.path] = field.storedRaw ?? null;
        fields.push(field.field);
    }

    if (fields.length === 0) return null;

    set.updated_at = now.toISOString();
    set.updated_from_csv = true;

    return {
        update: { admissionNumber: selection.admissionNumber, guard, set },
        fields,
        omitted
    };
}

/**
 * Applies the selections one record at a time. A failing record is recorded
 * and the batch carries on.
 */
export async function commitSelections(
    repository: AdmissionRepository,
    selections: readonly UpdateSelection[],
    options: CommitOptions = {}
): Promise<CommitSummary> {
    const { io, dryRun = false, now = () => new Date() } = options;
    const failures: CommitFailure[] = [];
    let updated = 0;
    let skipped = 0;

    const progress = io?.progress(dryRun ? 'Simulating updates' : 'Updating records', selections.length);

    for (const selection of selections) {
        const { admissionNumber } = selection;
        try {
            const payload = buildUpdatePayload(selection, now());

            if (!payload) {
                skipped++;
                console.warn(`[UPDATER] Admission ${admissionNumber}: no spreadsheet values to write, skipped.`);
            } else if (dryRun) {
                skipped++;
                console.log(`[UPDATER] DRY RUN: would update admission ${admissionNumber} (${payload.fields.join(', ')}).`);
            } else {
                const outcome = await repository.applyUpdate(payload.update);
                if (!outcome.matched) {
                    failures.push({
                        admissionNumber,
                        message: 'record changed since it was read, or no longer exists'
                    });
                } else if (!outcome.modified) {
                    failures.push({ admissionNumber, message: 'record not modified' });
                } else {
                    updated++;
                    if (payload.omitted.length > 0) {
                        console.warn(`[UPDATER] Admission ${admissionNumber}: left out ${payload.omitted.join(', ')} (blank in spreadsheet).`);
                    }
                }
            }
        } catch (error) {
            const message = errorMessage(error);
            console.error(`[UPDATER] Error updating admission ${admissionNumber}:`, message);
            failures.push({ admissionNumber, message });
        }
        progress?.advance();
    }

    progress?.done();

    return {
        total: selections.length,
        updated,
        failed: failures.length,
        skipped,
        failures
    };
}

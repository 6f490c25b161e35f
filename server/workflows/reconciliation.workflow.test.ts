import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { AdmissionRecord } from '../services/admission.types.js';
import { admission } from '../testing/fixtures.js';
import { InMemoryAdmissionRepository } from '../testing/inMemoryAdmissionRepository.js';
import { ScriptedOperator } from '../testing/scriptedOperator.js';
import {
    bulkUpdateWorkflow,
    interactiveUpdateWorkflow,
    validateWorkflow,
    verifyWorkflow
} from './reconciliation.workflow.js';
import type { WorkflowContext } from './workflow.types.js';

const NOW = new Date('2024-06-01T12:00:00.000Z');
const CSV = [
    'ID,year,processo,nome,data_ent,data_alta,destino,data_nasc,data_queim',
    '2401,2024,123456,Maria Silva,05/01/2024,10/02/2024,Domicilio,15/03/1950,04/01/2024',
    '2402,2024,123456,Maria Silva,05/01/2024,10/02/2024,Domicilio,15/03/1950,04/01/2024'
].join('\n');

function recordFor(admissionNumber: number, overrides: Partial<AdmissionRecord> = {}): AdmissionRecord {
    const base = admission(overrides);
    return { ...base, internamento: { ...base.internamento, numero_internamento: admissionNumber } };
}

describe('reconciliation workflows', () => {
    let dir: string;
    let repository: InMemoryAdmissionRepository;

    function context(answers: string[]): WorkflowContext & { io: ScriptedOperator } {
        return {
            io: new ScriptedOperator(answers),
            repository,
            spreadsheetPath: path.join(dir, 'admissions.csv'),
            reportPath: path.join(dir, 'reports', 'report.csv'),
            extractedDir: path.join(dir, 'extracted'),
            now: () => NOW
        };
    }

    const shownText = (io: ScriptedOperator) => io.shown.join('\n');

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'workflow-'));
        await fs.writeFile(path.join(dir, 'admissions.csv'), CSV, 'utf-8');
        repository = new InMemoryAdmissionRepository([
            recordFor(2401),
            recordFor(2402, { ano_internamento: 2023 }),
            recordFor(2403)
        ]);
        vi.spyOn(console, 'log').mockImplementation(() => { });
        vi.spyOn(console, 'warn').mockImplementation(() => { });
        vi.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.rm(dir, { recursive: true, force: true });
    });

    describe('validateWorkflow', () => {
        it('summarises the scan and exports the report', async () => {
            const ctx = context(['y', 'y']);

            const report = await validateWorkflow(ctx);

            expect(report?.perfectMatches).toBe(1);
            expect(report?.withDiscrepancies).toBe(1);
            expect(report?.unmatched).toBe(1);
            expect(ctx.io.prompts).toEqual([
                'Show detailed comparison of records with discrepancies?',
                'Export the full report to CSV?'
            ]);
            expect(shownText(ctx.io)).toContain('Admission 2402');
            expect(shownText(ctx.io)).toContain(`Report saved to ${ctx.reportPath}`);
            const csv = await fs.readFile(ctx.reportPath, 'utf-8');
            expect(csv.split(/\r?\n/)).toHaveLength(4);
        });

        it('stops when there is no spreadsheet data', async () => {
            const ctx = { ...context([]), spreadsheetPath: path.join(dir, 'missing.csv') };

            expect(await validateWorkflow(ctx)).toBeNull();
            expect(shownText(ctx.io)).toContain('No spreadsheet data found');
            expect(ctx.io.prompts).toEqual([]);
        });
    });

    describe('interactiveUpdateWorkflow', () => {
        it('writes the selected fields after confirmation and verifies them', async () => {
            const ctx = context(['a', 'y']);

            const summary = await interactiveUpdateWorkflow(ctx);

            expect(summary).toEqual({ total: 1, updated: 1, failed: 0, skipped: 0, failures: [] });
            const stored = repository.snapshot().find(r => r.internamento?.numero_internamento === 2402);
            expect(stored?.ano_internamento).toBe(2024);
            expect(stored?.updated_at).toBe('2024-06-01T12:00:00.000Z');
            expect(shownText(ctx.io)).toContain('Total fields to update: 1');
            expect(shownText(ctx.io)).toContain('Verification results');
        });

        it('writes nothing when the operator cancels', async () => {
            const ctx = context(['a', 'n']);

            expect(await interactiveUpdateWorkflow(ctx)).toBeNull();
            expect(repository.updates).toEqual([]);
            expect(shownText(ctx.io)).toContain('Update cancelled. Nothing was written.');
        });

        it('writes nothing when no record is selected', async () => {
            const ctx = context(['n']);

            expect(await interactiveUpdateWorkflow(ctx)).toBeNull();
            expect(repository.updates).toEqual([]);
            expect(ctx.io.remainingAnswers).toBe(0);
        });
    });

    describe('bulkUpdateWorkflow', () => {
        it('runs as a dry run by default', async () => {
            const ctx = context(['']);

            const summary = await bulkUpdateWorkflow(ctx);

            expect(summary).toEqual({ total: 1, updated: 0, failed: 0, skipped: 1, failures: [] });
            expect(repository.updates).toEqual([]);
            expect(shownText(ctx.io)).toContain('Dry run: nothing was written.');
        });

        it('writes every mismatched field when confirmed twice', async () => {
            const ctx = context(['n', 'y']);

            const summary = await bulkUpdateWorkflow(ctx);

            expect(summary?.updated).toBe(1);
            expect(repository.updates.map(u => u.admissionNumber)).toEqual([2402]);
        });

        it('falls back to a dry run when the live run is not confirmed', async () => {
            const ctx = context(['n', 'n']);

            const summary = await bulkUpdateWorkflow(ctx);

            expect(summary?.skipped).toBe(1);
            expect(repository.updates).toEqual([]);
        });

        it('has nothing to do when every record matches', async () => {
            repository = new InMemoryAdmissionRepository([recordFor(2401)]);
            const ctx = context([]);

            expect(await bulkUpdateWorkflow(ctx)).toBeNull();
            expect(shownText(ctx.io)).toContain('All records match. No updates needed.');
        });
    });

    describe('verifyWorkflow', () => {
        it('reports the audit markers left by updates', async () => {
            repository = new InMemoryAdmissionRepository([
                recordFor(2401, { updated_from_csv: true, updated_at: '2024-06-01T12:00:00.000Z' }),
                recordFor(2402)
            ]);
            const ctx = context([]);

            const status = await verifyWorkflow(ctx);

            expect(status).toEqual({
                flagged: 1,
                timestamped: 1,
                sample: [{ admissionNumber: 2401, updatedAt: '2024-06-01T12:00:00.000Z' }]
            });
            expect(shownText(ctx.io)).toContain('2024-06-01T12:00:00');
        });
    });
});

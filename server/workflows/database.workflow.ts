import chalk from 'chalk';
import type { OperatorIO } from '../operator/operator.types.js';
import {
    renderAdmissionSummary,
    renderDatabaseDescription,
    renderExtractionStatus,
    renderImportSummary,
    renderSubjectList
} from '../operator/render.js';
import type { AdmissionRecord } from '../services/admission.types.js';
import {
    analyzeExtractionStatus,
    importDirectory,
    importSubject,
    type ExtractionStatus,
    type ImportDetail,
    type ImportSummary
} from '../services/importer.service.js';
import { normalizeInteger } from '../services/reconciliation/normalizer.js';
import type { DatabaseDescription } from '../services/mongo.service.js';
import type { WorkflowContext } from './workflow.types.js';

export interface DescribableStore {
    describe(): Promise<DatabaseDescription>;
}

export async function databaseInfoWorkflow(io: OperatorIO, store: DescribableStore): Promise<DatabaseDescription> {
    const info = await store.describe();
    io.show(renderDatabaseDescription(info));
    return info;
}

export async function importWorkflow(ctx: WorkflowContext): Promise<ImportSummary> {
    const { io } = ctx;
    io.show(chalk.bold(`Importing extracted admissions from ${ctx.extractedDir}`));

    const replaceExisting = await io.confirm('Replace admissions that already exist?', false);
    const summary = await importDirectory(ctx.repository, ctx.extractedDir, {
        replaceExisting,
        io,
        now: ctx.now?.()
    });

    io.show(renderImportSummary(summary));
    return summary;
}

const LISTED_NOT_IMPORTED = 30;
const LISTED_NOT_EXTRACTED = 20;

export async function extractionStatusWorkflow(ctx: WorkflowContext): Promise<ExtractionStatus> {
    const { io } = ctx;
    io.show(chalk.bold.yellow('Analyzing extraction and import status...'));

    const status = await analyzeExtractionStatus(ctx.repository, ctx.extractedDir, io);
    io.show(renderExtractionStatus(status));

    const ready = status.notImported;
    if (ready.length > 0 && ready.length <= LISTED_NOT_IMPORTED) {
        if (await io.confirm('Show subjects not yet imported?', false)) {
            io.show(renderSubjectList('Subjects not yet imported', ready, 'Ready to import'));
        }
    } else if (ready.length > 0) {
        io.show(chalk.yellow(`${ready.length} subjects ready to import`));
    }

    const missing = status.notExtracted;
    if (missing.length > 0 && missing.length <= LISTED_NOT_EXTRACTED) {
        if (await io.confirm('Show subjects without extraction?', false)) {
            io.show(renderSubjectList('Subjects without extraction', missing, 'Needs extraction'));
        }
    } else if (missing.length > 0) {
        io.show(chalk.red(`${missing.length} subjects need extraction`));
    }

    return status;
}

export async function importSubjectWorkflow(ctx: WorkflowContext): Promise<ImportDetail> {
    const { io } = ctx;
    const subjectId = (await io.ask('Subject ID to import (4 digits, e.g. 2401)', '')).trim();

    io.show(chalk.cyan(`Importing ${subjectId}...`));
    const detail = await importSubject(ctx.repository, ctx.extractedDir, subjectId, { now: ctx.now?.() });

    switch (detail.status) {
        case 'imported':
        case 'replaced':
            io.show(chalk.green(`✓ Imported ${subjectId}`));
            break;
        case 'skipped':
            io.show(chalk.yellow(`${subjectId} is already in the database`));
            break;
        case 'failed':
            io.show(chalk.red(`✗ Failed to import ${subjectId}: ${detail.message}`));
            break;
    }
    return detail;
}

const SEARCH_KEYS = ['a', 'p'] as const;

/**
 * Looks admissions up by admission number (a) or by patient process number (p).
 */
export async function queryWorkflow(ctx: WorkflowContext): Promise<AdmissionRecord[]> {
    const { io } = ctx;
    const by = await io.choose('Search by admission number (a) or patient process number (p)', SEARCH_KEYS, 'a');
    const label = by === 'a' ? 'Admission number' : 'Process number';

    const value = normalizeInteger(await io.ask(label, ''));
    if (value === null) {
        io.show(chalk.red(`${label} must be a whole number.`));
        return [];
    }

    let records: AdmissionRecord[];
    if (by === 'a') {
        const record = await ctx.repository.findByAdmissionNumber(value);
        records = record ? [record] : [];
    } else {
        records = await ctx.repository.findByProcessNumber(value);
    }

    if (records.length === 0) {
        io.show(chalk.yellow(`No admissions found for ${label.toLowerCase()} ${value}.`));
        return records;
    }

    if (by === 'p') io.show(`Found ${records.length} admission(s) for patient ${value}.`);
    for (const record of records) io.show(renderAdmissionSummary(record));
    return records;
}

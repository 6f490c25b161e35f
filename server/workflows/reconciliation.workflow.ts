import chalk from 'chalk';
import {
    renderAuditStatus,
    renderCommitSummary,
    renderDetailedComparisons,
    renderScanSummary,
    renderSelectionSummary
} from '../operator/render.js';
import type { AuditStatus } from '../services/admission.types.js';
import {
    collectSelections,
    commitSelections,
    scanRecords,
    selectAll,
    type CommitSummary,
    type ScanReport
} from '../services/reconciliation/index.js';
import { exportReport } from '../services/report.service.js';
import { loadSpreadsheet } from '../services/spreadsheet.service.js';
import type { WorkflowContext } from './workflow.types.js';

/**
 * Loads both sides and compares them. Returns null when the spreadsheet has
 * no usable rows.
 */
export async function runScan(ctx: WorkflowContext): Promise<ScanReport | null> {
    const rows = await loadSpreadsheet(ctx.spreadsheetPath);
    if (rows.size === 0) {
        ctx.io.show(chalk.red(`No spreadsheet data found at ${ctx.spreadsheetPath}.`));
        return null;
    }

    const records = await ctx.repository.findAll();
    return scanRecords(records, rows);
}

export async function validateWorkflow(ctx: WorkflowContext): Promise<ScanReport | null> {
    const { io } = ctx;
    const report = await runScan(ctx);
    if (!report) return null;

    io.show(renderScanSummary(report));

    if (report.withDiscrepancies > 0 && await io.confirm('Show detailed comparison of records with discrepancies?', false)) {
        io.show(renderDetailedComparisons(report));
    }

    if (await io.confirm('Export the full report to CSV?', true)) {
        const written = await exportReport(report, ctx.reportPath);
        io.show(chalk.green(`Report saved to ${written}`));
    }

    return report;
}

async function showVerification(ctx: WorkflowContext, summary: CommitSummary): Promise<void> {
    if (summary.updated === 0) return;
    ctx.io.show(chalk.green(`${summary.updated} record(s) updated. Updated records carry 'updated_at' and 'updated_from_csv'.`));
    ctx.io.show(renderAuditStatus(await ctx.repository.auditStatus()));
}

/**
 * Scan, let the operator pick fields record by record, confirm, then write.
 */
export async function interactiveUpdateWorkflow(ctx: WorkflowContext): Promise<CommitSummary | null> {
    const { io } = ctx;

    io.show(chalk.bold.yellow('\nStep 1: Validating data...'));
    const report = await runScan(ctx);
    if (!report) return null;
    io.show(renderScanSummary(report));

    io.show(chalk.bold.yellow('\nStep 2: Review discrepancies and select updates...'));
    const selections = await collectSelections(io, report.results);
    if (selections.length === 0) {
        io.show(chalk.yellow('No updates selected. Nothing was written.'));
        return null;
    }
    io.show(renderSelectionSummary(selections));

    io.show(chalk.bold.yellow('\nStep 3: Execute updates...'));
    if (!await io.confirm('This will modify the database. Continue?', false)) {
        io.show(chalk.yellow('Update cancelled. Nothing was written.'));
        return null;
    }

    const summary = await commitSelections(ctx.repository, selections, { io, now: ctx.now });
    io.show(renderCommitSummary(summary));
    await showVerification(ctx, summary);
    return summary;
}

/**
 * Every mismatched field of every matched record. Runs as a dry run unless
 * the operator opts out twice.
 */
export async function bulkUpdateWorkflow(ctx: WorkflowContext): Promise<CommitSummary | null> {
    const { io } = ctx;
    const report = await runScan(ctx);
    if (!report) return null;
    io.show(renderScanSummary(report));

    const selections = selectAll(report.results);
    if (selections.length === 0) {
        io.show(chalk.green('All records match. No updates needed.'));
        return null;
    }

    const fieldCount = selections.reduce((sum, s) => sum + s.fields.length, 0);
    io.show(`${selections.length} record(s) and ${fieldCount} field(s) would be updated from the spreadsheet.`);

    let dryRun = await io.confirm('Run as a dry run (no writes)?', true);
    if (!dryRun && !await io.confirm('This will overwrite every mismatched field with spreadsheet values. Continue?', false)) {
        io.show(chalk.yellow('Live update cancelled; running as a dry run instead.'));
        dryRun = true;
    }

    const summary = await commitSelections(ctx.repository, selections, { io, dryRun, now: ctx.now });
    io.show(renderCommitSummary(summary));
    if (dryRun) {
        io.show(chalk.dim('Dry run: nothing was written.'));
    } else {
        await showVerification(ctx, summary);
    }
    return summary;
}

export async function verifyWorkflow(ctx: WorkflowContext): Promise<AuditStatus> {
    const status = await ctx.repository.auditStatus();
    ctx.io.show(renderAuditStatus(status));
    return status;
}

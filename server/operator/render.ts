import chalk from 'chalk';
import type { FieldDiscrepancy, ScanReport, CommitSummary, UpdateSelection } from '../services/reconciliation/reconciliation.types.js';
import type { AdmissionRecord, AdmissionSection, AuditStatus, PatientSection } from '../services/admission.types.js';
import type { ExtractionStatus, ImportSummary } from '../services/importer.service.js';
import type { DatabaseDescription } from '../services/mongo.service.js';

export interface Column {
    header: string;
    width: number;
    align?: 'left' | 'right';
}

function fit(text: string, width: number, align: 'left' | 'right'): string {
    const clipped = text.length > width ? `${text.slice(0, width - 1)}…` : text;
    return align === 'right' ? clipped.padStart(width) : clipped.padEnd(width);
}

/**
 * Plain fixed-width table. Cells longer than their column are clipped.
 */
export function renderTable(columns: readonly Column[], rows: readonly string[][], title?: string): string {
    const line = (cells: readonly string[]) =>
        columns.map((col, i) => fit(cells[i] ?? '', col.width, col.align ?? 'left')).join('  ');
    const rule = columns.map(col => '-'.repeat(col.width)).join('  ');

    const out: string[] = [];
    if (title) out.push(chalk.bold(title));
    out.push(chalk.bold(line(columns.map(col => col.header))));
    out.push(rule);
    for (const row of rows) out.push(line(row));
    return out.join('\n');
}

function pct(count: number, total: number): string {
    return total > 0 ? `${((count / total) * 100).toFixed(1)}%` : '0.0%';
}

const empty = (value: string | null) => value ?? '(empty)';

export function renderDiscrepancyTable(discrepancies: readonly FieldDiscrepancy[]): string {
    return renderTable(
        [
            { header: 'No', width: 4, align: 'right' },
            { header: 'Field', width: 22 },
            { header: 'Database value', width: 30 },
            { header: 'Spreadsheet value', width: 30 }
        ],
        discrepancies.map((d, i) => [String(i + 1), d.field, empty(d.storedValue), empty(d.externalValue)]),
        'Field discrepancies'
    );
}

export function renderScanSummary(report: ScanReport): string {
    const { total } = report;
    const summary = renderTable(
        [
            { header: 'Category', width: 30 },
            { header: 'Count', width: 10, align: 'right' },
            { header: 'Percentage', width: 12, align: 'right' }
        ],
        [
            ['Total admissions', String(total), '100.0%'],
            ['Perfect matches', String(report.perfectMatches), pct(report.perfectMatches, total)],
            ['With discrepancies', String(report.withDiscrepancies), pct(report.withDiscrepancies, total)],
            ['Not in spreadsheet', String(report.unmatched), pct(report.unmatched, total)]
        ],
        'Validation summary'
    );

    const mismatching = report.fieldStats.filter(stat => stat.mismatches > 0);
    if (mismatching.length === 0) return summary;

    const fields = renderTable(
        [
            { header: 'Field', width: 22 },
            { header: 'Discrepancies', width: 14, align: 'right' },
            { header: 'Percentage', width: 12, align: 'right' }
        ],
        mismatching.map(stat => [stat.field, String(stat.mismatches), `${stat.percentage.toFixed(1)}%`]),
        'Field-level discrepancies'
    );

    return `${summary}\n\n${fields}\n\nMismatched fields in total: ${report.mismatchedFieldCount}`;
}

/**
 * Side-by-side comparison of the first `limit` records with discrepancies.
 */
export function renderDetailedComparisons(report: ScanReport, limit = 10): string {
    const discrepant = report.results.filter(r => r.status === 'discrepant');
    if (discrepant.length === 0) return chalk.green('All records match the spreadsheet.');

    const blocks = discrepant.slice(0, limit).map(result =>
        renderTable(
            [
                { header: 'Field', width: 20 },
                { header: 'Database', width: 25 },
                { header: 'Spreadsheet', width: 25 },
                { header: 'Match', width: 5 }
            ],
            result.fields.map(f => [
                f.field,
                f.storedValue ?? '',
                f.externalValue ?? '',
                f.match ? chalk.green('yes') : chalk.red('no')
            ]),
            `Admission ${result.admissionNumber ?? 'unknown'}`
        )
    );

    if (discrepant.length > limit) {
        blocks.push(chalk.dim(`... and ${discrepant.length - limit} more records with discrepancies`));
    }
    return blocks.join('\n\n');
}

export function renderCommitSummary(summary: CommitSummary): string {
    const table = renderTable(
        [
            { header: 'Category', width: 22 },
            { header: 'Count', width: 8, align: 'right' }
        ],
        [
            ['Total records', String(summary.total)],
            ['Successfully updated', String(summary.updated)],
            ['Failed', String(summary.failed)],
            ['Skipped', String(summary.skipped)]
        ],
        'Update summary'
    );

    const failures = summary.failures.map(f => chalk.red(`  ✗ ${f.admissionNumber}: ${f.message}`));
    return [table, ...failures].join('\n');
}

/**
 * Records queued for update, first three field names per record.
 */
export function renderSelectionSummary(selections: readonly UpdateSelection[]): string {
    const table = renderTable(
        [
            { header: 'Admission', width: 12 },
            { header: 'Fields to update', width: 64 },
            { header: 'Count', width: 6, align: 'right' }
        ],
        selections.map(selection => {
            const names = selection.fields.map(f => f.field);
            const shown = names.slice(0, 3).join(', ');
            const more = names.length > 3 ? `, ... (+${names.length - 3} more)` : '';
            return [String(selection.admissionNumber), shown + more, String(names.length)];
        }),
        `Records to update: ${selections.length}`
    );

    const totalFields = selections.reduce((sum, selection) => sum + selection.fields.length, 0);
    return `${table}\n\nTotal fields to update: ${totalFields}`;
}

export function renderAuditStatus(status: AuditStatus): string {
    const counts = renderTable(
        [
            { header: 'Metric', width: 40 },
            { header: 'Count', width: 8, align: 'right' }
        ],
        [
            ["Records with 'updated_from_csv' flag", String(status.flagged)],
            ["Records with 'updated_at' timestamp", String(status.timestamped)]
        ],
        'Verification results'
    );
    if (status.sample.length === 0) return counts;

    const sample = renderTable(
        [
            { header: 'Admission', width: 12 },
            { header: 'Updated at', width: 20 }
        ],
        status.sample.map(entry => [
            entry.admissionNumber === null ? 'N/A' : String(entry.admissionNumber),
            entry.updatedAt === null ? 'N/A' : entry.updatedAt.slice(0, 19)
        ]),
        'Sample of updated records'
    );
    return `${counts}\n\n${sample}`;
}

export function renderImportSummary(summary: ImportSummary): string {
    const table = renderTable(
        [
            { header: 'Category', width: 24 },
            { header: 'Count', width: 8, align: 'right' }
        ],
        [
            ['Total files', String(summary.total)],
            ['Imported', String(summary.imported)],
            ['Replaced', String(summary.replaced)],
            ['Skipped (duplicates)', String(summary.skipped)],
            ['Failed', String(summary.failed)]
        ],
        'Import summary'
    );

    const failures = summary.details
        .filter(detail => detail.status === 'failed')
        .map(detail => chalk.red(`  ✗ ${detail.file}: ${detail.message}`));
    return [table, ...failures].join('\n');
}

export function renderDatabaseDescription(info: DatabaseDescription): string {
    const overview = renderTable(
        [
            { header: 'Property', width: 18 },
            { header: 'Value', width: 40 }
        ],
        [
            ['Database', info.database],
            ['Server version', info.version],
            ['Collections', String(info.collections.length)],
            ['Documents', String(info.objects)],
            ['Indexes', String(info.indexes)],
            ['Data size', `${info.dataSizeMb} MB`],
            ['Storage size', `${info.storageSizeMb} MB`]
        ],
        'Database information'
    );
    const collections = renderTable(
        [
            { header: 'Collection', width: 30 },
            { header: 'Documents', width: 10, align: 'right' }
        ],
        info.collections.map(c => [c.name, String(c.documents)])
    );
    return `${overview}\n\n${collections}`;
}

export function renderExtractionStatus(status: ExtractionStatus): string {
    const total = status.totalSubjects;
    const extracted = status.extracted.length;
    const rows = [
        ['Total subjects', String(total), '100.0%'],
        ['With extracted JSON', String(extracted), pct(extracted, total)],
        ['Without extracted JSON', String(status.notExtracted.length), pct(status.notExtracted.length, total)]
    ];
    if (extracted > 0) {
        rows.push(
            ['Imported to database', String(status.imported.length), pct(status.imported.length, extracted)],
            ['Not yet imported', String(status.notImported.length), pct(status.notImported.length, extracted)]
        );
    }

    return renderTable(
        [
            { header: 'Category', width: 30 },
            { header: 'Count', width: 10, align: 'right' },
            { header: 'Percentage', width: 12, align: 'right' }
        ],
        rows,
        'Database import status'
    );
}

export function renderSubjectList(title: string, subjects: readonly string[], note: string): string {
    return renderTable(
        [
            { header: 'Subject ID', width: 12 },
            { header: 'Status', width: 20 }
        ],
        subjects.map(subject => [subject, note]),
        title
    );
}

function display(value: unknown): string {
    if (value instanceof Date) return value.toISOString().slice(0, 10);
    if (typeof value === 'string' || typeof value === 'number') return String(value);
    return 'N/A';
}

const count = (value: unknown) => String(Array.isArray(value) ? value.length : 0);

export function renderAdmissionSummary(record: AdmissionRecord): string {
    const admission: AdmissionSection = record.internamento ?? {};
    const patient: PatientSection = record.doente ?? {};
    const discharge = admission.data_alta === undefined || admission.data_alta === null ? 'ongoing' : display(admission.data_alta);

    return renderTable(
        [
            { header: 'Property', width: 14 },
            { header: 'Value', width: 40 }
        ],
        [
            ['Patient', display(patient.nome)],
            ['Process', display(patient.numero_processo)],
            ['Birth date', display(patient.data_nascimento)],
            ['Dates', `${display(admission.data_entrada)} -> ${discharge}`],
            ['Origin', display(admission.origem_entrada)],
            ['Destination', display(admission.destino_alta)],
            ['Burns', count(record.queimaduras)],
            ['Procedures', count(record.procedimentos)],
            ['Pathologies', count(patient.patologias)],
            ['Medications', count(patient.medicacoes)],
            ['Infections', count(record.infecoes)]
        ],
        `Admission ${display(admission.numero_internamento)}`
    );
}

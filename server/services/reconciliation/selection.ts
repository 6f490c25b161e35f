import type { OperatorIO } from '../../operator/operator.types.js';
import { renderDiscrepancyTable } from '../../operator/render.js';
import { convertForStorage } from './updater.js';
import type { FieldDiscrepancy, RecordComparison, ReviewDecision, UpdateSelection } from './reconciliation.types.js';

export const REVIEW_CHOICES = ['a', 's', 'n', 'q'] as const;
export type ReviewChoice = typeof REVIEW_CHOICES[number];

export type IndexParseResult =
    | { ok: true; indices: number[] }
    | { ok: false; error: string };

/**
 * Parses "1,3, 4" (or "all") against a list of `count` discrepancies.
 * Indices are 1-based; duplicates collapse; order follows the list.
 */
export function parseIndexList(input: string, count: number): IndexParseResult {
    const text = input.trim().toLowerCase();
    if (text === 'all') {
        return { ok: true, indices: Array.from({ length: count }, (_, i) => i + 1) };
    }

    const tokens = text.split(',').map(token => token.trim()).filter(token => token !== '');
    if (tokens.length === 0) {
        return { ok: false, error: 'No field numbers given' };
    }

    const picked = new Set<number>();
    for (const token of tokens) {
        if (!/^\d+$/.test(token)) {
            return { ok: false, error: `"${token}" is not a field number` };
        }
        const index = Number(token);
        if (index < 1 || index > count) {
            return { ok: false, error: `Field number ${index} is out of range (1-${count})` };
        }
        picked.add(index);
    }

    return { ok: true, indices: [...picked].sort((a, b) => a - b) };
}

export function mismatchedFields(comparison: RecordComparison): FieldDiscrepancy[] {
    return comparison.fields.filter(field => !field.match);
}

/**
 * Review of one record: PRESENTED -> ALL_SELECTED | SUBSET_SELECTED | SKIPPED,
 * or QUIT to end the whole review.
 *
 * An invalid subset is reported and the subset prompt is asked again; a blank
 * subset answer skips the record.
 */
export async function reviewRecord(
    io: OperatorIO,
    comparison: RecordComparison,
    position: number,
    total: number
): Promise<ReviewDecision> {
    const discrepancies = mismatchedFields(comparison);

    io.show(`\nRecord ${position} of ${total} - admission ${comparison.admissionNumber ?? 'unknown'}`);
    io.show(renderDiscrepancyTable(discrepancies));
    io.show('Options:');
    io.show('  a - Update all fields for this record');
    io.show('  s - Select specific fields to update');
    io.show('  n - Skip this record');
    io.show('  q - Quit (keep selections so far)');

    const choice = await io.choose<ReviewChoice>('What would you like to do?', REVIEW_CHOICES, 'n');

    switch (choice) {
        case 'q':
            return { kind: 'quit' };
        case 'n':
            return { kind: 'skip' };
        case 'a':
            return { kind: 'all' };
        case 's':
            break;
    }

    for (;;) {
        const answer = await io.ask('Fields to update (comma-separated, e.g. 1,3,4, or "all"; blank to skip)', '');
        if (answer.trim() === '') {
            return { kind: 'skip' };
        }

        const parsed = parseIndexList(answer, discrepancies.length);
        if (parsed.ok) {
            return { kind: 'subset', indices: parsed.indices };
        }
        io.show(`Invalid input: ${parsed.error}. Try again.`);
    }
}

export function selectionFromDecision(
    comparison: RecordComparison,
    decision: ReviewDecision
): UpdateSelection | null {
    if (comparison.admissionNumber === null) return null;

    if (decision.kind === 'skip' || decision.kind === 'quit') return null;

    const discrepancies = mismatchedFields(comparison);
    let fields = discrepancies;
    if (decision.kind === 'subset') {
        const picked = new Set(decision.indices);
        fields = discrepancies.filter((_, i) => picked.has(i + 1));
    }

    return fields.length > 0 ? { admissionNumber: comparison.admissionNumber, fields } : null;
}

/**
 * Walks every discrepant record and gathers the operator's selections.
 * Quitting keeps what was selected before.
 */
export async function collectSelections(
    io: OperatorIO,
    comparisons: readonly RecordComparison[]
): Promise<UpdateSelection[]> {
    const candidates = comparisons.filter(c => c.status === 'discrepant' && c.admissionNumber !== null);
    const selections: UpdateSelection[] = [];

    if (candidates.length === 0) {
        io.show('All records match. No updates needed.');
        return selections;
    }

    io.show(`Found ${candidates.length} record(s) with discrepancies.`);

    for (const [i, comparison] of candidates.entries()) {
        const decision = await reviewRecord(io, comparison, i + 1, candidates.length);
        if (decision.kind === 'quit') {
            io.show('Stopping selection.');
            break;
        }

        const selection = selectionFromDecision(comparison, decision);
        if (selection && !selection.fields.some(field => convertForStorage(field) !== null)) {
            io.show('No valid fields selected: the spreadsheet has no value for them. Skipping this record.');
        } else if (selection) {
            selections.push(selection);
            io.show(`Queued ${selection.fields.length} field(s) for update.`);
        } else {
            io.show('Skipping this record.');
        }
    }

    return selections;
}

/**
 * Non-interactive selection of every discrepant field of every matched record.
 */
export function selectAll(comparisons: readonly RecordComparison[]): UpdateSelection[] {
    const selections: UpdateSelection[] = [];
    for (const comparison of comparisons) {
        if (comparison.status !== 'discrepant') continue;
        const selection = selectionFromDecision(comparison, { kind: 'all' });
        if (selection) selections.push(selection);
    }
    return selections;
}

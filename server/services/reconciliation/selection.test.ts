import { describe, expect, it } from 'vitest';
import { admission, indexRows, matchingRow } from '../../testing/fixtures.js';
import { ScriptedOperator } from '../../testing/scriptedOperator.js';
import { classifyRecord } from './scanner.js';
import { collectSelections, parseIndexList, reviewRecord, selectAll, selectionFromDecision } from './selection.js';

/** Admission with four mismatching fields: year, process number, name, admission date. */
function discrepant(admissionNumber = 2401) {
    const record = admission({
        ano_internamento: 2023,
        internamento: { numero_internamento: admissionNumber, data_entrada: '2023-12-31', data_alta: '2024-02-10', destino_alta: 'Domicilio' },
        doente: { numero_processo: 1, nome: 'Other', data_nascimento: '1950-03-15' }
    });
    return classifyRecord(record, indexRows(matchingRow(admissionNumber)));
}

const fieldNames = (selection: { fields: Array<{ field: string }> } | null | undefined) =>
    selection?.fields.map(f => f.field);

describe('parseIndexList', () => {
    it('accepts "all"', () => {
        expect(parseIndexList(' ALL ', 3)).toEqual({ ok: true, indices: [1, 2, 3] });
    });

    it('collapses duplicates and sorts', () => {
        expect(parseIndexList(' 3, 1,3 ', 4)).toEqual({ ok: true, indices: [1, 3] });
    });

    it('rejects empty lists, non-numbers and out-of-range numbers', () => {
        expect(parseIndexList(',,', 4)).toEqual({ ok: false, error: 'No field numbers given' });
        expect(parseIndexList('1,two', 4)).toEqual({ ok: false, error: '"two" is not a field number' });
        expect(parseIndexList('0', 4)).toEqual({ ok: false, error: 'Field number 0 is out of range (1-4)' });
        expect(parseIndexList('5', 4)).toEqual({ ok: false, error: 'Field number 5 is out of range (1-4)' });
    });
});

describe('reviewRecord', () => {
    it('presents the discrepancies before asking', async () => {
        const io = new ScriptedOperator(['n']);
        await reviewRecord(io, discrepant(), 1, 2);

        expect(io.shown[0]).toBe('\nRecord 1 of 2 - admission 2401');
        expect(io.prompts).toEqual(['What would you like to do?']);
    });

    it('skips on a blank answer', async () => {
        const io = new ScriptedOperator(['']);
        expect(await reviewRecord(io, discrepant(), 1, 1)).toEqual({ kind: 'skip' });
    });

    it('asks again after an unknown choice', async () => {
        const io = new ScriptedOperator(['z', 'A']);

        expect(await reviewRecord(io, discrepant(), 1, 1)).toEqual({ kind: 'all' });
        expect(io.shown).toContain('Please select one of: a, s, n, q');
    });

    it('re-asks for the subset after invalid input', async () => {
        const io = new ScriptedOperator(['s', '9', 'x', '2,2']);

        expect(await reviewRecord(io, discrepant(), 1, 1)).toEqual({ kind: 'subset', indices: [2] });
        expect(io.shown).toContain('Invalid input: Field number 9 is out of range (1-4). Try again.');
        expect(io.shown).toContain('Invalid input: "x" is not a field number. Try again.');
        expect(io.prompts).toHaveLength(4);
    });

    it('skips when the subset answer is blank', async () => {
        const io = new ScriptedOperator(['s', '  ']);
        expect(await reviewRecord(io, discrepant(), 1, 1)).toEqual({ kind: 'skip' });
    });
});

describe('selectionFromDecision', () => {
    it('keeps only the picked discrepancies, in list order', () => {
        const selection = selectionFromDecision(discrepant(), { kind: 'subset', indices: [3, 1] });

        expect(selection?.admissionNumber).toBe(2401);
        expect(fieldNames(selection)).toEqual(['ano_internamento', 'nome']);
    });

    it('selects nothing for skip and quit', () => {
        expect(selectionFromDecision(discrepant(), { kind: 'skip' })).toBeNull();
        expect(selectionFromDecision(discrepant(), { kind: 'quit' })).toBeNull();
    });
});

describe('collectSelections', () => {
    it('gathers one selection per accepted record', async () => {
        const io = new ScriptedOperator(['a', 'n', 's', '1,3']);
        const selections = await collectSelections(io, [discrepant(2401), discrepant(2402), discrepant(2403)]);

        expect(selections.map(s => s.admissionNumber)).toEqual([2401, 2403]);
        expect(fieldNames(selections[0])).toEqual(['ano_internamento', 'numero_processo', 'nome', 'data_entrada']);
        expect(fieldNames(selections[1])).toEqual(['ano_internamento', 'nome']);
        expect(io.shown).toContain('Found 3 record(s) with discrepancies.');
        expect(io.shown).toContain('Queued 4 field(s) for update.');
        expect(io.shown).toContain('Skipping this record.');
        expect(io.remainingAnswers).toBe(0);
    });

    it('keeps earlier selections when the operator quits', async () => {
        const io = new ScriptedOperator(['a', 'q']);
        const selections = await collectSelections(io, [discrepant(2401), discrepant(2402), discrepant(2403)]);

        expect(selections.map(s => s.admissionNumber)).toEqual([2401]);
        expect(io.shown).toContain('Stopping selection.');
        expect(io.prompts).toHaveLength(2);
    });

    it('leaves earlier selections intact after invalid subset input', async () => {
        const io = new ScriptedOperator(['s', '2', 's', 'oops', '']);
        const selections = await collectSelections(io, [discrepant(2401), discrepant(2402)]);

        expect(selections).toHaveLength(1);
        expect(fieldNames(selections[0])).toEqual(['numero_processo']);
    });

    it('does not queue a record whose selected cells are all blank', async () => {
        const record = admission({ doente: { numero_processo: 123456, nome: 'Other', data_nascimento: '1950-03-15' } });
        const blankName = classifyRecord(record, indexRows(matchingRow(2401, { nome: '' })));
        const io = new ScriptedOperator(['a']);

        expect(await collectSelections(io, [blankName])).toEqual([]);
        expect(io.shown).toContain('No valid fields selected: the spreadsheet has no value for them. Skipping this record.');
    });

    it('only reviews discrepant records', async () => {
        const perfect = classifyRecord(admission(), indexRows(matchingRow()));
        const unmatched = classifyRecord(admission(), indexRows());
        const io = new ScriptedOperator();

        expect(await collectSelections(io, [perfect, unmatched])).toEqual([]);
        expect(io.shown).toEqual(['All records match. No updates needed.']);
    });
});

describe('selectAll', () => {
    it('selects every mismatched field of every discrepant record', () => {
        const perfect = classifyRecord(admission(), indexRows(matchingRow()));
        const selections = selectAll([perfect, discrepant(2402)]);

        expect(selections).toHaveLength(1);
        expect(selections[0].admissionNumber).toBe(2402);
        expect(fieldNames(selections[0])).toEqual(['ano_internamento', 'numero_processo', 'nome', 'data_entrada']);
    });
});

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { KEY_PATH } from '../config/fields.config.js';
import type { OperatorIO } from '../operator/operator.types.js';
import { errorMessage } from '../utils/errors.js';
import { readPath } from '../utils/objectPath.js';
import type { AdmissionRecord, AdmissionRepository } from './admission.types.js';
import { normalizeDate, normalizeInteger } from './reconciliation/normalizer.js';

// ============================================================================
// IMPORTER - Extracted admission JSON into the admissions collection
// ============================================================================

const SUBJECT_DIR = /^\d{4}$/;
const EXTRACTED_SUFFIX = '_extracted.json';

const storedValue = z.union([z.string(), z.number(), z.null()]).optional();

const extractedSchema = z.object({
    internamento: z.object({
        numero_internamento: z.union([z.number().int(), z.string().regex(/^\d+$/)]),
        data_entrada: z.string().nullish(),
        data_alta: storedValue,
        destino_alta: storedValue
    }).passthrough(),
    doente: z.object({
        numero_processo: storedValue,
        nome: storedValue,
        data_nascimento: storedValue
    }).passthrough(),
    patologias: z.array(z.unknown()).default([]),
    medicacoes: z.array(z.unknown()).default([]),
    queimaduras: z.array(z.object({ data: storedValue }).passthrough()).default([]),
    procedimentos: z.array(z.unknown()).default([]),
    antibioticos: z.array(z.unknown()).default([]),
    infecoes: z.array(z.unknown()).default([]),
    traumas: z.array(z.unknown()).default([]),
    source_file: z.string().nullish(),
    extraction_date: z.string().nullish()
});

export type ExtractedAdmission = z.infer<typeof extractedSchema>;

export type ImportStatus = 'imported' | 'replaced' | 'skipped' | 'failed';

export interface ImportDetail {
    file: string;
    admissionNumber: number | null;
    status: ImportStatus;
    message: string;
}

export interface ImportSummary {
    total: number;
    imported: number;
    replaced: number;
    skipped: number;
    failed: number;
    details: ImportDetail[];
}

/** Subject folders by stage: extracted or not, and extracted ones imported or not. */
export interface ExtractionStatus {
    totalSubjects: number;
    extracted: string[];
    notExtracted: string[];
    imported: string[];
    notImported: string[];
}

export interface ImportOptions {
    replaceExisting?: boolean;
    io?: OperatorIO;
    now?: Date;
}

export function parseExtractedAdmission(data: unknown): ExtractedAdmission {
    const parsed = extractedSchema.safeParse(data);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new Error(`Invalid extracted admission: ${issues.join('; ')}`);
    }
    return parsed.data;
}

function yearOf(admissionDate: string | null | undefined): number | null {
    const day = normalizeDate(admissionDate);
    return day === null ? null : Number(day.slice(0, 4));
}

/**
 * Shapes one extracted admission into the stored document: pathologies and
 * medications embed under `doente`, clinical lists stay as arrays.
 */
export function transformForStorage(data: ExtractedAdmission, now: Date = new Date()): AdmissionRecord {
    return {
        internamento: data.internamento,
        doente: {
            ...data.doente,
            patologias: data.patologias,
            medicacoes: data.medicacoes
        },
        queimaduras: data.queimaduras,
        procedimentos: data.procedimentos,
        antibioticos: data.antibioticos,
        infecoes: data.infecoes,
        traumas: data.traumas,
        source_file: data.source_file ?? null,
        extraction_date: data.extraction_date ?? null,
        import_date: now.toISOString(),
        ano_internamento: yearOf(data.internamento.data_entrada),
        tem_queimaduras: data.queimaduras.length > 0,
        tem_procedimentos: data.procedimentos.length > 0,
        tem_infecoes: data.infecoes.length > 0
    };
}

export async function importFile(
    repository: AdmissionRepository,
    filePath: string,
    options: ImportOptions = {}
): Promise<ImportDetail> {
    let data: ExtractedAdmission;
    try {
        data = parseExtractedAdmission(JSON.parse(await fs.readFile(filePath, 'utf-8')));
    } catch (error) {
        console.error(`[IMPORTER] Could not load ${filePath}:`, errorMessage(error));
        return { file: filePath, admissionNumber: null, status: 'failed', message: errorMessage(error) };
    }

    const document = transformForStorage(data, options.now);
    const admissionNumber = normalizeInteger(data.internamento.numero_internamento);
    if (admissionNumber === null) {
        return { file: filePath, admissionNumber: null, status: 'failed', message: 'Admission number is not an integer' };
    }

    try {
        const existing = await repository.findByAdmissionNumber(admissionNumber);
        if (existing) {
            if (!options.replaceExisting) {
                return { file: filePath, admissionNumber, status: 'skipped', message: `Admission ${admissionNumber} already exists` };
            }
            await repository.replace(admissionNumber, document);
            console.log(`[IMPORTER] Replaced admission ${admissionNumber}`);
            return { file: filePath, admissionNumber, status: 'replaced', message: `Admission ${admissionNumber} replaced` };
        }

        const id = await repository.insert(document);
        console.log(`[IMPORTER] Inserted admission ${admissionNumber} (${id})`);
        return { file: filePath, admissionNumber, status: 'imported', message: `Admission ${admissionNumber} imported` };
    } catch (error) {
        console.error(`[IMPORTER] Import of admission ${admissionNumber} failed:`, errorMessage(error));
        return { file: filePath, admissionNumber, status: 'failed', message: errorMessage(error) };
    }
}

export function isSubjectId(value: string): boolean {
    return SUBJECT_DIR.test(value);
}

export function extractedFileFor(directory: string, subjectId: string): string {
    return path.join(directory, subjectId, `${subjectId}${EXTRACTED_SUFFIX}`);
}

const isFile = (filePath: string) => fs.stat(filePath).then(stats => stats.isFile(), () => false);

async function listSubjects(directory: string): Promise<string[]> {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    return entries
        .filter(entry => entry.isDirectory() && isSubjectId(entry.name))
        .map(entry => entry.name)
        .sort();
}

/**
 * Lists `<dir>/<NNNN>/<id>_extracted.json` files in subject order.
 */
export async function findExtractedFiles(directory: string): Promise<string[]> {
    const files: string[] = [];
    for (const subject of await listSubjects(directory)) {
        const subjectDir = path.join(directory, subject);
        const names = (await fs.readdir(subjectDir)).filter(name => name.endsWith(EXTRACTED_SUFFIX)).sort();
        files.push(...names.map(name => path.join(subjectDir, name)));
    }
    return files;
}

/**
 * Sorts every subject folder into extracted / not extracted, and each
 * extracted one into imported / not imported by looking its admission up.
 * A file that cannot be read counts as not imported.
 */
export async function analyzeExtractionStatus(
    repository: AdmissionRepository,
    directory: string,
    io?: OperatorIO
): Promise<ExtractionStatus> {
    const status: ExtractionStatus = { totalSubjects: 0, extracted: [], notExtracted: [], imported: [], notImported: [] };

    let subjects: string[];
    try {
        subjects = await listSubjects(directory);
    } catch (error) {
        console.error(`[IMPORTER] Cannot read ${directory}:`, errorMessage(error));
        return status;
    }
    status.totalSubjects = subjects.length;

    const progress = io?.progress('Analyzing extraction status', subjects.length);
    for (const subject of subjects) {
        const file = extractedFileFor(directory, subject);
        if (await isFile(file)) {
            status.extracted.push(subject);
            try {
                const data: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));
                const admissionNumber = normalizeInteger(readPath(data, KEY_PATH));
                const stored = admissionNumber === null ? null : await repository.findByAdmissionNumber(admissionNumber);
                (stored ? status.imported : status.notImported).push(subject);
            } catch (error) {
                console.warn(`[IMPORTER] Could not check ${subject}:`, errorMessage(error));
                status.notImported.push(subject);
            }
        } else {
            status.notExtracted.push(subject);
        }
        progress?.advance();
    }
    progress?.done();

    console.log(`[IMPORTER] ${status.totalSubjects} subjects: ${status.extracted.length} extracted, ${status.imported.length} imported`);
    return status;
}

/**
 * Imports one subject's `<id>/<id>_extracted.json`. Existing admissions are
 * skipped unless `replaceExisting` is set.
 */
export async function importSubject(
    repository: AdmissionRepository,
    directory: string,
    subjectId: string,
    options: ImportOptions = {}
): Promise<ImportDetail> {
    const file = extractedFileFor(directory, subjectId);
    if (!isSubjectId(subjectId)) {
        return { file, admissionNumber: null, status: 'failed', message: `Invalid subject ID "${subjectId}": must be 4 digits` };
    }
    if (!(await isFile(file))) {
        return { file, admissionNumber: null, status: 'failed', message: `Extracted JSON not found: ${file}` };
    }

    await repository.ensureIndexes();
    return importFile(repository, file, options);
}

export async function importDirectory(
    repository: AdmissionRepository,
    directory: string,
    options: ImportOptions = {}
): Promise<ImportSummary> {
    const summary: ImportSummary = { total: 0, imported: 0, replaced: 0, skipped: 0, failed: 0, details: [] };

    let files: string[];
    try {
        files = await findExtractedFiles(directory);
    } catch (error) {
        console.error(`[IMPORTER] Cannot read ${directory}:`, errorMessage(error));
        return summary;
    }

    if (files.length === 0) {
        console.warn(`[IMPORTER] No extracted files found in ${directory}`);
        return summary;
    }

    await repository.ensureIndexes();

    const progress = options.io?.progress('Importing files', files.length);
    for (const file of files) {
        const detail = await importFile(repository, file, options);
        summary.details.push(detail);
        summary[detail.status]++;
        progress?.advance();
    }
    progress?.done();

    summary.total = files.length;
    console.log(`[IMPORTER] ${summary.total} files: ${summary.imported} imported, ${summary.replaced} replaced, ${summary.skipped} skipped, ${summary.failed} failed`);
    return summary;
}

// ============================================================================
// ADMISSIONS - Stored document shape and repository contract
// ============================================================================

/** Scalar values that may sit at a reconciled storage path. */
export type StoredValue = string | number | Date | null | undefined;

export interface AdmissionSection {
    numero_internamento?: number | string | null;
    data_entrada?: StoredValue;
    data_alta?: StoredValue;
    destino_alta?: StoredValue;
    [key: string]: unknown;
}

export interface PatientSection {
    numero_processo?: StoredValue;
    nome?: StoredValue;
    data_nascimento?: StoredValue;
    patologias?: unknown[];
    medicacoes?: unknown[];
    [key: string]: unknown;
}

export interface BurnEntry {
    data?: StoredValue;
    [key: string]: unknown;
}

/**
 * One hospital admission as persisted in the `internamentos` collection.
 * Every section may be missing on malformed imports.
 */
export interface AdmissionRecord {
    ano_internamento?: number | null;
    internamento?: AdmissionSection;
    doente?: PatientSection;
    queimaduras?: BurnEntry[];
    procedimentos?: unknown[];
    antibioticos?: unknown[];
    infecoes?: unknown[];
    traumas?: unknown[];
    source_file?: string | null;
    extraction_date?: string | null;
    import_date?: string;
    tem_queimaduras?: boolean;
    tem_procedimentos?: boolean;
    tem_infecoes?: boolean;
    updated_at?: string;
    updated_from_csv?: boolean;
    [key: string]: unknown;
}

/**
 * A single-document update: `guard` holds the values the document must still
 * carry for the write to apply.
 */
export interface AdmissionUpdate {
    admissionNumber: number;
    guard: Record<string, unknown>;
    set: Record<string, string | number | boolean | Date>;
}

export interface UpdateOutcome {
    matched: boolean;
    modified: boolean;
}

export interface AuditStatus {
    flagged: number;
    timestamped: number;
    sample: Array<{ admissionNumber: number | string | null; updatedAt: string | null }>;
}

export interface AdmissionRepository {
    findAll(): Promise<AdmissionRecord[]>;
    findByAdmissionNumber(admissionNumber: number): Promise<AdmissionRecord | null>;
    /** Every admission of one patient, latest admission first. */
    findByProcessNumber(processNumber: number): Promise<AdmissionRecord[]>;
    /** Applies one atomic update. Never split across operations. */
    applyUpdate(update: AdmissionUpdate): Promise<UpdateOutcome>;
    insert(record: AdmissionRecord): Promise<string>;
    replace(admissionNumber: number, record: AdmissionRecord): Promise<boolean>;
    ensureIndexes(): Promise<string[]>;
    auditStatus(sampleSize?: number): Promise<AuditStatus>;
}

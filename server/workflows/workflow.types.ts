import type { OperatorIO } from '../operator/operator.types.js';
import type { AdmissionRepository } from '../services/admission.types.js';

/**
 * Everything a menu option needs. Built once per run by the CLI; tests
 * pass a scripted operator and an in-memory repository.
 */
export interface WorkflowContext {
    io: OperatorIO;
    repository: AdmissionRepository;
    spreadsheetPath: string;
    reportPath: string;
    extractedDir: string;
    now?: () => Date;
}

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

const envSchema = z.object({
    MONGO_URI: z.string().min(1).default('mongodb://localhost:27017'),
    MONGO_DB: z.string().min(1).default('UQ'),
    MONGO_COLLECTION: z.string().min(1).default('internamentos'),
    MONGO_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    SPREADSHEET_PATH: z.string().min(1).default('./csv/BD_doentes_clean.csv'),
    REPORT_PATH: z.string().min(1).default('./reports/data_validation_report.csv'),
    EXTRACTED_DIR: z.string().min(1).default('./pdf/output'),
    PORT: z.coerce.number().int().min(0).max(65535).default(5000)
});

export interface MongoConfig {
    uri: string;
    database: string;
    collection: string;
    timeoutMs: number;
}

export interface AppConfig {
    mongo: MongoConfig;
    spreadsheetPath: string;
    reportPath: string;
    extractedDir: string;
    port: number;
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError('Invalid environment', issues);
    }

    const e = parsed.data;
    return {
        mongo: {
            uri: e.MONGO_URI,
            database: e.MONGO_DB,
            collection: e.MONGO_COLLECTION,
            timeoutMs: e.MONGO_TIMEOUT_MS
        },
        spreadsheetPath: e.SPREADSHEET_PATH,
        reportPath: e.REPORT_PATH,
        extractedDir: e.EXTRACTED_DIR,
        port: e.PORT
    };
}

/**
 * Reads `.env` (if present) into the process environment and validates it.
 */
export function loadConfig(): AppConfig {
    dotenv.config();
    return parseConfig(process.env);
}

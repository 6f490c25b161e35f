import { MongoClient, type Collection, type Db, type Document } from 'mongodb';
import type { MongoConfig } from '../config/env.config.js';
import { KEY_PATH } from '../config/fields.config.js';
import { StorageConnectionError, errorMessage } from '../utils/errors.js';
import { retryWithBackoff, type RetryOptions } from '../utils/retryWithBackoff.js';
import type {
    AdmissionRecord,
    AdmissionRepository,
    AdmissionUpdate,
    AuditStatus,
    UpdateOutcome
} from './admission.types.js';

export interface CollectionInfo {
    name: string;
    documents: number;
}

export interface DatabaseDescription {
    host: string;
    database: string;
    version: string;
    collections: CollectionInfo[];
    dataSizeMb: number;
    storageSizeMb: number;
    indexes: number;
    objects: number;
    timestamp: string;
}

const INDEXES: Array<{ key: Record<string, 1 | -1>; name: string; unique?: boolean }> = [
    { key: { [KEY_PATH]: 1 }, name: 'idx_numero_internamento', unique: true },
    { key: { 'doente.numero_processo': 1 }, name: 'idx_patient_processo' },
    { key: { 'internamento.data_entrada': -1 }, name: 'idx_data_entrada' },
    { key: { 'doente.nome': 1 }, name: 'idx_patient_name' },
    { key: { 'doente.numero_processo': 1, 'internamento.data_entrada': -1 }, name: 'idx_patient_date' },
    { key: { source_file: 1 }, name: 'idx_source_file' },
    { key: { extraction_date: -1 }, name: 'idx_extraction_date' }
];

const toMb = (bytes: unknown) => (typeof bytes === 'number' ? Math.round((bytes / (1024 * 1024)) * 100) / 100 : 0);

/**
 * Matches the admission whether its number was stored as a number or a string.
 */
function keyFilter(admissionNumber: number): Document {
    return numberFilter(KEY_PATH, admissionNumber);
}

function numberFilter(path: string, value: number): Document {
    return { [path]: { $in: [value, String(value)] } };
}

export class MongoAdmissionRepository implements AdmissionRepository {
    constructor(private collection: Collection<Document>) { }

    async findAll(): Promise<AdmissionRecord[]> {
        return this.collection.find({}).toArray();
    }

    async findByAdmissionNumber(admissionNumber: number): Promise<AdmissionRecord | null> {
        return this.collection.findOne(keyFilter(admissionNumber));
    }

    async findByProcessNumber(processNumber: number): Promise<AdmissionRecord[]> {
        return this.collection
            .find(numberFilter('doente.numero_processo', processNumber))
            .sort({ 'internamento.data_entrada': -1 })
            .toArray();
    }

    async applyUpdate(update: AdmissionUpdate): Promise<UpdateOutcome> {
        const filter: Document = { ...keyFilter(update.admissionNumber), ...update.guard };
        const result = await this.collection.updateOne(filter, { $set: update.set });
        return { matched: result.matchedCount > 0, modified: result.modifiedCount > 0 };
    }

    async insert(record: AdmissionRecord): Promise<string> {
        const result = await this.collection.insertOne({ ...record });
        return result.insertedId.toString();
    }

    async replace(admissionNumber: number, record: AdmissionRecord): Promise<boolean> {
        const result = await this.collection.replaceOne(keyFilter(admissionNumber), { ...record });
        return result.matchedCount > 0;
    }

    async ensureIndexes(): Promise<string[]> {
        const created: string[] = [];
        for (const index of INDEXES) {
            created.push(await this.collection.createIndex(index.key, { name: index.name, unique: index.unique ?? false }));
        }
        console.log(`[MONGO] Ensured ${created.length} indexes on ${this.collection.collectionName}`);
        return created;
    }

    async auditStatus(sampleSize = 5): Promise<AuditStatus> {
        const flagged = await this.collection.countDocuments({ updated_from_csv: true });
        const timestamped = await this.collection.countDocuments({ updated_from_csv: true, updated_at: { $exists: true } });
        const sample = await this.collection.find({ updated_from_csv: true }).limit(sampleSize).toArray();

        return {
            flagged,
            timestamped,
            sample: sample.map((doc: AdmissionRecord) => {
                const admissionNumber = doc.internamento?.numero_internamento;
                return {
                    admissionNumber: admissionNumber ?? null,
                    updatedAt: typeof doc.updated_at === 'string' ? doc.updated_at : null
                };
            })
        };
    }
}

/**
 * One connection to the admissions database. Open it, use `admissions`, and
 * close it; `withMongoSession` does the closing for you.
 */
export class MongoSession {
    readonly admissions: AdmissionRepository;
    private closed = false;

    private constructor(private client: MongoClient, private db: Db, private config: MongoConfig) {
        this.admissions = new MongoAdmissionRepository(db.collection(config.collection));
    }

    static async open(config: MongoConfig, retry: RetryOptions = {}): Promise<MongoSession> {
        const client = new MongoClient(config.uri, {
            serverSelectionTimeoutMS: config.timeoutMs,
            connectTimeoutMS: config.timeoutMs
        });

        console.log(`[MONGO] Connecting to ${config.database}...`);
        try {
            await retryWithBackoff(async () => {
                await client.connect();
                await client.db('admin').command({ ping: 1 });
            }, {
                onRetry: (attempt, error, wait) =>
                    console.warn(`[MONGO] Connection attempt ${attempt} failed (${errorMessage(error)}), retrying in ${wait}ms`),
                ...retry
            });
        } catch (error) {
            await client.close().catch((closeError: unknown) =>
                console.warn('[MONGO] Error closing failed client:', errorMessage(closeError))
            );
            throw new StorageConnectionError(`Could not connect to MongoDB: ${errorMessage(error)}`, error);
        }

        console.log(`[MONGO] ✓ Connected. Database: ${config.database}`);
        return new MongoSession(client, client.db(config.database), config);
    }

    async describe(): Promise<DatabaseDescription> {
        const buildInfo = await this.db.admin().command({ buildInfo: 1 });
        const stats = await this.db.command({ dbStats: 1 });
        const names = (await this.db.listCollections({}, { nameOnly: true }).toArray()).map(c => c.name).sort();

        const collections: CollectionInfo[] = [];
        for (const name of names) {
            collections.push({ name, documents: await this.db.collection(name).estimatedDocumentCount() });
        }

        return {
            host: this.config.uri,
            database: this.config.database,
            version: typeof buildInfo.version === 'string' ? buildInfo.version : 'unknown',
            collections,
            dataSizeMb: toMb(stats.dataSize),
            storageSizeMb: toMb(stats.storageSize),
            indexes: typeof stats.indexes === 'number' ? stats.indexes : 0,
            objects: typeof stats.objects === 'number' ? stats.objects : 0,
            timestamp: new Date().toISOString()
        };
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        await this.client.close();
        console.log('[MONGO] Disconnected');
    }
}

export async function withMongoSession<T>(
    config: MongoConfig,
    fn: (session: MongoSession) => Promise<T>
): Promise<T> {
    const session = await MongoSession.open(config);
    try {
        return await fn(session);
    } finally {
        await session.close();
    }
}

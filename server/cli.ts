#!/usr/bin/env node
import chalk from 'chalk';
import { loadConfig, type AppConfig } from './config/env.config.js';
import { RECONCILED_FIELDS, validateFieldTable } from './config/fields.config.js';
import { ConsoleOperator } from './operator/console.operator.js';
import { withMongoSession, type MongoSession } from './services/mongo.service.js';
import { ConfigurationError, StorageConnectionError, errorMessage } from './utils/errors.js';
import {
    databaseInfoWorkflow,
    extractionStatusWorkflow,
    importSubjectWorkflow,
    importWorkflow,
    queryWorkflow
} from './workflows/database.workflow.js';
import {
    bulkUpdateWorkflow,
    interactiveUpdateWorkflow,
    validateWorkflow,
    verifyWorkflow
} from './workflows/reconciliation.workflow.js';
import type { WorkflowContext } from './workflows/workflow.types.js';

// ============================================================================
// OPERATOR CLI - Numbered menu, or one option as a sub-command
// ============================================================================

const MENU = [
    { key: '1', command: 'validate', label: 'Validate spreadsheet against database' },
    { key: '2', command: 'update', label: 'Interactive update (choose fields per record)' },
    { key: '3', command: 'bulk-update', label: 'Bulk update (all mismatched fields)' },
    { key: '4', command: 'verify', label: 'Verify applied updates' },
    { key: '5', command: 'info', label: 'Database information' },
    { key: '6', command: 'import', label: 'Import extracted admissions' },
    { key: '7', command: 'status', label: 'Extraction and import status' },
    { key: '8', command: 'import-subject', label: 'Import one subject by ID' },
    { key: '9', command: 'query', label: 'Query database' },
    { key: '0', command: 'exit', label: 'Exit' }
] as const;

type MenuItem = typeof MENU[number];
type Command = MenuItem['command'];

const MENU_KEYS = MENU.map(item => item.key);

function findCommand(name: string): Command | null {
    const item = MENU.find(entry => entry.command === name || entry.key === name);
    return item ? item.command : null;
}

async function runCommand(command: Command, session: MongoSession, ctx: WorkflowContext): Promise<void> {
    switch (command) {
        case 'validate':
            await validateWorkflow(ctx);
            return;
        case 'update':
            await interactiveUpdateWorkflow(ctx);
            return;
        case 'bulk-update':
            await bulkUpdateWorkflow(ctx);
            return;
        case 'verify':
            await verifyWorkflow(ctx);
            return;
        case 'info':
            await databaseInfoWorkflow(ctx.io, session);
            return;
        case 'import':
            await importWorkflow(ctx);
            return;
        case 'status':
            await extractionStatusWorkflow(ctx);
            return;
        case 'import-subject':
            await importSubjectWorkflow(ctx);
            return;
        case 'query':
            await queryWorkflow(ctx);
            return;
        case 'exit':
            return;
    }
}

async function menuLoop(session: MongoSession, ctx: WorkflowContext): Promise<void> {
    const { io } = ctx;
    for (;;) {
        io.show(chalk.bold.cyan('\nAdmission reconciliation'));
        for (const item of MENU) io.show(`  ${chalk.cyan(item.key)}  ${item.label}`);

        const key = await io.choose('Select an option', MENU_KEYS, '0');
        const command = findCommand(key);
        if (command === null || command === 'exit') return;

        try {
            await runCommand(command, session, ctx);
        } catch (error) {
            console.error(`[CLI] ${command} failed:`, errorMessage(error));
            io.show(chalk.red(`${command} failed: ${errorMessage(error)}`));
        }
    }
}

async function main(argv: string[]): Promise<number> {
    let config: AppConfig;
    try {
        validateFieldTable(RECONCILED_FIELDS);
        config = loadConfig();
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error(chalk.red(error.message));
            return 1;
        }
        throw error;
    }

    const requested = argv[0];
    const command = requested === undefined ? null : findCommand(requested);
    if (requested !== undefined && command === null) {
        console.error(chalk.red(`Unknown command "${requested}". Use one of: ${MENU.map(item => item.command).join(', ')}`));
        return 1;
    }
    if (command === 'exit') return 0;

    try {
        return await withMongoSession(config.mongo, async session => {
            const io = new ConsoleOperator();
            const ctx: WorkflowContext = {
                io,
                repository: session.admissions,
                spreadsheetPath: config.spreadsheetPath,
                reportPath: config.reportPath,
                extractedDir: config.extractedDir
            };

            try {
                if (command === null) {
                    await menuLoop(session, ctx);
                } else {
                    await runCommand(command, session, ctx);
                }
                return 0;
            } finally {
                io.close();
            }
        });
    } catch (error) {
        if (error instanceof StorageConnectionError) {
            console.error(chalk.red(error.message));
            return 1;
        }
        throw error;
    }
}

main(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error('[CLI] Fatal error:', errorMessage(error));
        process.exitCode = 1;
    });

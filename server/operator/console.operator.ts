import * as readline from 'node:readline/promises';
import chalk from 'chalk';
import type { OperatorIO, ProgressHandle } from './operator.types.js';

/**
 * Terminal operator on stdin/stdout. Call `close()` when the session ends so
 * the process can exit.
 */
export class ConsoleOperator implements OperatorIO {
    private rl: readline.Interface;

    constructor(
        input: NodeJS.ReadableStream = process.stdin,
        private output: NodeJS.WritableStream = process.stdout
    ) {
        this.rl = readline.createInterface({ input, output });
    }

    async choose<T extends string>(question: string, choices: readonly T[], defaultChoice: T): Promise<T> {
        for (;;) {
            const answer = (await this.rl.question(
                `${chalk.cyan(question)} [${choices.join('/')}] (${defaultChoice}): `
            )).trim().toLowerCase();

            if (answer === '') return defaultChoice;
            const picked = choices.find(choice => choice === answer);
            if (picked !== undefined) return picked;

            this.show(chalk.red(`Please select one of: ${choices.join(', ')}`));
        }
    }

    async ask(question: string, defaultValue?: string): Promise<string> {
        const suffix = defaultValue ? ` (${defaultValue})` : '';
        const answer = await this.rl.question(`${chalk.cyan(question)}${suffix}: `);
        return answer.trim() === '' && defaultValue !== undefined ? defaultValue : answer;
    }

    async confirm(question: string, defaultValue: boolean): Promise<boolean> {
        const hint = defaultValue ? 'Y/n' : 'y/N';
        const answer = (await this.rl.question(`${chalk.yellow(question)} [${hint}]: `)).trim().toLowerCase();
        if (answer === '') return defaultValue;
        return answer === 'y' || answer === 'yes';
    }

    show(text: string): void {
        this.output.write(`${text}\n`);
    }

    progress(label: string, total: number): ProgressHandle {
        let current = 0;
        const render = () => {
            const width = 30;
            const filled = total > 0 ? Math.round((current / total) * width) : width;
            const bar = '█'.repeat(filled) + '░'.repeat(width - filled);
            this.output.write(`\r${chalk.cyan(label)} ${bar} ${current}/${total}`);
        };

        render();
        return {
            advance: (step = 1) => {
                current = Math.min(total, current + step);
                render();
            },
            done: () => {
                current = total;
                render();
                this.output.write('\n');
            }
        };
    }

    close(): void {
        this.rl.close();
    }
}

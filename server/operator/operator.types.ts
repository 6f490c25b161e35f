// ============================================================================
// OPERATOR BOUNDARY - What the workflows need from whoever drives them
// ============================================================================

export interface ProgressHandle {
    advance(step?: number): void;
    done(): void;
}

export interface OperatorIO {
    /** Repeats the question until one of `choices` (or blank, meaning the default) is entered. */
    choose<T extends string>(question: string, choices: readonly T[], defaultChoice: T): Promise<T>;
    ask(question: string, defaultValue?: string): Promise<string>;
    confirm(question: string, defaultValue: boolean): Promise<boolean>;
    show(text: string): void;
    progress(label: string, total: number): ProgressHandle;
}

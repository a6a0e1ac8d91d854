/**
 * User-facing side channel
 *
 * Everything the assistant says or asks goes through here, so the core
 * never touches stdin/stdout directly.
 */
export interface Terminal {
    /** Print a line as-is */
    print(text?: string): void;
    /** Print a line spoken by the assistant */
    say(text: string): void;
    /** Ask for a line of input; null once input has ended */
    ask(question: string): Promise<string | null>;
    /** Yes/no question; an empty answer or ended input takes the default */
    confirm(question: string, defaultValue?: boolean): Promise<boolean>;
    /** Show progress while a task runs */
    busy<T>(message: string, task: () => Promise<T>): Promise<T>;
}

/**
 * Interpret a yes/no answer
 */
export function parseYesNo(answer: string | null, defaultValue: boolean): boolean {
    const normalized = answer?.trim().toLowerCase() ?? '';
    if (normalized === 'y' || normalized === 'yes') return true;
    if (normalized === 'n' || normalized === 'no') return false;
    return defaultValue;
}

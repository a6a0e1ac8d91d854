import type { CommandParams } from '../workflows/types.js';

/**
 * Result of parsing one line of user input
 */
export interface ParsedCommand {
    workflow: string;
    command: string;
    params: CommandParams;
}

/**
 * Text handed to matchers: `lowered` for classification, `original`
 * (trimmed, casing preserved) for payload extraction
 */
export interface ParserInput {
    original: string;
    lowered: string;
}

export interface CommandMatcher {
    command: string;
    /** Any of these substrings (in the lowered text) selects the command */
    phrases: string[];
    /** Pull parameters out of the input; may throw a UserInputError */
    extract?: (input: ParserInput) => CommandParams;
}

/**
 * Keywords and commands one workflow understands, checked in order
 */
export interface WorkflowVocabulary {
    workflow: string;
    keywords: string[];
    commands: CommandMatcher[];
    /** Example phrasings shown in the formatting help */
    examples: string[];
    tips?: string[];
}

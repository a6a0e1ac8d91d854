import { CommandNotRecognizedError, ContentNotExtractedError } from '../errors.js';
import type { ParsedCommand, ParserInput, WorkflowVocabulary } from './types.js';

/** Phrases after which unquoted content is taken, in priority order */
export const CONTENT_TRIGGERS = ['saying', 'tweet', 'post', 'with content', 'with text'] as const;

const QUOTED = /(['"])(.*?)\1/s;

/**
 * Pull the message payload out of a command, preserving the user's casing
 *
 * The leftmost quoted span wins; otherwise whatever follows the first
 * trigger phrase that is followed by something.
 */
export function extractContent(text: string): string {
    const quoted = QUOTED.exec(text);
    if (quoted) {
        return quoted[2];
    }

    const lowered = text.toLowerCase();
    for (const trigger of CONTENT_TRIGGERS) {
        const index = lowered.indexOf(trigger);
        if (index === -1) continue;

        const rest = text.slice(index + trigger.length).trim();
        if (rest) return rest;
    }

    throw new ContentNotExtractedError();
}

/**
 * Command Parser — free text to (workflow, command, params)
 *
 * Keyword-driven, no LLM involved. Each workflow brings its own
 * vocabulary; the first vocabulary whose keyword appears owns the input.
 */
export class CommandParser {
    private readonly vocabularies: readonly WorkflowVocabulary[];

    constructor(vocabularies: readonly WorkflowVocabulary[]) {
        this.vocabularies = vocabularies;
    }

    parse(command: string): ParsedCommand {
        const original = command.trim();
        const input: ParserInput = { original, lowered: original.toLowerCase() };

        const vocabulary = this.vocabularies.find((v) =>
            v.keywords.some((keyword) => input.lowered.includes(keyword))
        );
        if (!vocabulary) {
            throw new CommandNotRecognizedError();
        }

        for (const matcher of vocabulary.commands) {
            if (!matcher.phrases.some((phrase) => input.lowered.includes(phrase))) continue;
            return {
                workflow: vocabulary.workflow,
                command: matcher.command,
                params: matcher.extract ? matcher.extract(input) : {},
            };
        }

        throw new CommandNotRecognizedError();
    }

    /**
     * Formatting help built from every vocabulary's example phrasings
     */
    getCommandHelp(): string {
        const lines = ['Available Commands:', '------------------'];
        this.vocabularies.forEach((vocabulary, i) => {
            lines.push(`${i + 1}. ${capitalize(vocabulary.workflow)}:`);
            for (const example of vocabulary.examples) {
                lines.push(`   - "${example}"`);
            }
        });

        const tips = this.vocabularies.flatMap((v) => v.tips ?? []);
        if (tips.length > 0) {
            lines.push('', 'Tips:');
            for (const tip of tips) {
                lines.push(`- ${tip}`);
            }
        }
        return lines.join('\n');
    }
}

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1);
}

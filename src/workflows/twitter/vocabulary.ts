import { extractContent } from '../../parser/parser.js';
import type { ParserInput, WorkflowVocabulary } from '../../parser/types.js';
import type { CommandParams } from '../types.js';

const MENTION_ID = /\bid\b[\s:#=]*([A-Za-z0-9_]+)/i;

function replyTarget(input: ParserInput): CommandParams {
    if (!input.lowered.includes('to mention')) return {};
    const match = MENTION_ID.exec(input.original);
    return match ? { mention_id: match[1] } : {};
}

export const twitterVocabulary: WorkflowVocabulary = {
    workflow: 'twitter',
    keywords: ['tweet', 'twitter', 'mention'],
    commands: [
        {
            command: 'mentions',
            phrases: ['check mention', 'recent mention', 'show mention', 'view mention', 'get mention'],
        },
        {
            command: 'reply',
            phrases: ['reply', 'respond'],
            extract: replyTarget,
        },
        {
            command: 'post',
            phrases: ['post', 'send', 'tweet'],
            extract: (input) => ({ content: extractContent(input.original) }),
        },
    ],
    examples: [
        "Post a tweet saying 'your message here'",
        "Tweet 'your message here'",
        "Send tweet 'your message here'",
        'Check my recent mentions',
        'Reply to mention id 1234567890',
    ],
    tips: [
        'Use quotes (single or double) around your message',
        'Be specific about the action you want to take',
    ],
};

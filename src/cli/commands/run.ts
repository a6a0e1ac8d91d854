import { Command } from 'commander';
import { openSession } from '../session.js';
import { renderResult } from '../ui/render.js';

export function createRunCommand(): Command {
    return new Command('run')
        .description('Run a single command, e.g. mentat run "post a tweet saying \'hi\'"')
        .argument('<command...>', 'Command text')
        .action(async (words: string[]) => {
            const { assistant, terminal } = openSession();
            try {
                assistant.discover();
                const result = await assistant.dispatcher.execute(words.join(' '));
                if (result) renderResult(result);
            } finally {
                terminal.close();
            }
        });
}

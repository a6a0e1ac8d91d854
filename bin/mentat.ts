#!/usr/bin/env node

import { VERSION, createCLI } from '../src/cli/index.js';
import { startREPL } from '../src/cli/repl.js';
import { errorMessage } from '../src/errors.js';

const program = createCLI();

const args = process.argv.slice(2);
const hasSubcommand = args.length > 0 && !args[0].startsWith('-');
const wantsInfo = ['--help', '-h', '--version', '-V'].some((flag) => args.includes(flag));

if (hasSubcommand || wantsInfo) {
    program.parseAsync(process.argv).catch((err) => {
        console.error('Error:', errorMessage(err));
        process.exit(1);
    });
} else {
    // No subcommand → interactive mode
    startREPL(VERSION).catch((err) => {
        console.error('Failed to start interactive mode:', errorMessage(err));
        process.exit(1);
    });
}

#!/usr/bin/env node
/**
 * Fatura CLI
 *
 * The CLI owns every side effect: it reads statement text files, loads
 * workspace configuration and learned patterns, and prints results.
 * The core receives text and returns transactions and warnings.
 */

import { parseArgs } from 'node:util';
import { processStatements } from './commands/process.js';
import { correctCategory } from './commands/correct.js';
import { listBanks } from './commands/banks.js';
import { errorMessage } from './utils/errors.js';

const USAGE = [
    'Fatura Engine CLI',
    '',
    'Usage:',
    '  fatura process [files...] [--origin LABEL] [--source ID] [--workspace DIR] [--json] [--yes]',
    '  fatura correct <description> <category> [--workspace DIR]',
    '  fatura banks [--workspace DIR]',
    '',
    'Examples:',
    '  fatura process imports/fatura_2026_03.txt --origin principal',
    '  fatura correct "MAGAZINE BELA" compras',
].join('\n');

async function main(argv: string[]): Promise<void> {
    const [command, ...rest] = argv;

    switch (command) {
        case 'process': {
            const { values, positionals } = parseArgs({
                args: rest,
                allowPositionals: true,
                options: {
                    origin: { type: 'string' },
                    source: { type: 'string' },
                    workspace: { type: 'string', short: 'w' },
                    json: { type: 'boolean' },
                    yes: { type: 'boolean', short: 'y' },
                },
            });
            await processStatements(positionals, {
                yes: values.yes ?? false,
                json: values.json ?? false,
                origin: values.origin,
                source: values.source,
                workspace: values.workspace,
            });
            return;
        }

        case 'correct': {
            const { values, positionals } = parseArgs({
                args: rest,
                allowPositionals: true,
                options: {
                    workspace: { type: 'string', short: 'w' },
                },
            });
            if (positionals.length !== 2) {
                console.error('Usage: fatura correct <description> <category>');
                process.exit(1);
            }
            await correctCategory(positionals[0], positionals[1], { workspace: values.workspace });
            return;
        }

        case 'banks': {
            const { values } = parseArgs({
                args: rest,
                options: {
                    workspace: { type: 'string', short: 'w' },
                },
            });
            listBanks({ workspace: values.workspace });
            return;
        }

        case undefined:
        case 'help':
        case '--help':
        case '-h':
            console.log(USAGE);
            return;

        default:
            console.error(`Unknown command: ${command}\n`);
            console.error(USAGE);
            process.exit(1);
    }
}

main(process.argv.slice(2)).catch((err: unknown) => {
    console.error('Unexpected error:', errorMessage(err));
    process.exit(1);
});

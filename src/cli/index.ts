#!/usr/bin/env node
import { Command } from 'commander';
import dotenv from 'dotenv';
import path from 'path';
import os from 'os';
import { logger } from '../utils/logger';
import { describeError } from '../utils/ErrorHandler';
import { readStdin, respond, probe, listKinds, reportUnhandledRejection, type GlobalOptions } from './commands';

dotenv.config(); // Local .env
dotenv.config({ path: path.join(os.homedir(), '.inbox-responder', '.env') }); // Global .env

process.on('unhandledRejection', (reason) => reportUnhandledRejection(reason));

const program = new Command();

program
    .name('inbox-responder')
    .description('Answer incoming email with an AI assistant')
    .version('1.0.0')
    .option('-c, --config <path>', 'Path to responder.config.yaml')
    .option('-a, --assistants <path>', 'Path to assistants.json');

program
    .command('respond', { isDefault: true })
    .description('Read one raw email from stdin and reply to it')
    .action(async () => {
        const outcome = await respond(await readStdin(), program.opts<GlobalOptions>());
        if (outcome === 'failed') process.exitCode = 1;
    });

program
    .command('probe')
    .description('Print the enriched prompt for the given enhancements (all when none given)')
    .argument('[kinds...]', 'Enhancement kinds to collect')
    .option('-p, --prompt <text>', 'Base prompt to enrich')
    .action(async (kinds: string[], options: { prompt?: string }) => {
        console.log(await probe(kinds, { prompt: options.prompt }));
    });

program
    .command('kinds')
    .description('List the available enhancement kinds')
    .action(() => {
        for (const kind of listKinds()) console.log(kind);
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    logger.error(describeError(error));
    process.exitCode = 1;
});

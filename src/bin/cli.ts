#!/usr/bin/env node
/**
 * CLI Entry Point for chapter-binder
 */

import { Command } from 'commander';
import { Application } from '../cli/app';

const program = new Command();

program
    .name('chapter-binder')
    .description('Downloads chapter images and binds them into PDFs')
    .version('1.0.0')
    .argument('[url]', 'First chapter URL (optional)')
    .option('-s, --settings <file>', 'Settings file', 'settings.json')
    .option('-b, --bulk <file>', 'Run the bulk list in this file')
    .option('-v, --verbose', 'Enable verbose output')
    .action(async (url: string | undefined, options: { settings: string; bulk?: string; verbose?: boolean }) => {
        const app = new Application(url, {
            settingsFile: options.settings,
            bulkFile: options.bulk,
            verbose: options.verbose,
        });
        await app.run();
    });

await program.parseAsync();

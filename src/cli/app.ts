/**
 * CLI Application for chapter-binder
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { select, input, confirm } from '@inquirer/prompts';
import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';

import { PATHS } from '../config/constants';
import { loadSettings } from '../config/settings';
import { loadBulkFile, runBulk } from '../services/bulk';
import { createJob, createSequencer, titleFolder } from '../services/engine';
import { SettingsError } from '../services/errors';
import { PdfMerger, type MergeReport } from '../services/merger';
import { formatProgress, RunProgress } from '../services/progress';
import { ConsoleLogger } from '../utils/logger';
import { titleFromUrl } from '../utils/text';
import { formatDuration } from '../utils/time';
import type { DownloadJob, DownloadMode, EngineSettings, OriginalsPolicy, RunEvent, RunState } from '../types';

export interface ApplicationOptions {
    settingsFile?: string;
    bulkFile?: string;
    verbose?: boolean;
}

type Action = 'download' | 'bulk' | 'merge';

function validateUrl(value: string): true | string {
    if (!value.trim()) return 'URL is required';
    try {
        new URL(value.trim());
        return true;
    } catch {
        return 'Please enter a valid URL';
    }
}

function validateCount(min: number) {
    return (value: string): true | string =>
        Number.isInteger(Number(value)) && Number(value) >= min ? true : `Enter a whole number >= ${min}`;
}

/**
 * Main CLI Application class
 */
export class Application {
    private readonly cliUrl?: string;
    private readonly options: ApplicationOptions;
    private readonly logger: ConsoleLogger;

    constructor(url?: string, options: ApplicationOptions = {}) {
        this.cliUrl = url;
        this.options = options;
        // Spinners own the terminal during runs, so only warnings and errors are printed by default
        this.logger = new ConsoleLogger({ level: options.verbose ? 'debug' : 'warn' });
    }

    /**
     * Main entry point for the CLI application
     */
    async run(): Promise<void> {
        console.log(chalk.cyan('\n📚 Chapter Binder - chapter images to PDF\n'));

        let settings: EngineSettings;
        try {
            settings = await loadSettings(this.options.settingsFile ?? PATHS.SETTINGS_FILE);
        } catch (error) {
            if (error instanceof SettingsError) {
                console.error(chalk.red(`Settings error: ${error.message}`));
                process.exitCode = 1;
                return;
            }
            throw error;
        }

        try {
            const action: Action = this.options.bulkFile ? 'bulk' : await this.showMainMenu();
            await this.handleAction(action, settings);
        } catch (error) {
            if (error instanceof Error && error.name === 'ExitPromptError') {
                console.log(chalk.yellow('\nGoodbye! 👋'));
                return;
            }
            console.error(chalk.red('\nError:'), error);
            process.exitCode = 1;
        }
    }

    private async showMainMenu(): Promise<Action> {
        return select<Action>({
            message: 'Select Action:',
            choices: [
                { name: 'Download chapters', value: 'download' },
                { name: 'Bulk download (from bulk.json)', value: 'bulk' },
                { name: 'Merge chapter PDFs', value: 'merge' },
            ],
        });
    }

    private async handleAction(action: Action, settings: EngineSettings): Promise<void> {
        switch (action) {
            case 'download':
                await this.handleDownload(settings);
                break;
            case 'bulk':
                await this.handleBulk(settings);
                break;
            case 'merge':
                await this.handleMerge(settings);
                break;
        }
    }

    private async handleDownload(settings: EngineSettings): Promise<void> {
        const url = this.cliUrl ?? (await input({ message: 'First chapter URL:', validate: validateUrl })).trim();
        const title = (await input({ message: 'Title:', default: titleFromUrl(url) || 'Untitled' })).trim();

        const modeKind = await select({
            message: 'Download mode:',
            choices: [
                { name: 'Automatic (follow next links to the end)', value: 'automatic' as const },
                { name: 'Manual (fixed number of chapters)', value: 'manual' as const },
            ],
        });
        const mode: DownloadMode = modeKind === 'manual'
            ? { kind: 'manual', count: Number(await input({ message: 'Number of chapters:', default: '1', validate: validateCount(1) })) }
            : { kind: 'automatic' };

        const deleteImages = await confirm({ message: 'Delete images after each PDF is written?', default: false });
        const mergeAfter = await confirm({ message: 'Merge chapter PDFs afterwards?', default: false });
        const perBundle = mergeAfter
            ? Number(await input({ message: 'Chapters per merged PDF (0 = all):', default: '10', validate: validateCount(0) }))
            : 0;
        const onlyNew = mergeAfter && await confirm({ message: 'Merge only chapters from this session?', default: true });

        const job = createJob(settings, {
            url,
            title,
            mode,
            targetDir: titleFolder(settings, title),
            deleteImages,
            keepManifest: onlyNew,
        });

        const state = await this.runJob(settings, job);
        if (mergeAfter && state.status === 'completed') {
            const report = await new PdfMerger(this.logger).merge(job.targetDir, {
                chaptersPerBundle: perBundle,
                useSessionManifest: onlyNew,
            });
            this.printMergeReport(report);
        }
    }

    /**
     * Runs one job behind a spinner; Ctrl+C stops after the current chapter
     */
    private async runJob(settings: EngineSettings, job: DownloadJob): Promise<RunState> {
        const controller = new AbortController();
        const spinner = ora(`Starting ${job.mangaTitle}...`).start();
        const onSigint = (): void => {
            controller.abort();
            spinner.text = chalk.yellow('Stopping after the current chapter...');
        };
        process.once('SIGINT', onSigint);

        const started = Date.now();
        const progress = new RunProgress();
        try {
            const state = await createSequencer(settings, this.logger).run(job, {
                signal: controller.signal,
                onEvent: (event) => this.showEvent(spinner, event, progress),
            });
            this.printRunSummary(spinner, state, (Date.now() - started) / 1000);
            return state;
        } catch (error) {
            spinner.fail(chalk.red('Download failed'));
            throw error;
        } finally {
            process.removeListener('SIGINT', onSigint);
        }
    }

    private showEvent(spinner: Ora, event: RunEvent, progress: RunProgress): void {
        progress.record(event);
        const chapter = (index: number): string => {
            const { total } = progress.stats();
            return total !== undefined ? `Chapter ${index}/${total}` : `Chapter ${index}`;
        };
        switch (event.type) {
            case 'chapter_started':
                spinner.text = `${chapter(event.index)}: loading page... ${chalk.gray(formatProgress(progress.stats()))}`;
                break;
            case 'image_downloaded':
                spinner.text = `${chapter(event.index)}: image ${event.imageIndex + 1}/${event.total}`;
                break;
            case 'image_failed':
                this.logger.debug(`Image ${event.imageIndex + 1} attempt ${event.attempt} failed: ${event.message}`);
                break;
            case 'chapter_completed': {
                const { result } = event;
                const files = result.files.length > 0 ? `${result.files.length} PDF` : 'no PDF';
                spinner.succeed(chalk.green(`${result.label}: ${result.imageCount} images, ${files}`));
                spinner.start(`Next chapter... ${chalk.gray(formatProgress(progress.stats()))}`);
                break;
            }
            case 'run_finished':
                break;
        }
    }

    private printRunSummary(spinner: Ora, state: RunState, seconds: number): void {
        const summary = `${state.chaptersCompleted} chapters in ${formatDuration(seconds)}`;
        switch (state.status) {
            case 'completed':
                spinner.succeed(chalk.green(`Done (${state.stopReason ?? 'completed'}): ${summary}`));
                break;
            case 'cancelled':
                spinner.warn(chalk.yellow(`Cancelled: ${summary}`));
                break;
            default:
                spinner.fail(chalk.red(`Failed: ${summary}`));
                if (state.failure) {
                    console.log(chalk.red(`  Chapter ${state.failure.ordinal} (${state.failure.kind}): ${state.failure.message}`));
                    console.log(chalk.gray(`  Resume from: ${state.failure.url}`));
                }
        }
    }

    private async handleBulk(settings: EngineSettings): Promise<void> {
        const file = this.options.bulkFile ?? PATHS.BULK_FILE;
        const parsed = await loadBulkFile(file);
        if (!parsed.success) {
            console.log(chalk.red(parsed.error));
            return;
        }
        if (parsed.data.length === 0) {
            console.log(chalk.yellow(`'${file}' is empty. Nothing to download.`));
            return;
        }

        const controller = new AbortController();
        const onSigint = (): void => {
            controller.abort();
            console.log(chalk.yellow('\nStopping after the current chapter...'));
        };
        process.once('SIGINT', onSigint);

        const spinner = ora();
        let progress = new RunProgress();
        try {
            const results = await runBulk(parsed.data, {
                settings,
                createSequencer: () => createSequencer(settings, this.logger),
                merger: new PdfMerger(this.logger),
                logger: this.logger,
            }, {
                signal: controller.signal,
                onEntryStart: (entry, position, total) => {
                    console.log(chalk.cyan(`\n>>> [${position}/${total}] ${entry.title}`));
                    progress = new RunProgress();
                    spinner.start('Starting...');
                },
                onEvent: (event) => {
                    this.showEvent(spinner, event, progress);
                    if (event.type === 'run_finished') spinner.stop();
                },
            });

            console.log(chalk.cyan('\nBulk summary:'));
            for (const result of results) {
                const status = result.state?.status ?? 'failed';
                const line = `  ${result.entry.title}: ${status}, ${result.state?.chaptersCompleted ?? 0} chapters`;
                console.log(result.error ? chalk.red(`${line} (${result.error})`) : chalk.green(line));
                if (result.merge) this.printMergeReport(result.merge);
            }
        } finally {
            spinner.stop();
            process.removeListener('SIGINT', onSigint);
        }
    }

    private async handleMerge(settings: EngineSettings): Promise<void> {
        const folders = await this.getDownloadFolders(settings.downloadDir);
        if (folders.length === 0) {
            console.log(chalk.yellow(`No folders found in '${settings.downloadDir}'.`));
            return;
        }

        const folder = await select({
            message: 'Select folder:',
            choices: folders.map((f) => ({ name: f, value: f })),
        });
        const perBundle = Number(await input({
            message: 'Chapters per merged PDF (0 = all):',
            default: '10',
            validate: validateCount(0),
        }));
        const originals = await select<OriginalsPolicy>({
            message: 'Original chapter PDFs:',
            choices: [
                { name: `Move to ${PATHS.ORIGINALS_DIR}/`, value: 'move' },
                { name: 'Delete', value: 'delete' },
                { name: 'Keep in place', value: 'keep' },
            ],
        });
        const useSessionManifest = await confirm({ message: 'Only chapters from the latest session?', default: false });

        const spinner = ora('Merging PDFs...').start();
        try {
            const report = await new PdfMerger(this.logger).merge(join(settings.downloadDir, folder), {
                chaptersPerBundle: perBundle,
                originals,
                useSessionManifest,
            });
            spinner.stop();
            this.printMergeReport(report);
        } catch (error) {
            spinner.fail(chalk.red('Merge failed'));
            throw error;
        }
    }

    private printMergeReport(report: MergeReport): void {
        for (const bundle of report.bundles) {
            console.log(chalk.green(`  ✔ ${bundle.outputPath} (${bundle.memberFiles.length} files)`));
        }
        for (const warning of report.warnings) {
            console.log(chalk.yellow(`  ! ${warning}`));
        }
        for (const error of report.errors) {
            console.log(chalk.red(`  ✖ ${error.message}`));
        }
        console.log(chalk.gray(`  ${report.bundles.length} bundles, ${report.skipped.length} files left as they were`));
    }

    private async getDownloadFolders(downloadDir: string): Promise<string[]> {
        try {
            const entries = await readdir(downloadDir, { withFileTypes: true });
            return entries.filter((e) => e.isDirectory()).map((e) => e.name);
        } catch {
            return [];
        }
    }
}

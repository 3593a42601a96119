#!/usr/bin/env node

import { Command } from 'commander';
import { ConfigLoader } from '../config/ConfigLoader';
import { AnalysisOrchestrator } from '../orchestrator/AnalysisOrchestrator';
import { ReportGenerator } from '../reporter/ReportGenerator';
import { buildFingerprintSnapshot, loadFingerprints, saveFingerprints } from '../store/FingerprintStore';
import { DoclensError } from '../models/errors';
import { EnvLoader } from '../utils/EnvLoader';
import logger from '../utils/logger';

export const EXIT_OK = 0;
export const EXIT_BELOW_THRESHOLD = 1;
export const EXIT_FATAL = 2;

export interface AnalyzeCliOptions {
    config?: string;
    format?: string;
    output?: string;
    style?: string;
    languages?: string;
    rules?: string;
    include?: string[];
    exclude?: string[];
    ignorePrivate?: boolean;
    concurrency?: string;
    fingerprints?: string;
    saveFingerprints?: string;
    minCoverage?: string;
    verbose?: boolean;
}

function splitList(value: string): string[] {
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Translate command-line options into configuration overrides. Values are
 * validated together with the config file.
 */
export function applyCliOptions(options: AnalyzeCliOptions): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};

    if (options.style) {
        overrides.doc_style = options.style;
    }
    if (options.languages) {
        overrides.included_languages = splitList(options.languages);
    }
    if (options.rules) {
        overrides.enabled_rules = splitList(options.rules);
    }
    if (options.include && options.include.length > 0) {
        overrides.include_globs = options.include;
    }
    if (options.exclude && options.exclude.length > 0) {
        overrides.exclude_globs = options.exclude;
    }
    if (options.ignorePrivate) {
        overrides.ignore_private = true;
    }
    if (options.concurrency !== undefined) {
        overrides.concurrency = Number(options.concurrency);
    }
    if (options.minCoverage !== undefined) {
        overrides.min_coverage = Number(options.minCoverage);
    }

    const output: Record<string, unknown> = {};
    if (options.format) {
        output.format = options.format;
    }
    if (options.verbose) {
        output.verbose = true;
    }
    if (Object.keys(output).length > 0) {
        overrides.output = output;
    }

    return overrides;
}

/**
 * Run an analysis and print or write the report. Resolves to the exit code.
 */
export async function analyzeAction(target: string, options: AnalyzeCliOptions): Promise<number> {
    const controller = new AbortController();
    const onInterrupt = (): void => {
        logger.warn('Interrupted, finishing files in progress');
        controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
        new EnvLoader().load(target);

        const config = await new ConfigLoader().load(options.config, applyCliOptions(options));
        if (config.output.verbose) {
            logger.level = 'info';
        }

        const priorFingerprints = options.fingerprints ? await loadFingerprints(options.fingerprints) : undefined;

        const orchestrator = new AnalysisOrchestrator(config);
        const report = await orchestrator.analyze(target, { signal: controller.signal, priorFingerprints });

        const generator = new ReportGenerator();
        if (options.output) {
            await generator.writeReport(report, config.output.format, options.output);
        } else {
            process.stdout.write(generator.render(report, config.output.format));
        }

        if (options.saveFingerprints) {
            await saveFingerprints(options.saveFingerprints, buildFingerprintSnapshot(orchestrator.getFileResults()));
        }

        if (report.coverage < config.minCoverage) {
            console.error(
                `Coverage ${(report.coverage * 100).toFixed(1)}% is below the required ${(config.minCoverage * 100).toFixed(1)}%`
            );
            return EXIT_BELOW_THRESHOLD;
        }
        return EXIT_OK;
    } catch (error) {
        if (!(error instanceof DoclensError)) {
            throw error;
        }
        logger.error(`Analysis failed: ${error.message}`);
        console.error(`Error: ${error.message}`);
        return EXIT_FATAL;
    } finally {
        process.removeListener('SIGINT', onInterrupt);
    }
}

const program = new Command();

program
    .name('doclens')
    .description('Documentation quality analysis for multi-language codebases')
    .version('1.0.0');

program
    .command('analyze')
    .description('Analyze a file or directory and report documentation issues')
    .argument('<target>', 'File or directory to analyze')
    .option('-c, --config <path>', 'Config file (default: ./.doclens.yml)')
    .option('-f, --format <format>', 'Report format: json, markdown or text')
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .option('-s, --style <style>', 'Documentation style for every language')
    .option('-l, --languages <list>', 'Comma-separated languages to analyze')
    .option('-r, --rules <list>', 'Comma-separated rules to enable')
    .option('--include <glob...>', 'Only analyze matching files')
    .option('--exclude <glob...>', 'Skip matching files')
    .option('--ignore-private', 'Skip private elements')
    .option('--concurrency <number>', 'Files analyzed in parallel')
    .option('--fingerprints <file>', 'Fingerprints from a previous run, for sync scoring')
    .option('--save-fingerprints <file>', 'Write this run\'s fingerprints')
    .option('--min-coverage <ratio>', 'Exit with code 1 when coverage is below this ratio (0-1)')
    .option('-v, --verbose', 'Verbose output')
    .action(async (target: string, options: AnalyzeCliOptions) => {
        process.exitCode = await analyzeAction(target, options);
    });

// Only parse arguments if this module is run directly
if (require.main === module) {
    program.parseAsync().catch((error: unknown) => {
        logger.error(`Unexpected failure: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
        process.exitCode = EXIT_FATAL;
    });
}

export { program };

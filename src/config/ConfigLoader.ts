import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import {
    DEFAULT_CONFIG,
    DEFAULT_LANGUAGE_STYLES,
    DOC_STYLES,
    DocStyle,
    DoclensConfig,
    ReportFormat,
    ResolvedConfig,
} from './schema';
import { LANGUAGE_IDS, LanguageId } from '../models/CodeElement';
import { ISSUE_CATEGORIES } from '../models/AnalysisReport';
import { ConfigurationError } from '../models/errors';
import { fileExists } from '../utils/fileUtils';
import logger from '../utils/logger';

export const DEFAULT_CONFIG_FILE = '.doclens.yml';

const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'markdown', 'text'];

const KNOWN_KEYS = new Set([
    'included_languages',
    'doc_style',
    'language_styles',
    'enabled_rules',
    'include_globs',
    'exclude_globs',
    'ignore_private',
    'max_file_size_kb',
    'concurrency',
    'min_coverage',
    'output',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(options: readonly T[], value: unknown): value is T {
    return typeof value === 'string' && options.some(option => option === value);
}

/**
 * Validate an untyped configuration value (parsed YAML, CLI overrides).
 * Collects every problem before failing.
 */
export function validateConfig(raw: unknown): DoclensConfig {
    if (raw === undefined || raw === null) {
        return {};
    }
    if (!isRecord(raw)) {
        throw new ConfigurationError(['configuration must be a mapping of option names to values']);
    }

    const problems: string[] = [];
    const config: DoclensConfig = {};

    for (const key of Object.keys(raw)) {
        if (!KNOWN_KEYS.has(key)) {
            problems.push(`unknown option '${key}'`);
        }
    }

    const enumList = <T extends string>(key: string, options: readonly T[]): T[] | undefined => {
        const value = raw[key];
        if (value === undefined) return undefined;
        if (!Array.isArray(value)) {
            problems.push(`'${key}' must be a list`);
            return undefined;
        }
        const result: T[] = [];
        for (const item of value) {
            if (isOneOf(options, item)) {
                result.push(item);
            } else {
                problems.push(`'${key}' contains unknown value '${String(item)}' (expected one of: ${options.join(', ')})`);
            }
        }
        return result;
    };

    const globList = (key: string): string[] | undefined => {
        const value = raw[key];
        if (value === undefined) return undefined;
        if (!Array.isArray(value) || !value.every(item => typeof item === 'string' && item.length > 0)) {
            problems.push(`'${key}' must be a list of non-empty glob patterns`);
            return undefined;
        }
        return value.filter((item): item is string => typeof item === 'string');
    };

    const positiveNumber = (key: string, integer: boolean): number | undefined => {
        const value = raw[key];
        if (value === undefined) return undefined;
        if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
            problems.push(`'${key}' must be a positive ${integer ? 'integer' : 'number'}`);
            return undefined;
        }
        return value;
    };

    config.included_languages = enumList('included_languages', LANGUAGE_IDS);
    config.enabled_rules = enumList('enabled_rules', ISSUE_CATEGORIES);
    config.include_globs = globList('include_globs');
    config.exclude_globs = globList('exclude_globs');
    config.max_file_size_kb = positiveNumber('max_file_size_kb', false);
    config.concurrency = positiveNumber('concurrency', true);

    if (raw.doc_style !== undefined) {
        if (isOneOf(DOC_STYLES, raw.doc_style)) {
            config.doc_style = raw.doc_style;
        } else {
            problems.push(`'doc_style' must be one of: ${DOC_STYLES.join(', ')}`);
        }
    }

    if (raw.language_styles !== undefined) {
        if (!isRecord(raw.language_styles)) {
            problems.push(`'language_styles' must map language names to styles`);
        } else {
            const styles: Partial<Record<LanguageId, DocStyle>> = {};
            for (const [language, style] of Object.entries(raw.language_styles)) {
                if (!isOneOf(LANGUAGE_IDS, language)) {
                    problems.push(`'language_styles' names unknown language '${language}'`);
                } else if (!isOneOf(DOC_STYLES, style)) {
                    problems.push(`'language_styles.${language}' must be one of: ${DOC_STYLES.join(', ')}`);
                } else {
                    styles[language] = style;
                }
            }
            config.language_styles = styles;
        }
    }

    if (raw.ignore_private !== undefined) {
        if (typeof raw.ignore_private === 'boolean') {
            config.ignore_private = raw.ignore_private;
        } else {
            problems.push(`'ignore_private' must be true or false`);
        }
    }

    if (raw.min_coverage !== undefined) {
        const value = raw.min_coverage;
        if (typeof value === 'number' && value >= 0 && value <= 1) {
            config.min_coverage = value;
        } else {
            problems.push(`'min_coverage' must be a number between 0 and 1`);
        }
    }

    if (raw.output !== undefined) {
        if (!isRecord(raw.output)) {
            problems.push(`'output' must be a mapping`);
        } else {
            const output: NonNullable<DoclensConfig['output']> = {};
            if (raw.output.format !== undefined) {
                if (isOneOf(REPORT_FORMATS, raw.output.format)) {
                    output.format = raw.output.format;
                } else {
                    problems.push(`'output.format' must be one of: ${REPORT_FORMATS.join(', ')}`);
                }
            }
            if (raw.output.verbose !== undefined) {
                if (typeof raw.output.verbose === 'boolean') {
                    output.verbose = raw.output.verbose;
                } else {
                    problems.push(`'output.verbose' must be true or false`);
                }
            }
            config.output = output;
        }
    }

    if (problems.length > 0) {
        throw new ConfigurationError(problems);
    }
    return config;
}

/**
 * Merge a validated configuration over the defaults and freeze it
 */
export function resolveConfig(raw: unknown = {}): ResolvedConfig {
    const config = validateConfig(raw);

    const includedLanguages = config.included_languages ?? DEFAULT_CONFIG.included_languages;
    if (includedLanguages.length === 0) {
        throw new ConfigurationError([`'included_languages' must name at least one language`]);
    }

    const resolved: ResolvedConfig = {
        includedLanguages: new Set(includedLanguages),
        docStyle: config.doc_style,
        languageStyles: Object.freeze({ ...DEFAULT_LANGUAGE_STYLES, ...config.language_styles }),
        enabledRules: new Set(config.enabled_rules ?? DEFAULT_CONFIG.enabled_rules),
        includeGlobs: Object.freeze([...(config.include_globs ?? DEFAULT_CONFIG.include_globs)]),
        excludeGlobs: Object.freeze([...(config.exclude_globs ?? DEFAULT_CONFIG.exclude_globs)]),
        ignorePrivate: config.ignore_private ?? DEFAULT_CONFIG.ignore_private,
        maxFileSizeKb: config.max_file_size_kb ?? DEFAULT_CONFIG.max_file_size_kb,
        concurrency: config.concurrency ?? DEFAULT_CONFIG.concurrency,
        minCoverage: config.min_coverage ?? DEFAULT_CONFIG.min_coverage,
        output: Object.freeze({ ...DEFAULT_CONFIG.output, ...config.output }),
    };
    return Object.freeze(resolved);
}

/**
 * Loads .doclens.yml, applies environment and command-line overrides
 * and resolves the result
 */
export class ConfigLoader {
    private configSource: string = 'defaults';

    /**
     * Load configuration from file or use defaults
     */
    async load(configPath?: string, overrides: Record<string, unknown> = {}): Promise<ResolvedConfig> {
        let fileConfig: Record<string, unknown> = {};

        if (configPath) {
            fileConfig = await this.loadFromFile(configPath);
            this.configSource = configPath;
        } else {
            const defaultPath = path.join(process.cwd(), DEFAULT_CONFIG_FILE);
            if (await fileExists(defaultPath)) {
                fileConfig = await this.loadFromFile(defaultPath);
                this.configSource = defaultPath;
            }
        }

        const merged: Record<string, unknown> = { ...fileConfig };
        this.applyEnvironmentOverrides(merged);
        for (const [key, value] of Object.entries(overrides)) {
            if (value === undefined) continue;
            const current = merged[key];
            merged[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
        }

        const config = resolveConfig(merged);
        logger.info(`Configuration loaded from: ${this.configSource}`);
        return config;
    }

    getConfigSource(): string {
        return this.configSource;
    }

    /**
     * Load config from file. A named file that cannot be read or parsed is fatal.
     */
    private async loadFromFile(filePath: string): Promise<Record<string, unknown>> {
        let content: string;
        try {
            content = await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            throw new ConfigurationError([`cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`]);
        }

        let parsed: unknown;
        try {
            parsed = yaml.load(content);
        } catch (error) {
            throw new ConfigurationError([`cannot parse config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`]);
        }

        if (parsed === undefined || parsed === null) {
            return {};
        }
        if (!isRecord(parsed)) {
            throw new ConfigurationError([`config file ${filePath} must contain a mapping`]);
        }
        logger.debug(`Loaded config from: ${filePath}`);
        return parsed;
    }

    /**
     * Apply environment variable overrides
     */
    private applyEnvironmentOverrides(config: Record<string, unknown>): void {
        if (process.env.DOCLENS_STYLE) {
            config.doc_style = process.env.DOCLENS_STYLE;
        }
        if (process.env.DOCLENS_LANGUAGES) {
            config.included_languages = process.env.DOCLENS_LANGUAGES.split(',')
                .map(language => language.trim())
                .filter(language => language.length > 0);
        }
        if (process.env.DOCLENS_CONCURRENCY) {
            config.concurrency = parseInt(process.env.DOCLENS_CONCURRENCY, 10);
        }
    }
}

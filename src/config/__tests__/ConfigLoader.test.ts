import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigLoader, resolveConfig, validateConfig } from '../ConfigLoader';
import { ConfigurationError } from '../../models/errors';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    },
}));

function problemsOf(fn: () => unknown): string[] {
    try {
        fn();
    } catch (error) {
        if (error instanceof ConfigurationError) return error.problems;
        throw error;
    }
    return [];
}

describe('validateConfig', () => {
    it('accepts an empty configuration', () => {
        expect(validateConfig(undefined)).toEqual({});
        expect(validateConfig(null)).toEqual({});
    });

    it('rejects a non-mapping', () => {
        expect(problemsOf(() => validateConfig(['python']))).toEqual([
            'configuration must be a mapping of option names to values',
        ]);
    });

    it('collects every problem', () => {
        expect(problemsOf(() => validateConfig({ colour: 'red', concurrency: 0, doc_style: 'fancy' }))).toEqual([
            "unknown option 'colour'",
            "'concurrency' must be a positive integer",
            "'doc_style' must be one of: google, numpy, sphinx, jsdoc, javadoc, doxygen, godoc",
        ]);
    });

    it('rejects unknown rules, languages and styles', () => {
        const problems = problemsOf(() => validateConfig({
            enabled_rules: ['MissingDocumentation', 'Spelling'],
            language_styles: { ruby: 'google', go: 'prose' },
        }));

        expect(problems).toEqual([
            "'enabled_rules' contains unknown value 'Spelling' (expected one of: MissingDocumentation, FormatViolation, IncompleteParameters, IncompleteReturn, IncompleteExceptions, StyleInconsistency, StaleDocumentation)",
            "'language_styles' names unknown language 'ruby'",
            "'language_styles.go' must be one of: google, numpy, sphinx, jsdoc, javadoc, doxygen, godoc",
        ]);
    });

    it('checks value ranges', () => {
        expect(problemsOf(() => validateConfig({ min_coverage: 1.5, ignore_private: 'yes', include_globs: [''] }))).toEqual([
            "'include_globs' must be a list of non-empty glob patterns",
            "'ignore_private' must be true or false",
            "'min_coverage' must be a number between 0 and 1",
        ]);
    });

    it('validates output settings', () => {
        expect(problemsOf(() => validateConfig({ output: { format: 'html' } }))).toEqual([
            "'output.format' must be one of: json, markdown, text",
        ]);
    });
});

describe('resolveConfig', () => {
    it('fills in defaults', () => {
        const config = resolveConfig();

        expect(Array.from(config.includedLanguages)).toEqual(['python', 'javascript', 'typescript', 'java', 'cpp', 'go']);
        expect(config.docStyle).toBeUndefined();
        expect(config.languageStyles.python).toBe('google');
        expect(config.languageStyles.go).toBe('godoc');
        expect(config.enabledRules.size).toBe(7);
        expect(config.concurrency).toBe(4);
        expect(config.maxFileSizeKb).toBe(1024);
        expect(config.minCoverage).toBe(0);
        expect(config.output).toEqual({ format: 'text', verbose: false });
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('merges language styles over the defaults', () => {
        const config = resolveConfig({ language_styles: { python: 'numpy' } });

        expect(config.languageStyles.python).toBe('numpy');
        expect(config.languageStyles.java).toBe('javadoc');
    });

    it('requires at least one language', () => {
        expect(problemsOf(() => resolveConfig({ included_languages: [] }))).toEqual([
            "'included_languages' must name at least one language",
        ]);
    });
});

describe('ConfigLoader', () => {
    const ORIGINAL_ENV = { ...process.env };
    let tmpDir: string;
    let loader: ConfigLoader;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'doclens-config-'));
        loader = new ConfigLoader();
        delete process.env.DOCLENS_STYLE;
        delete process.env.DOCLENS_LANGUAGES;
        delete process.env.DOCLENS_CONCURRENCY;
    });

    afterEach(() => {
        jest.restoreAllMocks();
        process.env = { ...ORIGINAL_ENV };
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    const writeConfig = (content: string, name = '.doclens.yml'): string => {
        const filePath = path.join(tmpDir, name);
        fs.writeFileSync(filePath, content);
        return filePath;
    };

    it('should load a config file from the given path', async () => {
        const configPath = writeConfig('doc_style: numpy\nconcurrency: 2\noutput:\n  format: json\n', 'custom.yml');

        const config = await loader.load(configPath);

        expect(config.docStyle).toBe('numpy');
        expect(config.concurrency).toBe(2);
        expect(config.output).toEqual({ format: 'json', verbose: false });
        expect(loader.getConfigSource()).toBe(configPath);
    });

    it('should look for .doclens.yml in the working directory', async () => {
        const configPath = writeConfig('ignore_private: true\n');
        jest.spyOn(process, 'cwd').mockReturnValue(tmpDir);

        const config = await loader.load();

        expect(config.ignorePrivate).toBe(true);
        expect(loader.getConfigSource()).toBe(configPath);
    });

    it('should use defaults when no config file exists', async () => {
        jest.spyOn(process, 'cwd').mockReturnValue(tmpDir);

        const config = await loader.load();

        expect(config.concurrency).toBe(4);
        expect(loader.getConfigSource()).toBe('defaults');
    });

    it('should treat an empty file as defaults', async () => {
        const config = await loader.load(writeConfig(''));

        expect(config.ignorePrivate).toBe(false);
    });

    it('should fail on a missing named file', async () => {
        await expect(loader.load(path.join(tmpDir, 'missing.yml'))).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should fail on invalid YAML and on a non-mapping document', async () => {
        await expect(loader.load(writeConfig('output: [unclosed\n', 'bad.yml'))).rejects.toBeInstanceOf(ConfigurationError);
        await expect(loader.load(writeConfig('- python\n- go\n', 'list.yml'))).rejects.toThrow(/must contain a mapping/);
    });

    it('should apply environment overrides', async () => {
        process.env.DOCLENS_STYLE = 'sphinx';
        process.env.DOCLENS_LANGUAGES = 'python, go';
        process.env.DOCLENS_CONCURRENCY = '3';

        const config = await loader.load(writeConfig('doc_style: numpy\n'));

        expect(config.docStyle).toBe('sphinx');
        expect(Array.from(config.includedLanguages)).toEqual(['python', 'go']);
        expect(config.concurrency).toBe(3);
    });

    it('should merge command-line overrides into nested options', async () => {
        const config = await loader.load(writeConfig('output:\n  format: json\n'), { output: { verbose: true }, min_coverage: 0.8 });

        expect(config.output).toEqual({ format: 'json', verbose: true });
        expect(config.minCoverage).toBe(0.8);
    });

    it('should validate overrides with the file', async () => {
        await expect(loader.load(writeConfig('concurrency: 2\n'), { doc_style: 'fancy' })).rejects.toBeInstanceOf(ConfigurationError);
    });
});

import { LanguageId } from '../models/CodeElement';
import { IssueCategory } from '../models/AnalysisReport';

export type DocStyle = 'google' | 'numpy' | 'sphinx' | 'jsdoc' | 'javadoc' | 'doxygen' | 'godoc';

export const DOC_STYLES: readonly DocStyle[] = ['google', 'numpy', 'sphinx', 'jsdoc', 'javadoc', 'doxygen', 'godoc'];

export type ReportFormat = 'json' | 'markdown' | 'text';

/**
 * Configuration file schema (.doclens.yml). Every field is optional.
 */
export interface DoclensConfig {
    included_languages?: LanguageId[];
    /** Overrides the per-language style for every language */
    doc_style?: DocStyle;
    language_styles?: Partial<Record<LanguageId, DocStyle>>;
    enabled_rules?: IssueCategory[];
    include_globs?: string[];
    exclude_globs?: string[];
    ignore_private?: boolean;
    max_file_size_kb?: number;
    concurrency?: number;
    min_coverage?: number;
    output?: {
        format?: ReportFormat;
        verbose?: boolean;
    };
}

/**
 * Fully-resolved, immutable configuration the engine reads
 */
export interface ResolvedConfig {
    readonly includedLanguages: ReadonlySet<LanguageId>;
    readonly docStyle?: DocStyle;
    readonly languageStyles: Readonly<Record<LanguageId, DocStyle>>;
    readonly enabledRules: ReadonlySet<IssueCategory>;
    readonly includeGlobs: readonly string[];
    readonly excludeGlobs: readonly string[];
    readonly ignorePrivate: boolean;
    readonly maxFileSizeKb: number;
    readonly concurrency: number;
    readonly minCoverage: number;
    readonly output: {
        readonly format: ReportFormat;
        readonly verbose: boolean;
    };
}

export const DEFAULT_LANGUAGE_STYLES: Record<LanguageId, DocStyle> = {
    python: 'google',
    javascript: 'jsdoc',
    typescript: 'jsdoc',
    java: 'javadoc',
    cpp: 'doxygen',
    go: 'godoc',
};

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Required<Omit<DoclensConfig, 'doc_style' | 'output'>> & {
    output: { format: ReportFormat; verbose: boolean };
} = {
    included_languages: ['python', 'javascript', 'typescript', 'java', 'cpp', 'go'],
    language_styles: { ...DEFAULT_LANGUAGE_STYLES },
    enabled_rules: [
        'MissingDocumentation',
        'FormatViolation',
        'IncompleteParameters',
        'IncompleteReturn',
        'IncompleteExceptions',
        'StyleInconsistency',
        'StaleDocumentation',
    ],
    include_globs: ['**/*'],
    exclude_globs: [
        '**/node_modules/**',
        '**/vendor/**',
        '**/dist/**',
        '**/build/**',
        '**/target/**',
        '**/.git/**',
        '**/__pycache__/**',
        '**/.venv/**',
        '**/venv/**',
        '**/coverage/**',
        '**/*.d.ts',
    ],
    ignore_private: false,
    max_file_size_kb: 1024,
    concurrency: 4,
    min_coverage: 0,
    output: {
        format: 'text',
        verbose: false,
    },
};

/**
 * Style rules applied to a language: the global override, else the per-language style
 */
export function styleFor(
    config: Pick<ResolvedConfig, 'docStyle' | 'languageStyles'>,
    language: LanguageId
): DocStyle {
    return config.docStyle ?? config.languageStyles[language];
}

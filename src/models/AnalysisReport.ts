import { CodeElement, LanguageId, SourceLocation } from './CodeElement';

export type Severity = 'High' | 'Medium' | 'Low';

export type IssueCategory =
    | 'MissingDocumentation'
    | 'FormatViolation'
    | 'IncompleteParameters'
    | 'IncompleteReturn'
    | 'IncompleteExceptions'
    | 'StyleInconsistency'
    | 'StaleDocumentation';

/**
 * Rule order. Issues for one element are always reported in this order.
 */
export const ISSUE_CATEGORIES: readonly IssueCategory[] = [
    'MissingDocumentation',
    'FormatViolation',
    'IncompleteParameters',
    'IncompleteReturn',
    'IncompleteExceptions',
    'StyleInconsistency',
    'StaleDocumentation',
];

export const SEVERITY_RANK: Record<Severity, number> = {
    High: 3,
    Medium: 2,
    Low: 1,
};

export interface ElementRef {
    qualifiedName: string;
    location: SourceLocation;
}

/**
 * One detected documentation defect
 */
export interface Issue {
    severity: Severity;
    category: IssueCategory;
    element: ElementRef;
    message: string;
    suggestion?: string;
}

/**
 * Quality metrics. `null` means no element contributed to the score.
 */
export interface EvaluationScore {
    clarityScore: number | null;
    consistencyScore: number | null;
    syncScore: number | null;
}

export type SyncStatus = 'in-sync' | 'drift' | 'unknown';

export interface ElementSync {
    qualifiedName: string;
    status: SyncStatus;
}

/**
 * Complete outcome of analyzing one file. Produced by a worker and
 * never modified afterwards.
 */
export interface FileResult {
    filePath: string;
    language: LanguageId;
    elements: CodeElement[];
    issues: Issue[];
    scores: EvaluationScore;
    elementSync: ElementSync[];
}

export interface FileNote {
    filePath: string;
    reason: string;
}

export interface FileSummary {
    filePath: string;
    language: LanguageId;
    elementsTotal: number;
    elementsDocumented: number;
    coverage: number;
    issueCount: number;
    scores: EvaluationScore;
}

export type RunState =
    | 'Pending'
    | 'Scanning'
    | 'PerFileAnalyzing'
    | 'Aggregating'
    | 'Complete'
    | 'Cancelled'
    | 'Failed';

/**
 * Aggregation root handed to presentation layers
 */
export interface AnalysisReport {
    targetPath: string;
    state: RunState;
    complete: boolean;
    filesAnalyzed: number;
    elementsTotal: number;
    elementsDocumented: number;
    coverage: number;
    issues: Issue[];
    scores: EvaluationScore;
    files: FileSummary[];
    failedFiles: FileNote[];
    skippedFiles: FileNote[];
    issuesBySeverity: Record<Severity, number>;
    coverageByLanguage: Partial<Record<LanguageId, number>>;
    generatedAt: string;
}

import fs from 'fs/promises';
import path from 'path';
import micromatch from 'micromatch';
import { AdapterRegistry } from '../adapters/AdapterRegistry';
import { LanguageAdapter } from '../adapters/LanguageAdapter';
import { DocumentationChecker } from '../analyzer/DocumentationChecker';
import { DocumentationEvaluator } from '../analyzer/DocumentationEvaluator';
import { ResolvedConfig } from '../config/schema';
import { CodeElement, LanguageId, PriorFingerprintStore } from '../models/CodeElement';
import {
    AnalysisReport,
    EvaluationScore,
    FileNote,
    FileResult,
    FileSummary,
    ISSUE_CATEGORIES,
    Issue,
    RunState,
    SEVERITY_RANK,
    Severity,
} from '../models/AnalysisReport';
import { InvalidTarget } from '../models/errors';
import { findFiles, getFileSize, readFile, toPosixPath } from '../utils/fileUtils';
import logger from '../utils/logger';

export interface AnalyzeOptions {
    /** Checked before each file; an aborted run returns a partial report */
    signal?: AbortSignal;
    /** Fingerprints of a previous run, read-only */
    priorFingerprints?: PriorFingerprintStore;
}

interface Candidate {
    filePath: string;
    absolutePath: string;
    adapter: LanguageAdapter;
}

type FileOutcome =
    | { status: 'analyzed'; result: FileResult }
    | { status: 'failed'; note: FileNote }
    | { status: 'skipped'; note: FileNote };

function compareStrings(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order on issues: file, line, severity (high first), element,
 * rule order, message
 */
export function compareIssues(a: Issue, b: Issue): number {
    return compareStrings(a.element.location.filePath, b.element.location.filePath)
        || a.element.location.startLine - b.element.location.startLine
        || SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity]
        || compareStrings(a.element.qualifiedName, b.element.qualifiedName)
        || ISSUE_CATEGORIES.indexOf(a.category) - ISSUE_CATEGORIES.indexOf(b.category)
        || compareStrings(a.message, b.message);
}

function meanOf(values: Array<number | null>): number | null {
    const present = values.filter((value): value is number => value !== null);
    if (present.length === 0) return null;
    return present.reduce((total, value) => total + value, 0) / present.length;
}

function coverageOf(elements: CodeElement[]): number {
    if (elements.length === 0) return 0;
    return elements.filter(element => element.docstring !== undefined).length / elements.length;
}

/**
 * Drop private elements and everything nested in them, re-linking
 * parent indexes into the shorter list
 */
export function withoutPrivate(elements: CodeElement[]): CodeElement[] {
    const dropped = new Set<number>();
    const newIndex = new Map<number, number>();
    const kept: CodeElement[] = [];

    elements.forEach((element, index) => {
        const parentDropped = element.parentIndex !== undefined && dropped.has(element.parentIndex);
        if (element.kind !== 'module' && (element.visibility === 'private' || parentDropped)) {
            dropped.add(index);
            return;
        }
        newIndex.set(index, kept.length);
        kept.push(
            element.parentIndex === undefined
                ? element
                : { ...element, parentIndex: newIndex.get(element.parentIndex) }
        );
    });

    return kept;
}

/**
 * Runs an analysis: scan the target, analyze each file in a bounded
 * pool of workers, then reduce the per-file results into one report
 */
export class AnalysisOrchestrator {
    private state: RunState = 'Pending';
    private fileResults: FileResult[] = [];
    private checker: DocumentationChecker;
    private evaluator: DocumentationEvaluator;

    constructor(
        private readonly config: ResolvedConfig,
        private readonly registry: AdapterRegistry = new AdapterRegistry()
    ) {
        this.checker = new DocumentationChecker(config);
        this.evaluator = new DocumentationEvaluator(config);
    }

    getState(): RunState {
        return this.state;
    }

    /**
     * Per-file results of the last run, sorted by path
     */
    getFileResults(): FileResult[] {
        return this.fileResults;
    }

    async analyze(targetPath: string, options: AnalyzeOptions = {}): Promise<AnalysisReport> {
        const { signal, priorFingerprints } = options;
        this.fileResults = [];

        this.setState('Scanning');
        const { candidates, skipped } = await this.scan(targetPath);
        logger.info(`Found ${candidates.length} file(s) to analyze in ${targetPath}`);

        this.setState('PerFileAnalyzing');
        const outcomes = await this.analyzeFiles(candidates, priorFingerprints, signal);

        // An abort that lands after the last file was taken cancels nothing
        const cancelled = outcomes.some(outcome => outcome === undefined);
        this.setState('Aggregating');
        const report = this.aggregate(targetPath, outcomes, skipped, cancelled);

        this.setState(cancelled ? 'Cancelled' : 'Complete');
        return report;
    }

    private setState(state: RunState): void {
        this.state = state;
        logger.info(`Run state: ${state}`);
    }

    private async scan(targetPath: string): Promise<{ candidates: Candidate[]; skipped: FileNote[] }> {
        let root: string;
        let files: string[];

        try {
            const stat = await fs.stat(targetPath);
            if (stat.isDirectory()) {
                root = targetPath;
                files = await findFiles(root, [...this.config.includeGlobs], { ignore: [...this.config.excludeGlobs] });
            } else if (stat.isFile()) {
                root = path.dirname(targetPath);
                const name = path.basename(targetPath);
                const included = micromatch.isMatch(name, [...this.config.includeGlobs], { dot: true })
                    && !micromatch.isMatch(name, [...this.config.excludeGlobs], { dot: true });
                files = included ? [name] : [];
            } else {
                throw new InvalidTarget(targetPath, 'not a file or directory');
            }
        } catch (error) {
            this.setState('Failed');
            if (error instanceof InvalidTarget) throw error;
            const reason = error instanceof Error ? error.message : String(error);
            throw new InvalidTarget(targetPath, reason);
        }

        const candidates: Candidate[] = [];
        const skipped: FileNote[] = [];
        for (const file of files.map(toPosixPath).sort(compareStrings)) {
            const adapter = this.registry.getAdapterForFile(file);
            if (!adapter) {
                skipped.push({ filePath: file, reason: 'unsupported file type' });
            } else if (!this.config.includedLanguages.has(adapter.language)) {
                skipped.push({ filePath: file, reason: `language '${adapter.language}' is not included` });
            } else {
                candidates.push({ filePath: file, absolutePath: path.join(root, file), adapter });
            }
        }
        return { candidates, skipped };
    }

    /**
     * Bounded worker pool. Each worker owns the outcome slot of the file it
     * takes; results are reduced only after every worker has finished.
     */
    private async analyzeFiles(
        candidates: Candidate[],
        priorFingerprints: PriorFingerprintStore | undefined,
        signal: AbortSignal | undefined
    ): Promise<Array<FileOutcome | undefined>> {
        const outcomes: Array<FileOutcome | undefined> = new Array(candidates.length).fill(undefined);
        let next = 0;

        const worker = async (): Promise<void> => {
            while (next < candidates.length) {
                if (signal?.aborted) {
                    logger.warn('Analysis cancelled');
                    return;
                }
                const index = next++;
                outcomes[index] = await this.analyzeFile(candidates[index], priorFingerprints);
            }
        };

        const workerCount = Math.max(1, Math.min(this.config.concurrency, candidates.length));
        await Promise.all(Array.from({ length: workerCount }, () => worker()));
        return outcomes;
    }

    private async analyzeFile(candidate: Candidate, priorFingerprints?: PriorFingerprintStore): Promise<FileOutcome> {
        const { filePath, absolutePath, adapter } = candidate;

        let source: string;
        try {
            const size = await getFileSize(absolutePath);
            if (size > this.config.maxFileSizeKb * 1024) {
                return { status: 'skipped', note: { filePath, reason: `larger than ${this.config.maxFileSizeKb} KB` } };
            }
            source = await readFile(absolutePath);
        } catch (error) {
            const reason = `cannot read file: ${error instanceof Error ? error.message : String(error)}`;
            logger.warn(`${filePath}: ${reason}`);
            return { status: 'failed', note: { filePath, reason } };
        }

        let elements: CodeElement[];
        try {
            elements = adapter.extract(source, filePath);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            logger.warn(`Failed to analyze ${reason}`);
            return { status: 'failed', note: { filePath, reason } };
        }

        if (this.config.ignorePrivate) {
            elements = withoutPrivate(elements);
        }

        // Style is judged against the whole project during aggregation
        const assessment = this.evaluator.assess(elements, priorFingerprints, { styleIssues: false });
        const issues = [...this.checker.check(elements), ...assessment.issues].sort(compareIssues);
        logger.debug(`${filePath}: ${elements.length} element(s), ${issues.length} issue(s)`);

        return {
            status: 'analyzed',
            result: {
                filePath,
                language: adapter.language,
                elements,
                issues,
                scores: assessment.score,
                elementSync: assessment.elementSync,
            },
        };
    }

    /**
     * Single-writer reduction over outcomes in path order
     */
    private aggregate(
        targetPath: string,
        outcomes: Array<FileOutcome | undefined>,
        scanSkipped: FileNote[],
        cancelled: boolean
    ): AnalysisReport {
        const analyzed: FileResult[] = [];
        const failedFiles: FileNote[] = [];
        const skippedFiles: FileNote[] = [...scanSkipped];

        for (const outcome of outcomes) {
            if (!outcome) continue;
            if (outcome.status === 'analyzed') analyzed.push(outcome.result);
            else if (outcome.status === 'failed') failedFiles.push(outcome.note);
            else skippedFiles.push(outcome.note);
        }
        analyzed.sort((a, b) => compareStrings(a.filePath, b.filePath));
        failedFiles.sort((a, b) => compareStrings(a.filePath, b.filePath));
        skippedFiles.sort((a, b) => compareStrings(a.filePath, b.filePath));

        const elements = analyzed.flatMap(result => result.elements);
        const projectStyle = this.evaluator.consistencyAcross(elements);
        const results = analyzed.map(result => {
            const styleIssues = projectStyle.issues.filter(issue => issue.element.location.filePath === result.filePath);
            return styleIssues.length === 0
                ? result
                : { ...result, issues: [...result.issues, ...styleIssues].sort(compareIssues) };
        });

        const issues = results.flatMap(result => result.issues).sort(compareIssues);
        const elementsDocumented = elements.filter(element => element.docstring !== undefined).length;

        const issuesBySeverity: Record<Severity, number> = { High: 0, Medium: 0, Low: 0 };
        for (const issue of issues) {
            issuesBySeverity[issue.severity]++;
        }

        const byLanguage = new Map<LanguageId, CodeElement[]>();
        for (const result of results) {
            byLanguage.set(result.language, [...(byLanguage.get(result.language) ?? []), ...result.elements]);
        }
        const coverageByLanguage: Partial<Record<LanguageId, number>> = {};
        for (const language of Array.from(byLanguage.keys()).sort()) {
            coverageByLanguage[language] = coverageOf(byLanguage.get(language) ?? []);
        }

        const scores: EvaluationScore = {
            clarityScore: meanOf(results.map(result => result.scores.clarityScore)),
            consistencyScore: projectStyle.consistencyScore,
            syncScore: meanOf(results.map(result => result.scores.syncScore)),
        };

        const files: FileSummary[] = results.map(result => ({
            filePath: result.filePath,
            language: result.language,
            elementsTotal: result.elements.length,
            elementsDocumented: result.elements.filter(element => element.docstring !== undefined).length,
            coverage: coverageOf(result.elements),
            issueCount: result.issues.length,
            scores: result.scores,
        }));

        this.fileResults = results;

        return {
            targetPath,
            state: cancelled ? 'Cancelled' : 'Complete',
            complete: !cancelled,
            filesAnalyzed: results.length,
            elementsTotal: elements.length,
            elementsDocumented,
            coverage: elements.length === 0 ? 0 : elementsDocumented / elements.length,
            issues,
            scores,
            files,
            failedFiles,
            skippedFiles,
            issuesBySeverity,
            coverageByLanguage,
            generatedAt: new Date().toISOString(),
        };
    }
}

/**
 * Analyze a file or directory with a resolved configuration
 */
export async function analyze(
    targetPath: string,
    config: ResolvedConfig,
    options: AnalyzeOptions = {}
): Promise<AnalysisReport> {
    return new AnalysisOrchestrator(config).analyze(targetPath, options);
}

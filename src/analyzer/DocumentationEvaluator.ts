import { CodeElement, PriorFingerprintStore, fingerprintKey } from '../models/CodeElement';
import { ElementSync, EvaluationScore, Issue } from '../models/AnalysisReport';
import { ResolvedConfig } from '../config/schema';
import { conventionSignature, proseOf } from './DocstringParser';
import { clarityOf } from './readability';
import { elementRef } from './DocumentationChecker';

export type EvaluatorConfig = Pick<ResolvedConfig, 'enabledRules'>;

export interface Assessment {
    score: EvaluationScore;
    elementSync: ElementSync[];
    issues: Issue[];
}

export interface AssessOptions {
    /** Report StyleInconsistency against this set's dominant convention (default true) */
    styleIssues?: boolean;
}

export interface ConsistencyResult {
    consistencyScore: number | null;
    issues: Issue[];
}

function mean(values: number[]): number | null {
    if (values.length === 0) return null;
    return values.reduce((total, value) => total + value, 0) / values.length;
}

function isDocumented(element: CodeElement): element is CodeElement & { docstring: string } {
    return element.docstring !== undefined && element.docstring.trim().length > 0;
}

/**
 * Quality scores for a set of elements: clarity of the prose,
 * consistency of the conventions used, and whether documentation kept
 * up with code changes since a prior run
 */
export class DocumentationEvaluator {
    constructor(private readonly config: EvaluatorConfig) {}

    evaluate(elements: CodeElement[], priorFingerprints?: PriorFingerprintStore): EvaluationScore {
        return this.assess(elements, priorFingerprints).score;
    }

    assess(elements: CodeElement[], priorFingerprints?: PriorFingerprintStore, options: AssessOptions = {}): Assessment {
        const documented = elements.filter(isDocumented);
        const issues: Issue[] = [];

        const clarityScore = mean(
            documented
                .map(element => clarityOf(proseOf(element.docstring)))
                .filter((score): score is number => score !== null)
        );

        const consistency = this.consistencyAcross(documented);
        const consistencyScore = consistency.consistencyScore;
        if (options.styleIssues !== false) issues.push(...consistency.issues);
        const { syncScore, elementSync } = this.sync(elements, priorFingerprints, issues);

        return {
            score: { clarityScore, consistencyScore, syncScore },
            elementSync,
            issues,
        };
    }

    /**
     * Share of classified docstrings using the dominant convention, with a
     * StyleInconsistency issue for every other one. Ties go to the
     * alphabetically first signature. Used per file and over a whole project.
     */
    consistencyAcross(elements: CodeElement[]): ConsistencyResult {
        const signatures = new Map<CodeElement, string>();
        const counts = new Map<string, number>();
        const issues: Issue[] = [];
        for (const element of elements.filter(isDocumented)) {
            const signature = conventionSignature(element.docstring);
            if (signature === null) continue;
            signatures.set(element, signature);
            counts.set(signature, (counts.get(signature) ?? 0) + 1);
        }
        if (signatures.size === 0) return { consistencyScore: null, issues };

        const [dominant, dominantCount] = Array.from(counts.entries()).sort(
            (a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0)
        )[0];

        if (this.config.enabledRules.has('StyleInconsistency')) {
            for (const [element, signature] of signatures) {
                if (signature !== dominant) {
                    issues.push({
                        severity: 'Low',
                        category: 'StyleInconsistency',
                        element: elementRef(element),
                        message: `Documentation convention '${signature}' differs from the dominant '${dominant}'`,
                        suggestion: `Rewrite using the '${dominant}' convention`,
                    });
                }
            }
        }

        return { consistencyScore: dominantCount / signatures.size, issues };
    }

    /**
     * Drift: the code changed since the prior run while its documentation did not
     */
    private sync(
        elements: CodeElement[],
        priorFingerprints: PriorFingerprintStore | undefined,
        issues: Issue[]
    ): { syncScore: number | null; elementSync: ElementSync[] } {
        const contributions: number[] = [];
        const elementSync: ElementSync[] = [];

        for (const element of elements) {
            const prior = priorFingerprints?.get(fingerprintKey(element.location.filePath, element.qualifiedName));
            if (!prior || !isDocumented(element)) {
                elementSync.push({ qualifiedName: element.qualifiedName, status: 'unknown' });
                continue;
            }

            const codeChanged = prior.contentFingerprint !== element.contentFingerprint;
            const docUnchanged = prior.docstringFingerprint === element.docstringFingerprint;

            if (codeChanged && docUnchanged) {
                contributions.push(0);
                elementSync.push({ qualifiedName: element.qualifiedName, status: 'drift' });
                if (this.config.enabledRules.has('StaleDocumentation')) {
                    issues.push({
                        severity: 'Medium',
                        category: 'StaleDocumentation',
                        element: elementRef(element),
                        message: `Code of '${element.name}' changed since the last run but its documentation did not`,
                        suggestion: 'Review the documentation against the current code',
                    });
                }
            } else {
                contributions.push(1);
                elementSync.push({ qualifiedName: element.qualifiedName, status: 'in-sync' });
            }
        }

        return { syncScore: mean(contributions), elementSync };
    }
}

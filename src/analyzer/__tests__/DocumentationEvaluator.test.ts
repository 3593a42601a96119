import { DocumentationEvaluator } from '../DocumentationEvaluator';
import { CodeElement, PriorFingerprint, fingerprintKey } from '../../models/CodeElement';
import { ISSUE_CATEGORIES, IssueCategory } from '../../models/AnalysisReport';

let counter = 0;

function makeElement(overrides: Partial<CodeElement> = {}): CodeElement {
    counter++;
    return {
        kind: 'function',
        name: `f${counter}`,
        qualifiedName: `mod.f${counter}`,
        location: { filePath: 'mod.py', startLine: counter, endLine: counter },
        parameters: [],
        hasReturnValue: false,
        raises: [],
        language: 'python',
        visibility: 'public',
        contentFingerprint: 'code-v1',
        ...overrides,
    };
}

const GOOGLE_DOC = 'Do it.\n\nArgs:\n    a: Value.';
const ALT_DOC = 'Do it.\n\nArguments:\n    a: Value.';

describe('DocumentationEvaluator', () => {
    const evaluator = new DocumentationEvaluator({ enabledRules: new Set<IssueCategory>(ISSUE_CATEGORIES) });

    it('returns null scores when nothing contributes', () => {
        expect(evaluator.assess([])).toEqual({
            score: { clarityScore: null, consistencyScore: null, syncScore: null },
            elementSync: [],
            issues: [],
        });
    });

    describe('clarity', () => {
        it('averages reading ease over documented elements', () => {
            const score = evaluator.evaluate([
                makeElement({ docstring: 'Add two numbers.' }),
                makeElement(),
            ]);

            expect(score.clarityScore).toBeCloseTo(0.9099, 4);
        });
    });

    describe('consistency', () => {
        it('is null when no docstring follows a convention', () => {
            expect(evaluator.evaluate([makeElement({ docstring: 'Plain prose.' })]).consistencyScore).toBeNull();
        });

        it('is the share of the dominant convention and flags the rest', () => {
            const odd = makeElement({ docstring: ALT_DOC });
            const elements = [
                makeElement({ docstring: GOOGLE_DOC }),
                odd,
                makeElement({ docstring: GOOGLE_DOC }),
                makeElement({ docstring: GOOGLE_DOC }),
                makeElement({ docstring: 'Plain prose.' }),
            ];

            const { score, issues } = evaluator.assess(elements);

            expect(score.consistencyScore).toBe(0.75);
            expect(issues).toEqual([
                {
                    severity: 'Low',
                    category: 'StyleInconsistency',
                    element: { qualifiedName: odd.qualifiedName, location: odd.location },
                    message: "Documentation convention 'google[Arguments]' differs from the dominant 'google'",
                    suggestion: "Rewrite using the 'google' convention",
                },
            ]);
        });

        it('breaks ties alphabetically', () => {
            const sphinx = makeElement({ docstring: 'Do it.\n:param a: Value.' });
            const { score, issues } = evaluator.assess([sphinx, makeElement({ docstring: GOOGLE_DOC })]);

            expect(score.consistencyScore).toBe(0.5);
            expect(issues.map(issue => issue.element.qualifiedName)).toEqual([sphinx.qualifiedName]);
        });

        it('scores without issues when the rule is disabled', () => {
            const quiet = new DocumentationEvaluator({ enabledRules: new Set<IssueCategory>() });

            const { score, issues } = quiet.assess([
                makeElement({ docstring: GOOGLE_DOC }),
                makeElement({ docstring: ALT_DOC }),
            ]);

            expect(score.consistencyScore).toBe(0.5);
            expect(issues).toEqual([]);
        });
    });

    describe('sync', () => {
        const priorFor = (element: CodeElement, prior: PriorFingerprint) =>
            new Map([[fingerprintKey(element.location.filePath, element.qualifiedName), prior]]);

        it('is unknown without a prior run', () => {
            const element = makeElement({ docstring: 'Doc.', docstringFingerprint: 'doc-v1' });

            const { score, elementSync } = evaluator.assess([element]);

            expect(score.syncScore).toBeNull();
            expect(elementSync).toEqual([{ qualifiedName: element.qualifiedName, status: 'unknown' }]);
        });

        it('is in sync when the code is unchanged', () => {
            const element = makeElement({ docstring: 'Doc.', docstringFingerprint: 'doc-v1' });

            const { score, elementSync } = evaluator.assess(
                [element],
                priorFor(element, { contentFingerprint: 'code-v1', docstringFingerprint: 'doc-v1' })
            );

            expect(score.syncScore).toBe(1);
            expect(elementSync[0].status).toBe('in-sync');
        });

        it('is in sync when code and documentation changed together', () => {
            const element = makeElement({ contentFingerprint: 'code-v2', docstring: 'Doc.', docstringFingerprint: 'doc-v2' });

            const { elementSync } = evaluator.assess(
                [element],
                priorFor(element, { contentFingerprint: 'code-v1', docstringFingerprint: 'doc-v1' })
            );

            expect(elementSync[0].status).toBe('in-sync');
        });

        it('flags drift when the code changed but the documentation did not', () => {
            const element = makeElement({
                name: 'load',
                contentFingerprint: 'code-v2',
                docstring: 'Doc.',
                docstringFingerprint: 'doc-v1',
            });

            const { score, elementSync, issues } = evaluator.assess(
                [element],
                priorFor(element, { contentFingerprint: 'code-v1', docstringFingerprint: 'doc-v1' })
            );

            expect(score.syncScore).toBe(0);
            expect(elementSync[0].status).toBe('drift');
            expect(issues).toHaveLength(1);
            expect(issues[0]).toMatchObject({
                severity: 'Medium',
                category: 'StaleDocumentation',
                message: "Code of 'load' changed since the last run but its documentation did not",
            });
        });

        it('counts documentation added since an undocumented prior run as in sync', () => {
            const element = makeElement({
                contentFingerprint: 'code-v2',
                parameters: [{ name: 'x', hasTypeAnnotation: false }, { name: 'y', hasTypeAnnotation: false }],
                docstring: 'Combine.\n\nArgs:\n    x: First.\n    y: Second.',
                docstringFingerprint: 'doc-v1',
            });

            const { score, elementSync, issues } = evaluator.assess([element], priorFor(element, { contentFingerprint: 'code-v1' }));

            expect(elementSync).toEqual([{ qualifiedName: element.qualifiedName, status: 'in-sync' }]);
            expect(score.syncScore).toBe(1);
            expect(issues.filter(issue => issue.category === 'StaleDocumentation')).toEqual([]);
        });

        it('leaves undocumented elements unknown and averages the rest', () => {
            const undocumented = makeElement({ contentFingerprint: 'code-v2' });
            const drifted = makeElement({ contentFingerprint: 'code-v2', docstring: 'Doc.', docstringFingerprint: 'doc-v1' });
            const fresh = makeElement({ docstring: 'Doc.', docstringFingerprint: 'doc-v1' });
            const prior = new Map<string, PriorFingerprint>(
                [undocumented, drifted, fresh].map(element => [
                    fingerprintKey(element.location.filePath, element.qualifiedName),
                    { contentFingerprint: 'code-v1', docstringFingerprint: 'doc-v1' },
                ])
            );

            const { score, elementSync } = evaluator.assess([undocumented, drifted, fresh], prior);

            expect(elementSync.map(entry => entry.status)).toEqual(['unknown', 'drift', 'in-sync']);
            expect(score.syncScore).toBe(0.5);
        });
    });
});

import { CodeElement, ElementKind } from '../models/CodeElement';
import { ElementRef, Issue, IssueCategory } from '../models/AnalysisReport';
import { DocStyle, ResolvedConfig, styleFor } from '../config/schema';
import { ParsedDocstring, parseDocstring } from './DocstringParser';
import { lastSegment } from '../adapters/TreeSitterAdapter';

export type CheckerConfig = Pick<ResolvedConfig, 'enabledRules' | 'docStyle' | 'languageStyles'>;

const KIND_LABELS: Record<ElementKind, string> = {
    module: 'Module',
    class: 'Class',
    function: 'Function',
    method: 'Method',
};

// Destructuring patterns and other non-identifier parameters cannot be named in docs
const DOCUMENTABLE_NAME = /^[A-Za-z_$][\w$]*$/;

export function elementRef(element: CodeElement): ElementRef {
    return { qualifiedName: element.qualifiedName, location: element.location };
}

/**
 * Presence, format and completeness rules. Stateless: the same
 * elements always produce the same issues, in rule order per element.
 */
export class DocumentationChecker {
    constructor(private readonly config: CheckerConfig) {}

    check(elements: CodeElement[]): Issue[] {
        const issues: Issue[] = [];
        for (const element of elements) {
            issues.push(...this.checkElement(element));
        }
        return issues;
    }

    checkElement(element: CodeElement): Issue[] {
        const issues: Issue[] = [];
        const style = styleFor(this.config, element.language);
        const docstring = element.docstring;

        if (docstring === undefined || docstring.trim().length === 0) {
            if (this.enabled('MissingDocumentation')) {
                issues.push({
                    severity: 'High',
                    category: 'MissingDocumentation',
                    element: elementRef(element),
                    message: `${KIND_LABELS[element.kind]} '${element.name}' has no documentation`,
                    suggestion: `Add a ${style} docstring describing '${element.name}'`,
                });
            }
            return issues;
        }

        const parsed = parseDocstring(docstring, style);
        const names = element.parameters.map(parameter => parameter.name);
        const parameters = names.filter(name => DOCUMENTABLE_NAME.test(name));

        if (this.enabled('FormatViolation')) {
            const problems = this.formatProblems(element, docstring, parsed, style, parameters);
            if (problems.length > 0) {
                issues.push({
                    severity: 'Medium',
                    category: 'FormatViolation',
                    element: elementRef(element),
                    message: `Documentation for '${element.name}' does not follow the ${style} style: ${problems.join('; ')}`,
                    suggestion: `Rewrite the documentation using the ${style} layout`,
                });
            }
        }

        if (this.enabled('IncompleteParameters')) {
            const documented = new Set(parsed.params);
            const missing = parameters.filter(name => !documented.has(name));
            if (missing.length > 0) {
                issues.push({
                    severity: 'Medium',
                    category: 'IncompleteParameters',
                    element: elementRef(element),
                    message: `Parameters not documented: ${missing.join(', ')}`,
                    suggestion: `Describe ${missing.map(name => `'${name}'`).join(', ')} in the documentation`,
                });
            }
        }

        if (this.enabled('IncompleteReturn') && element.hasReturnValue && !parsed.hasReturns) {
            issues.push({
                severity: 'Medium',
                category: 'IncompleteReturn',
                element: elementRef(element),
                message: 'Return value is not documented',
                suggestion: 'Describe what is returned',
            });
        }

        if (this.enabled('IncompleteExceptions')) {
            const documented = new Set(parsed.raises.map(lastSegment));
            const missing = element.raises.filter(name => !documented.has(lastSegment(name)));
            if (missing.length > 0) {
                issues.push({
                    severity: 'Low',
                    category: 'IncompleteExceptions',
                    element: elementRef(element),
                    message: `Raised exceptions not documented: ${missing.join(', ')}`,
                    suggestion: `Document when ${missing.join(', ')} ${missing.length === 1 ? 'is' : 'are'} raised`,
                });
            }
        }

        if (this.enabled('StaleDocumentation') && this.comparesSignature(element, style, names)) {
            const actual = new Set(parameters);
            const extra = Array.from(new Set(parsed.params)).filter(name => !actual.has(name));
            if (extra.length > 0) {
                issues.push({
                    severity: 'Medium',
                    category: 'StaleDocumentation',
                    element: elementRef(element),
                    message: `Documented parameters not in the signature: ${extra.join(', ')}`,
                    suggestion: `Remove ${extra.map(name => `'${name}'`).join(', ')} from the documentation or check the signature`,
                });
            }
        }

        return issues;
    }

    /**
     * Documented names can only be matched against a function signature
     * whose parameters all have plain names. Go prose mentions any word.
     */
    private comparesSignature(element: CodeElement, style: DocStyle, names: string[]): boolean {
        if (style === 'godoc') return false;
        if (element.kind !== 'function' && element.kind !== 'method') return false;
        return names.every(name => DOCUMENTABLE_NAME.test(name));
    }

    private enabled(rule: IssueCategory): boolean {
        return this.config.enabledRules.has(rule);
    }

    private formatProblems(
        element: CodeElement,
        docstring: string,
        parsed: ParsedDocstring,
        style: DocStyle,
        parameters: string[]
    ): string[] {
        const problems: string[] = [];

        if (style === 'godoc') {
            const first = docstring.trim().split(/\s+/);
            const startsWithName = first[0] === element.name
                || (/^(A|An|The)$/.test(first[0] ?? '') && first[1] === element.name);
            if (element.kind !== 'module' && !startsWithName) {
                problems.push(`comment should start with '${element.name}'`);
            }
            if (element.kind === 'module' && !/^Package\s/.test(docstring.trim())) {
                problems.push(`package comment should start with 'Package'`);
            }
            return problems;
        }

        if (parsed.summary.length === 0) {
            problems.push('missing summary line');
        }
        if (parameters.length > 0 && !parsed.hasParamSection) {
            problems.push('missing parameter section');
        }
        for (const header of parsed.malformedHeaders) {
            problems.push(`section '${header}' must be underlined`);
        }
        return problems;
    }
}

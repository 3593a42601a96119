import JavaScript from 'tree-sitter-javascript';
import {
    Definition,
    DocBlock,
    Grammar,
    Scope,
    SyntaxNode,
    TreeSitterAdapter,
    cleanBlockComment,
    isComment,
    isDocBlockComment,
    lastSegment,
    nodeText,
    ownDescendants,
    precedingComments,
} from './TreeSitterAdapter';
import { LanguageId, Parameter, Visibility } from '../models/CodeElement';

const FUNCTION_VALUES = new Set(['arrow_function', 'function_expression', 'function', 'generator_function']);

const NESTED_SCOPES = new Set([
    'function_declaration',
    'generator_function_declaration',
    'function_expression',
    'function',
    'generator_function',
    'arrow_function',
    'method_definition',
    'class_declaration',
    'abstract_class_declaration',
    'class',
]);

const RETURN_NODES = new Set(['return_statement', 'yield_expression']);
const THROW_NODES = new Set(['throw_statement']);

const FILE_TAG = /@(file|fileoverview|overview|module)\b/;

// Return annotations that mean "no value"
const VOID_TYPES = new Set(['void', 'never', 'undefined', 'Promise<void>', 'Promise<never>']);

/**
 * Language adapter for JavaScript sources. The TypeScript adapter
 * extends it with the TypeScript grammars.
 */
export class JavaScriptAdapter extends TreeSitterAdapter {
    readonly language: LanguageId = 'javascript';
    readonly extensions: readonly string[] = ['.js', '.jsx', '.mjs', '.cjs'];

    protected grammarFor(_filePath: string): Grammar {
        return JavaScript;
    }

    /**
     * A leading `/** ... *\/` block that either carries a file tag or is
     * separated from the next statement by a blank line
     */
    protected moduleDoc(root: SyntaxNode, source: string): DocBlock | undefined {
        const first = root.namedChildren.find(child => child.type !== 'hash_bang_line');
        if (!first || !isComment(first)) return undefined;

        const text = nodeText(first, source);
        if (!isDocBlockComment(text)) return undefined;

        const next = first.nextNamedSibling;
        const detached = !next || next.startPosition.row > first.endPosition.row + 1;
        if (!FILE_TAG.test(text) && !detached) return undefined;

        return { text: cleanBlockComment(text), nodes: [first] };
    }

    protected definitionAt(node: SyntaxNode, source: string, scope: Scope): Definition | null {
        switch (node.type) {
            case 'class_declaration':
            case 'abstract_class_declaration': {
                const name = nodeText(node.childForFieldName('name'), source);
                if (!name) return null;
                return {
                    kind: 'class',
                    name,
                    node,
                    body: node.childForFieldName('body'),
                    doc: this.docFor(node, source),
                    parameters: [],
                    hasReturnValue: false,
                    raises: [],
                    visibility: this.visibilityOf(node, name, source),
                };
            }

            case 'function_declaration':
            case 'generator_function_declaration': {
                const name = nodeText(node.childForFieldName('name'), source);
                return name ? this.functionDefinition(node, node, name, 'function', source) : null;
            }

            case 'method_definition': {
                if (node.parent?.type !== 'class_body') return null;
                const name = nodeText(node.childForFieldName('name'), source);
                return this.functionDefinition(node, node, name, 'method', source);
            }

            case 'lexical_declaration':
            case 'variable_declaration': {
                const declarators = node.namedChildren.filter(child => child.type === 'variable_declarator');
                const declarator = declarators[0];
                if (declarators.length !== 1 || !declarator) return null;

                const value = declarator.childForFieldName('value');
                const nameNode = declarator.childForFieldName('name');
                if (!value || !FUNCTION_VALUES.has(value.type) || nameNode?.type !== 'identifier') return null;

                const kind = scope === 'class' ? 'method' : 'function';
                return this.functionDefinition(node, value, nodeText(nameNode, source), kind, source);
            }

            default:
                return null;
        }
    }

    /**
     * @param node statement the definition occupies
     * @param fn node carrying the parameter list and body
     */
    private functionDefinition(
        node: SyntaxNode,
        fn: SyntaxNode,
        name: string,
        kind: 'function' | 'method',
        source: string
    ): Definition {
        const body = fn.childForFieldName('body');
        return {
            kind,
            name,
            node,
            body: fn === node ? body : fn,
            doc: this.docFor(node, source),
            parameters: this.parametersOf(fn, source),
            hasReturnValue: this.returnsValue(fn, body, name, source),
            raises: this.raisesOf(body, source),
            visibility: this.visibilityOf(node, name, source),
        };
    }

    private docFor(node: SyntaxNode, source: string): DocBlock | undefined {
        let anchor = node.parent?.type === 'export_statement' ? node.parent : node;
        // Decorators sit between a member and its comment
        while (anchor.previousSibling?.type === 'decorator') {
            anchor = anchor.previousSibling;
        }

        const comments = precedingComments(anchor);
        const last = comments[comments.length - 1];
        if (!last) return undefined;

        const text = nodeText(last, source);
        if (!isDocBlockComment(text) || FILE_TAG.test(text)) return undefined;
        return { text: cleanBlockComment(text), nodes: [last] };
    }

    private parametersOf(fn: SyntaxNode, source: string): Parameter[] {
        const list = fn.childForFieldName('parameters') ?? fn.childForFieldName('parameter');
        if (!list) return [];
        // `x => x` has a bare identifier in place of a parameter list
        if (list.type === 'identifier') {
            return [{ name: nodeText(list, source), hasTypeAnnotation: false }];
        }

        const parameters: Parameter[] = [];
        for (const child of list.namedChildren) {
            if (isComment(child)) continue;

            let pattern: SyntaxNode | null = child;
            let typed = false;
            if (child.type === 'required_parameter' || child.type === 'optional_parameter') {
                pattern = child.childForFieldName('pattern');
                typed = child.childForFieldName('type') !== null;
            }
            if (pattern?.type === 'assignment_pattern') {
                pattern = pattern.childForFieldName('left');
            }
            if (pattern?.type === 'rest_pattern') {
                pattern = pattern.namedChildren[0] ?? null;
            }
            if (!pattern || pattern.type === 'this') continue;

            parameters.push({
                name: nodeText(pattern, source).replace(/\s+/g, ' '),
                hasTypeAnnotation: typed,
            });
        }
        return parameters;
    }

    private returnsValue(fn: SyntaxNode, body: SyntaxNode | null, name: string, source: string): boolean {
        if (name === 'constructor') return false;
        if (fn.children.some(child => child.type === 'set')) return false;

        const annotation = fn.childForFieldName('return_type');
        if (annotation) {
            const text = nodeText(annotation, source).replace(/^:\s*/, '').replace(/\s+/g, '');
            return !VOID_TYPES.has(text);
        }

        if (fn.type === 'arrow_function' && body && body.type !== 'statement_block') {
            return true;
        }

        return ownDescendants(body, RETURN_NODES, NESTED_SCOPES).some(found =>
            found.type === 'yield_expression' || found.namedChildren.some(child => !isComment(child))
        );
    }

    /**
     * Error classes thrown with `throw new X(...)` or `throw X`
     */
    private raisesOf(body: SyntaxNode | null, source: string): string[] {
        const names: string[] = [];
        for (const statement of ownDescendants(body, THROW_NODES, NESTED_SCOPES)) {
            const thrown = statement.namedChildren.find(child => !isComment(child));
            if (!thrown) continue;

            const target = thrown.type === 'new_expression' ? thrown.childForFieldName('constructor') : thrown;
            if (!target || (target.type !== 'identifier' && target.type !== 'member_expression')) continue;

            const name = nodeText(target, source);
            if (/^[A-Z]/.test(lastSegment(name))) {
                names.push(name);
            }
        }
        return names;
    }

    private visibilityOf(node: SyntaxNode, name: string, source: string): Visibility {
        if (name.startsWith('#')) return 'private';

        const modifier = node.namedChildren.find(child => child.type === 'accessibility_modifier');
        if (modifier) {
            const text = nodeText(modifier, source);
            if (text === 'private' || text === 'protected') return text;
            return 'public';
        }

        return name.startsWith('_') ? 'protected' : 'public';
    }
}

import Python from 'tree-sitter-python';
import {
    Definition,
    DocBlock,
    Grammar,
    Scope,
    SyntaxNode,
    TreeSitterAdapter,
    dedent,
    isComment,
    lastSegment,
    nodeText,
    ownDescendants,
} from './TreeSitterAdapter';
import { Parameter, Visibility } from '../models/CodeElement';

const NESTED_SCOPES = new Set(['function_definition', 'class_definition', 'lambda']);
const RETURN_NODES = new Set(['return_statement', 'yield']);
const RAISE_NODES = new Set(['raise_statement']);

/**
 * Language adapter for Python sources
 */
export class PythonAdapter extends TreeSitterAdapter {
    readonly language = 'python';
    readonly extensions = ['.py', '.pyi'];

    protected grammarFor(_filePath: string): Grammar {
        return Python;
    }

    protected moduleDoc(root: SyntaxNode, source: string): DocBlock | undefined {
        return this.leadingString(root, source);
    }

    protected definitionAt(node: SyntaxNode, source: string, scope: Scope): Definition | null {
        if (node.type === 'class_definition') {
            const name = nodeText(node.childForFieldName('name'), source);
            return {
                kind: 'class',
                name,
                node,
                body: node.childForFieldName('body'),
                doc: this.leadingString(node.childForFieldName('body'), source),
                parameters: [],
                hasReturnValue: false,
                raises: [],
                visibility: this.visibilityOf(name),
            };
        }

        if (node.type === 'function_definition') {
            const name = nodeText(node.childForFieldName('name'), source);
            const body = node.childForFieldName('body');
            return {
                kind: scope === 'class' ? 'method' : 'function',
                name,
                node,
                body,
                doc: this.leadingString(body, source),
                parameters: this.parametersOf(node, source, scope),
                hasReturnValue: this.returnsValue(node, body, source),
                raises: this.raisesOf(body, source),
                visibility: this.visibilityOf(name),
            };
        }

        return null;
    }

    /**
     * A string literal as the first statement of a block
     */
    private leadingString(block: SyntaxNode | null, source: string): DocBlock | undefined {
        const first = block?.namedChildren.find(child => !isComment(child));
        if (!first || first.type !== 'expression_statement') return undefined;

        const literal = first.namedChildren[0];
        if (!literal || (literal.type !== 'string' && literal.type !== 'concatenated_string')) return undefined;

        return { text: this.stringValue(nodeText(literal, source)), nodes: [first] };
    }

    private stringValue(literal: string): string {
        const unprefixed = literal.replace(/^[rRuUbBfF]+/, '');
        const quote = unprefixed.startsWith('"""') || unprefixed.startsWith("'''") ? 3 : 1;
        return dedent(unprefixed.slice(quote, unprefixed.length - quote));
    }

    private parametersOf(node: SyntaxNode, source: string, scope: Scope): Parameter[] {
        const parameters: Parameter[] = [];
        for (const child of node.childForFieldName('parameters')?.namedChildren ?? []) {
            let nameNode: SyntaxNode | null = null;
            let typed = false;

            switch (child.type) {
                case 'identifier':
                    nameNode = child;
                    break;
                case 'list_splat_pattern':
                case 'dictionary_splat_pattern':
                    nameNode = child.namedChildren[0] ?? null;
                    break;
                case 'default_parameter':
                    nameNode = child.childForFieldName('name');
                    break;
                case 'typed_parameter': {
                    const inner = child.namedChildren[0] ?? null;
                    nameNode = inner && inner.type !== 'identifier' ? inner.namedChildren[0] ?? null : inner;
                    typed = true;
                    break;
                }
                case 'typed_default_parameter':
                    nameNode = child.childForFieldName('name');
                    typed = true;
                    break;
                default:
                    break;
            }

            if (nameNode) {
                parameters.push({ name: nodeText(nameNode, source), hasTypeAnnotation: typed });
            }
        }

        const first = parameters[0];
        if (scope === 'class' && first && (first.name === 'self' || first.name === 'cls')) {
            parameters.shift();
        }
        return parameters;
    }

    private returnsValue(node: SyntaxNode, body: SyntaxNode | null, source: string): boolean {
        const annotation = node.childForFieldName('return_type');
        if (annotation) {
            const text = nodeText(annotation, source).trim();
            return text !== 'None' && text !== 'NoReturn';
        }

        return ownDescendants(body, RETURN_NODES, NESTED_SCOPES).some(found => {
            if (found.type === 'yield') return true;
            const value = found.namedChildren[0];
            return value !== undefined && value.type !== 'none';
        });
    }

    /**
     * Exception names raised directly in the body. Re-raises and
     * lower-case names (variables) are not reported.
     */
    private raisesOf(body: SyntaxNode | null, source: string): string[] {
        const names: string[] = [];
        for (const statement of ownDescendants(body, RAISE_NODES, NESTED_SCOPES)) {
            const raised = statement.namedChildren[0];
            if (!raised) continue;

            const target = raised.type === 'call' ? raised.childForFieldName('function') : raised;
            const name = nodeText(target, source);
            if (/^[A-Z]/.test(lastSegment(name))) {
                names.push(name);
            }
        }
        return names;
    }

    private visibilityOf(name: string): Visibility {
        if (name.startsWith('__') && name.endsWith('__')) return 'public';
        if (name.startsWith('__')) return 'private';
        if (name.startsWith('_')) return 'protected';
        return 'public';
    }
}

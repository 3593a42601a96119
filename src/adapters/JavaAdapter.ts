import Java from 'tree-sitter-java';
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
    nodeText,
    ownDescendants,
    precedingComments,
} from './TreeSitterAdapter';
import { Parameter, Visibility } from '../models/CodeElement';

const TYPE_DECLARATIONS = new Set([
    'class_declaration',
    'interface_declaration',
    'enum_declaration',
    'record_declaration',
    'annotation_type_declaration',
]);

const NESTED_SCOPES = new Set([
    ...TYPE_DECLARATIONS,
    'method_declaration',
    'constructor_declaration',
    'lambda_expression',
    'class_body',
]);

const THROW_NODES = new Set(['throw_statement']);

/**
 * Language adapter for Java sources
 */
export class JavaAdapter extends TreeSitterAdapter {
    readonly language = 'java';
    readonly extensions = ['.java'];

    protected grammarFor(_filePath: string): Grammar {
        return Java;
    }

    /**
     * A `/** ... *\/` block before the package declaration
     */
    protected moduleDoc(root: SyntaxNode, source: string): DocBlock | undefined {
        const pkg = root.namedChildren.find(child => child.type === 'package_declaration');
        if (!pkg) return undefined;

        const comments = precedingComments(pkg);
        const last = comments[comments.length - 1];
        if (!last || !isDocBlockComment(nodeText(last, source))) return undefined;
        return { text: cleanBlockComment(nodeText(last, source)), nodes: [last] };
    }

    protected definitionAt(node: SyntaxNode, source: string, _scope: Scope): Definition | null {
        if (TYPE_DECLARATIONS.has(node.type)) {
            const name = nodeText(node.childForFieldName('name'), source);
            return {
                kind: 'class',
                name,
                node,
                body: node.childForFieldName('body'),
                doc: this.docFor(node, source),
                parameters: [],
                hasReturnValue: false,
                raises: [],
                visibility: this.visibilityOf(node, source),
            };
        }

        if (node.type === 'method_declaration' || node.type === 'constructor_declaration') {
            const body = node.childForFieldName('body');
            const returnType = node.childForFieldName('type');
            return {
                kind: 'method',
                name: nodeText(node.childForFieldName('name'), source),
                node,
                body,
                doc: this.docFor(node, source),
                parameters: this.parametersOf(node, source),
                hasReturnValue: returnType !== null && returnType.type !== 'void_type',
                raises: this.raisesOf(node, body, source),
                visibility: this.visibilityOf(node, source),
            };
        }

        return null;
    }

    private docFor(node: SyntaxNode, source: string): DocBlock | undefined {
        const comments = precedingComments(node);
        const last = comments[comments.length - 1];
        if (!last) return undefined;

        const text = nodeText(last, source);
        if (!isDocBlockComment(text)) return undefined;
        return { text: cleanBlockComment(text), nodes: [last] };
    }

    private parametersOf(node: SyntaxNode, source: string): Parameter[] {
        const parameters: Parameter[] = [];
        for (const child of node.childForFieldName('parameters')?.namedChildren ?? []) {
            if (child.type === 'formal_parameter') {
                parameters.push({ name: nodeText(child.childForFieldName('name'), source), hasTypeAnnotation: true });
            } else if (child.type === 'spread_parameter') {
                const declarator = child.namedChildren.find(part => part.type === 'variable_declarator');
                const name = declarator?.childForFieldName('name') ?? null;
                if (name) {
                    parameters.push({ name: nodeText(name, source), hasTypeAnnotation: true });
                }
            }
        }
        return parameters;
    }

    /**
     * Declared `throws` types plus `throw new X(...)` in the body
     */
    private raisesOf(node: SyntaxNode, body: SyntaxNode | null, source: string): string[] {
        const names: string[] = [];

        const throwsClause = node.namedChildren.find(child => child.type === 'throws');
        for (const type of throwsClause?.namedChildren ?? []) {
            if (!isComment(type)) {
                names.push(nodeText(type, source));
            }
        }

        for (const statement of ownDescendants(body, THROW_NODES, NESTED_SCOPES)) {
            const thrown = statement.namedChildren.find(child => !isComment(child));
            if (thrown?.type === 'object_creation_expression') {
                names.push(nodeText(thrown.childForFieldName('type'), source));
            }
        }
        return names;
    }

    private visibilityOf(node: SyntaxNode, source: string): Visibility {
        const modifiers = node.namedChildren.find(child => child.type === 'modifiers');
        const words = nodeText(modifiers, source).split(/\s+/);
        if (words.includes('private')) return 'private';
        if (words.includes('protected')) return 'protected';
        return 'public';
    }
}

import Cpp from 'tree-sitter-cpp';
import {
    Definition,
    DocBlock,
    Grammar,
    Scope,
    SyntaxNode,
    TreeSitterAdapter,
    cleanBlockComment,
    cleanLineComments,
    isComment,
    isDocBlockComment,
    nodeText,
    ownDescendants,
    precedingComments,
} from './TreeSitterAdapter';
import { Parameter, Visibility } from '../models/CodeElement';

const CLASS_SPECIFIERS = new Set(['class_specifier', 'struct_specifier']);
const DECLARATOR_WRAPPERS = new Set(['pointer_declarator', 'reference_declarator', 'parenthesized_declarator']);
const PARAMETER_TYPES = new Set([
    'parameter_declaration',
    'optional_parameter_declaration',
    'variadic_parameter_declaration',
]);
const NESTED_SCOPES = new Set(['lambda_expression', 'class_specifier', 'struct_specifier', 'function_definition']);
const THROW_NODES = new Set(['throw_statement']);

const FILE_TAG = /[@\\]file\b/;

/**
 * Language adapter for C++ sources and headers. Prototypes and in-class
 * declarations are reported alongside definitions, since headers carry
 * most of the documentation.
 */
export class CppAdapter extends TreeSitterAdapter {
    readonly language = 'cpp';
    readonly extensions = ['.cpp', '.cc', '.cxx', '.hpp', '.hh', '.hxx', '.h'];

    protected grammarFor(_filePath: string): Grammar {
        return Cpp;
    }

    /**
     * The first comment carrying a `@file` command, with the line
     * comments that directly follow it
     */
    protected moduleDoc(root: SyntaxNode, source: string): DocBlock | undefined {
        const comment = root.namedChildren.find(child => isComment(child) && FILE_TAG.test(nodeText(child, source)));
        if (!comment) return undefined;

        const text = nodeText(comment, source);
        if (text.startsWith('/*')) {
            return { text: cleanBlockComment(text), nodes: [comment] };
        }

        const run = [comment];
        let next = comment.nextSibling;
        while (next && isComment(next) && nodeText(next, source).startsWith('//')
            && next.startPosition.row === run[run.length - 1].endPosition.row + 1) {
            run.push(next);
            next = next.nextSibling;
        }
        return { text: cleanLineComments(run.map(node => nodeText(node, source))), nodes: run };
    }

    protected definitionAt(node: SyntaxNode, source: string, scope: Scope): Definition | null {
        if (CLASS_SPECIFIERS.has(node.type)) {
            const body = node.childForFieldName('body');
            if (!body) return null;
            const name = nodeText(node.childForFieldName('name'), source);
            if (!name) return null;
            return {
                kind: 'class',
                name,
                node,
                body,
                doc: this.docFor(this.anchorOf(node), source),
                parameters: [],
                hasReturnValue: false,
                raises: [],
                visibility: this.visibilityOf(node, source),
            };
        }

        const isDefinition = node.type === 'function_definition';
        if (!isDefinition && node.type !== 'declaration' && node.type !== 'field_declaration') {
            return null;
        }

        const declarator = this.functionDeclarator(node.childForFieldName('declarator'));
        if (!declarator) return null;

        const nameNode = declarator.childForFieldName('declarator');
        const name = nodeText(nameNode, source);
        const qualified = nameNode?.type === 'qualified_identifier';
        const body = isDefinition ? node.childForFieldName('body') : null;

        return {
            kind: scope === 'class' || qualified ? 'method' : 'function',
            name,
            node,
            body,
            doc: this.docFor(this.anchorOf(node), source),
            parameters: this.parametersOf(declarator, source),
            hasReturnValue: this.returnsValue(node, source),
            raises: this.raisesOf(body, source),
            visibility: this.visibilityOf(node, source),
        };
    }

    /**
     * Template and variable declarations wrap the entity their comment documents
     */
    private anchorOf(node: SyntaxNode): SyntaxNode {
        let anchor = node;
        while (anchor.parent && (
            anchor.parent.type === 'template_declaration'
            || (anchor.parent.type === 'declaration'
                && anchor.parent.childForFieldName('type')?.startIndex === anchor.startIndex)
        )) {
            anchor = anchor.parent;
        }
        return anchor;
    }

    /**
     * A `/** *\/` or `/*! *\/` block, or a run of `///` or `//!` lines
     */
    private docFor(anchor: SyntaxNode, source: string): DocBlock | undefined {
        const comments = precedingComments(anchor);
        const last = comments[comments.length - 1];
        if (!last) return undefined;

        const lastText = nodeText(last, source);
        if (isDocBlockComment(lastText)) {
            return { text: cleanBlockComment(lastText), nodes: [last] };
        }

        const run: SyntaxNode[] = [];
        for (let i = comments.length - 1; i >= 0; i--) {
            if (!/^\/\/[/!]/.test(nodeText(comments[i], source))) break;
            run.unshift(comments[i]);
        }
        if (run.length === 0) return undefined;
        return { text: cleanLineComments(run.map(comment => nodeText(comment, source))), nodes: run };
    }

    private functionDeclarator(declarator: SyntaxNode | null): SyntaxNode | null {
        let current = declarator;
        while (current && DECLARATOR_WRAPPERS.has(current.type)) {
            current = current.childForFieldName('declarator') ?? current.namedChildren.find(child => child.type.endsWith('declarator')) ?? null;
        }
        return current?.type === 'function_declarator' ? current : null;
    }

    private parametersOf(declarator: SyntaxNode, source: string): Parameter[] {
        const parameters: Parameter[] = [];
        for (const child of declarator.childForFieldName('parameters')?.namedChildren ?? []) {
            if (!PARAMETER_TYPES.has(child.type)) continue;
            const name = this.innermostIdentifier(child.childForFieldName('declarator'));
            if (name) {
                parameters.push({ name: nodeText(name, source), hasTypeAnnotation: true });
            }
        }
        return parameters;
    }

    private innermostIdentifier(node: SyntaxNode | null): SyntaxNode | null {
        let current = node;
        while (current && current.type !== 'identifier') {
            current = current.childForFieldName('declarator')
                ?? current.namedChildren.find(child => child.type === 'identifier' || child.type.endsWith('declarator'))
                ?? null;
        }
        return current;
    }

    /**
     * Constructors and destructors have no return type; `void` returns nothing
     */
    private returnsValue(node: SyntaxNode, source: string): boolean {
        const type = node.childForFieldName('type');
        if (!type) return false;
        if (nodeText(type, source) !== 'void') return true;
        // void* still returns a value
        return node.childForFieldName('declarator')?.type === 'pointer_declarator';
    }

    private raisesOf(body: SyntaxNode | null, source: string): string[] {
        const names: string[] = [];
        for (const statement of ownDescendants(body, THROW_NODES, NESTED_SCOPES)) {
            const thrown = statement.namedChildren.find(child => !isComment(child));
            if (!thrown) continue;
            if (thrown.type === 'call_expression') {
                names.push(nodeText(thrown.childForFieldName('function'), source));
            } else if (thrown.type === 'compound_literal_expression') {
                names.push(nodeText(thrown.childForFieldName('type'), source));
            }
        }
        return names;
    }

    /**
     * Members follow the nearest access specifier above them; classes
     * default to private and structs to public
     */
    private visibilityOf(node: SyntaxNode, source: string): Visibility {
        const anchor = this.anchorOf(node);
        const container = anchor.parent;
        if (container?.type !== 'field_declaration_list') return 'public';

        let sibling = anchor.previousNamedSibling;
        while (sibling) {
            if (sibling.type === 'access_specifier') {
                const text = nodeText(sibling, source).replace(':', '').trim();
                if (text === 'private' || text === 'protected') return text;
                return 'public';
            }
            sibling = sibling.previousNamedSibling;
        }
        return container.parent?.type === 'class_specifier' ? 'private' : 'public';
    }
}

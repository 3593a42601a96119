import Go from 'tree-sitter-go';
import {
    Definition,
    DocBlock,
    Grammar,
    Scope,
    SyntaxNode,
    TreeSitterAdapter,
    cleanBlockComment,
    cleanLineComments,
    nodeText,
    precedingComments,
} from './TreeSitterAdapter';
import { Parameter, Visibility } from '../models/CodeElement';

const CLASS_LIKE_TYPES = new Set(['struct_type', 'interface_type']);

/**
 * Language adapter for Go sources. Structs and interfaces are reported
 * as classes; methods are qualified by their receiver type.
 */
export class GoAdapter extends TreeSitterAdapter {
    readonly language = 'go';
    readonly extensions = ['.go'];

    protected grammarFor(_filePath: string): Grammar {
        return Go;
    }

    protected moduleDoc(root: SyntaxNode, source: string): DocBlock | undefined {
        const pkg = root.namedChildren.find(child => child.type === 'package_clause');
        return pkg ? this.docFor(pkg, source) : undefined;
    }

    protected definitionAt(node: SyntaxNode, source: string, _scope: Scope): Definition | null {
        switch (node.type) {
            case 'function_declaration':
            case 'method_declaration': {
                const name = nodeText(node.childForFieldName('name'), source);
                const receiver = node.type === 'method_declaration' ? this.receiverType(node, source) : undefined;
                return {
                    kind: receiver === undefined ? 'function' : 'method',
                    name,
                    segment: receiver ? `${receiver}.${name}` : undefined,
                    node,
                    body: node.childForFieldName('body'),
                    doc: this.docFor(node, source),
                    parameters: this.parametersOf(node.childForFieldName('parameters'), source),
                    hasReturnValue: node.childForFieldName('result') !== null,
                    raises: [],
                    visibility: this.visibilityOf(name),
                };
            }

            case 'type_spec': {
                const type = node.childForFieldName('type');
                if (!type || !CLASS_LIKE_TYPES.has(type.type)) return null;

                const name = nodeText(node.childForFieldName('name'), source);
                const declaration = node.parent;
                const alone = declaration?.type === 'type_declaration'
                    && declaration.namedChildren.filter(child => child.type === 'type_spec').length === 1;

                return {
                    kind: 'class',
                    name,
                    node: alone && declaration ? declaration : node,
                    body: null,
                    doc: this.docFor(alone && declaration ? declaration : node, source),
                    parameters: [],
                    hasReturnValue: false,
                    raises: [],
                    visibility: this.visibilityOf(name),
                };
            }

            default:
                return null;
        }
    }

    /**
     * Comment lines directly above a declaration
     */
    private docFor(anchor: SyntaxNode, source: string): DocBlock | undefined {
        const comments = precedingComments(anchor);
        if (comments.length === 0) return undefined;

        const texts = comments.map(comment => nodeText(comment, source));
        const text = texts.length === 1 && texts[0].startsWith('/*')
            ? cleanBlockComment(texts[0])
            : cleanLineComments(texts);
        return { text, nodes: comments };
    }

    private receiverType(node: SyntaxNode, source: string): string {
        const receiver = node.childForFieldName('receiver');
        const declaration = receiver?.namedChildren.find(child => child.type === 'parameter_declaration');
        const type = nodeText(declaration?.childForFieldName('type'), source);
        // *Stack[T] -> Stack
        return type.replace(/^\*/, '').replace(/\[.*\]$/, '');
    }

    private parametersOf(list: SyntaxNode | null, source: string): Parameter[] {
        const parameters: Parameter[] = [];
        for (const child of list?.namedChildren ?? []) {
            if (child.type !== 'parameter_declaration' && child.type !== 'variadic_parameter_declaration') continue;
            for (const name of child.childrenForFieldName('name')) {
                parameters.push({ name: nodeText(name, source), hasTypeAnnotation: true });
            }
        }
        return parameters;
    }

    private visibilityOf(name: string): Visibility {
        return /^[A-Z]/.test(name) ? 'public' : 'private';
    }
}

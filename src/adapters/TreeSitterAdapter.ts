import path from 'path';
import { createHash } from 'crypto';
import Parser from 'tree-sitter';
import { LanguageAdapter } from './LanguageAdapter';
import {
    CodeElement,
    ElementKind,
    LanguageId,
    Parameter,
    Visibility,
} from '../models/CodeElement';
import { ParseError } from '../models/errors';

export type SyntaxNode = Parser.SyntaxNode;
export type Grammar = Parameters<Parser['setLanguage']>[0];

/**
 * Lexical scope a definition is found in
 */
export type Scope = 'module' | 'class' | 'function';

/**
 * Documentation attached to a definition, with the nodes that carry it
 */
export interface DocBlock {
    text: string;
    nodes: SyntaxNode[];
}

/**
 * A definition recognised by a concrete adapter
 */
export interface Definition {
    kind: Exclude<ElementKind, 'module'>;
    name: string;
    /** Qualified-name segment when it differs from `name` (e.g. Go receivers) */
    segment?: string;
    node: SyntaxNode;
    /** Subtree searched for nested definitions; defaults to `node` */
    body?: SyntaxNode | null;
    doc?: DocBlock;
    parameters: Parameter[];
    hasReturnValue: boolean;
    raises: string[];
    visibility: Visibility;
}

interface Collected {
    definition: Definition;
    parent: number;
}

// node-tree-sitter reads string input through a fixed-size buffer
const CHUNK_SIZE = 16 * 1024;

const DOC_TAG_BLOCK = /^\/\*[*!]/;

export function nodeText(node: SyntaxNode | null | undefined, source: string): string {
    if (!node) return '';
    return source.slice(node.startIndex, node.endIndex);
}

export function isComment(node: SyntaxNode): boolean {
    return node.type === 'comment' || node.type.endsWith('_comment');
}

/**
 * Remove common indentation and surrounding blank lines
 */
export function dedent(text: string): string {
    const lines = text.replace(/\r\n?/g, '\n').split('\n');
    const indents = lines
        .slice(1)
        .filter(line => line.trim().length > 0)
        .map(line => line.length - line.trimStart().length);
    const common = indents.length > 0 ? Math.min(...indents) : 0;
    const cleaned = [lines[0].trim(), ...lines.slice(1).map(line => line.slice(common).trimEnd())];
    return cleaned.join('\n').trim();
}

/**
 * Strip the delimiters and leading asterisks of a `/** ... *\/` comment
 */
export function cleanBlockComment(text: string): string {
    const body = text.replace(/^\/\*[*!]?/, '').replace(/\*\/$/, '');
    const lines = body.split(/\r?\n/).map(line => line.replace(/^\s*\* ?/, ''));
    return dedent(lines.join('\n'));
}

/**
 * Strip `//`, `///` or `//!` prefixes from a run of line comments
 */
export function cleanLineComments(texts: string[]): string {
    return dedent(texts.map(text => text.replace(/^\/\/[/!]? ?/, '')).join('\n'));
}

export function isDocBlockComment(text: string): boolean {
    return DOC_TAG_BLOCK.test(text) && text !== '/**/';
}

/**
 * Comments directly above `anchor`, in source order, with no blank line between
 */
export function precedingComments(anchor: SyntaxNode): SyntaxNode[] {
    const comments: SyntaxNode[] = [];
    let boundary = anchor.startPosition.row;
    let sibling = anchor.previousSibling;
    while (sibling && isComment(sibling) && sibling.endPosition.row >= boundary - 1) {
        comments.unshift(sibling);
        boundary = sibling.startPosition.row;
        sibling = sibling.previousSibling;
    }
    return comments;
}

/**
 * Descendants of `node` matching `types`, without entering nested definitions
 */
export function ownDescendants(
    node: SyntaxNode | null | undefined,
    types: ReadonlySet<string>,
    boundaries: ReadonlySet<string>
): SyntaxNode[] {
    if (!node) return [];
    const found: SyntaxNode[] = [];
    const stack: SyntaxNode[] = [...node.namedChildren].reverse();
    while (stack.length > 0) {
        const current = stack.pop();
        if (!current) break;
        if (types.has(current.type)) {
            found.push(current);
        }
        if (!boundaries.has(current.type)) {
            const children = current.namedChildren;
            for (let i = children.length - 1; i >= 0; i--) {
                stack.push(children[i]);
            }
        }
    }
    return found;
}

/**
 * Last dotted/scoped segment of an identifier such as `errors.NotFound`
 */
export function lastSegment(identifier: string): string {
    const parts = identifier.split(/\.|::/);
    return parts[parts.length - 1];
}

export function uniqueSorted(values: string[]): string[] {
    return Array.from(new Set(values)).sort();
}

function sha256(text: string): string {
    return createHash('sha256').update(text).digest('hex');
}

/**
 * Shared extraction pipeline for grammar-backed adapters. Subclasses
 * recognise definitions and documentation; this class handles parsing,
 * error detection, naming, parent links and fingerprints.
 */
export abstract class TreeSitterAdapter implements LanguageAdapter {
    abstract readonly language: LanguageId;
    abstract readonly extensions: readonly string[];

    private parsers = new Map<Grammar, Parser>();

    /**
     * Grammar used for a file
     */
    protected abstract grammarFor(filePath: string): Grammar;

    /**
     * File-level documentation, if any
     */
    protected abstract moduleDoc(root: SyntaxNode, source: string): DocBlock | undefined;

    /**
     * Recognise a definition at `node`, or return null to keep descending
     */
    protected abstract definitionAt(node: SyntaxNode, source: string, scope: Scope): Definition | null;

    extract(source: string, filePath: string): CodeElement[] {
        const tree = this.parse(source, filePath);
        const root = tree.rootNode;

        const comments = this.checkSyntaxAndCollectComments(root, filePath);
        const moduleDoc = this.moduleDoc(root, source);
        const moduleText = moduleDoc?.text || undefined;

        const collected: Collected[] = [];
        this.walk(root, source, 'module', 0, collected);

        const excluded: Array<[number, number]> = comments.map(node => [node.startIndex, node.endIndex]);
        for (const doc of [moduleDoc, ...collected.map(item => item.definition.doc)]) {
            for (const node of doc?.nodes ?? []) {
                excluded.push([node.startIndex, node.endIndex]);
            }
        }

        const moduleName = path.basename(filePath).replace(/\.[^.]+$/, '');
        const moduleElement: CodeElement = {
            kind: 'module',
            name: moduleName,
            qualifiedName: moduleName,
            location: {
                filePath,
                startLine: 1,
                endLine: Math.max(1, root.endPosition.row + 1),
            },
            parameters: [],
            hasReturnValue: false,
            raises: [],
            docstring: moduleText,
            language: this.language,
            visibility: 'public',
            contentFingerprint: this.fingerprint(
                source,
                root,
                [...excluded, ...this.childRanges(collected, 0)]
            ),
            docstringFingerprint: moduleText === undefined ? undefined : sha256(moduleText),
        };

        const elements: CodeElement[] = [moduleElement];
        const seen = new Map<string, number>();
        seen.set(moduleName, 1);

        collected.forEach((item, index) => {
            const { definition } = item;
            // An empty comment or string documents nothing
            const docstring = definition.doc?.text || undefined;
            const parent = elements[item.parent];
            let qualifiedName = `${parent.qualifiedName}.${definition.segment ?? definition.name}`;
            const count = (seen.get(qualifiedName) ?? 0) + 1;
            seen.set(qualifiedName, count);
            if (count > 1) {
                qualifiedName = `${qualifiedName}#${count}`;
            }

            const ownRanges = definition.kind === 'class'
                ? [...excluded, ...this.childRanges(collected, index + 1)]
                : excluded;

            elements.push({
                kind: definition.kind,
                name: definition.name,
                qualifiedName,
                parentQualifiedName: parent.qualifiedName,
                parentIndex: item.parent,
                location: {
                    filePath,
                    startLine: definition.node.startPosition.row + 1,
                    endLine: definition.node.endPosition.row + 1,
                },
                parameters: definition.parameters,
                hasReturnValue: definition.hasReturnValue,
                raises: uniqueSorted(definition.raises),
                docstring,
                language: this.language,
                visibility: definition.visibility,
                contentFingerprint: this.fingerprint(source, definition.node, ownRanges),
                docstringFingerprint: docstring === undefined ? undefined : sha256(docstring),
            });
        });

        return elements;
    }

    private parserFor(filePath: string): Parser {
        const grammar = this.grammarFor(filePath);
        let parser = this.parsers.get(grammar);
        if (!parser) {
            parser = new Parser();
            parser.setLanguage(grammar);
            this.parsers.set(grammar, parser);
        }
        return parser;
    }

    private parse(source: string, filePath: string): Parser.Tree {
        const parser = this.parserFor(filePath);
        try {
            return parser.parse((index: number) => source.slice(index, index + CHUNK_SIZE));
        } catch (error) {
            throw new ParseError(filePath, error instanceof Error ? error.message : String(error));
        }
    }

    /**
     * Fail on the first error or missing node; return every comment node
     */
    private checkSyntaxAndCollectComments(root: SyntaxNode, filePath: string): SyntaxNode[] {
        const comments: SyntaxNode[] = [];
        const stack: SyntaxNode[] = [root];
        while (stack.length > 0) {
            const node = stack.pop();
            if (!node) break;

            const isMissing = node !== root && node.childCount === 0 && node.startIndex === node.endIndex;
            if (node.type === 'ERROR' || isMissing) {
                throw new ParseError(
                    filePath,
                    node.type === 'ERROR' ? 'syntax error' : `missing ${node.type}`,
                    node.startPosition.row + 1,
                    node.startPosition.column + 1
                );
            }
            if (isComment(node)) {
                comments.push(node);
                continue;
            }
            const children = node.children;
            for (let i = children.length - 1; i >= 0; i--) {
                stack.push(children[i]);
            }
        }
        return comments;
    }

    private walk(node: SyntaxNode, source: string, scope: Scope, parent: number, out: Collected[]): void {
        for (const child of node.namedChildren) {
            if (isComment(child)) continue;

            const definition = this.definitionAt(child, source, scope);
            if (definition) {
                out.push({ definition, parent });
                const index = out.length;
                const nested = definition.body === undefined ? definition.node : definition.body;
                if (nested) {
                    this.walk(nested, source, definition.kind === 'class' ? 'class' : 'function', index, out);
                }
            } else {
                this.walk(child, source, scope, parent, out);
            }
        }
    }

    /**
     * Source ranges of the direct children of element `index` (0 = module)
     */
    private childRanges(collected: Collected[], index: number): Array<[number, number]> {
        return collected
            .filter(item => item.parent === index)
            .map(item => [item.definition.node.startIndex, item.definition.node.endIndex]);
    }

    /**
     * Hash of the node's source with documentation, comments and the
     * given ranges removed and whitespace collapsed
     */
    private fingerprint(source: string, node: SyntaxNode, excluded: Array<[number, number]>): string {
        const ranges = excluded
            .filter(([start, end]) => end > node.startIndex && start < node.endIndex)
            .sort((a, b) => a[0] - b[0]);

        let cursor = node.startIndex;
        let text = '';
        for (const [start, end] of ranges) {
            if (start > cursor) {
                text += source.slice(cursor, start);
            }
            cursor = Math.max(cursor, end);
        }
        if (cursor < node.endIndex) {
            text += source.slice(cursor, node.endIndex);
        }

        return sha256(text.replace(/\s+/g, ' ').trim());
    }
}

import TypeScript from 'tree-sitter-typescript';
import { JavaScriptAdapter } from './JavaScriptAdapter';
import { Grammar } from './TreeSitterAdapter';
import { LanguageId } from '../models/CodeElement';

/**
 * Language adapter for TypeScript sources. `.tsx` files use the TSX grammar.
 */
export class TypeScriptAdapter extends JavaScriptAdapter {
    readonly language: LanguageId = 'typescript';
    readonly extensions: readonly string[] = ['.ts', '.tsx', '.mts', '.cts'];

    protected grammarFor(filePath: string): Grammar {
        return filePath.toLowerCase().endsWith('.tsx') ? TypeScript.tsx : TypeScript.typescript;
    }
}

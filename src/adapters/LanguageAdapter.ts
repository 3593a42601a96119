import { CodeElement, LanguageId } from '../models/CodeElement';

/**
 * Base interface for language adapters
 */
export interface LanguageAdapter {
    /**
     * Language name
     */
    language: LanguageId;

    /**
     * File extensions handled by this adapter, lower-case with the leading dot
     */
    extensions: readonly string[];

    /**
     * Convert source text into the file's documentable elements.
     * Throws ParseError when the source is not syntactically valid.
     */
    extract(source: string, filePath: string): CodeElement[];
}

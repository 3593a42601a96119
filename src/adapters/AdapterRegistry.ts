import path from 'path';
import { LanguageAdapter } from './LanguageAdapter';
import { PythonAdapter } from './PythonAdapter';
import { JavaScriptAdapter } from './JavaScriptAdapter';
import { TypeScriptAdapter } from './TypeScriptAdapter';
import { JavaAdapter } from './JavaAdapter';
import { GoAdapter } from './GoAdapter';
import { CppAdapter } from './CppAdapter';
import { LanguageId } from '../models/CodeElement';
import { UnsupportedLanguage } from '../models/errors';
import logger from '../utils/logger';

/**
 * Registry for all language adapters, keyed by file extension
 */
export class AdapterRegistry {
    private adapters: Map<string, LanguageAdapter> = new Map();

    constructor(adapters?: LanguageAdapter[]) {
        const initial = adapters ?? [
            new PythonAdapter(),
            new JavaScriptAdapter(),
            new TypeScriptAdapter(),
            new JavaAdapter(),
            new GoAdapter(),
            new CppAdapter(),
        ];
        for (const adapter of initial) {
            this.registerAdapter(adapter);
        }
    }

    /**
     * Register a language adapter. A later registration wins an extension.
     */
    registerAdapter(adapter: LanguageAdapter): void {
        for (const extension of adapter.extensions) {
            this.adapters.set(extension.toLowerCase(), adapter);
        }
        logger.debug(`Registered adapter for: ${adapter.language} (${adapter.extensions.join(', ')})`);
    }

    /**
     * Adapter for a file, by extension. Null when nothing is registered.
     */
    getAdapterForFile(filePath: string): LanguageAdapter | null {
        return this.adapters.get(path.extname(filePath).toLowerCase()) ?? null;
    }

    /**
     * Like getAdapterForFile, but throws UnsupportedLanguage
     */
    requireAdapter(filePath: string): LanguageAdapter {
        const adapter = this.getAdapterForFile(filePath);
        if (!adapter) {
            throw new UnsupportedLanguage(filePath);
        }
        return adapter;
    }

    /**
     * Get all registered adapters, one entry per adapter
     */
    getAllAdapters(): LanguageAdapter[] {
        return Array.from(new Set(this.adapters.values()));
    }

    getSupportedLanguages(): LanguageId[] {
        return Array.from(new Set(this.getAllAdapters().map(adapter => adapter.language))).sort();
    }
}

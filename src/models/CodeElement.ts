/**
 * Kinds of documentable units extracted from source
 */
export type ElementKind = 'module' | 'class' | 'function' | 'method';

export type Visibility = 'public' | 'protected' | 'private';

export type LanguageId = 'python' | 'javascript' | 'typescript' | 'java' | 'cpp' | 'go';

export const LANGUAGE_IDS: readonly LanguageId[] = ['python', 'javascript', 'typescript', 'java', 'cpp', 'go'];

export interface SourceLocation {
    filePath: string;
    startLine: number;
    endLine: number;
}

export interface Parameter {
    name: string;
    hasTypeAnnotation: boolean;
}

/**
 * A documentable unit of source. Elements are emitted as a flat list;
 * the parent link is a lookup-only reference into that list.
 */
export interface CodeElement {
    kind: ElementKind;
    name: string;
    qualifiedName: string;
    parentQualifiedName?: string;
    parentIndex?: number;
    location: SourceLocation;
    parameters: Parameter[];
    hasReturnValue: boolean;
    raises: string[];
    docstring?: string;
    language: LanguageId;
    visibility: Visibility;
    contentFingerprint: string;
    docstringFingerprint?: string;
}

/**
 * Fingerprints recorded by a previous run for one element
 */
export interface PriorFingerprint {
    contentFingerprint: string;
    docstringFingerprint?: string;
}

/**
 * Read-only view of a prior run, keyed by `fingerprintKey()`
 */
export type PriorFingerprintStore = ReadonlyMap<string, PriorFingerprint>;

export function fingerprintKey(filePath: string, qualifiedName: string): string {
    return `${filePath}::${qualifiedName}`;
}

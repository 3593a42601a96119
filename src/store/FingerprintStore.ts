import fs from 'fs/promises';
import { FileResult } from '../models/AnalysisReport';
import { PriorFingerprint, PriorFingerprintStore, fingerprintKey } from '../models/CodeElement';
import { ConfigurationError } from '../models/errors';
import { fileExists, writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';

const SNAPSHOT_VERSION = 1;

interface SnapshotFile {
    version: number;
    elements: Record<string, { content: string; docstring?: string }>;
}

/**
 * Fingerprints of every element in a run, for the next run's sync check
 */
export function buildFingerprintSnapshot(results: FileResult[]): Map<string, PriorFingerprint> {
    const snapshot = new Map<string, PriorFingerprint>();
    for (const result of results) {
        for (const element of result.elements) {
            snapshot.set(fingerprintKey(element.location.filePath, element.qualifiedName), {
                contentFingerprint: element.contentFingerprint,
                docstringFingerprint: element.docstringFingerprint,
            });
        }
    }
    return snapshot;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load a snapshot written by saveFingerprints. A missing file is an empty
 * store (first run); a malformed one is a configuration error.
 */
export async function loadFingerprints(filePath: string): Promise<PriorFingerprintStore> {
    if (!(await fileExists(filePath))) {
        logger.warn(`Fingerprint file not found, sync scores will be unknown: ${filePath}`);
        return new Map();
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    } catch (error) {
        throw new ConfigurationError([`cannot read fingerprint file ${filePath}: ${error instanceof Error ? error.message : String(error)}`]);
    }

    if (!isRecord(parsed) || parsed.version !== SNAPSHOT_VERSION || !isRecord(parsed.elements)) {
        throw new ConfigurationError([`fingerprint file ${filePath} is not a version ${SNAPSHOT_VERSION} snapshot`]);
    }

    const store = new Map<string, PriorFingerprint>();
    for (const [key, entry] of Object.entries(parsed.elements)) {
        if (!isRecord(entry) || typeof entry.content !== 'string'
            || (entry.docstring !== undefined && typeof entry.docstring !== 'string')) {
            throw new ConfigurationError([`fingerprint file ${filePath} has a malformed entry for '${key}'`]);
        }
        store.set(key, {
            contentFingerprint: entry.content,
            docstringFingerprint: typeof entry.docstring === 'string' ? entry.docstring : undefined,
        });
    }

    logger.info(`Loaded ${store.size} fingerprint(s) from ${filePath}`);
    return store;
}

export async function saveFingerprints(filePath: string, snapshot: PriorFingerprintStore): Promise<void> {
    const file: SnapshotFile = { version: SNAPSHOT_VERSION, elements: {} };
    for (const key of Array.from(snapshot.keys()).sort()) {
        const entry = snapshot.get(key);
        if (!entry) continue;
        file.elements[key] = entry.docstringFingerprint === undefined
            ? { content: entry.contentFingerprint }
            : { content: entry.contentFingerprint, docstring: entry.docstringFingerprint };
    }
    await writeFile(filePath, JSON.stringify(file, null, 2) + '\n');
    logger.info(`Saved ${snapshot.size} fingerprint(s) to ${filePath}`);
}

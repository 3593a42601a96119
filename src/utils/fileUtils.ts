import fs from 'fs/promises';
import path from 'path';
import { glob } from 'fast-glob';

/**
 * Read file content
 */
export async function readFile(filePath: string): Promise<string> {
    return await fs.readFile(filePath, 'utf-8');
}

/**
 * Write content to file
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Get file size in bytes
 */
export async function getFileSize(filePath: string): Promise<number> {
    const stat = await fs.stat(filePath);
    return stat.size;
}

/**
 * Find files matching patterns, relative to `directory` and sorted
 */
export async function findFiles(
    directory: string,
    patterns: string | string[],
    options: { ignore?: string[] } = {}
): Promise<string[]> {
    const { ignore = [] } = options;

    const files = await glob(patterns, {
        cwd: directory,
        ignore,
        absolute: false,
        onlyFiles: true,
        dot: false,
        followSymbolicLinks: false,
    });

    return files.sort();
}

/**
 * Forward-slash form of a path, used for report paths and glob matching
 */
export function toPosixPath(filePath: string): string {
    return filePath.split(path.sep).join('/');
}

import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import logger from './logger';

export interface EnvLoadResult {
    loadedFrom: string[];
    tried: string[];
    errors: string[];
}

/**
 * Loads .env files from predictable locations so DOCLENS_* and LOG_LEVEL
 * settings can live beside the analyzed project. Variables already set
 * in the environment win over file values.
 */
export class EnvLoader {
    load(targetPath?: string): EnvLoadResult {
        const tried: string[] = [];
        const loadedFrom: string[] = [];
        const errors: string[] = [];

        for (const candidate of this.buildCandidatePaths(targetPath)) {
            if (tried.includes(candidate)) continue;
            tried.push(candidate);

            if (!fs.existsSync(candidate)) {
                continue;
            }

            const result = dotenv.config({ path: candidate });
            if (result.error) {
                errors.push(result.error.message);
                logger.warn(`Failed to load env file ${candidate}: ${result.error.message}`);
            } else {
                loadedFrom.push(candidate);
                logger.debug(`Loaded environment variables from ${candidate}`);
            }
        }

        return { loadedFrom, tried, errors };
    }

    private buildCandidatePaths(targetPath?: string): string[] {
        const paths: string[] = [];

        // Analyzed directory
        if (targetPath && fs.existsSync(targetPath) && fs.statSync(targetPath).isDirectory()) {
            paths.push(path.resolve(targetPath, '.env'));
        }

        paths.push(path.resolve(process.cwd(), '.env'));

        // User-level override
        paths.push(path.join(os.homedir(), '.doclens.env'));

        return paths;
    }
}

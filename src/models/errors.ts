export type DoclensErrorCode =
    | 'PARSE_ERROR'
    | 'UNSUPPORTED_LANGUAGE'
    | 'INVALID_TARGET'
    | 'CONFIGURATION_ERROR';

/**
 * Base class for every error the analysis engine raises
 */
export class DoclensError extends Error {
    constructor(
        message: string,
        public readonly code: DoclensErrorCode
    ) {
        super(message);
        this.name = 'DoclensError';
    }
}

/**
 * A single file could not be parsed. Recovered by the orchestrator.
 */
export class ParseError extends DoclensError {
    constructor(
        public readonly filePath: string,
        public readonly reason: string,
        public readonly line?: number,
        public readonly column?: number
    ) {
        super(
            line !== undefined
                ? `${filePath}:${line}:${column ?? 0}: ${reason}`
                : `${filePath}: ${reason}`,
            'PARSE_ERROR'
        );
        this.name = 'ParseError';
    }
}

/**
 * No adapter is registered for a file's extension
 */
export class UnsupportedLanguage extends DoclensError {
    constructor(public readonly filePath: string) {
        super(`No language adapter registered for ${filePath}`, 'UNSUPPORTED_LANGUAGE');
        this.name = 'UnsupportedLanguage';
    }
}

/**
 * The analysis target does not exist or cannot be read. Fatal.
 */
export class InvalidTarget extends DoclensError {
    constructor(
        public readonly targetPath: string,
        public readonly reason: string
    ) {
        super(`Invalid target ${targetPath}: ${reason}`, 'INVALID_TARGET');
        this.name = 'InvalidTarget';
    }
}

/**
 * Malformed rule or style configuration. Raised before any file is read.
 */
export class ConfigurationError extends DoclensError {
    constructor(public readonly problems: string[]) {
        super(`Invalid configuration: ${problems.join('; ')}`, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * Raised when the two header lines of a record file are missing or malformed.
 */
export class SchemaError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SchemaError';
    }
}

/**
 * Raised for a data line that does not match the declared schema.
 */
export class RowParseError extends Error {
    readonly line: number;

    constructor(line: number, message: string) {
        super(`Line ${line}: ${message}`);
        this.name = 'RowParseError';
        this.line = line;
    }
}

export class ConfigError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}\n${issues.join('\n')}` : message);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

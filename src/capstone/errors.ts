export class CapstoneError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'CapstoneError';
    }
}

/** Input is not a zip archive, lacks `main.xml`, or lacks a referenced entry. */
export class ArchiveError extends CapstoneError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'ArchiveError';
    }
}

export class IndexParseError extends CapstoneError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'IndexParseError';
    }
}

export class DecodeError extends CapstoneError {
    constructor(message: string) {
        super(message);
        this.name = 'DecodeError';
    }
}

export class WriteError extends CapstoneError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'WriteError';
    }
}

/** An option value the library cannot work with, such as a two-character separator. */
export class OptionError extends CapstoneError {
    constructor(message: string) {
        super(message);
        this.name = 'OptionError';
    }
}

/** Bad command line. Not a CapstoneError: it never comes out of the library. */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

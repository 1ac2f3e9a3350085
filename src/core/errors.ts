// src/core/errors.ts

export type ValidationErrorKind = 'NameInvalid' | 'NameReserved' | 'VersionInvalid';

/**
 * Invalid user-supplied configuration. Raised before any filesystem access.
 */
export class ValidationError extends Error {
    constructor(
        message: string,
        public readonly kind: ValidationErrorKind,
    ) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class ProjectNameError extends ValidationError {
    constructor(
        message: string,
        kind: 'NameInvalid' | 'NameReserved',
        public readonly projectName: string,
    ) {
        super(message, kind);
        this.name = 'ProjectNameError';
    }
}

export class RuntimeVersionError extends ValidationError {
    constructor(
        message: string,
        public readonly runtimeVersion: string,
    ) {
        super(message, 'VersionInvalid');
        this.name = 'RuntimeVersionError';
    }
}

/**
 * The destination root cannot be used. Raised before the first write.
 */
export class DestinationError extends Error {
    constructor(
        message: string,
        public readonly destination: string,
    ) {
        super(message);
        this.name = 'DestinationError';
    }
}

export class DestinationExistsError extends DestinationError {
    constructor(destination: string, displayName: string) {
        super(
            `Directory '${displayName}' already exists. Remove it or choose a different name.`,
            destination,
        );
        this.name = 'DestinationExistsError';
    }
}

export class DestinationNotEmptyError extends DestinationError {
    constructor(
        destination: string,
        public readonly entries: readonly string[],
    ) {
        super(
            `Current directory '${destination}' is not empty. Use '.' only in an empty directory.`,
            destination,
        );
        this.name = 'DestinationNotEmptyError';
    }
}

/**
 * I/O failure while creating directories or writing files.
 * Files written before the failure are left in place.
 */
export class FilesystemError extends Error {
    constructor(
        message: string,
        public readonly targetPath: string,
        public readonly writtenPaths: readonly string[],
        cause?: unknown,
    ) {
        super(message, { cause });
        this.name = 'FilesystemError';
    }
}

export class TemplateError extends Error {
    constructor(
        message: string,
        public readonly templateId: string,
        cause?: unknown,
    ) {
        super(message, { cause });
        this.name = 'TemplateError';
    }
}

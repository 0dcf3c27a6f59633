class PackageManagerError extends Error {
    readonly code: string;

    constructor(code: string, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

class LaunchError extends PackageManagerError {
    readonly command: string;

    constructor(command: string, cause: Error) {
        super('launch', `Failed to launch ${command}: ${cause.message}`);
        this.command = command;
        this.cause = cause;
    }
}

class ExitError extends PackageManagerError {
    readonly exitCode: number | null;
    readonly lastLines: string[];

    constructor(command: string, exitCode: number | null, lastLines: string[]) {
        super('exit', `${command} exited with code ${exitCode}`);
        this.exitCode = exitCode;
        this.lastLines = lastLines;
    }
}

class UnresolvableConflict extends PackageManagerError {
    readonly details: string[];

    constructor(details: string[]) {
        super(
            'conflict',
            `Unresolvable conflicts: ${details.join('; ') || 'unknown'}`,
        );
        this.details = details;
    }
}

class OperationInProgress extends PackageManagerError {
    constructor(holder?: string) {
        super(
            'in-progress',
            holder
                ? `Operation ${holder} is already running`
                : 'Another operation is already running',
        );
    }
}

class CredentialDenied extends PackageManagerError {
    constructor(message = 'Authentication was declined') {
        super('credential-denied', message);
    }
}

class ParseError extends PackageManagerError {
    readonly tool: string;
    readonly raw: string;

    constructor(tool: string, message: string, raw: string) {
        super('parse', `Unexpected ${tool} output: ${message}`);
        this.tool = tool;
        this.raw = raw;
    }
}

class ValidationError extends PackageManagerError {
    constructor(message: string) {
        super('validation', message);
    }
}

class OperationCancelled extends PackageManagerError {
    constructor() {
        super('cancelled', 'Operation was cancelled');
    }
}

class NotFoundError extends PackageManagerError {
    constructor(message: string) {
        super('not-found', message);
    }
}

export {
    PackageManagerError,
    LaunchError,
    ExitError,
    UnresolvableConflict,
    OperationInProgress,
    CredentialDenied,
    ParseError,
    ValidationError,
    OperationCancelled,
    NotFoundError,
};

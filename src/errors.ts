export type AssistantErrorKind = "InvalidFormat" | "NotFound" | "InvalidArgument" | "PreconditionFailed";

/**
 * Recoverable failure raised by the record engine.
 *
 * The command boundary turns any AssistantError into an `Error: <message>` reply;
 * everything else is reported as unexpected.
 */
export class AssistantError extends Error {
    readonly kind: AssistantErrorKind;

    constructor(kind: AssistantErrorKind, message: string) {
        super(message);
        this.name = new.target.name;
        this.kind = kind;
    }
}

export class InvalidFormatError extends AssistantError {
    constructor(message: string) {
        super("InvalidFormat", message);
    }
}

export class NotFoundError extends AssistantError {
    constructor(message: string) {
        super("NotFound", message);
    }
}

export class InvalidArgumentError extends AssistantError {
    constructor(message: string) {
        super("InvalidArgument", message);
    }
}

export class PreconditionFailedError extends AssistantError {
    constructor(message: string) {
        super("PreconditionFailed", message);
    }
}

export function isAssistantError(error: unknown): error is AssistantError {
    return error instanceof AssistantError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

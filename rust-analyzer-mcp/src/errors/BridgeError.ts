export type BridgeErrorCode =
    | "SpawnFailed"
    | "AnalyzerUnavailable"
    | "Timeout"
    | "OutputTooLarge"
    | "AnalyzerError"
    | "DocumentNotOpen"
    | "ProtocolDecodeError"
    | "ConfigurationError"
    | "InvalidArguments"
    | "NotFound"
    | "CompilerFailed";

/**
 * Base class for every failure that crosses the tool boundary. `details` is
 * serialized as-is into the tool error payload.
 */
export class BridgeError extends Error {
    public readonly code: BridgeErrorCode;
    public readonly details: Record<string, unknown>;

    constructor(code: BridgeErrorCode, message: string, details: Record<string, unknown> = {}) {
        super(message);
        this.name = "BridgeError";
        this.code = code;
        this.details = details;
    }
}

export class SpawnFailedError extends BridgeError {
    public readonly command: string;

    constructor(command: string, cause: string) {
        super("SpawnFailed", `Failed to spawn ${command}: ${cause}`, { command, cause });
        this.name = "SpawnFailedError";
        this.command = command;
    }
}

export class AnalyzerUnavailableError extends BridgeError {
    constructor(reason: string) {
        super("AnalyzerUnavailable", `rust-analyzer is unavailable: ${reason}`, { reason });
        this.name = "AnalyzerUnavailableError";
    }
}

export class TimeoutError extends BridgeError {
    public readonly limitMs: number;
    public readonly operation: string;

    constructor(operation: string, limitMs: number) {
        super("Timeout", `${operation} timed out after ${limitMs}ms`, { operation, limitMs });
        this.name = "TimeoutError";
        this.limitMs = limitMs;
        this.operation = operation;
    }
}

export class OutputTooLargeError extends BridgeError {
    public readonly observed: number;
    public readonly limit: number;
    public readonly artifact?: string;

    constructor(observed: number, limit: number, artifact?: string) {
        super(
            "OutputTooLarge",
            artifact
                ? `Artifact ${artifact} exceeded the size limit (${observed} bytes > ${limit} bytes)`
                : `Output exceeded the size limit (${observed} bytes > ${limit} bytes)`,
            artifact ? { observed, limit, artifact } : { observed, limit }
        );
        this.name = "OutputTooLargeError";
        this.observed = observed;
        this.limit = limit;
        this.artifact = artifact;
    }
}

/** Error response returned by the analyzer itself; fields are kept verbatim. */
export class AnalyzerError extends BridgeError {
    public readonly rpcCode: number;
    public readonly rpcMessage: string;
    public readonly data?: unknown;

    constructor(method: string, rpcCode: number, rpcMessage: string, data?: unknown) {
        super("AnalyzerError", rpcMessage, { method, code: rpcCode, message: rpcMessage, data });
        this.name = "AnalyzerError";
        this.rpcCode = rpcCode;
        this.rpcMessage = rpcMessage;
        this.data = data;
    }
}

export class DocumentNotOpenError extends BridgeError {
    public readonly uri: string;

    constructor(uri: string) {
        super("DocumentNotOpen", `Document is not open: ${uri}`, { uri });
        this.name = "DocumentNotOpenError";
        this.uri = uri;
    }
}

export class ProtocolDecodeError extends BridgeError {
    constructor(reason: string) {
        super("ProtocolDecodeError", `Malformed message from analyzer: ${reason}`, { reason });
        this.name = "ProtocolDecodeError";
    }
}

export class ConfigurationError extends BridgeError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super("ConfigurationError", message, details);
        this.name = "ConfigurationError";
    }
}

export class InvalidArgumentsError extends BridgeError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super("InvalidArguments", message, details);
        this.name = "InvalidArgumentsError";
    }
}

export class NotFoundError extends BridgeError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super("NotFound", message, details);
        this.name = "NotFoundError";
    }
}

export class CompilerFailedError extends BridgeError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super("CompilerFailed", message, details);
        this.name = "CompilerFailedError";
    }
}

export function isBridgeError(error: unknown): error is BridgeError {
    return error instanceof BridgeError;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

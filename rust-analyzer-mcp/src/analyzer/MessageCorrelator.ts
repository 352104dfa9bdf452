import {
    Message,
    StreamMessageReader,
    StreamMessageWriter,
    type Disposable,
    type NotificationMessage,
    type RequestMessage,
    type ResponseMessage
} from "vscode-jsonrpc/node";
import { AnalyzerError, AnalyzerUnavailableError, TimeoutError, describeError } from "../errors/BridgeError.js";
import { createLogger, type Logger } from "../utils/StructuredLogger.js";

export type NotificationHandler = (params: unknown) => void;
export type ServerRequestHandler = (params: unknown) => unknown;

export interface CorrelatorOptions {
    requestTimeoutMs: number;
    /** Used in log lines to tell subprocess generations apart. */
    label?: string;
}

export interface RequestOptions {
    timeoutMs?: number;
}

export interface CorrelatorStats {
    pending: number;
    decodeErrors: number;
    droppedResponses: number;
    nextId: number;
}

interface PendingRequest {
    id: number;
    method: string;
    issuedAt: number;
    timer?: NodeJS.Timeout;
    resolve(value: unknown): void;
    reject(error: Error): void;
}

const METHOD_NOT_FOUND = -32601;
const INTERNAL_ERROR = -32603;

const baseLogger = createLogger("MessageCorrelator");

/**
 * JSON-RPC request/response correlation over an LSP byte stream.
 *
 * A request is registered in the pending table before its frame is written,
 * so a response can never arrive for an id that is not yet known. Every
 * pending entry is settled exactly once: by its response, by its deadline,
 * or by close().
 */
export class MessageCorrelator {
    private readonly reader: StreamMessageReader;
    private readonly writer: StreamMessageWriter;
    private readonly pending = new Map<number, PendingRequest>();
    private readonly notificationHandlers = new Map<string, NotificationHandler>();
    private readonly requestHandlers = new Map<string, ServerRequestHandler>();
    private readonly closeListeners: Array<(reason: string) => void> = [];
    private readonly subscriptions: Disposable[] = [];
    private nextId = 1;
    private decodeErrors = 0;
    private droppedResponses = 0;
    private closedReason?: string;
    private readonly log: Logger;

    constructor(
        input: NodeJS.ReadableStream,
        output: NodeJS.WritableStream,
        private readonly options: CorrelatorOptions
    ) {
        this.log = baseLogger.child({ label: options.label ?? "analyzer" });
        this.reader = new StreamMessageReader(input);
        this.writer = new StreamMessageWriter(output);

        this.subscriptions.push(this.reader.onError(error => {
            this.decodeErrors += 1;
            this.log.warn("skipping undecodable frame", { error: describeError(error) });
        }));
        this.subscriptions.push(this.reader.onClose(() => this.close("analyzer output stream closed")));
        this.subscriptions.push(this.writer.onError(([error]) => {
            this.log.warn("write to analyzer failed", { error: describeError(error) });
        }));
        this.subscriptions.push(this.reader.listen(message => this.handleMessage(message)));
    }

    public get isClosed(): boolean {
        return this.closedReason !== undefined;
    }

    public sendRequest(method: string, params?: object, options: RequestOptions = {}): Promise<unknown> {
        if (this.closedReason !== undefined) {
            return Promise.reject(new AnalyzerUnavailableError(this.closedReason));
        }
        const id = this.nextId++;
        const timeoutMs = options.timeoutMs ?? this.options.requestTimeoutMs;

        return new Promise<unknown>((resolve, reject) => {
            const entry: PendingRequest = { id, method, issuedAt: Date.now(), resolve, reject };
            if (timeoutMs > 0) {
                entry.timer = setTimeout(() => this.expire(id, timeoutMs), timeoutMs);
            }
            this.pending.set(id, entry);

            const message: RequestMessage = { jsonrpc: "2.0", id, method, params };
            this.writer.write(message).catch((error: unknown) => {
                this.settleWithError(id, new AnalyzerUnavailableError(`failed to write ${method}: ${describeError(error)}`));
            });
        });
    }

    public async sendNotification(method: string, params?: object): Promise<void> {
        if (this.closedReason !== undefined) {
            throw new AnalyzerUnavailableError(this.closedReason);
        }
        const message: NotificationMessage = { jsonrpc: "2.0", method, params };
        await this.writer.write(message);
    }

    /** One subscriber per method; a later registration replaces the earlier one. */
    public onNotification(method: string, handler: NotificationHandler): void {
        this.notificationHandlers.set(method, handler);
    }

    public onRequest(method: string, handler: ServerRequestHandler): void {
        this.requestHandlers.set(method, handler);
    }

    public onClose(listener: (reason: string) => void): void {
        if (this.closedReason !== undefined) {
            listener(this.closedReason);
            return;
        }
        this.closeListeners.push(listener);
    }

    public stats(): CorrelatorStats {
        return {
            pending: this.pending.size,
            decodeErrors: this.decodeErrors,
            droppedResponses: this.droppedResponses,
            nextId: this.nextId
        };
    }

    /** Fails every outstanding request with AnalyzerUnavailable. Idempotent. */
    public close(reason: string): void {
        if (this.closedReason !== undefined) return;
        this.closedReason = reason;

        const outstanding = Array.from(this.pending.values());
        this.pending.clear();
        for (const entry of outstanding) {
            if (entry.timer) clearTimeout(entry.timer);
            entry.reject(new AnalyzerUnavailableError(reason));
        }
        if (outstanding.length > 0) {
            this.log.warn("failed outstanding requests on close", { reason, count: outstanding.length });
        }

        for (const subscription of this.subscriptions.splice(0)) {
            subscription.dispose();
        }
        this.reader.dispose();
        this.writer.dispose();

        for (const listener of this.closeListeners.splice(0)) {
            listener(reason);
        }
    }

    private expire(id: number, timeoutMs: number): void {
        const entry = this.pending.get(id);
        if (!entry) return;
        this.pending.delete(id);
        entry.reject(new TimeoutError(entry.method, timeoutMs));
        this.log.warn("request timed out", { id, method: entry.method, timeoutMs });

        this.sendNotification("$/cancelRequest", { id }).catch((error: unknown) => {
            this.log.debug("cancel notification not delivered", { id, error: describeError(error) });
        });
    }

    private settleWithError(id: number, error: Error): void {
        const entry = this.pending.get(id);
        if (!entry) return;
        this.pending.delete(id);
        if (entry.timer) clearTimeout(entry.timer);
        entry.reject(error);
    }

    private handleMessage(message: Message): void {
        if (Message.isResponse(message)) {
            this.handleResponse(message);
            return;
        }
        if (Message.isRequest(message)) {
            this.handleServerRequest(message);
            return;
        }
        if (Message.isNotification(message)) {
            const handler = this.notificationHandlers.get(message.method);
            if (!handler) {
                this.log.debug("unhandled notification", { method: message.method });
                return;
            }
            try {
                handler(message.params);
            } catch (error) {
                this.log.warn("notification handler failed", { method: message.method, error: describeError(error) });
            }
            return;
        }
        this.decodeErrors += 1;
        this.log.warn("skipping frame that is not a JSON-RPC message");
    }

    private handleResponse(message: ResponseMessage): void {
        const entry = typeof message.id === "number" ? this.pending.get(message.id) : undefined;
        if (!entry) {
            // Late (already timed out) or never issued.
            this.droppedResponses += 1;
            this.log.debug("dropping response without pending request", { id: message.id });
            return;
        }
        this.pending.delete(entry.id);
        if (entry.timer) clearTimeout(entry.timer);

        if (message.error) {
            entry.reject(new AnalyzerError(entry.method, message.error.code, message.error.message, message.error.data));
            return;
        }
        entry.resolve(message.result ?? null);
    }

    private handleServerRequest(message: RequestMessage): void {
        const handler = this.requestHandlers.get(message.method);
        const respond = (response: ResponseMessage) => {
            this.writer.write(response).catch((error: unknown) => {
                this.log.debug("failed to answer server request", { method: message.method, error: describeError(error) });
            });
        };

        if (!handler) {
            respond({
                jsonrpc: "2.0",
                id: message.id,
                error: { code: METHOD_NOT_FOUND, message: `Unhandled method ${message.method}` }
            });
            return;
        }

        void Promise.resolve()
            .then(() => handler(message.params))
            .then(
                result => respond({ jsonrpc: "2.0", id: message.id, result: toResult(result) }),
                (error: unknown) => respond({
                    jsonrpc: "2.0",
                    id: message.id,
                    error: { code: INTERNAL_ERROR, message: describeError(error) }
                })
            );
    }
}

function toResult(value: unknown): ResponseMessage["result"] {
    if (value === undefined || value === null) return null;
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
    if (typeof value === "object") return value;
    return null;
}

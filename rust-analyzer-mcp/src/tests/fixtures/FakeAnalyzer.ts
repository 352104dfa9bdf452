import { EventEmitter } from "events";
import { PassThrough } from "stream";
import {
    Message,
    StreamMessageReader,
    StreamMessageWriter,
    type NotificationMessage,
    type RequestMessage,
    type ResponseMessage
} from "vscode-jsonrpc/node";
import type { AnalyzerProcess, SpawnFunction } from "../../analyzer/ProcessSupervisor.js";

export type FakeRequestHandler = (params: unknown) => unknown;

export interface ReceivedMessage {
    method: string;
    params: unknown;
    id?: number | string;
}

/** Thrown from a handler to answer with a JSON-RPC error. */
export class FakeRpcError extends Error {
    constructor(public readonly code: number, message: string) {
        super(message);
    }
}

let nextPid = 4000;

/**
 * Stand-in for a rust-analyzer child process. Speaks LSP framing on its
 * stdin/stdout pipes and answers requests from a handler table.
 */
export class FakeAnalyzer extends EventEmitter implements AnalyzerProcess {
    public readonly pid = nextPid++;
    public readonly stdin = new PassThrough();
    public readonly stdout = new PassThrough();
    public readonly stderr = new PassThrough();
    public readonly received: ReceivedMessage[] = [];
    public readonly signals: Array<NodeJS.Signals | number | undefined> = [];
    public exitOnStdinEnd = true;
    private readonly handlers = new Map<string, FakeRequestHandler>();
    private readonly responses = new Map<number | string, (response: ResponseMessage) => void>();
    private readonly reader: StreamMessageReader;
    private readonly writer: StreamMessageWriter;
    private exited = false;
    private serverRequestId = 1;

    constructor() {
        super();
        this.handlers.set("initialize", () => ({
            capabilities: { definitionProvider: true },
            serverInfo: { name: "rust-analyzer", version: "test" }
        }));
        this.handlers.set("shutdown", () => null);

        this.reader = new StreamMessageReader(this.stdin);
        this.writer = new StreamMessageWriter(this.stdout);
        this.reader.listen(message => this.handle(message));
        this.stdin.on("finish", () => {
            if (this.exitOnStdinEnd) this.terminate(0, null);
        });
    }

    public get hasExited(): boolean {
        return this.exited;
    }

    public handleRequest(method: string, handler: FakeRequestHandler): this {
        this.handlers.set(method, handler);
        return this;
    }

    public methods(): string[] {
        return this.received.map(message => message.method);
    }

    public messages(method: string): ReceivedMessage[] {
        return this.received.filter(message => message.method === method);
    }

    /** Resolves with the `count`-th message of `method`, counting ones already received. */
    public waitFor(method: string, count = 1): Promise<ReceivedMessage> {
        const existing = this.messages(method);
        if (existing.length >= count) {
            return Promise.resolve(existing[count - 1]);
        }
        return new Promise(resolve => {
            const listener = (message: ReceivedMessage) => {
                if (message.method !== method) return;
                const seen = this.messages(method);
                if (seen.length >= count) {
                    this.off("message", listener);
                    resolve(seen[count - 1]);
                }
            };
            this.on("message", listener);
        });
    }

    public notify(method: string, params: object): Promise<void> {
        const notification: NotificationMessage = { jsonrpc: "2.0", method, params };
        return this.writer.write(notification);
    }

    /** Sends a server-to-client request and resolves with the client's response. */
    public request(method: string, params: object): Promise<ResponseMessage> {
        const id = `server-${this.serverRequestId++}`;
        return new Promise((resolve, reject) => {
            this.responses.set(id, resolve);
            const request: RequestMessage = { jsonrpc: "2.0", id, method, params };
            this.writer.write(request).catch(reject);
        });
    }

    /** Writes raw bytes to stdout, bypassing the framing. */
    public writeRaw(data: string): void {
        this.stdout.write(data);
    }

    public crash(code = 101): void {
        this.terminate(code, null);
    }

    public kill(signal?: NodeJS.Signals | number): boolean {
        this.signals.push(signal);
        this.terminate(null, typeof signal === "string" ? signal : "SIGTERM");
        return true;
    }

    private terminate(code: number | null, signal: NodeJS.Signals | null): void {
        if (this.exited) return;
        this.exited = true;
        this.stdout.end();
        setImmediate(() => this.emit("exit", code, signal));
    }

    private handle(message: Message): void {
        if (Message.isResponse(message)) {
            const id = message.id;
            const resolve = id === null ? undefined : this.responses.get(id);
            if (id !== null && resolve) {
                this.responses.delete(id);
                resolve(message);
            }
            return;
        }
        if (Message.isRequest(message)) {
            const received: ReceivedMessage = { method: message.method, params: message.params, id: message.id ?? undefined };
            this.received.push(received);
            this.emit("message", received);
            void this.answer(message.id, message.method, message.params);
            return;
        }
        if (Message.isNotification(message)) {
            const received: ReceivedMessage = { method: message.method, params: message.params };
            this.received.push(received);
            this.emit("message", received);
            if (message.method === "exit") {
                this.terminate(0, null);
            }
        }
    }

    private async answer(id: number | string | null, method: string, params: unknown): Promise<void> {
        const handler = this.handlers.get(method);
        let response: ResponseMessage;
        if (!handler) {
            response = { jsonrpc: "2.0", id, error: { code: -32601, message: `Unhandled method ${method}` } };
        } else {
            try {
                const result = await handler(params);
                response = { jsonrpc: "2.0", id, result: result === undefined ? null : toJson(result) };
            } catch (error) {
                response = error instanceof FakeRpcError
                    ? { jsonrpc: "2.0", id, error: { code: error.code, message: error.message } }
                    : { jsonrpc: "2.0", id, error: { code: -32603, message: String(error) } };
            }
        }
        if (this.exited) return;
        await this.writer.write(response);
    }
}

function toJson(value: unknown): ResponseMessage["result"] {
    if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
        return value;
    }
    if (typeof value === "object") return value;
    return null;
}

export interface FakeSpawnOptions {
    /** Called for every generation before it reports "spawn". */
    configure?: (analyzer: FakeAnalyzer, index: number) => void;
    /** Generations (0-based) that fail to spawn with ENOENT. */
    failAt?: number[];
}

export interface FakeSpawn {
    spawn: SpawnFunction;
    processes: FakeAnalyzer[];
    calls: Array<{ command: string; args: string[]; cwd: string }>;
}

export function createFakeSpawn(options: FakeSpawnOptions = {}): FakeSpawn {
    const processes: FakeAnalyzer[] = [];
    const calls: FakeSpawn["calls"] = [];
    const spawn: SpawnFunction = (command, args, spawnOptions) => {
        const index = calls.length;
        calls.push({ command, args, cwd: spawnOptions.cwd });
        const analyzer = new FakeAnalyzer();
        processes.push(analyzer);
        options.configure?.(analyzer, index);
        const fails = options.failAt?.includes(index) ?? false;
        process.nextTick(() => {
            if (fails) {
                analyzer.emit("error", new Error(`spawn ${command} ENOENT`));
            } else {
                analyzer.emit("spawn");
            }
        });
        return analyzer;
    };
    return { spawn, processes, calls };
}

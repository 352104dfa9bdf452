import * as path from "path";
import type { AnalyzerConfig } from "../config/ServerConfig.js";
import {
    AnalyzerUnavailableError,
    DocumentNotOpenError,
    describeError
} from "../errors/BridgeError.js";
import { NodeFileSystem, type IFileSystem } from "../platform/FileSystem.js";
import { pathToUri, uriToPath } from "../utils/DocumentUri.js";
import { KeyedMutex } from "../utils/KeyedMutex.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { DiagnosticsCache, type DiagnosticsSnapshot } from "./DiagnosticsCache.js";
import { MessageCorrelator, type CorrelatorStats } from "./MessageCorrelator.js";
import { ProcessSupervisor, type SpawnFunction, type SubprocessHandle } from "./ProcessSupervisor.js";
import {
    ConfigurationRequestSchema,
    InitializeResultSchema,
    PublishDiagnosticsSchema,
    buildInitializeParams,
    normalizeCodeAction,
    normalizeCodeActions,
    normalizeDocumentSymbols,
    normalizeHover,
    normalizeLocations,
    normalizeTextEdits,
    normalizeTypeHierarchy,
    normalizeWorkspaceEdit,
    normalizeWorkspaceSymbols,
    parseResponse,
    textDocumentPosition,
    type FlatSymbol,
    type LspCodeAction,
    type LspInitializeResult,
    type LspLocation,
    type LspRange,
    type LspTextEdit,
    type LspTypeHierarchyItem,
    type LspWorkspaceEdit,
    type WorkspaceSymbolMatch
} from "./protocol.js";
import { findEnclosingSymbol } from "./SymbolIdentity.js";
import { WorkspaceState, type TrackedDocument } from "./WorkspaceState.js";

export interface AnalyzerClientOptions {
    rootPath: string;
    analyzer: AnalyzerConfig;
    spawn?: SpawnFunction;
    fileSystem?: IFileSystem;
    clientVersion?: string;
}

export interface DefinitionDetails {
    location: LspLocation;
    /** Outline path of the definition, e.g. `["impl Foo", "bar"]`. */
    symbolPath: string[];
    symbol?: FlatSymbol;
}

export interface FileChangeNotice {
    uri: string;
    kind: "created" | "changed" | "deleted";
}

export interface AnalyzerClientStats {
    generation?: number;
    pid?: number;
    restarts: number;
    openDocuments: number;
    correlator?: CorrelatorStats;
}

interface PreparedDocument {
    correlator: MessageCorrelator;
    document: TrackedDocument;
}

const FILE_CHANGE_TYPE = { created: 1, changed: 2, deleted: 3 } as const;

const logger = createLogger("AnalyzerClient");

/**
 * Typed requests against a supervised rust-analyzer process.
 *
 * Position-based requests need the document to be open; they fail with
 * DocumentNotOpen before anything is written to the analyzer. Every request
 * re-reads the document from disk and sends a full-text didChange when the
 * content drifted.
 */
export class AnalyzerClient {
    public readonly workspace: WorkspaceState;
    public readonly diagnostics = new DiagnosticsCache();
    private readonly supervisor: ProcessSupervisor;
    private readonly fileSystem: IFileSystem;
    private readonly documentLocks = new KeyedMutex();
    private readonly clientVersion: string;
    private correlator?: MessageCorrelator;
    private connectionGeneration?: number;
    private connecting?: Promise<MessageCorrelator>;
    private initializeResult?: LspInitializeResult;
    private stopped = false;

    constructor(private readonly options: AnalyzerClientOptions) {
        this.workspace = new WorkspaceState(options.rootPath);
        this.fileSystem = options.fileSystem ?? new NodeFileSystem(options.rootPath);
        this.clientVersion = options.clientVersion ?? "0.1.0";
        this.supervisor = new ProcessSupervisor({
            command: options.analyzer.executablePath,
            args: options.analyzer.args,
            cwd: options.rootPath,
            shutdownGraceMs: options.analyzer.shutdownGraceMs,
            maxRestarts: options.analyzer.maxRestarts,
            spawn: options.spawn
        });
        this.supervisor.on("exit", ({ handle, info }) => {
            if (handle.generation !== this.connectionGeneration) return;
            const reason = `analyzer exited (code=${info.code ?? "null"}, signal=${info.signal ?? "null"})`;
            this.correlator?.close(reason);
        });
    }

    public get serverInfo(): { name: string; version?: string } | undefined {
        return this.initializeResult?.serverInfo;
    }

    public get serverCapabilities(): Record<string, unknown> | undefined {
        return this.initializeResult?.capabilities;
    }

    public get isRunning(): boolean {
        return Boolean(this.correlator && !this.correlator.isClosed && this.supervisor.current?.isAlive);
    }

    public async start(): Promise<void> {
        await this.connection();
    }

    public async shutdown(): Promise<void> {
        if (this.stopped) return;
        this.stopped = true;
        await this.supervisor.shutdown(async handle => {
            const correlator = this.correlator;
            if (!correlator || correlator.isClosed || handle.generation !== this.connectionGeneration) return;
            await correlator.sendRequest("shutdown", undefined, { timeoutMs: this.options.analyzer.shutdownGraceMs });
            await correlator.sendNotification("exit");
        });
        this.correlator?.close("client shut down");
    }

    public stats(): AnalyzerClientStats {
        const handle = this.supervisor.current;
        return {
            generation: handle?.generation,
            pid: handle?.pid,
            restarts: this.supervisor.restarts,
            openDocuments: this.workspace.size,
            correlator: this.correlator?.stats()
        };
    }

    public resolvePath(filePath: string): string {
        return path.resolve(this.options.rootPath, filePath);
    }

    // ----- document synchronization -----

    /** Opens the document, or re-syncs it when the file changed on disk. */
    public async openDocument(filePath: string): Promise<TrackedDocument> {
        const absolute = this.resolvePath(filePath);
        const uri = pathToUri(absolute);
        return this.documentLocks.runExclusive(uri, async () => {
            const text = await this.fileSystem.readFile(absolute);
            const correlator = await this.connection();
            const existing = this.workspace.get(uri);
            if (!existing) {
                const opened = this.workspace.open(uri, absolute, text);
                await correlator.sendNotification("textDocument/didOpen", {
                    textDocument: { uri: opened.uri, languageId: opened.languageId, version: opened.version, text }
                });
                this.workspace.markSynced(opened.uri, opened.version);
                return this.workspace.get(uri) ?? opened;
            }
            if (existing.text !== text) {
                return this.pushChange(correlator, uri, text);
            }
            return existing;
        });
    }

    public async closeDocument(filePath: string): Promise<boolean> {
        const uri = pathToUri(this.resolvePath(filePath));
        return this.documentLocks.runExclusive(uri, async () => {
            const closed = this.workspace.close(uri);
            if (!closed) return false;
            const correlator = await this.settledCorrelator();
            if (correlator) {
                await correlator.sendNotification("textDocument/didClose", { textDocument: { uri: closed.uri } });
            }
            return true;
        });
    }

    public isDocumentOpen(filePath: string): boolean {
        return this.workspace.isOpen(pathToUri(this.resolvePath(filePath)));
    }

    /** Pushes on-disk content of an open document after an external write. No-op for closed documents. */
    public async syncDocument(filePath: string): Promise<void> {
        if (!this.isDocumentOpen(filePath)) return;
        await this.prepareDocument(filePath);
    }

    public async notifyWatchedFilesChanged(changes: FileChangeNotice[]): Promise<void> {
        if (changes.length === 0) return;
        const correlator = await this.settledCorrelator();
        if (!correlator) return;
        await correlator.sendNotification("workspace/didChangeWatchedFiles", {
            changes: changes.map(change => ({ uri: change.uri, type: FILE_CHANGE_TYPE[change.kind] }))
        });
    }

    // ----- requests -----

    public async definition(filePath: string, line: number, character: number): Promise<LspLocation[]> {
        const { correlator, document } = await this.prepareDocument(filePath);
        const method = "textDocument/definition";
        const raw = await correlator.sendRequest(method, textDocumentPosition(document.uri, line, character));
        return normalizeLocations(method, raw);
    }

    /** Definition plus its outline path, taken from the defining file's document symbols. */
    public async definitionDetails(filePath: string, line: number, character: number): Promise<DefinitionDetails | null> {
        const locations = await this.definition(filePath, line, character);
        const location = locations[locations.length - 1];
        if (!location) return null;

        let symbols: FlatSymbol[] = [];
        if (location.uri.startsWith("file:")) {
            const targetPath = uriToPath(location.uri);
            if (await this.fileSystem.exists(targetPath)) {
                const openedHere = !this.isDocumentOpen(targetPath);
                await this.openDocument(targetPath);
                try {
                    symbols = await this.documentSymbols(targetPath);
                } finally {
                    if (openedHere) {
                        await this.closeDocument(targetPath);
                    }
                }
            }
        }
        const symbol = findEnclosingSymbol(symbols, location.range.start);
        return { location, symbolPath: symbol?.path ?? [], symbol };
    }

    public async references(filePath: string, line: number, character: number, includeDeclaration = true): Promise<LspLocation[]> {
        const { correlator, document } = await this.prepareDocument(filePath);
        const method = "textDocument/references";
        const raw = await correlator.sendRequest(method, {
            ...textDocumentPosition(document.uri, line, character),
            context: { includeDeclaration }
        });
        return normalizeLocations(method, raw);
    }

    public async implementations(filePath: string, line: number, character: number): Promise<LspLocation[]> {
        const { correlator, document } = await this.prepareDocument(filePath);
        const method = "textDocument/implementation";
        const raw = await correlator.sendRequest(method, textDocumentPosition(document.uri, line, character));
        return normalizeLocations(method, raw);
    }

    public async hover(filePath: string, line: number, character: number): Promise<string | null> {
        const { correlator, document } = await this.prepareDocument(filePath);
        const method = "textDocument/hover";
        const raw = await correlator.sendRequest(method, textDocumentPosition(document.uri, line, character));
        return normalizeHover(method, raw);
    }

    public async documentSymbols(filePath: string): Promise<FlatSymbol[]> {
        const { correlator, document } = await this.prepareDocument(filePath);
        const method = "textDocument/documentSymbol";
        const raw = await correlator.sendRequest(method, { textDocument: { uri: document.uri } });
        return normalizeDocumentSymbols(method, raw);
    }

    public async workspaceSymbols(query: string): Promise<WorkspaceSymbolMatch[]> {
        const correlator = await this.connection();
        const method = "workspace/symbol";
        const raw = await correlator.sendRequest(method, { query });
        return normalizeWorkspaceSymbols(method, raw);
    }

    public async rename(filePath: string, line: number, character: number, newName: string): Promise<LspWorkspaceEdit | null> {
        const { correlator, document } = await this.prepareDocument(filePath);
        const method = "textDocument/rename";
        const raw = await correlator.sendRequest(method, {
            ...textDocumentPosition(document.uri, line, character),
            newName
        });
        return normalizeWorkspaceEdit(method, raw);
    }

    public async codeActions(filePath: string, range: LspRange, only?: string[]): Promise<LspCodeAction[]> {
        const { correlator, document } = await this.prepareDocument(filePath);
        const method = "textDocument/codeAction";
        const raw = await correlator.sendRequest(method, {
            textDocument: { uri: document.uri },
            range,
            context: { diagnostics: [], only }
        });
        return normalizeCodeActions(method, raw);
    }

    public async resolveCodeAction(action: LspCodeAction): Promise<LspCodeAction> {
        if (action.edit) return action;
        const correlator = await this.connection();
        const method = "codeAction/resolve";
        const raw = await correlator.sendRequest(method, action);
        return normalizeCodeAction(method, raw);
    }

    public async formatting(filePath: string, tabSize = 4, insertSpaces = true): Promise<LspTextEdit[]> {
        const { correlator, document } = await this.prepareDocument(filePath);
        const method = "textDocument/formatting";
        const raw = await correlator.sendRequest(method, {
            textDocument: { uri: document.uri },
            options: { tabSize, insertSpaces }
        });
        return normalizeTextEdits(method, raw);
    }

    public async prepareTypeHierarchy(filePath: string, line: number, character: number): Promise<LspTypeHierarchyItem[]> {
        const { correlator, document } = await this.prepareDocument(filePath);
        const method = "textDocument/prepareTypeHierarchy";
        const raw = await correlator.sendRequest(method, textDocumentPosition(document.uri, line, character));
        return normalizeTypeHierarchy(method, raw);
    }

    public async typeHierarchySupertypes(item: LspTypeHierarchyItem): Promise<LspTypeHierarchyItem[]> {
        const correlator = await this.connection();
        const method = "typeHierarchy/supertypes";
        return normalizeTypeHierarchy(method, await correlator.sendRequest(method, { item }));
    }

    public async typeHierarchySubtypes(item: LspTypeHierarchyItem): Promise<LspTypeHierarchyItem[]> {
        const correlator = await this.connection();
        const method = "typeHierarchy/subtypes";
        return normalizeTypeHierarchy(method, await correlator.sendRequest(method, { item }));
    }

    /** Latest pushed diagnostics. Never waits for the analyzer. */
    public getDiagnostics(filePath: string): DiagnosticsSnapshot {
        return this.diagnostics.get(pathToUri(this.resolvePath(filePath)));
    }

    // ----- connection management -----

    private async prepareDocument(filePath: string): Promise<PreparedDocument> {
        const absolute = this.resolvePath(filePath);
        const uri = pathToUri(absolute);
        if (!this.workspace.isOpen(uri)) {
            throw new DocumentNotOpenError(uri);
        }
        return this.documentLocks.runExclusive(uri, async () => {
            const correlator = await this.connection();
            const current = this.workspace.get(uri);
            if (!current) {
                throw new DocumentNotOpenError(uri);
            }
            const text = await this.fileSystem.readFile(absolute);
            if (text !== current.text) {
                return { correlator, document: await this.pushChange(correlator, uri, text) };
            }
            return { correlator, document: current };
        });
    }

    private async pushChange(correlator: MessageCorrelator, uri: string, text: string): Promise<TrackedDocument> {
        const next = this.workspace.change(uri, text);
        if (!next) {
            throw new DocumentNotOpenError(uri);
        }
        await correlator.sendNotification("textDocument/didChange", {
            textDocument: { uri: next.uri, version: next.version },
            contentChanges: [{ text }]
        });
        this.workspace.markSynced(next.uri, next.version);
        return this.workspace.get(uri) ?? next;
    }

    private connection(): Promise<MessageCorrelator> {
        if (this.stopped) {
            return Promise.reject(new AnalyzerUnavailableError("client has been shut down"));
        }
        // A correlator is handed out only after its handshake and replay.
        if (this.connecting) {
            return this.connecting;
        }
        const correlator = this.correlator;
        const handle = this.supervisor.current;
        if (correlator && !correlator.isClosed && handle && handle.isAlive && !handle.isStopping
            && handle.generation === this.connectionGeneration) {
            return Promise.resolve(correlator);
        }
        const connecting = this.connect().finally(() => {
            if (this.connecting === connecting) {
                this.connecting = undefined;
            }
        });
        this.connecting = connecting;
        return connecting;
    }

    /** The live correlator once any connect in flight has settled. Never starts an analyzer. */
    private async settledCorrelator(): Promise<MessageCorrelator | undefined> {
        if (this.connecting) {
            await this.connecting.catch((error: unknown) => {
                logger.debug("connect in flight failed", { error: describeError(error) });
            });
        }
        const correlator = this.correlator;
        return correlator && !correlator.isClosed ? correlator : undefined;
    }

    private async connect(): Promise<MessageCorrelator> {
        const { handle, restarted } = await this.supervisor.ensureAlive();
        this.correlator?.close("superseded by a new analyzer generation");

        const correlator = new MessageCorrelator(handle.stdout, handle.stdin, {
            requestTimeoutMs: this.options.analyzer.requestTimeoutMs,
            label: `generation-${handle.generation}`
        });
        this.registerHandlers(correlator);
        this.correlator = correlator;
        this.connectionGeneration = handle.generation;

        try {
            await this.handshake(correlator);
        } catch (error) {
            correlator.close(`initialize failed: ${describeError(error)}`);
            this.supervisor.discard(handle);
            throw error;
        }
        this.supervisor.markHealthy(handle);

        if (restarted) {
            await this.replayDocuments(correlator, handle);
        }
        return correlator;
    }

    private async handshake(correlator: MessageCorrelator): Promise<void> {
        const method = "initialize";
        const raw = await correlator.sendRequest(method, buildInitializeParams(this.options.rootPath, this.clientVersion));
        this.initializeResult = parseResponse(InitializeResultSchema, method, raw);
        await correlator.sendNotification("initialized", {});
        logger.info("analyzer initialized", {
            server: this.initializeResult.serverInfo?.name,
            version: this.initializeResult.serverInfo?.version
        });
    }

    /** Re-sends didOpen for exactly the documents that were open before the restart. */
    private async replayDocuments(correlator: MessageCorrelator, handle: SubprocessHandle): Promise<void> {
        this.diagnostics.clear();
        const documents = this.workspace.resetForReplay();
        for (const document of documents) {
            await correlator.sendNotification("textDocument/didOpen", {
                textDocument: {
                    uri: document.uri,
                    languageId: document.languageId,
                    version: document.version,
                    text: document.text
                }
            });
            this.workspace.markSynced(document.uri, document.version);
        }
        logger.info("replayed open documents after restart", { generation: handle.generation, count: documents.length });
    }

    private registerHandlers(correlator: MessageCorrelator): void {
        correlator.onNotification("textDocument/publishDiagnostics", params => {
            const parsed = PublishDiagnosticsSchema.safeParse(params);
            if (!parsed.success) {
                logger.warn("ignoring malformed diagnostics publication", { issue: parsed.error.issues[0]?.message });
                return;
            }
            this.diagnostics.publish(parsed.data);
        });
        correlator.onNotification("window/logMessage", params => {
            logger.debug("analyzer log", { params });
        });
        correlator.onNotification("window/showMessage", params => {
            logger.info("analyzer message", { params });
        });
        correlator.onNotification("$/progress", () => undefined);

        correlator.onRequest("workspace/configuration", params => {
            const parsed = ConfigurationRequestSchema.safeParse(params);
            return parsed.success ? parsed.data.items.map(() => ({})) : [];
        });
        correlator.onRequest("window/workDoneProgress/create", () => null);
        correlator.onRequest("client/registerCapability", () => null);
        correlator.onRequest("client/unregisterCapability", () => null);
        correlator.onRequest("workspace/applyEdit", () => ({
            applied: false,
            failureReason: "edits are applied by the tool layer"
        }));
    }
}

#!/usr/bin/env node
import "./utils/StdoutGuard.js";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { AnalyzerClient } from "./analyzer/AnalyzerClient.js";
import { GuardedCompilerRunner } from "./compiler/GuardedCompilerRunner.js";
import { ConfigurationManager, type WatchedChangeKind } from "./config/ConfigurationManager.js";
import { resolveServerConfigFromEnv, validateAnalyzerExecutable, type ServerConfig } from "./config/ServerConfig.js";
import { WorkspaceEditApplier } from "./edits/WorkspaceEditApplier.js";
import { describeError } from "./errors/BridgeError.js";
import { InspectionContext } from "./inspection/InspectionContext.js";
import { InspectionService } from "./inspection/InspectionService.js";
import { NodeFileSystem, type IFileSystem } from "./platform/FileSystem.js";
import { ToolDispatcher } from "./tools/ToolDispatcher.js";
import { pathToUri } from "./utils/DocumentUri.js";
import { createLogger } from "./utils/StructuredLogger.js";

const SERVER_NAME = "rust-analyzer-mcp";
const SERVER_VERSION = "0.1.0";

const logger = createLogger("Server");

export class RustAnalyzerMcpServer {
    private readonly server: Server;
    private readonly fileSystem: IFileSystem;
    private readonly analyzer: AnalyzerClient;
    private readonly runner: GuardedCompilerRunner;
    private readonly inspectionContext: InspectionContext;
    private readonly configurationManager: ConfigurationManager;
    private readonly dispatcher: ToolDispatcher;
    private shutdownRequested = false;
    private shutdownTimer?: NodeJS.Timeout;

    constructor(private readonly config: ServerConfig) {
        this.server = new Server({
            name: SERVER_NAME,
            version: SERVER_VERSION
        }, {
            capabilities: { tools: {} }
        });

        this.fileSystem = new NodeFileSystem(config.rootPath);
        this.analyzer = new AnalyzerClient({
            rootPath: config.rootPath,
            analyzer: config.analyzer,
            fileSystem: this.fileSystem,
            clientVersion: SERVER_VERSION
        });
        this.runner = new GuardedCompilerRunner({
            cwd: config.rootPath,
            timeoutMs: config.compiler.timeoutMs,
            maxOutputBytes: config.compiler.maxOutputBytes,
            maxArtifactBytes: config.compiler.maxArtifactBytes
        });
        this.inspectionContext = new InspectionContext({
            rootPath: config.rootPath,
            targetDir: config.compiler.targetDir,
            gatingMode: config.gatingMode,
            limits: {
                timeoutMs: config.compiler.timeoutMs,
                maxOutputBytes: config.compiler.maxOutputBytes,
                maxOutputLines: config.compiler.maxOutputLines
            },
            runner: this.runner,
            rustcPath: config.compiler.rustcPath,
            analyzerPath: config.analyzer.executablePath
        });
        const edits = new WorkspaceEditApplier({
            rootPath: config.rootPath,
            fileSystem: this.fileSystem,
            onFilesChanged: async changes => {
                for (const change of changes) {
                    if (change.kind === "changed") {
                        await this.analyzer.syncDocument(change.path);
                    }
                }
                await this.analyzer.notifyWatchedFilesChanged(changes.map(change => ({ uri: pathToUri(change.path), kind: change.kind })));
            }
        });

        this.dispatcher = new ToolDispatcher({
            rootPath: config.rootPath,
            cargoPath: config.compiler.cargoPath,
            analyzer: this.analyzer,
            runner: this.runner,
            fileSystem: this.fileSystem,
            edits,
            inspection: new InspectionService({
                context: this.inspectionContext,
                analyzer: this.analyzer,
                fileSystem: this.fileSystem,
                cargoPath: config.compiler.cargoPath
            }),
            inspectionContext: this.inspectionContext,
            allDiagnostics: () => this.analyzer.diagnostics.all()
        });

        this.configurationManager = new ConfigurationManager(config.rootPath);
        this.configurationManager.on("manifestChanged", ({ filePath, kind }) => this.forwardWatchedFile(filePath, kind));
        this.configurationManager.on("lintConfigChanged", ({ filePath, kind }) => this.forwardWatchedFile(filePath, kind));
        this.configurationManager.on("toolchainChanged", ({ filePath, kind }) => {
            this.inspectionContext.invalidateToolchain();
            this.forwardWatchedFile(filePath, kind);
        });

        this.setupHandlers();
        this.setupShutdownHooks();
    }

    private isTestEnv(): boolean {
        return process.env.NODE_ENV === "test" || process.env.JEST_WORKER_ID != null;
    }

    private setupHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: this.dispatcher.listTools()
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async request => {
            return this.dispatcher.call(request.params.name, request.params.arguments);
        });
    }

    private forwardWatchedFile(filePath: string, kind: WatchedChangeKind): void {
        this.analyzer.notifyWatchedFilesChanged([{ uri: pathToUri(filePath), kind }]).catch(error => {
            logger.warn("failed to forward file change to rust-analyzer", { filePath, error: describeError(error) });
        });
    }

    private setupShutdownHooks(): void {
        if (this.isTestEnv()) return;
        const handle = (reason: string, error?: unknown) => {
            if (this.shutdownRequested) return;
            this.shutdownRequested = true;
            const timeoutMs = this.config.shutdownTimeoutMs;
            if (timeoutMs > 0) {
                this.shutdownTimer = setTimeout(() => {
                    logger.warn("shutdown timeout exceeded; forcing exit", { timeoutMs });
                    process.exit(1);
                }, timeoutMs);
                this.shutdownTimer.unref?.();
            }
            if (error) {
                logger.warn("shutdown requested", { reason, error: describeError(error) });
            } else {
                logger.info("shutdown requested", { reason });
            }
            void this.shutdown().finally(() => {
                if (this.shutdownTimer) {
                    clearTimeout(this.shutdownTimer);
                    this.shutdownTimer = undefined;
                }
                process.exit(0);
            });
        };

        process.on("SIGTERM", () => handle("SIGTERM"));
        process.on("SIGINT", () => handle("SIGINT"));
        process.on("SIGHUP", () => handle("SIGHUP"));

        process.stdin.on("end", () => handle("stdin_end"));
        process.stdin.on("close", () => handle("stdin_close"));
        process.stdin.on("error", err => handle("stdin_error", err));
        process.stdin.resume();
    }

    /** Stops the watcher, the analyzer and the transport; each step runs even if an earlier one fails. */
    public async shutdown(): Promise<void> {
        const steps: Array<[string, () => Promise<void>]> = [
            ["configuration watcher", () => this.configurationManager.dispose()],
            ["rust-analyzer", () => this.analyzer.shutdown()],
            ["transport", () => this.server.close()]
        ];
        for (const [label, step] of steps) {
            try {
                await step();
            } catch (error) {
                logger.warn(`failed to stop ${label}`, { error: describeError(error) });
            }
        }
    }

    public async run(): Promise<void> {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        logger.info("rust-analyzer MCP server running on stdio", {
            root: this.config.rootPath,
            analyzer: this.config.analyzer.executablePath,
            gatingMode: this.config.gatingMode
        });
    }
}

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<void> {
    const resolved = resolveServerConfigFromEnv(env);
    const config: ServerConfig = {
        ...resolved,
        analyzer: {
            ...resolved.analyzer,
            executablePath: validateAnalyzerExecutable(resolved.analyzer.executablePath, env)
        }
    };
    const server = new RustAnalyzerMcpServer(config);
    await server.run();
}

if (require.main === module) {
    process.on("uncaughtException", error => {
        logger.error("uncaught exception", { error: describeError(error), stack: error.stack });
    });
    process.on("unhandledRejection", reason => {
        logger.error("unhandled rejection", { error: describeError(reason) });
    });
    main().catch(error => {
        logger.error("failed to start", { error: describeError(error), cwd: process.cwd() });
        process.exit(1);
    });
}

import { watch, type FSWatcher } from "chokidar";
import { EventEmitter } from "events";
import * as path from "path";
import { createLogger } from "../utils/StructuredLogger.js";

export type ConfigurationEvent =
    | "manifestChanged"
    | "toolchainChanged"
    | "lintConfigChanged";

export type WatchedChangeKind = "created" | "changed" | "deleted";

export interface ConfigurationEventPayloads {
    manifestChanged: { filePath: string; kind: WatchedChangeKind };
    toolchainChanged: { filePath: string; kind: WatchedChangeKind };
    lintConfigChanged: { filePath: string; kind: WatchedChangeKind };
}

const MANIFEST_FILES = ["Cargo.toml", "Cargo.lock"];
const TOOLCHAIN_FILES = ["rust-toolchain", "rust-toolchain.toml"];
const LINT_FILES = ["rustfmt.toml", ".rustfmt.toml", "clippy.toml", ".clippy.toml"];

const logger = createLogger("ConfigurationManager");

/**
 * Watches the workspace-level Cargo and toolchain files. Nested member
 * manifests are picked up through the root glob.
 */
export class ConfigurationManager extends EventEmitter {
    private readonly watcher?: FSWatcher;

    constructor(private readonly rootPath: string, options: { watch?: boolean } = {}) {
        super();

        const isTestEnv = process.env.NODE_ENV === "test" || process.env.JEST_WORKER_ID !== undefined;
        const enabled = options.watch ?? !isTestEnv;
        if (enabled) {
            const watchTargets = [
                ...MANIFEST_FILES.map(file => path.join(this.rootPath, file)),
                path.join(this.rootPath, "*", "Cargo.toml"),
                path.join(this.rootPath, "crates", "*", "Cargo.toml"),
                ...TOOLCHAIN_FILES.map(file => path.join(this.rootPath, file)),
                ...LINT_FILES.map(file => path.join(this.rootPath, file))
            ];
            this.watcher = watch(watchTargets, {
                ignoreInitial: true,
                persistent: true,
                ignored: ["**/target/**", "**/node_modules/**"],
                awaitWriteFinish: {
                    stabilityThreshold: 200,
                    pollInterval: 100
                }
            });
            this.registerWatchHandlers(this.watcher);
        }
    }

    public on<T extends ConfigurationEvent>(event: T, listener: (payload: ConfigurationEventPayloads[T]) => void): this {
        return super.on(event, listener);
    }

    public off<T extends ConfigurationEvent>(event: T, listener: (payload: ConfigurationEventPayloads[T]) => void): this {
        return super.off(event, listener);
    }

    public async dispose(): Promise<void> {
        if (this.watcher) {
            await this.watcher.close();
        }
        this.removeAllListeners();
    }

    private registerWatchHandlers(watcher: FSWatcher): void {
        watcher.on("add", filePath => this.handleConfigChange(filePath, "created"));
        watcher.on("change", filePath => this.handleConfigChange(filePath, "changed"));
        watcher.on("unlink", filePath => this.handleConfigChange(filePath, "deleted"));
        watcher.on("error", error => {
            logger.warn("watcher error", { error: String(error) });
        });
    }

    /** Exposed for callers that learn about changes outside the watcher. */
    public handleConfigChange(filePath: string, kind: WatchedChangeKind): void {
        const basename = path.basename(filePath);
        if (MANIFEST_FILES.includes(basename)) {
            this.emit("manifestChanged", { filePath, kind });
            return;
        }
        if (TOOLCHAIN_FILES.includes(basename)) {
            this.emit("toolchainChanged", { filePath, kind });
            return;
        }
        if (LINT_FILES.includes(basename)) {
            this.emit("lintConfigChanged", { filePath, kind });
        }
    }
}

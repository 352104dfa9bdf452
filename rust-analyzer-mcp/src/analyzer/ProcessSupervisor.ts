import { spawn } from "child_process";
import { EventEmitter } from "events";
import type { Readable, Writable } from "stream";
import { AnalyzerUnavailableError, SpawnFailedError, describeError } from "../errors/BridgeError.js";
import { createLogger } from "../utils/StructuredLogger.js";

/** The subset of ChildProcess the supervisor relies on. */
export interface AnalyzerProcess extends EventEmitter {
    readonly pid?: number;
    readonly stdin: Writable | null;
    readonly stdout: Readable | null;
    readonly stderr: Readable | null;
    kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFunction = (
    command: string,
    args: string[],
    options: { cwd: string; env: NodeJS.ProcessEnv }
) => AnalyzerProcess;

export interface ExitInfo {
    code: number | null;
    signal: NodeJS.Signals | null;
    expected: boolean;
}

export interface SupervisorOptions {
    command: string;
    args?: string[];
    cwd: string;
    env?: NodeJS.ProcessEnv;
    shutdownGraceMs: number;
    /** Consecutive failed generations tolerated before ensureAlive gives up. */
    maxRestarts: number;
    spawn?: SpawnFunction;
}

export type SupervisorEvent = "spawn" | "exit";

export interface SupervisorEventPayloads {
    spawn: { handle: SubprocessHandle };
    exit: { handle: SubprocessHandle; info: ExitInfo };
}

export type GracefulStop = (handle: SubprocessHandle) => Promise<void>;

const logger = createLogger("ProcessSupervisor");

const defaultSpawn: SpawnFunction = (command, args, options) =>
    spawn(command, args, { cwd: options.cwd, env: options.env, stdio: ["pipe", "pipe", "pipe"] });

export class SubprocessHandle {
    public readonly exited: Promise<ExitInfo>;
    private exitInfo?: ExitInfo;
    private stopRequested = false;

    constructor(
        public readonly generation: number,
        public readonly process: AnalyzerProcess,
        public readonly stdin: Writable,
        public readonly stdout: Readable
    ) {
        this.exited = new Promise<ExitInfo>(resolve => {
            process.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
                this.exitInfo = { code, signal, expected: this.stopRequested };
                resolve(this.exitInfo);
            });
        });
    }

    public get pid(): number | undefined {
        return this.process.pid;
    }

    public get isAlive(): boolean {
        return this.exitInfo === undefined;
    }

    public get exit(): ExitInfo | undefined {
        return this.exitInfo;
    }

    /** True once a stop was requested; the process may still be running. */
    public get isStopping(): boolean {
        return this.stopRequested;
    }

    public markStopping(): void {
        this.stopRequested = true;
    }
}

/**
 * Owns the analyzer child process. Only one generation is current at a time;
 * callers always re-read it through ensureAlive().
 */
export class ProcessSupervisor extends EventEmitter {
    private readonly spawnProcess: SpawnFunction;
    private currentHandle?: SubprocessHandle;
    private starting?: Promise<SubprocessHandle>;
    private shutdownPromise?: Promise<void>;
    private generationCounter = 0;
    private consecutiveFailures = 0;
    private restartCount = 0;
    private readonly healthyGenerations = new Set<number>();
    private readonly exitHook = () => this.killNow();
    private exitHookInstalled = false;

    constructor(private readonly options: SupervisorOptions) {
        super();
        this.spawnProcess = options.spawn ?? defaultSpawn;
    }

    public static async scoped<T>(
        options: SupervisorOptions,
        fn: (supervisor: ProcessSupervisor, handle: SubprocessHandle) => Promise<T>,
        graceful?: GracefulStop
    ): Promise<T> {
        const supervisor = new ProcessSupervisor(options);
        try {
            const handle = await supervisor.start();
            return await fn(supervisor, handle);
        } finally {
            await supervisor.shutdown(graceful);
        }
    }

    public on<T extends SupervisorEvent>(event: T, listener: (payload: SupervisorEventPayloads[T]) => void): this {
        return super.on(event, listener);
    }

    public off<T extends SupervisorEvent>(event: T, listener: (payload: SupervisorEventPayloads[T]) => void): this {
        return super.off(event, listener);
    }

    public get current(): SubprocessHandle | undefined {
        return this.currentHandle;
    }

    public get restarts(): number {
        return this.restartCount;
    }

    public start(): Promise<SubprocessHandle> {
        if (this.shutdownPromise) {
            return Promise.reject(new AnalyzerUnavailableError("supervisor has been shut down"));
        }
        if (this.starting) {
            return this.starting;
        }
        const starting = this.launch().finally(() => {
            if (this.starting === starting) {
                this.starting = undefined;
            }
        });
        this.starting = starting;
        return starting;
    }

    /**
     * Returns the live generation, starting a new one when the previous
     * process has exited.
     */
    public async ensureAlive(): Promise<{ handle: SubprocessHandle; restarted: boolean }> {
        const current = this.currentHandle;
        if (current && current.isAlive && !current.isStopping) {
            return { handle: current, restarted: false };
        }
        if (this.shutdownPromise) {
            throw new AnalyzerUnavailableError("supervisor has been shut down");
        }
        if (!current) {
            return { handle: await this.start(), restarted: false };
        }
        if (this.consecutiveFailures >= this.options.maxRestarts) {
            throw new AnalyzerUnavailableError(
                `restart limit reached after ${this.consecutiveFailures} failed attempt(s) (max ${this.options.maxRestarts})`
            );
        }
        const handle = await this.start();
        this.restartCount += 1;
        logger.info("analyzer restarted", { generation: handle.generation, pid: handle.pid, restarts: this.restartCount });
        return { handle, restarted: true };
    }

    /** Called once a generation has completed its handshake; resets the failure budget. */
    public markHealthy(handle: SubprocessHandle): void {
        this.healthyGenerations.add(handle.generation);
        this.consecutiveFailures = 0;
    }

    /** Kills a generation that failed its handshake. Counts against the restart budget. */
    public discard(handle: SubprocessHandle): void {
        if (!handle.isAlive || handle.isStopping) return;
        handle.markStopping();
        this.consecutiveFailures += 1;
        logger.warn("discarding analyzer generation", { generation: handle.generation, pid: handle.pid });
        handle.process.kill("SIGKILL");
    }

    /** Idempotent. Runs the graceful step, then force-kills after the grace window. */
    public shutdown(graceful?: GracefulStop): Promise<void> {
        if (!this.shutdownPromise) {
            this.shutdownPromise = this.terminate(graceful);
        }
        return this.shutdownPromise;
    }

    /** Synchronous last-resort termination for process exit hooks. */
    public killNow(): void {
        const handle = this.currentHandle;
        if (handle && handle.isAlive) {
            handle.markStopping();
            handle.process.kill("SIGKILL");
        }
    }

    private async terminate(graceful?: GracefulStop): Promise<void> {
        if (this.starting) {
            await this.starting.catch((error: unknown) => {
                logger.debug("start in flight failed during shutdown", { error: describeError(error) });
            });
        }
        this.removeExitHook();

        const handle = this.currentHandle;
        if (!handle || !handle.isAlive) {
            return;
        }
        handle.markStopping();
        const graceMs = this.options.shutdownGraceMs;

        if (graceful) {
            const completed = await raceDeadline(graceful(handle), graceMs).catch((error: unknown) => {
                logger.warn("graceful analyzer shutdown failed", { error: describeError(error) });
                return false;
            });
            if (!completed) {
                logger.warn("graceful analyzer shutdown did not complete in time", { graceMs });
            }
        }
        handle.stdin.end();

        if (await waitForExit(handle, graceMs)) {
            return;
        }
        logger.warn("analyzer did not exit in time; killing", { pid: handle.pid, graceMs });
        handle.process.kill("SIGKILL");
        if (!(await waitForExit(handle, graceMs))) {
            logger.error("analyzer still running after SIGKILL", { pid: handle.pid });
        }
    }

    private launch(): Promise<SubprocessHandle> {
        const generation = ++this.generationCounter;
        const { command } = this.options;
        const args = this.options.args ?? [];

        let child: AnalyzerProcess;
        try {
            child = this.spawnProcess(command, args, {
                cwd: this.options.cwd,
                env: this.options.env ?? process.env
            });
        } catch (error) {
            this.consecutiveFailures += 1;
            return Promise.reject(new SpawnFailedError(command, describeError(error)));
        }

        return new Promise<SubprocessHandle>((resolve, reject) => {
            const cleanup = () => {
                child.off("spawn", onSpawn);
                child.off("error", onError);
            };
            const onError = (error: Error) => {
                cleanup();
                this.consecutiveFailures += 1;
                logger.error("failed to spawn analyzer", { command, error: error.message });
                reject(new SpawnFailedError(command, error.message));
            };
            const onSpawn = () => {
                cleanup();
                const { stdin, stdout } = child;
                if (!stdin || !stdout) {
                    child.kill("SIGKILL");
                    this.consecutiveFailures += 1;
                    reject(new SpawnFailedError(command, "stdio pipes are not available"));
                    return;
                }
                const handle = this.track(generation, child, stdin, stdout);
                resolve(handle);
            };
            child.once("spawn", onSpawn);
            child.once("error", onError);
        });
    }

    private track(generation: number, child: AnalyzerProcess, stdin: Writable, stdout: Readable): SubprocessHandle {
        const handle = new SubprocessHandle(generation, child, stdin, stdout);
        this.currentHandle = handle;
        this.installExitHook();

        child.on("error", (error: Error) => {
            logger.warn("analyzer process error", { generation, error: error.message });
        });
        stdin.on("error", (error: Error) => {
            logger.debug("analyzer stdin error", { generation, error: error.message });
        });
        child.stderr?.on("data", (chunk: Buffer | string) => {
            for (const line of String(chunk).split(/\r?\n/)) {
                if (line.trim().length > 0) {
                    logger.debug("analyzer stderr", { generation, line });
                }
            }
        });

        void handle.exited.then(info => {
            if (!info.expected) {
                if (!this.healthyGenerations.has(generation)) {
                    this.consecutiveFailures += 1;
                }
                logger.warn("analyzer exited unexpectedly", { generation, code: info.code, signal: info.signal });
            }
            this.healthyGenerations.delete(generation);
            this.emit("exit", { handle, info });
        });

        logger.info("analyzer started", { generation, pid: child.pid, command: this.options.command });
        this.emit("spawn", { handle });
        return handle;
    }

    private installExitHook(): void {
        if (this.exitHookInstalled) return;
        process.once("exit", this.exitHook);
        this.exitHookInstalled = true;
    }

    private removeExitHook(): void {
        if (!this.exitHookInstalled) return;
        process.off("exit", this.exitHook);
        this.exitHookInstalled = false;
    }
}

async function waitForExit(handle: SubprocessHandle, timeoutMs: number): Promise<boolean> {
    if (!handle.isAlive) return true;
    return raceDeadline(handle.exited, timeoutMs);
}

/** Resolves true when `work` settles first, false when the deadline wins. */
function raceDeadline(work: Promise<unknown>, timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<boolean>(resolve => {
        timer = setTimeout(() => resolve(false), timeoutMs);
    });
    return Promise.race([work.then(() => true), deadline]).finally(() => {
        if (timer) clearTimeout(timer);
    });
}

import { spawn, type ChildProcess } from "child_process";
import { promises as fsPromises } from "fs";
import {
    OutputTooLargeError,
    SpawnFailedError,
    TimeoutError,
    describeError
} from "../errors/BridgeError.js";
import { isErrnoCode } from "../platform/FileSystem.js";
import { createLogger } from "../utils/StructuredLogger.js";

export type OverflowMode = "fail" | "truncate";

export interface CompilerRunRequest {
    command: string;
    args: string[];
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    timeoutMs?: number;
    maxOutputBytes?: number;
    /** `fail` kills the process at the cap; `truncate` keeps running and drops the excess. */
    overflow?: OverflowMode;
}

export interface CompilerRunResult {
    readonly command: readonly string[];
    readonly exitCode: number | null;
    readonly signal: NodeJS.Signals | null;
    readonly success: boolean;
    readonly stdout: string;
    readonly stderr: string;
    /** stdout and stderr interleaved in arrival order. */
    readonly output: string;
    /** Bytes kept in `output`. */
    readonly outputBytes: number;
    /** Bytes the process wrote, kept or not. */
    readonly observedBytes: number;
    readonly truncated: boolean;
    readonly elapsedMs: number;
}

export interface CompilerRunnerOptions {
    cwd: string;
    timeoutMs: number;
    maxOutputBytes: number;
    maxArtifactBytes: number;
    env?: NodeJS.ProcessEnv;
}

/** The runner surface inspections depend on. */
export type CompilerRunner = Pick<GuardedCompilerRunner, "run" | "readArtifact">;

interface OutputSegment {
    source: "stdout" | "stderr";
    data: Buffer;
}

const USE_PROCESS_GROUPS = process.platform !== "win32";

const logger = createLogger("GuardedCompilerRunner");

/**
 * Runs short-lived toolchain commands under a wall-clock deadline and a cap on
 * combined output. Each invocation owns its process, timer and byte counter;
 * nothing is shared with the analyzer connection or with other runs.
 */
export class GuardedCompilerRunner {
    constructor(private readonly options: CompilerRunnerOptions) {}

    public get limits(): { timeoutMs: number; maxOutputBytes: number; maxArtifactBytes: number } {
        return {
            timeoutMs: this.options.timeoutMs,
            maxOutputBytes: this.options.maxOutputBytes,
            maxArtifactBytes: this.options.maxArtifactBytes
        };
    }

    public run(request: CompilerRunRequest): Promise<CompilerRunResult> {
        const timeoutMs = request.timeoutMs ?? this.options.timeoutMs;
        const limit = request.maxOutputBytes ?? this.options.maxOutputBytes;
        const overflow = request.overflow ?? "fail";
        const commandLine = [request.command, ...request.args];
        const label = describeCommand(commandLine);
        const startedAt = Date.now();

        return new Promise<CompilerRunResult>((resolve, reject) => {
            let child: ChildProcess;
            try {
                child = spawn(request.command, request.args, {
                    cwd: request.cwd ?? this.options.cwd,
                    env: { ...process.env, ...this.options.env, ...request.env },
                    stdio: ["ignore", "pipe", "pipe"],
                    detached: USE_PROCESS_GROUPS
                });
            } catch (error) {
                reject(new SpawnFailedError(request.command, describeError(error)));
                return;
            }

            const segments: OutputSegment[] = [];
            let observed = 0;
            let kept = 0;
            let truncated = false;
            let settled = false;

            const killTree = () => {
                const pid = child.pid;
                if (pid === undefined) return;
                try {
                    if (USE_PROCESS_GROUPS) {
                        process.kill(-pid, "SIGKILL");
                    } else {
                        child.kill("SIGKILL");
                    }
                } catch (error) {
                    if (!isErrnoCode(error, "ESRCH")) {
                        logger.debug("process group kill failed; killing child directly", { pid, error: describeError(error) });
                    }
                    child.kill("SIGKILL");
                }
            };

            const finish = (settle: () => void) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                child.stdout?.off("data", onStdout);
                child.stderr?.off("data", onStderr);
                settle();
            };

            const onData = (source: OutputSegment["source"]) => (chunk: Buffer) => {
                if (settled) return;
                observed += chunk.length;
                if (truncated) return;
                if (observed <= limit) {
                    segments.push({ source, data: chunk });
                    kept += chunk.length;
                    return;
                }
                if (overflow === "truncate") {
                    const end = characterBoundary(chunk, limit - kept);
                    if (end > 0) {
                        segments.push({ source, data: chunk.subarray(0, end) });
                        kept += end;
                    }
                    truncated = true;
                    return;
                }
                killTree();
                logger.warn("output cap exceeded; killed", { command: label, observed, limit });
                finish(() => reject(new OutputTooLargeError(observed, limit)));
            };
            const onStdout = onData("stdout");
            const onStderr = onData("stderr");

            const timer = setTimeout(() => {
                killTree();
                logger.warn("deadline exceeded; killed", { command: label, timeoutMs });
                finish(() => reject(new TimeoutError(label, timeoutMs)));
            }, timeoutMs);

            child.stdout?.on("data", onStdout);
            child.stderr?.on("data", onStderr);
            child.once("error", (error: Error) => {
                killTree();
                finish(() => reject(new SpawnFailedError(request.command, error.message)));
            });
            child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
                finish(() => resolve(buildResult(commandLine, segments, code, signal, { kept, observed }, truncated, Date.now() - startedAt)));
            });
        });
    }

    /**
     * Reads a compiler artifact as text. The size is checked before reading,
     * and again after, in case the file grew in between.
     */
    public async readArtifact(filePath: string, maxBytes?: number): Promise<string> {
        const limit = maxBytes ?? this.options.maxArtifactBytes;
        const stats = await fsPromises.stat(filePath);
        if (stats.size > limit) {
            throw new OutputTooLargeError(stats.size, limit, filePath);
        }
        const buffer = await fsPromises.readFile(filePath);
        if (buffer.length > limit) {
            throw new OutputTooLargeError(buffer.length, limit, filePath);
        }
        return buffer.toString("utf-8");
    }
}

function buildResult(
    command: string[],
    segments: OutputSegment[],
    exitCode: number | null,
    signal: NodeJS.Signals | null,
    bytes: { kept: number; observed: number },
    truncated: boolean,
    elapsedMs: number
): CompilerRunResult {
    const collect = (source?: OutputSegment["source"]) => Buffer.concat(
        segments.filter(segment => source === undefined || segment.source === source).map(segment => segment.data)
    ).toString("utf-8");

    return Object.freeze({
        command: Object.freeze([...command]),
        exitCode,
        signal,
        success: exitCode === 0,
        stdout: collect("stdout"),
        stderr: collect("stderr"),
        output: collect(),
        outputBytes: bytes.kept,
        observedBytes: bytes.observed,
        truncated,
        elapsedMs
    });
}

/** Largest cut of `chunk` at or below `room` that does not split a UTF-8 sequence. */
function characterBoundary(chunk: Buffer, room: number): number {
    if (room <= 0) return 0;
    if (room >= chunk.length) return chunk.length;
    let end = room;
    while (end > 0 && (chunk[end] & 0xc0) === 0x80) {
        end -= 1;
    }
    return end;
}

export function describeCommand(commandLine: readonly string[]): string {
    const text = commandLine.join(" ");
    return text.length > 160 ? `${text.slice(0, 157)}...` : text;
}

import type { CompilerRunRequest, CompilerRunResult, CompilerRunner } from "../../compiler/GuardedCompilerRunner.js";
import { NotFoundError } from "../../errors/BridgeError.js";
import type { IFileSystem } from "../../platform/FileSystem.js";

export interface ScriptedOutcome {
    exitCode?: number | null;
    stdout?: string;
    stderr?: string;
}

export type RunScript = (request: CompilerRunRequest) => ScriptedOutcome | Promise<ScriptedOutcome>;

export const STABLE_RUSTC = [
    "rustc 1.80.0 (051478957 2024-07-21)",
    "binary: rustc",
    "commit-hash: 051478957371ee0084a7c0913941d2a8c4757bb9",
    "host: x86_64-unknown-linux-gnu",
    "release: 1.80.0",
    "LLVM version: 18.1.7",
    ""
].join("\n");

export const NIGHTLY_RUSTC = STABLE_RUSTC.replace("release: 1.80.0", "release: 1.82.0-nightly");

/** Answers toolchain version queries, then defers everything else to `script`. */
export function toolchainScript(rustcVerbose: string, script: RunScript = () => ({ exitCode: 0 })): RunScript {
    return request => {
        if (request.args[0] === "-Vv") return { exitCode: 0, stdout: rustcVerbose };
        if (request.args[0] === "--version") return { exitCode: 0, stdout: "rust-analyzer 1.80.0 (0514789 2024-07-21)\n" };
        return script(request);
    };
}

/** CompilerRunner that records requests and answers from a script instead of spawning. */
export class ScriptedRunner implements CompilerRunner {
    public readonly requests: CompilerRunRequest[] = [];

    constructor(private readonly script: RunScript, private readonly fileSystem?: IFileSystem) {}

    public commands(): string[] {
        return this.requests.map(request => [request.command, ...request.args].join(" "));
    }

    async run(request: CompilerRunRequest): Promise<CompilerRunResult> {
        this.requests.push(request);
        const outcome = await this.script(request);
        const stdout = outcome.stdout ?? "";
        const stderr = outcome.stderr ?? "";
        const exitCode = outcome.exitCode === undefined ? 0 : outcome.exitCode;
        return {
            command: [request.command, ...request.args],
            exitCode,
            signal: null,
            success: exitCode === 0,
            stdout,
            stderr,
            output: stdout + stderr,
            outputBytes: Buffer.byteLength(stdout + stderr),
            observedBytes: Buffer.byteLength(stdout + stderr),
            truncated: false,
            elapsedMs: 1
        };
    }

    async readArtifact(filePath: string): Promise<string> {
        if (!this.fileSystem) {
            throw new NotFoundError(`No artifact at ${filePath}`);
        }
        return this.fileSystem.readFile(filePath);
    }
}

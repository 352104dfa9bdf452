import * as path from "path";
import type { CompilerRunner } from "../compiler/GuardedCompilerRunner.js";
import type { GatingMode } from "../config/ServerConfig.js";
import { describeError } from "../errors/BridgeError.js";
import { KeyedMutex } from "../utils/KeyedMutex.js";
import { createLogger } from "../utils/StructuredLogger.js";

export type ToolchainChannel = "stable" | "nightly" | "dev";

export type InspectionViewName = "def" | "types" | "llvm-ir" | "asm" | "mir";

export interface InspectionView {
    name: InspectionViewName;
    description: string;
    requiresNightly: boolean;
    emit?: "llvm-ir" | "asm";
    unpretty?: "mir";
}

export const INSPECTION_VIEWS: readonly InspectionView[] = [
    { name: "def", description: "Definition location and symbol identity", requiresNightly: false },
    { name: "types", description: "Type hierarchy for the symbol", requiresNightly: false },
    { name: "llvm-ir", description: "Lowered LLVM IR for a symbol", requiresNightly: false, emit: "llvm-ir" },
    { name: "asm", description: "Assembly for a symbol", requiresNightly: false, emit: "asm" },
    { name: "mir", description: "MIR for a symbol", requiresNightly: true, unpretty: "mir" }
];

export interface InspectionLimits {
    timeoutMs: number;
    maxOutputBytes: number;
    maxOutputLines: number;
}

export interface TruncationSummary {
    originalBytes: number;
    originalLines: number;
    keptBytes: number;
    keptLines: number;
    maxBytes: number;
    maxLines: number;
}

export interface ToolchainDetails {
    channel: ToolchainChannel;
    rustcVerboseVersion?: string;
    rustAnalyzerVersion?: string;
}

export interface InspectionProvenance {
    workspaceRoot: string;
    targetDir: string;
    env: Record<string, string>;
    gatingMode: GatingMode;
    toolchainChannel: ToolchainChannel;
    workspaceLocked: boolean;
    rustcVerboseVersion?: string;
    rustAnalyzerVersion?: string;
    command?: string;
    truncation?: TruncationSummary;
}

export interface InspectionCapabilities {
    toolchainChannel: ToolchainChannel;
    gatingMode: GatingMode;
    views: Array<{ name: InspectionViewName; description: string; runnable: boolean; requiresNightly: boolean }>;
    limits: InspectionLimits;
    diagnostics: string[];
    provenance: InspectionProvenance;
}

export interface InspectionContextOptions {
    rootPath: string;
    targetDir: string;
    gatingMode: GatingMode;
    limits: InspectionLimits;
    runner: CompilerRunner;
    rustcPath: string;
    analyzerPath: string;
}

const DETECTION_TIMEOUT_MS = 10_000;

// Shared by every context: inspections that share a root share a target directory.
const workspaceLocks = new KeyedMutex();

const logger = createLogger("InspectionContext");

export function findView(name: string): InspectionView | undefined {
    const wanted = name.trim().toLowerCase();
    return INSPECTION_VIEWS.find(view => view.name === wanted);
}

export function isNightlyLike(channel: ToolchainChannel): boolean {
    return channel === "nightly" || channel === "dev";
}

export function isViewAdvertised(view: InspectionView, channel: ToolchainChannel, gatingMode: GatingMode): boolean {
    return !(view.requiresNightly && !isNightlyLike(channel) && gatingMode === "strict");
}

export function isViewRunnable(view: InspectionView, channel: ToolchainChannel): boolean {
    return !(view.requiresNightly && !isNightlyLike(channel));
}

/** Channel from the `release:` line of `rustc -Vv`. */
export function parseToolchainChannel(rustcVerbose: string): ToolchainChannel {
    for (const line of rustcVerbose.split(/\r?\n/)) {
        if (!line.startsWith("release:")) continue;
        const release = line.slice("release:".length);
        if (release.includes("nightly")) return "nightly";
        if (release.includes("dev")) return "dev";
    }
    return "stable";
}

/** Host triple from the `host:` line of `rustc -Vv`. */
export function parseHostTriple(rustcVerbose: string): string | undefined {
    for (const line of rustcVerbose.split(/\r?\n/)) {
        if (line.startsWith("host:")) {
            const host = line.slice("host:".length).trim();
            return host.length > 0 ? host : undefined;
        }
    }
    return undefined;
}

function splitLines(text: string): string[] {
    if (text.length === 0) return [];
    const lines = text.split("\n");
    if (lines[lines.length - 1] === "") lines.pop();
    return lines.map(line => line.endsWith("\r") ? line.slice(0, -1) : line);
}

/**
 * Keeps whole lines while both limits hold, then appends a marker naming what
 * was kept, the original size and the limits.
 */
export function truncateWithLimits(
    text: string,
    limits: Pick<InspectionLimits, "maxOutputBytes" | "maxOutputLines">
): { text: string; truncated: boolean; summary?: TruncationSummary } {
    const originalBytes = Buffer.byteLength(text, "utf-8");
    const lines = splitLines(text);
    const originalLines = lines.length;

    if (originalBytes <= limits.maxOutputBytes && originalLines <= limits.maxOutputLines) {
        return { text, truncated: false };
    }

    let keptBytes = 0;
    let keptLines = 0;
    let kept = "";
    for (const line of lines) {
        const withNewline = `${line}\n`;
        const nextBytes = keptBytes + Buffer.byteLength(withNewline, "utf-8");
        const nextLines = keptLines + 1;
        if (nextBytes > limits.maxOutputBytes || nextLines > limits.maxOutputLines) {
            break;
        }
        kept += withNewline;
        keptBytes = nextBytes;
        keptLines = nextLines;
    }

    kept += `\n[truncated after ${keptLines} lines/${keptBytes} bytes; original ${originalLines} lines/${originalBytes} bytes; limits ${limits.maxOutputLines} lines/${limits.maxOutputBytes} bytes]`;

    return {
        text: kept,
        truncated: true,
        summary: {
            originalBytes,
            originalLines,
            keptBytes,
            keptLines,
            maxBytes: limits.maxOutputBytes,
            maxLines: limits.maxOutputLines
        }
    };
}

export function truncationNote(summary: TruncationSummary): string {
    return `Output truncated to ${summary.keptLines} lines/${summary.keptBytes} bytes from ${summary.originalLines} lines/${summary.originalBytes} bytes`;
}

/**
 * Per-workspace inspection settings: limits, gating, toolchain identity and
 * the lock that serializes compiler runs sharing a target directory.
 */
export class InspectionContext {
    private toolchainDetails?: Promise<ToolchainDetails>;
    private hostTriple?: string;

    constructor(private readonly options: InspectionContextOptions) {}

    public get rootPath(): string {
        return this.options.rootPath;
    }

    public get targetDir(): string {
        return this.options.targetDir;
    }

    public get gatingMode(): GatingMode {
        return this.options.gatingMode;
    }

    public get limits(): InspectionLimits {
        return { ...this.options.limits };
    }

    public get runner(): CompilerRunner {
        return this.options.runner;
    }

    /** Environment passed to every inspection build. */
    public env(): Record<string, string> {
        return { CARGO_TARGET_DIR: this.options.targetDir };
    }

    public toolchain(): Promise<ToolchainDetails> {
        if (!this.toolchainDetails) {
            this.toolchainDetails = this.detectToolchain();
        }
        return this.toolchainDetails;
    }

    public async host(): Promise<string | undefined> {
        await this.toolchain();
        return this.hostTriple;
    }

    /** Forgets detected versions; the next call re-runs detection. */
    public invalidateToolchain(): void {
        this.toolchainDetails = undefined;
        this.hostTriple = undefined;
    }

    public lockWorkspace<T>(fn: () => Promise<T>): Promise<T> {
        return workspaceLocks.runExclusive(path.resolve(this.options.rootPath), fn);
    }

    public isWorkspaceLocked(): boolean {
        return workspaceLocks.isLocked(path.resolve(this.options.rootPath));
    }

    public async provenance(gatingMode: GatingMode = this.options.gatingMode): Promise<InspectionProvenance> {
        const toolchain = await this.toolchain();
        return {
            workspaceRoot: this.options.rootPath,
            targetDir: this.options.targetDir,
            env: this.env(),
            gatingMode,
            toolchainChannel: toolchain.channel,
            workspaceLocked: false,
            rustcVerboseVersion: toolchain.rustcVerboseVersion,
            rustAnalyzerVersion: toolchain.rustAnalyzerVersion
        };
    }

    public async capabilities(gatingMode: GatingMode = this.options.gatingMode): Promise<InspectionCapabilities> {
        const toolchain = await this.toolchain();
        const diagnostics: string[] = [];
        const views: InspectionCapabilities["views"] = [];
        for (const view of INSPECTION_VIEWS) {
            if (!isViewAdvertised(view, toolchain.channel, gatingMode)) continue;
            const runnable = isViewRunnable(view, toolchain.channel);
            if (!runnable) {
                diagnostics.push(`View '${view.name}' requires nightly`);
            }
            views.push({ name: view.name, description: view.description, runnable, requiresNightly: view.requiresNightly });
        }
        return {
            toolchainChannel: toolchain.channel,
            gatingMode,
            views,
            limits: this.limits,
            diagnostics,
            provenance: await this.provenance(gatingMode)
        };
    }

    private async detectToolchain(): Promise<ToolchainDetails> {
        const details: ToolchainDetails = { channel: "stable" };
        try {
            const result = await this.options.runner.run({
                command: this.options.rustcPath,
                args: ["-Vv"],
                timeoutMs: DETECTION_TIMEOUT_MS,
                overflow: "truncate"
            });
            if (result.success) {
                details.rustcVerboseVersion = result.stdout;
                details.channel = parseToolchainChannel(result.stdout);
                this.hostTriple = parseHostTriple(result.stdout);
            }
        } catch (error) {
            logger.warn("rustc version detection failed; assuming stable", { error: describeError(error) });
        }

        try {
            const result = await this.options.runner.run({
                command: this.options.analyzerPath,
                args: ["--version"],
                timeoutMs: DETECTION_TIMEOUT_MS,
                overflow: "truncate"
            });
            const text = result.stdout.trim();
            if (result.success && text.length > 0) {
                details.rustAnalyzerVersion = text;
            }
        } catch (error) {
            logger.warn("rust-analyzer version detection failed", { error: describeError(error) });
        }
        return details;
    }
}

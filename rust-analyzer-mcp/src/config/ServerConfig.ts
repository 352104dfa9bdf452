import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConfigurationError } from "../errors/BridgeError.js";

export type GatingMode = "strict" | "lenient";

export interface AnalyzerConfig {
    executablePath: string;
    args: string[];
    requestTimeoutMs: number;
    shutdownGraceMs: number;
    maxRestarts: number;
}

export interface CompilerConfig {
    cargoPath: string;
    rustcPath: string;
    timeoutMs: number;
    maxOutputBytes: number;
    maxArtifactBytes: number;
    maxOutputLines: number;
    targetDir: string;
}

export interface ServerConfig {
    rootPath: string;
    analyzer: AnalyzerConfig;
    compiler: CompilerConfig;
    gatingMode: GatingMode;
    shutdownTimeoutMs: number;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_SHUTDOWN_GRACE_MS = 2_000;
export const DEFAULT_MAX_RESTARTS = 3;
export const DEFAULT_COMPILER_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;
export const DEFAULT_MAX_ARTIFACT_BYTES = 2 * 1024 * 1024;
export const DEFAULT_MAX_OUTPUT_LINES = 20_000;
export const DEFAULT_TARGET_DIR = path.join("target", "mcp-inspections");
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5_000;

export function resolveServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const rawRoot = env.RUST_MCP_ROOT?.trim();
    const rootPath = path.resolve(rawRoot && rawRoot.length > 0 ? rawRoot : process.cwd());

    return {
        rootPath,
        analyzer: {
            executablePath: resolveAnalyzerPath(env),
            args: splitArgs(env.RUST_ANALYZER_ARGS),
            requestTimeoutMs: positiveOr(parseOptionalInt(env.RUST_MCP_REQUEST_TIMEOUT_MS), DEFAULT_REQUEST_TIMEOUT_MS),
            shutdownGraceMs: positiveOr(parseOptionalInt(env.RUST_MCP_SHUTDOWN_GRACE_MS), DEFAULT_SHUTDOWN_GRACE_MS),
            maxRestarts: nonNegativeOr(parseOptionalInt(env.RUST_MCP_MAX_RESTARTS), DEFAULT_MAX_RESTARTS)
        },
        compiler: {
            cargoPath: env.CARGO?.trim() || "cargo",
            rustcPath: env.RUSTC?.trim() || "rustc",
            timeoutMs: positiveOr(parseOptionalInt(env.RUST_MCP_COMPILER_TIMEOUT_MS), DEFAULT_COMPILER_TIMEOUT_MS),
            maxOutputBytes: positiveOr(parseOptionalInt(env.RUST_MCP_MAX_OUTPUT_BYTES), DEFAULT_MAX_OUTPUT_BYTES),
            maxArtifactBytes: positiveOr(parseOptionalInt(env.RUST_MCP_MAX_ARTIFACT_BYTES), DEFAULT_MAX_ARTIFACT_BYTES),
            maxOutputLines: positiveOr(parseOptionalInt(env.RUST_MCP_MAX_OUTPUT_LINES), DEFAULT_MAX_OUTPUT_LINES),
            targetDir: resolveTargetDir(rootPath, env.RUST_MCP_TARGET_DIR)
        },
        gatingMode: normalizeGatingMode(env.RUST_MCP_GATING_MODE),
        shutdownTimeoutMs: nonNegativeOr(parseOptionalInt(env.RUST_MCP_SHUTDOWN_TIMEOUT_MS), DEFAULT_SHUTDOWN_TIMEOUT_MS)
    };
}

export function resolveAnalyzerPath(env: NodeJS.ProcessEnv = process.env): string {
    const explicit = env.RUST_ANALYZER_PATH?.trim();
    if (explicit) return explicit;
    const home = env.HOME?.trim() || os.homedir();
    return path.join(home, ".cargo", "bin", "rust-analyzer");
}

/**
 * Fails when the configured analyzer path cannot be executed. Bare command
 * names are looked up on PATH.
 */
export function validateAnalyzerExecutable(executablePath: string, env: NodeJS.ProcessEnv = process.env): string {
    const candidates = path.isAbsolute(executablePath) || executablePath.includes(path.sep)
        ? [path.resolve(executablePath)]
        : (env.PATH ?? "").split(path.delimiter).filter(Boolean).map(dir => path.join(dir, executablePath));

    for (const candidate of candidates) {
        if (isExecutableFile(candidate)) {
            return candidate;
        }
    }
    throw new ConfigurationError(
        `rust-analyzer executable not found or not executable: ${executablePath}. Set RUST_ANALYZER_PATH to a valid binary.`,
        { executablePath, searched: candidates }
    );
}

function isExecutableFile(candidate: string): boolean {
    try {
        const stats = fs.statSync(candidate);
        if (!stats.isFile()) return false;
        fs.accessSync(candidate, fs.constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

export function normalizeGatingMode(value: string | undefined): GatingMode {
    if (!value) return "strict";
    const normalized = value.trim().toLowerCase();
    if (normalized === "lenient") return "lenient";
    return "strict";
}

function resolveTargetDir(rootPath: string, value: string | undefined): string {
    const raw = value?.trim() || DEFAULT_TARGET_DIR;
    return path.isAbsolute(raw) ? raw : path.join(rootPath, raw);
}

function splitArgs(value: string | undefined): string[] {
    if (!value) return [];
    return value.split(/\s+/).filter(Boolean);
}

export function parseOptionalInt(value: string | undefined): number | undefined {
    if (!value) return undefined;
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : undefined;
}

function positiveOr(value: number | undefined, fallback: number): number {
    return value !== undefined && value > 0 ? value : fallback;
}

function nonNegativeOr(value: number | undefined, fallback: number): number {
    return value !== undefined && value >= 0 ? value : fallback;
}

import { describe, expect, it } from "@jest/globals";
import * as path from "path";
import {
    normalizeGatingMode,
    parseOptionalInt,
    resolveServerConfigFromEnv,
    validateAnalyzerExecutable
} from "../config/ServerConfig.js";
import { ConfigurationError } from "../errors/BridgeError.js";

describe("ServerConfig", () => {
    it("applies defaults relative to the workspace root", () => {
        const config = resolveServerConfigFromEnv({ RUST_MCP_ROOT: "/tmp/cfg-ws", HOME: "/home/tester" });

        expect(config).toEqual({
            rootPath: "/tmp/cfg-ws",
            analyzer: {
                executablePath: "/home/tester/.cargo/bin/rust-analyzer",
                args: [],
                requestTimeoutMs: 30_000,
                shutdownGraceMs: 2_000,
                maxRestarts: 3
            },
            compiler: {
                cargoPath: "cargo",
                rustcPath: "rustc",
                timeoutMs: 60_000,
                maxOutputBytes: 1024 * 1024,
                maxArtifactBytes: 2 * 1024 * 1024,
                maxOutputLines: 20_000,
                targetDir: "/tmp/cfg-ws/target/mcp-inspections"
            },
            gatingMode: "strict",
            shutdownTimeoutMs: 5_000
        });
    });

    it("reads overrides and ignores values out of range", () => {
        const config = resolveServerConfigFromEnv({
            RUST_MCP_ROOT: "/tmp/cfg-ws",
            RUST_ANALYZER_PATH: "/opt/ra/rust-analyzer",
            RUST_ANALYZER_ARGS: " --log-file  /tmp/ra.log ",
            RUST_MCP_REQUEST_TIMEOUT_MS: "0",
            RUST_MCP_SHUTDOWN_GRACE_MS: "soon",
            RUST_MCP_MAX_RESTARTS: "0",
            RUST_MCP_TARGET_DIR: "/var/tmp/inspections",
            RUST_MCP_GATING_MODE: "Lenient",
            RUST_MCP_SHUTDOWN_TIMEOUT_MS: "0",
            CARGO: " /opt/cargo "
        });

        expect(config.analyzer).toEqual({
            executablePath: "/opt/ra/rust-analyzer",
            args: ["--log-file", "/tmp/ra.log"],
            requestTimeoutMs: 30_000,
            shutdownGraceMs: 2_000,
            maxRestarts: 0
        });
        expect(config.compiler.targetDir).toBe("/var/tmp/inspections");
        expect(config.compiler.cargoPath).toBe("/opt/cargo");
        expect(config.gatingMode).toBe("lenient");
        expect(config.shutdownTimeoutMs).toBe(0);
    });

    it("parses integers and gating modes", () => {
        expect(parseOptionalInt("250ms")).toBe(250);
        expect(parseOptionalInt("")).toBeUndefined();
        expect(parseOptionalInt("never")).toBeUndefined();
        expect(normalizeGatingMode(undefined)).toBe("strict");
        expect(normalizeGatingMode("permissive")).toBe("strict");
    });

    describe("validateAnalyzerExecutable", () => {
        it("accepts an executable by path or by name on PATH", () => {
            expect(validateAnalyzerExecutable(process.execPath)).toBe(path.resolve(process.execPath));
            expect(validateAnalyzerExecutable(path.basename(process.execPath), { PATH: path.dirname(process.execPath) }))
                .toBe(path.join(path.dirname(process.execPath), path.basename(process.execPath)));
        });

        it("names the setting to fix when the binary is missing", () => {
            const check = () => validateAnalyzerExecutable("/tmp/cfg-ws/missing/rust-analyzer");

            expect(check).toThrow(ConfigurationError);
            expect(check).toThrow(
                "rust-analyzer executable not found or not executable: /tmp/cfg-ws/missing/rust-analyzer. Set RUST_ANALYZER_PATH to a valid binary."
            );
        });
    });
});

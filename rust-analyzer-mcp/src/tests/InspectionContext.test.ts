import { describe, expect, it } from "@jest/globals";
import { SpawnFailedError } from "../errors/BridgeError.js";
import {
    InspectionContext,
    findView,
    parseHostTriple,
    parseToolchainChannel,
    truncateWithLimits,
    truncationNote,
    type InspectionLimits
} from "../inspection/InspectionContext.js";
import { NIGHTLY_RUSTC, STABLE_RUSTC, ScriptedRunner, toolchainScript, type RunScript } from "./fixtures/ScriptedRunner.js";

const LIMITS: InspectionLimits = { timeoutMs: 5_000, maxOutputBytes: 4_096, maxOutputLines: 200 };

function createContext(script: RunScript, gatingMode: "strict" | "lenient" = "strict", rootPath = "/tmp/inspect-ws") {
    const runner = new ScriptedRunner(script);
    const context = new InspectionContext({
        rootPath,
        targetDir: `${rootPath}/target/mcp-inspections`,
        gatingMode,
        limits: LIMITS,
        runner,
        rustcPath: "rustc",
        analyzerPath: "rust-analyzer"
    });
    return { context, runner };
}

describe("InspectionContext", () => {
    it("reads the channel and host from rustc -Vv", () => {
        expect(parseToolchainChannel(STABLE_RUSTC)).toBe("stable");
        expect(parseToolchainChannel(NIGHTLY_RUSTC)).toBe("nightly");
        expect(parseToolchainChannel("release: 1.83.0-dev\n")).toBe("dev");
        expect(parseHostTriple(STABLE_RUSTC)).toBe("x86_64-unknown-linux-gnu");
        expect(parseHostTriple("release: 1.80.0\n")).toBeUndefined();
    });

    it("finds views case-insensitively", () => {
        expect(findView(" LLVM-IR ")?.emit).toBe("llvm-ir");
        expect(findView("hir")).toBeUndefined();
    });

    describe("truncateWithLimits", () => {
        it("leaves output within both limits untouched", () => {
            expect(truncateWithLimits("a\nbb\n", { maxOutputBytes: 100, maxOutputLines: 10 })).toEqual({ text: "a\nbb\n", truncated: false });
        });

        it("keeps whole lines up to the line limit and describes the cut", () => {
            const result = truncateWithLimits("a\nbb\nccc\n", { maxOutputBytes: 100, maxOutputLines: 2 });

            expect(result.text).toBe("a\nbb\n\n[truncated after 2 lines/5 bytes; original 3 lines/9 bytes; limits 2 lines/100 bytes]");
            expect(result.summary).toEqual({ originalBytes: 9, originalLines: 3, keptBytes: 5, keptLines: 2, maxBytes: 100, maxLines: 2 });
            expect(result.summary && truncationNote(result.summary)).toBe("Output truncated to 2 lines/5 bytes from 3 lines/9 bytes");
        });

        it("counts the byte limit in UTF-8", () => {
            const result = truncateWithLimits("αβ\nγ\n", { maxOutputBytes: 4, maxOutputLines: 10 });

            expect(result.text).toBe("\n[truncated after 0 lines/0 bytes; original 2 lines/8 bytes; limits 10 lines/4 bytes]");
            expect(result.truncated).toBe(true);
        });
    });

    describe("capabilities", () => {
        it("hides nightly-only views under strict gating on stable", async () => {
            const { context } = createContext(toolchainScript(STABLE_RUSTC));

            const capabilities = await context.capabilities();

            expect(capabilities.toolchainChannel).toBe("stable");
            expect(capabilities.views.map(view => view.name)).toEqual(["def", "types", "llvm-ir", "asm"]);
            expect(capabilities.diagnostics).toEqual([]);
            expect(capabilities.limits).toEqual(LIMITS);
            expect(capabilities.provenance).toEqual({
                workspaceRoot: "/tmp/inspect-ws",
                targetDir: "/tmp/inspect-ws/target/mcp-inspections",
                env: { CARGO_TARGET_DIR: "/tmp/inspect-ws/target/mcp-inspections" },
                gatingMode: "strict",
                toolchainChannel: "stable",
                workspaceLocked: false,
                rustcVerboseVersion: STABLE_RUSTC,
                rustAnalyzerVersion: "rust-analyzer 1.80.0 (0514789 2024-07-21)"
            });
        });

        it("lists nightly-only views as not runnable under lenient gating", async () => {
            const { context } = createContext(toolchainScript(STABLE_RUSTC), "lenient");

            const capabilities = await context.capabilities();

            expect(capabilities.views.find(view => view.name === "mir")).toEqual({
                name: "mir",
                description: "MIR for a symbol",
                runnable: false,
                requiresNightly: true
            });
            expect(capabilities.diagnostics).toEqual(["View 'mir' requires nightly"]);
        });

        it("runs every view on nightly, whatever the gating", async () => {
            const { context } = createContext(toolchainScript(NIGHTLY_RUSTC));

            const capabilities = await context.capabilities("strict");

            expect(capabilities.views.every(view => view.runnable)).toBe(true);
            expect(capabilities.views).toHaveLength(5);
        });
    });

    it("detects the toolchain once until invalidated", async () => {
        const { context, runner } = createContext(toolchainScript(STABLE_RUSTC));

        await context.toolchain();
        await context.host();
        expect(runner.commands()).toEqual(["rustc -Vv", "rust-analyzer --version"]);

        context.invalidateToolchain();
        await expect(context.host()).resolves.toBe("x86_64-unknown-linux-gnu");
        expect(runner.requests).toHaveLength(4);
    });

    it("assumes stable when rustc cannot be run", async () => {
        const { context } = createContext(request => {
            throw new SpawnFailedError(request.command, "ENOENT");
        });

        await expect(context.toolchain()).resolves.toEqual({ channel: "stable" });
        await expect(context.host()).resolves.toBeUndefined();
    });

    it("serializes work on the same workspace across contexts", async () => {
        const first = createContext(toolchainScript(STABLE_RUSTC), "strict", "/tmp/locked-ws").context;
        const second = createContext(toolchainScript(STABLE_RUSTC), "strict", "/tmp/locked-ws").context;
        const events: string[] = [];
        let release: () => void = () => undefined;
        const held = new Promise<void>(resolve => {
            release = resolve;
        });

        const running = first.lockWorkspace(async () => {
            events.push("first:start");
            await held;
            events.push("first:end");
        });
        const waiting = second.lockWorkspace(async () => {
            events.push("second:start");
        });
        await new Promise(resolve => setImmediate(resolve));

        expect(second.isWorkspaceLocked()).toBe(true);
        expect(events).toEqual(["first:start"]);
        release();
        await Promise.all([running, waiting]);

        expect(events).toEqual(["first:start", "first:end", "second:start"]);
        expect(first.isWorkspaceLocked()).toBe(false);
    });
});

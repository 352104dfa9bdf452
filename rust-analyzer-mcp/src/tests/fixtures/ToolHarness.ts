import * as path from "path";
import type { DiagnosticsSnapshot } from "../../analyzer/DiagnosticsCache.js";
import type { TrackedDocument } from "../../analyzer/WorkspaceState.js";
import { WorkspaceEditApplier, type AppliedFileChange } from "../../edits/WorkspaceEditApplier.js";
import { InspectionContext } from "../../inspection/InspectionContext.js";
import type { InspectionRequest, InspectionResult } from "../../inspection/InspectionService.js";
import type { ToolAnalyzer, ToolContext } from "../../tools/ToolContext.js";
import { ToolDispatcher } from "../../tools/ToolDispatcher.js";
import type { ToolResponse } from "../../types.js";
import { pathToUri } from "../../utils/DocumentUri.js";
import { MemoryFileSystem } from "./MemoryFileSystem.js";
import { STABLE_RUSTC, ScriptedRunner, toolchainScript, type RunScript } from "./ScriptedRunner.js";

export const HARNESS_ROOT = "/tmp/tool-ws";

export interface ToolHarnessOptions {
    files?: Record<string, string>;
    analyzer?: Partial<ToolAnalyzer>;
    cargo?: RunScript;
    diagnostics?: DiagnosticsSnapshot[];
}

export interface ToolHarness {
    dispatcher: ToolDispatcher;
    fileSystem: MemoryFileSystem;
    runner: ScriptedRunner;
    inspections: InspectionRequest[];
    written: AppliedFileChange[][];
    call(name: string, args: unknown): Promise<ToolResponse>;
}

/** Parses the JSON text of a tool response. */
export function payloadOf(response: ToolResponse): Record<string, unknown> {
    const parsed: unknown = JSON.parse(response.content[0].text);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new Error(`Tool response is not a JSON object: ${response.content[0].text}`);
    }
    return Object.fromEntries(Object.entries(parsed));
}

export function uriOf(relativePath: string): string {
    return pathToUri(path.join(HARNESS_ROOT, relativePath));
}

/**
 * Dispatcher wired to an in-memory workspace. Analyzer requests answer with
 * empty results unless overridden; documents open from the memory file system.
 */
export function createToolHarness(options: ToolHarnessOptions = {}): ToolHarness {
    const fileSystem = new MemoryFileSystem(HARNESS_ROOT, options.files ?? {});
    const runner = new ScriptedRunner(toolchainScript(STABLE_RUSTC, options.cargo), fileSystem);
    const written: AppliedFileChange[][] = [];
    const inspections: InspectionRequest[] = [];
    const resolvePath = (filePath: string) => path.resolve(HARNESS_ROOT, filePath);
    const emptyDiagnostics = (filePath: string): DiagnosticsSnapshot => ({ uri: pathToUri(resolvePath(filePath)), entries: [] });

    const analyzer: ToolAnalyzer = {
        resolvePath,
        openDocument: async (filePath): Promise<TrackedDocument> => {
            const absolute = resolvePath(filePath);
            return {
                uri: pathToUri(absolute),
                path: absolute,
                languageId: "rust",
                version: 1,
                text: await fileSystem.readFile(absolute),
                state: "synced"
            };
        },
        definitionDetails: async () => null,
        references: async () => [],
        implementations: async () => [],
        hover: async () => null,
        documentSymbols: async () => [],
        workspaceSymbols: async () => [],
        rename: async () => null,
        codeActions: async () => [],
        resolveCodeAction: async action => action,
        formatting: async () => [],
        prepareTypeHierarchy: async () => [],
        typeHierarchySupertypes: async () => [],
        typeHierarchySubtypes: async () => [],
        getDiagnostics: emptyDiagnostics,
        ...options.analyzer
    };

    const inspectionContext = new InspectionContext({
        rootPath: HARNESS_ROOT,
        targetDir: `${HARNESS_ROOT}/target/mcp-inspections`,
        gatingMode: "strict",
        limits: { timeoutMs: 5_000, maxOutputBytes: 65_536, maxOutputLines: 500 },
        runner,
        rustcPath: "rustc",
        analyzerPath: "rust-analyzer"
    });

    const context: ToolContext = {
        rootPath: HARNESS_ROOT,
        cargoPath: "cargo",
        analyzer,
        runner,
        fileSystem,
        edits: new WorkspaceEditApplier({
            rootPath: HARNESS_ROOT,
            fileSystem,
            onFilesChanged: async changes => {
                written.push(changes);
            }
        }),
        inspection: {
            inspect: async (request): Promise<InspectionResult> => {
                inspections.push(request);
                const { provenance } = await inspectionContext.capabilities(request.gatingMode);
                return { view: "def", symbol: "add", text: "Definition: stub", truncated: false, diagnostics: [], provenance };
            }
        },
        inspectionContext,
        allDiagnostics: () => options.diagnostics ?? []
    };

    const dispatcher = new ToolDispatcher(context);
    return {
        dispatcher,
        fileSystem,
        runner,
        inspections,
        written,
        call: (name, args) => dispatcher.call(name, args)
    };
}

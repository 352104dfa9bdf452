import type { AnalyzerClient } from "../analyzer/AnalyzerClient.js";
import type { GuardedCompilerRunner } from "../compiler/GuardedCompilerRunner.js";
import type { WorkspaceEditApplier } from "../edits/WorkspaceEditApplier.js";
import type { InspectionContext } from "../inspection/InspectionContext.js";
import type { InspectionService } from "../inspection/InspectionService.js";
import type { IFileSystem } from "../platform/FileSystem.js";

/** Analyzer requests the tool handlers issue. */
export type ToolAnalyzer = Pick<
    AnalyzerClient,
    | "openDocument"
    | "resolvePath"
    | "definitionDetails"
    | "references"
    | "implementations"
    | "hover"
    | "documentSymbols"
    | "workspaceSymbols"
    | "rename"
    | "codeActions"
    | "resolveCodeAction"
    | "formatting"
    | "prepareTypeHierarchy"
    | "typeHierarchySupertypes"
    | "typeHierarchySubtypes"
    | "getDiagnostics"
>;

export interface ToolContext {
    rootPath: string;
    cargoPath: string;
    analyzer: ToolAnalyzer;
    runner: Pick<GuardedCompilerRunner, "run">;
    fileSystem: IFileSystem;
    edits: WorkspaceEditApplier;
    inspection: Pick<InspectionService, "inspect">;
    inspectionContext: Pick<InspectionContext, "capabilities">;
    /** Cached diagnostics for every document the analyzer has reported on. */
    allDiagnostics(): ReturnType<AnalyzerClient["getDiagnostics"]>[];
}

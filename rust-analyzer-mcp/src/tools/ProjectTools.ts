import * as path from "path";
import { z } from "zod";
import { buildMetadataArgs } from "../compiler/CargoCommands.js";
import { CompilerFailedError, describeError } from "../errors/BridgeError.js";
import { CargoMetadataSchema, summarizeMetadata } from "../project/CargoMetadata.js";
import { parseDeclaredDependencies, suggestDependencies } from "../project/CrateCatalog.js";
import type { PROJECT_TOOLS, ToolGroup } from "./ToolCatalog.js";
import type { ToolContext } from "./ToolContext.js";
import { defineTool } from "./ToolDefinition.js";
import { jsonResponse } from "./responses.js";
import { workspacePathArg } from "./schemas.js";

const AnalyzeManifestArgs = z.object({
    manifestPath: z.string().min(1).optional().describe("Path to Cargo.toml; defaults to the one at the workspace root")
});

const SuggestDependenciesArgs = z.object({
    query: z.string().min(1).describe("What the crate should do, e.g. \"async http client with json\""),
    workspacePath: workspacePathArg,
    limit: z.number().int().positive().max(50).default(10)
});

export function createProjectTools(context: ToolContext): ToolGroup<typeof PROJECT_TOOLS> {
    const { analyzer, fileSystem, rootPath } = context;

    return {
        analyze_manifest: defineTool(
            "Summarize a Cargo manifest through `cargo metadata`: packages, targets, dependencies and features.",
            AnalyzeManifestArgs,
            async ({ manifestPath }) => {
                const manifest = manifestPath ? analyzer.resolvePath(manifestPath) : path.join(rootPath, "Cargo.toml");
                const result = await context.runner.run({
                    command: context.cargoPath,
                    args: buildMetadataArgs(manifest),
                    cwd: path.dirname(manifest)
                });
                if (!result.success) {
                    throw new CompilerFailedError(`cargo metadata failed for ${manifest}`, {
                        exitCode: result.exitCode,
                        stderr: result.stderr.trim()
                    });
                }
                let raw: unknown;
                try {
                    raw = JSON.parse(result.stdout);
                } catch (error) {
                    throw new CompilerFailedError("cargo metadata printed output that is not JSON", { reason: describeError(error) });
                }
                const parsed = CargoMetadataSchema.safeParse(raw);
                if (!parsed.success) {
                    throw new CompilerFailedError("cargo metadata output has an unexpected shape", {
                        issues: parsed.error.issues.slice(0, 5).map(issue => `${issue.path.join(".")}: ${issue.message}`)
                    });
                }
                return jsonResponse(summarizeMetadata(parsed.data, rootPath));
            }
        ),

        suggest_dependencies: defineTool(
            "Suggest well-known crates for a need described in words, marking the ones the manifest already declares.",
            SuggestDependenciesArgs,
            async ({ query, workspacePath, limit }) => {
                const manifest = path.join(workspacePath ? analyzer.resolvePath(workspacePath) : rootPath, "Cargo.toml");
                const declared = await fileSystem.exists(manifest)
                    ? parseDeclaredDependencies(await fileSystem.readFile(manifest))
                    : new Set<string>();
                const suggestions = suggestDependencies(query, declared, limit);
                return jsonResponse({
                    query,
                    summary: suggestions.length === 0
                        ? "No catalog crate matches the query; try broader keywords"
                        : `${suggestions.length} suggestion${suggestions.length === 1 ? "" : "s"}`,
                    suggestions
                });
            }
        )
    };
}

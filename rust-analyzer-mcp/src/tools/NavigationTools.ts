import { z } from "zod";
import type { DiagnosticsSnapshot } from "../analyzer/DiagnosticsCache.js";
import type { LspLocation, LspTypeHierarchyItem, SeverityLabel } from "../analyzer/protocol.js";
import { symbolKindName } from "../analyzer/SymbolIdentity.js";
import { AnalyzerError, NotFoundError } from "../errors/BridgeError.js";
import { displayPath, uriToPath } from "../utils/DocumentUri.js";
import type { NAVIGATION_TOOLS, ToolGroup } from "./ToolCatalog.js";
import type { ToolContext } from "./ToolContext.js";
import { defineTool } from "./ToolDefinition.js";
import { displayItem, displayLocation, pluralize, type DisplayLocation } from "./presentation.js";
import { jsonResponse } from "./responses.js";
import { PositionArgs, filePathArg } from "./schemas.js";

const METHOD_NOT_FOUND = -32601;
const MAX_LISTED_REFERENCES = 200;

const FindReferencesArgs = PositionArgs.extend({
    includeDeclaration: z.boolean().default(true).describe("Include the declaration itself")
});

const WorkspaceSymbolsArgs = z.object({
    query: z.string().min(1).describe("Symbol name or fuzzy fragment"),
    limit: z.number().int().positive().max(500).default(50)
});

const DiagnosticsArgs = z.object({
    filePath: filePathArg.optional().describe("Rust source file; omit to list every document with cached diagnostics")
});

interface ReferenceLine extends DisplayLocation {
    preview?: string;
}

export function createNavigationTools(context: ToolContext): ToolGroup<typeof NAVIGATION_TOOLS> {
    const { analyzer, rootPath } = context;

    return {
        find_definition: defineTool(
            "Go to the definition of the symbol at a position and report its path in the file outline (e.g. `impl Foo::bar`).",
            PositionArgs,
            async ({ filePath, line, character }) => {
                await analyzer.openDocument(filePath);
                const details = await analyzer.definitionDetails(filePath, line, character);
                if (!details) {
                    throw new NotFoundError(`No definition found at ${filePath}:${line + 1}:${character + 1}`, { filePath, line, character });
                }
                const location = displayLocation(details.location.uri, details.location.range.start, rootPath);
                const symbolPath = details.symbolPath.join("::");
                const start = details.location.range.start;
                return jsonResponse({
                    summary: `Definition at ${details.location.uri}:${start.line + 1}:${start.character + 1}${symbolPath ? ` (${symbolPath})` : ""}`,
                    location,
                    symbolPath: details.symbolPath,
                    kind: details.symbol ? symbolKindName(details.symbol.kind) : undefined
                });
            }
        ),

        find_references: defineTool(
            "List every reference to the symbol at a position, grouped by file.",
            FindReferencesArgs,
            async ({ filePath, line, character, includeDeclaration }) => {
                await analyzer.openDocument(filePath);
                const locations = await analyzer.references(filePath, line, character, includeDeclaration);
                const listed = await withPreviews(context, locations.slice(0, MAX_LISTED_REFERENCES));
                const byFile: Record<string, number> = {};
                for (const location of locations) {
                    const file = displayPath(location.uri, rootPath);
                    byFile[file] = (byFile[file] ?? 0) + 1;
                }
                return jsonResponse({
                    summary: `${pluralize(locations.length, "reference")} in ${pluralize(Object.keys(byFile).length, "file")}`,
                    total: locations.length,
                    byFile,
                    references: listed,
                    truncated: locations.length > MAX_LISTED_REFERENCES
                });
            }
        ),

        workspace_symbols: defineTool(
            "Search symbols across the workspace by name.",
            WorkspaceSymbolsArgs,
            async ({ query, limit }) => {
                const matches = await analyzer.workspaceSymbols(query);
                return jsonResponse({
                    query,
                    total: matches.length,
                    symbols: matches.slice(0, limit).map(match => ({
                        name: match.name,
                        kind: symbolKindName(match.kind),
                        containerName: match.containerName,
                        filePath: displayPath(match.uri, rootPath),
                        line: match.range ? match.range.start.line + 1 : undefined
                    }))
                });
            }
        ),

        get_type_hierarchy: defineTool(
            "Supertypes and subtypes of the type at a position. Falls back to implementations when the analyzer has no type hierarchy support.",
            PositionArgs,
            async ({ filePath, line, character }) => {
                await analyzer.openDocument(filePath);
                let items: LspTypeHierarchyItem[];
                try {
                    items = await analyzer.prepareTypeHierarchy(filePath, line, character);
                } catch (error) {
                    if (error instanceof AnalyzerError && error.rpcCode === METHOD_NOT_FOUND) {
                        const implementations = await analyzer.implementations(filePath, line, character);
                        return jsonResponse({
                            supported: false,
                            note: "Type hierarchy is not supported by this rust-analyzer; listing implementations instead",
                            implementations: implementations.map(location => displayLocation(location.uri, location.range.start, rootPath))
                        });
                    }
                    throw error;
                }
                const [item] = items;
                if (!item) {
                    throw new NotFoundError(`No type found at ${filePath}:${line + 1}:${character + 1}`, { filePath, line, character });
                }
                const [supertypes, subtypes] = await Promise.all([
                    analyzer.typeHierarchySupertypes(item),
                    analyzer.typeHierarchySubtypes(item)
                ]);
                return jsonResponse({
                    supported: true,
                    item: displayItem(item, rootPath),
                    supertypes: supertypes.map(entry => displayItem(entry, rootPath)),
                    subtypes: subtypes.map(entry => displayItem(entry, rootPath))
                });
            }
        ),

        get_diagnostics: defineTool(
            "Latest diagnostics the analyzer published. Opens the file if needed; never waits for a fresh analysis.",
            DiagnosticsArgs,
            async ({ filePath }) => {
                if (filePath === undefined) {
                    const snapshots = context.allDiagnostics().filter(snapshot => snapshot.entries.length > 0);
                    return jsonResponse({ documents: snapshots.map(snapshot => summarizeDiagnostics(snapshot, rootPath)) });
                }
                await analyzer.openDocument(filePath);
                return jsonResponse(summarizeDiagnostics(analyzer.getDiagnostics(filePath), rootPath));
            }
        )
    };
}

export function summarizeDiagnostics(snapshot: DiagnosticsSnapshot, rootPath: string) {
    const counts: Record<SeverityLabel, number> = { error: 0, warning: 0, information: 0, hint: 0 };
    for (const entry of snapshot.entries) {
        counts[entry.severity] += 1;
    }
    return {
        filePath: displayPath(snapshot.uri, rootPath),
        version: snapshot.version,
        received: snapshot.receivedAt !== undefined,
        counts,
        diagnostics: snapshot.entries.map(entry => ({
            severity: entry.severity,
            line: entry.range.start.line + 1,
            character: entry.range.start.character + 1,
            endLine: entry.range.end.line + 1,
            endCharacter: entry.range.end.character + 1,
            message: entry.message,
            code: entry.code,
            source: entry.source,
            suggestedFix: entry.suggestedFix
        }))
    };
}

async function withPreviews(context: ToolContext, locations: LspLocation[]): Promise<ReferenceLine[]> {
    const contents = new Map<string, string[] | null>();
    const lines: ReferenceLine[] = [];
    for (const location of locations) {
        const display = displayLocation(location.uri, location.range.start, context.rootPath);
        let fileLines = contents.get(location.uri);
        if (fileLines === undefined) {
            fileLines = location.uri.startsWith("file:") ? await readLines(context, uriToPath(location.uri)) : null;
            contents.set(location.uri, fileLines);
        }
        const text = fileLines?.[location.range.start.line]?.trim();
        lines.push(text ? { ...display, preview: text } : display);
    }
    return lines;
}

async function readLines(context: ToolContext, filePath: string): Promise<string[] | null> {
    if (!await context.fileSystem.exists(filePath)) return null;
    return (await context.fileSystem.readFile(filePath)).split(/\r?\n/);
}

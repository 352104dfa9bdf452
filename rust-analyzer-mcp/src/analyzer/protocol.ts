import { z } from "zod";
import {
    CodeActionKind,
    DiagnosticSeverity,
    type ClientCapabilities,
    type InitializeParams
} from "vscode-languageserver-protocol";
import { ProtocolDecodeError } from "../errors/BridgeError.js";
import { pathToUri } from "../utils/DocumentUri.js";

// Shapes of analyzer responses. Parsed at the boundary; unknown keys are dropped.

export const PositionSchema = z.object({
    line: z.number().int().nonnegative(),
    character: z.number().int().nonnegative()
});

export const RangeSchema = z.object({
    start: PositionSchema,
    end: PositionSchema
});

export const LocationSchema = z.object({
    uri: z.string(),
    range: RangeSchema
});

const LocationLinkSchema = z.object({
    originSelectionRange: RangeSchema.optional(),
    targetUri: z.string(),
    targetRange: RangeSchema,
    targetSelectionRange: RangeSchema
});

export type LspPosition = z.infer<typeof PositionSchema>;
export type LspRange = z.infer<typeof RangeSchema>;
export type LspLocation = z.infer<typeof LocationSchema>;

const LocationsResultSchema = z.union([
    z.null(),
    LocationSchema,
    z.array(z.union([LocationSchema, LocationLinkSchema]))
]);

export interface DocumentSymbolNode {
    name: string;
    detail?: string | null;
    kind: number;
    range: LspRange;
    selectionRange: LspRange;
    children?: DocumentSymbolNode[] | null;
}

const DocumentSymbolSchema: z.ZodType<DocumentSymbolNode> = z.lazy(() => z.object({
    name: z.string(),
    detail: z.string().nullish(),
    kind: z.number(),
    range: RangeSchema,
    selectionRange: RangeSchema,
    children: z.array(DocumentSymbolSchema).nullish()
}));

const SymbolInformationSchema = z.object({
    name: z.string(),
    kind: z.number(),
    location: LocationSchema,
    containerName: z.string().nullish()
});

const WorkspaceSymbolSchema = z.object({
    name: z.string(),
    kind: z.number(),
    location: z.union([LocationSchema, z.object({ uri: z.string() })]),
    containerName: z.string().nullish()
});

const DocumentSymbolResultSchema = z.union([
    z.null(),
    z.array(DocumentSymbolSchema),
    z.array(SymbolInformationSchema)
]);

const WorkspaceSymbolResultSchema = z.union([z.null(), z.array(WorkspaceSymbolSchema)]);

export const TextEditSchema = z.object({
    range: RangeSchema,
    newText: z.string()
});

export type LspTextEdit = z.infer<typeof TextEditSchema>;

const TextDocumentEditSchema = z.object({
    textDocument: z.object({ uri: z.string(), version: z.number().nullish() }),
    edits: z.array(TextEditSchema)
});

const CreateFileSchema = z.object({
    kind: z.literal("create"),
    uri: z.string(),
    options: z.object({ overwrite: z.boolean().optional(), ignoreIfExists: z.boolean().optional() }).optional()
});

const RenameFileSchema = z.object({
    kind: z.literal("rename"),
    oldUri: z.string(),
    newUri: z.string(),
    options: z.object({ overwrite: z.boolean().optional(), ignoreIfExists: z.boolean().optional() }).optional()
});

const DeleteFileSchema = z.object({
    kind: z.literal("delete"),
    uri: z.string(),
    options: z.object({ recursive: z.boolean().optional(), ignoreIfNotExists: z.boolean().optional() }).optional()
});

export const WorkspaceEditSchema = z.object({
    changes: z.record(z.array(TextEditSchema)).optional(),
    documentChanges: z.array(z.union([
        TextDocumentEditSchema,
        CreateFileSchema,
        RenameFileSchema,
        DeleteFileSchema
    ])).optional()
});

export type LspWorkspaceEdit = z.infer<typeof WorkspaceEditSchema>;
export type LspDocumentChange = NonNullable<LspWorkspaceEdit["documentChanges"]>[number];

const CommandSchema = z.object({
    title: z.string(),
    command: z.string(),
    arguments: z.array(z.unknown()).optional()
});

export const CodeActionSchema = z.object({
    title: z.string(),
    kind: z.string().optional(),
    isPreferred: z.boolean().optional(),
    disabled: z.object({ reason: z.string() }).optional(),
    edit: WorkspaceEditSchema.optional(),
    command: CommandSchema.optional(),
    data: z.unknown()
});

export type LspCodeAction = z.infer<typeof CodeActionSchema>;

const CodeActionResultSchema = z.union([
    z.null(),
    z.array(z.union([CodeActionSchema, CommandSchema]))
]);

const MarkedStringSchema = z.union([
    z.string(),
    z.object({ language: z.string(), value: z.string() })
]);

const HoverSchema = z.union([
    z.null(),
    z.object({
        contents: z.union([
            z.object({ kind: z.string(), value: z.string() }),
            MarkedStringSchema,
            z.array(MarkedStringSchema)
        ]),
        range: RangeSchema.optional()
    })
]);

export const TypeHierarchyItemSchema = z.object({
    name: z.string(),
    kind: z.number(),
    detail: z.string().nullish(),
    uri: z.string(),
    range: RangeSchema,
    selectionRange: RangeSchema,
    data: z.unknown()
});

export type LspTypeHierarchyItem = z.infer<typeof TypeHierarchyItemSchema>;

const TypeHierarchyResultSchema = z.union([z.null(), z.array(TypeHierarchyItemSchema)]);

const TextEditsResultSchema = z.union([z.null(), z.array(TextEditSchema)]);

export const InitializeResultSchema = z.object({
    capabilities: z.record(z.unknown()),
    serverInfo: z.object({ name: z.string(), version: z.string().optional() }).optional()
});

export type LspInitializeResult = z.infer<typeof InitializeResultSchema>;

const LspDiagnosticSchema = z.object({
    range: RangeSchema,
    severity: z.number().optional(),
    code: z.union([z.number(), z.string()]).nullish(),
    source: z.string().nullish(),
    message: z.string(),
    relatedInformation: z.array(z.object({
        location: LocationSchema,
        message: z.string()
    })).nullish()
});

export const PublishDiagnosticsSchema = z.object({
    uri: z.string(),
    version: z.number().nullish(),
    diagnostics: z.array(LspDiagnosticSchema)
});

export type LspPublishDiagnostics = z.infer<typeof PublishDiagnosticsSchema>;
export type LspDiagnostic = z.infer<typeof LspDiagnosticSchema>;

export const ConfigurationRequestSchema = z.object({
    items: z.array(z.object({ section: z.string().optional(), scopeUri: z.string().optional() }))
});

// Normalized forms handed to the tool layer.

export interface FlatSymbol {
    name: string;
    kind: number;
    /** Names from the outermost container down to the symbol itself. */
    path: string[];
    range: LspRange;
    selectionRange: LspRange;
    detail?: string;
}

export interface WorkspaceSymbolMatch {
    name: string;
    kind: number;
    uri: string;
    range?: LspRange;
    containerName?: string;
}

export function parseResponse<T extends z.ZodTypeAny>(schema: T, method: string, value: unknown): z.infer<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
        throw new ProtocolDecodeError(`${method} returned an unexpected shape${where}: ${issue?.message ?? "invalid"}`);
    }
    return result.data;
}

export function normalizeLocations(method: string, value: unknown): LspLocation[] {
    const parsed = parseResponse(LocationsResultSchema, method, value);
    if (parsed === null) return [];
    if (!Array.isArray(parsed)) return [parsed];
    return parsed.map(item => "targetUri" in item
        ? { uri: item.targetUri, range: item.targetSelectionRange }
        : item);
}

export function normalizeDocumentSymbols(method: string, value: unknown): FlatSymbol[] {
    const parsed = parseResponse(DocumentSymbolResultSchema, method, value);
    if (parsed === null) return [];
    const flat: FlatSymbol[] = [];
    for (const item of parsed) {
        if ("location" in item) {
            const container = item.containerName ? item.containerName.split("::").filter(Boolean) : [];
            flat.push({
                name: item.name,
                kind: item.kind,
                path: [...container, item.name],
                range: item.location.range,
                selectionRange: item.location.range
            });
        } else {
            flattenSymbol(item, [], flat);
        }
    }
    return flat;
}

function flattenSymbol(node: DocumentSymbolNode, parents: string[], out: FlatSymbol[]): void {
    const path = [...parents, node.name];
    out.push({
        name: node.name,
        kind: node.kind,
        path,
        range: node.range,
        selectionRange: node.selectionRange,
        detail: node.detail ?? undefined
    });
    for (const child of node.children ?? []) {
        flattenSymbol(child, path, out);
    }
}

export function normalizeWorkspaceSymbols(method: string, value: unknown): WorkspaceSymbolMatch[] {
    const parsed = parseResponse(WorkspaceSymbolResultSchema, method, value);
    if (parsed === null) return [];
    return parsed.map(item => ({
        name: item.name,
        kind: item.kind,
        uri: item.location.uri,
        range: "range" in item.location ? item.location.range : undefined,
        containerName: item.containerName ?? undefined
    }));
}

export function normalizeTextEdits(method: string, value: unknown): LspTextEdit[] {
    return parseResponse(TextEditsResultSchema, method, value) ?? [];
}

export function normalizeWorkspaceEdit(method: string, value: unknown): LspWorkspaceEdit | null {
    return parseResponse(z.union([z.null(), WorkspaceEditSchema]), method, value);
}

type LspCommand = z.infer<typeof CommandSchema>;

function isCodeAction(item: LspCodeAction | LspCommand): item is LspCodeAction {
    return typeof item.command !== "string";
}

/** Bare commands would have to be executed server-side, so only code action literals are kept. */
export function normalizeCodeActions(method: string, value: unknown): LspCodeAction[] {
    const parsed = parseResponse(CodeActionResultSchema, method, value);
    if (parsed === null) return [];
    return parsed.filter(isCodeAction);
}

export function normalizeCodeAction(method: string, value: unknown): LspCodeAction {
    return parseResponse(CodeActionSchema, method, value);
}

export function normalizeHover(method: string, value: unknown): string | null {
    const parsed = parseResponse(HoverSchema, method, value);
    if (parsed === null) return null;
    const contents = parsed.contents;
    const render = (part: z.infer<typeof MarkedStringSchema>) => typeof part === "string"
        ? part
        : "```" + part.language + "\n" + part.value + "\n```";
    if (Array.isArray(contents)) {
        return contents.map(render).join("\n\n");
    }
    if (typeof contents === "string") return contents;
    if ("kind" in contents) return contents.value;
    return render(contents);
}

export function normalizeTypeHierarchy(method: string, value: unknown): LspTypeHierarchyItem[] {
    return parseResponse(TypeHierarchyResultSchema, method, value) ?? [];
}

export type SeverityLabel = "error" | "warning" | "information" | "hint";

export function severityLabel(severity: number | undefined): SeverityLabel {
    switch (severity) {
        case DiagnosticSeverity.Warning:
            return "warning";
        case DiagnosticSeverity.Information:
            return "information";
        case DiagnosticSeverity.Hint:
            return "hint";
        default:
            return "error";
    }
}

export function buildClientCapabilities(): ClientCapabilities {
    return {
        workspace: {
            applyEdit: false,
            workspaceEdit: {
                documentChanges: true,
                resourceOperations: ["create", "rename", "delete"]
            },
            configuration: true,
            didChangeWatchedFiles: { dynamicRegistration: true },
            symbol: { dynamicRegistration: false },
            workspaceFolders: true
        },
        textDocument: {
            synchronization: { dynamicRegistration: false, didSave: false, willSave: false },
            definition: { linkSupport: true },
            references: {},
            implementation: { linkSupport: true },
            hover: { contentFormat: ["markdown", "plaintext"] },
            documentSymbol: { hierarchicalDocumentSymbolSupport: true },
            formatting: {},
            rename: { prepareSupport: false },
            codeAction: {
                codeActionLiteralSupport: {
                    codeActionKind: {
                        valueSet: [
                            CodeActionKind.QuickFix,
                            CodeActionKind.Refactor,
                            CodeActionKind.RefactorExtract,
                            CodeActionKind.RefactorInline,
                            CodeActionKind.RefactorRewrite,
                            CodeActionKind.Source,
                            CodeActionKind.SourceOrganizeImports
                        ]
                    }
                },
                resolveSupport: { properties: ["edit"] },
                dataSupport: true
            },
            typeHierarchy: { dynamicRegistration: false },
            publishDiagnostics: { relatedInformation: true, versionSupport: true }
        },
        window: { workDoneProgress: true }
    };
}

export function buildInitializeParams(rootPath: string, clientVersion: string): InitializeParams {
    const rootUri = pathToUri(rootPath);
    return {
        processId: process.pid,
        clientInfo: { name: "rust-analyzer-mcp", version: clientVersion },
        rootUri,
        workspaceFolders: [{ uri: rootUri, name: rootPath.split(/[\\/]/).filter(Boolean).pop() ?? "workspace" }],
        capabilities: buildClientCapabilities()
    };
}

export function textDocumentPosition(uri: string, line: number, character: number) {
    return { textDocument: { uri }, position: { line, character } };
}

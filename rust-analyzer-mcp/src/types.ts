export interface ToolSuggestion {
    toolName: string;
    rationale: string;
    exampleArgs?: Record<string, unknown>;
    priority?: "high" | "medium" | "low";
}

export interface EnhancedErrorDetails {
    nextActionHint?: string;
    toolSuggestions?: ToolSuggestion[];
    context?: Record<string, unknown>;
}

/** Payload of a failed tool call, serialized into the MCP error content. */
export interface ToolErrorPayload {
    errorCode: string;
    message: string;
    details: Record<string, unknown>;
}

export interface TextContent {
    type: "text";
    text: string;
}

export interface ToolResponse {
    [key: string]: unknown;
    content: TextContent[];
    isError?: boolean;
}

/** A single change produced by a mutating tool, whether previewed or written. */
export interface FileChangeSummary {
    filePath: string;
    kind: "edit" | "create" | "rename" | "delete";
    editCount: number;
    newPath?: string;
    preview?: string;
}

export interface EditOutcome {
    applied: boolean;
    changes: FileChangeSummary[];
    warnings: string[];
}

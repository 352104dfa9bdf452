import type { ToolResponse } from "../types.js";

export function jsonResponse(payload: unknown): ToolResponse {
    return { content: [{ type: "text", text: JSON.stringify(payload, jsonReplacer, 2) }] };
}

function jsonReplacer(_key: string, value: unknown): unknown {
    if (value instanceof Map) {
        return Object.fromEntries(value.entries());
    }
    if (value instanceof Set) {
        return Array.from(value.values());
    }
    return value;
}

export function errorResponse(errorCode: string, message: string, details?: unknown): ToolResponse {
    return {
        isError: true,
        content: [{ type: "text", text: JSON.stringify({ errorCode, message, details }) }]
    };
}

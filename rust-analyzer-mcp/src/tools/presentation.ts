import type { LspPosition, LspRange } from "../analyzer/protocol.js";
import { symbolKindName } from "../analyzer/SymbolIdentity.js";
import { displayPath } from "../utils/DocumentUri.js";

/** 1-based location as shown to clients. */
export interface DisplayLocation {
    filePath: string;
    line: number;
    character: number;
}

export function displayLocation(uri: string, position: LspPosition, rootPath: string): DisplayLocation {
    return {
        filePath: displayPath(uri, rootPath),
        line: position.line + 1,
        character: position.character + 1
    };
}

export interface DisplayItem extends DisplayLocation {
    name: string;
    kind: string;
    detail?: string;
}

export function displayItem(
    item: { name: string; kind: number; uri: string; selectionRange: LspRange; detail?: string | null },
    rootPath: string
): DisplayItem {
    return {
        name: item.name,
        kind: symbolKindName(item.kind),
        ...(item.detail ? { detail: item.detail } : {}),
        ...displayLocation(item.uri, item.selectionRange.start, rootPath)
    };
}

export function pluralize(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

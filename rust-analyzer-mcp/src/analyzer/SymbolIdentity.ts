import * as path from "path";
import { SymbolKind } from "vscode-languageserver-protocol";
import type { IFileSystem } from "../platform/FileSystem.js";
import type { FlatSymbol, LspPosition, LspRange } from "./protocol.js";

export type SymbolCategory =
    | "function"
    | "method"
    | "struct"
    | "enum"
    | "trait"
    | "module"
    | "constant"
    | "static"
    | "field"
    | "type"
    | "other";

export interface SymbolIdentity {
    crateName: string;
    /** Module segments between the crate root and the item. */
    modulePath: string[];
    /** Containers inside the file (impl blocks, nested modules) from the analyzer outline. */
    containerPath: string[];
    itemName: string;
    category: SymbolCategory;
}

const KIND_LABELS = new Map<number, SymbolCategory>([
    [SymbolKind.Function, "function"],
    [SymbolKind.Method, "method"],
    [SymbolKind.Constructor, "method"],
    [SymbolKind.Struct, "struct"],
    [SymbolKind.Class, "struct"],
    [SymbolKind.Enum, "enum"],
    [SymbolKind.Interface, "trait"],
    [SymbolKind.Module, "module"],
    [SymbolKind.Namespace, "module"],
    [SymbolKind.Constant, "constant"],
    [SymbolKind.Variable, "static"],
    [SymbolKind.Field, "field"],
    [SymbolKind.EnumMember, "field"],
    [SymbolKind.TypeParameter, "type"]
]);

export function symbolCategory(kind: number): SymbolCategory {
    return KIND_LABELS.get(kind) ?? "other";
}

export function symbolKindName(kind: number): string {
    for (const [name, value] of Object.entries(SymbolKind)) {
        if (value === kind) return name;
    }
    return `Kind(${kind})`;
}

/** Only code-bearing items produce MIR, IR and assembly. */
export function isInspectableCategory(category: SymbolCategory): boolean {
    return category === "function" || category === "method";
}

export function rangeContains(range: LspRange, position: LspPosition): boolean {
    const afterStart = position.line > range.start.line
        || (position.line === range.start.line && position.character >= range.start.character);
    const beforeEnd = position.line < range.end.line
        || (position.line === range.end.line && position.character <= range.end.character);
    return afterStart && beforeEnd;
}

/**
 * Symbol whose name range covers the position, else the innermost symbol
 * whose full range does.
 */
export function findEnclosingSymbol(symbols: FlatSymbol[], position: LspPosition): FlatSymbol | undefined {
    const byName = symbols.filter(symbol => rangeContains(symbol.selectionRange, position));
    if (byName.length > 0) {
        return byName.reduce((best, symbol) => symbol.path.length > best.path.length ? symbol : best);
    }
    const byRange = symbols.filter(symbol => rangeContains(symbol.range, position));
    if (byRange.length === 0) return undefined;
    return byRange.reduce((best, symbol) => symbol.path.length > best.path.length ? symbol : best);
}

export function findSymbolByName(symbols: FlatSymbol[], name: string): FlatSymbol | undefined {
    const segments = name.split("::").filter(Boolean);
    if (segments.length === 0) return undefined;
    const exact = symbols.find(symbol => symbol.path.join("::") === segments.join("::"));
    if (exact) return exact;
    const itemName = segments[segments.length - 1];
    return symbols.find(symbol => symbol.name === itemName);
}

/** Directory holding the nearest Cargo.toml at or above `filePath`. */
export async function findCrateRoot(fileSystem: IFileSystem, filePath: string): Promise<string | undefined> {
    let current = path.dirname(path.resolve(filePath));
    while (true) {
        if (await fileSystem.exists(path.join(current, "Cargo.toml"))) {
            return current;
        }
        const parent = path.dirname(current);
        if (parent === current) return undefined;
        current = parent;
    }
}

/** Reads `[package] name` without a TOML parser; crate names use `_` in paths. */
export function parsePackageName(manifest: string): string | undefined {
    let inPackage = false;
    for (const rawLine of manifest.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (line.startsWith("[")) {
            inPackage = line === "[package]";
            continue;
        }
        if (!inPackage) continue;
        const match = /^name\s*=\s*["']([^"']+)["']/.exec(line);
        if (match) return match[1];
    }
    return undefined;
}

export function crateIdentifier(packageName: string): string {
    return packageName.replace(/-/g, "_");
}

/**
 * Module segments for a source file relative to its crate root:
 * `src/lib.rs` and `src/main.rs` are the root, `mod.rs` names its directory.
 */
export function modulePathForFile(crateRoot: string, filePath: string): string[] {
    const relative = path.relative(path.join(crateRoot, "src"), path.resolve(filePath));
    if (relative.startsWith("..") || path.isAbsolute(relative)) {
        return [];
    }
    const parts = relative.split(path.sep);
    if (parts[0] === "bin") {
        return [];
    }
    const fileName = parts.pop() ?? "";
    const stem = fileName.replace(/\.rs$/, "");
    if (parts.length === 0 && (stem === "lib" || stem === "main")) {
        return [];
    }
    if (stem === "mod") {
        return parts;
    }
    return [...parts, stem];
}

export async function resolveSymbolIdentity(
    fileSystem: IFileSystem,
    filePath: string,
    symbol: FlatSymbol
): Promise<SymbolIdentity> {
    const crateRoot = await findCrateRoot(fileSystem, filePath);
    let crateName = path.basename(path.dirname(path.resolve(filePath)));
    let modulePath: string[] = [];
    if (crateRoot) {
        const manifest = await fileSystem.readFile(path.join(crateRoot, "Cargo.toml"));
        crateName = parsePackageName(manifest) ?? path.basename(crateRoot);
        modulePath = modulePathForFile(crateRoot, filePath);
    }
    return {
        crateName: crateIdentifier(crateName),
        modulePath,
        containerPath: symbol.path.slice(0, -1).map(normalizeContainerName),
        itemName: symbol.name,
        category: symbolCategory(symbol.kind)
    };
}

/** `impl Display for Foo` -> `Foo`, `impl<T> Foo<T>` -> `Foo`, `mod inner` -> `inner`. */
export function normalizeContainerName(name: string): string {
    const trimmed = name.trim();
    const implMatch = /^impl(?:<[^>]*>)?\s+(?:.*\s+for\s+)?([A-Za-z_][A-Za-z0-9_]*)/.exec(trimmed);
    if (implMatch) return implMatch[1];
    return trimmed.replace(/^mod\s+/, "");
}

import { NotFoundError } from "../errors/BridgeError.js";
import type { SymbolIdentity } from "../analyzer/SymbolIdentity.js";

/**
 * A symbol as it appears in compiler output. `defName` is the path form
 * (`crate::module::item`); `mangledPrefix` is the legacy `_ZN` encoding of the
 * same segments, used when the exact mangled name is unknown.
 */
export interface NormalizedSymbol {
    defName: string;
    /** `defName` without the crate segment; MIR headers omit the crate. */
    localName: string;
    itemName: string;
    mangled?: string;
    mangledPrefix: string;
}

export interface TargetedAssembly {
    target: string;
    content: string;
}

interface Candidate {
    header: string;
    content: string;
}

export function normalizeSymbol(identity: SymbolIdentity, mangled?: string): NormalizedSymbol {
    const segments = [identity.crateName, ...identity.modulePath, ...identity.containerPath, identity.itemName];
    return {
        defName: segments.join("::"),
        localName: segments.slice(1).join("::"),
        itemName: identity.itemName,
        mangled,
        mangledPrefix: encodeMangledPrefix(segments)
    };
}

export function encodeMangledPrefix(segments: string[]): string {
    return "_ZN" + segments.map(segment => `${segment.length}${segment}`).join("");
}

/** MIR block whose body names the def-path; falls back to the crate-less path, then the bare item name. */
export function extractMir(outputs: string[], symbol: NormalizedSymbol): string {
    const defMatches: Candidate[] = [];
    const localMatches: Candidate[] = [];
    const nameMatches: Candidate[] = [];

    for (const output of outputs) {
        for (const block of splitMirBlocks(output)) {
            const header = block.split("\n")[0].trim();
            if (block.includes(symbol.defName)) {
                defMatches.push({ header, content: block });
            } else if (symbol.localName && headerNamesItem(header, symbol.localName)) {
                localMatches.push({ header, content: block });
            } else if (headerNamesItem(header, symbol.itemName)) {
                nameMatches.push({ header, content: block });
            }
        }
    }

    const matches = defMatches.length > 0 ? defMatches
        : localMatches.length > 0 ? localMatches
        : nameMatches;
    return selectUniqueMatch(matches, "MIR", symbol);
}

/** `define` block by exact mangled name, then mangled prefix, then def-path mention. */
export function extractLlvmIr(outputs: string[], symbol: NormalizedSymbol): string {
    const exact: Candidate[] = [];
    const prefix: Candidate[] = [];
    const byDefName: Candidate[] = [];

    for (const output of outputs) {
        for (const block of splitLlvmBlocks(output)) {
            const candidate = { header: block.name, content: block.content };
            if (symbol.mangled && block.name.includes(symbol.mangled)) {
                exact.push(candidate);
            } else if (symbol.mangledPrefix && block.name.includes(symbol.mangledPrefix)) {
                prefix.push(candidate);
            } else if (block.content.includes(symbol.defName)) {
                byDefName.push(candidate);
            }
        }
    }

    if (exact.length > 0) return selectUniqueMatch(exact, "LLVM IR", symbol);
    if (prefix.length > 0) return selectUniqueMatch(prefix, "LLVM IR (prefix)", symbol);
    return selectUniqueMatch(byDefName, "LLVM IR", symbol);
}

export function extractAsm(assemblies: TargetedAssembly[], symbol: NormalizedSymbol, targetTriple: string): string {
    const forTarget = assemblies.filter(assembly => assembly.target === targetTriple);
    if (forTarget.length === 0) {
        throw new NotFoundError(
            `No assembly artifacts available for target \`${targetTriple}\` while searching for \`${symbol.defName}\``,
            { target: targetTriple, available: Array.from(new Set(assemblies.map(assembly => assembly.target))) }
        );
    }

    const exact: Candidate[] = [];
    const prefix: Candidate[] = [];
    const byName: Candidate[] = [];
    for (const assembly of forTarget) {
        for (const block of splitAsmBlocks(assembly.content)) {
            const candidate = { header: block.label, content: block.content };
            if (symbol.mangled && block.label.includes(symbol.mangled)) {
                exact.push(candidate);
            } else if (symbol.mangledPrefix && block.label.includes(symbol.mangledPrefix)) {
                prefix.push(candidate);
            } else if (block.content.includes(symbol.defName)) {
                byName.push(candidate);
            }
        }
    }

    if (exact.length > 0) return selectUniqueMatch(exact, "assembly", symbol);
    if (prefix.length > 0) return selectUniqueMatch(prefix, "assembly (prefix)", symbol);
    return selectUniqueMatch(byName, "assembly", symbol);
}

export function splitMirBlocks(output: string): string[] {
    const blocks: string[] = [];
    let current: string[] = [];
    let capturing = false;

    for (const line of output.split(/\r?\n/)) {
        if (isMirHeader(line)) {
            if (capturing && current.length > 0) {
                blocks.push(current.join("\n").trim());
            }
            current = [];
            capturing = true;
        }
        if (capturing) {
            current.push(line);
        }
    }
    if (capturing && current.length > 0) {
        blocks.push(current.join("\n").trim());
    }
    return blocks;
}

export function splitLlvmBlocks(output: string): Array<{ name: string; content: string }> {
    const blocks: Array<{ name: string; content: string }> = [];
    let name: string | undefined;
    let lines: string[] = [];

    for (const line of output.split(/\r?\n/)) {
        if (line.trimStart().startsWith("define")) {
            if (name !== undefined) {
                blocks.push({ name, content: lines.join("\n") });
            }
            lines = [];
            name = llvmSymbolName(line);
        }
        if (name !== undefined) {
            lines.push(line);
        }
    }
    if (name !== undefined) {
        blocks.push({ name, content: lines.join("\n") });
    }
    return blocks;
}

export function splitAsmBlocks(output: string): Array<{ label: string; content: string }> {
    const blocks: Array<{ label: string; content: string }> = [];
    let label: string | undefined;
    let lines: string[] = [];

    for (const line of output.split(/\r?\n/)) {
        const trimmed = line.trim();
        // Local labels (`.LBB0_1:`) stay inside their function's block.
        if (trimmed.endsWith(":") && !trimmed.startsWith("#") && !trimmed.startsWith(".")) {
            if (label !== undefined) {
                blocks.push({ label, content: lines.join("\n") });
            }
            lines = [];
            label = trimmed.slice(0, -1).replace(/^"+|"+$/g, "");
        }
        if (label !== undefined) {
            lines.push(line);
        }
    }
    if (label !== undefined) {
        blocks.push({ label, content: lines.join("\n") });
    }
    return blocks;
}

function llvmSymbolName(line: string): string | undefined {
    const at = line.indexOf("@");
    if (at < 0) return undefined;
    const rest = line.slice(at + 1);
    const paren = rest.indexOf("(");
    const name = paren >= 0 ? rest.slice(0, paren) : rest;
    return name.replace(/^"+|"+$/g, "");
}

function isMirHeader(line: string): boolean {
    const trimmed = line.trimStart();
    return trimmed.startsWith("fn ")
        || trimmed.startsWith("const ")
        || trimmed.startsWith("static ")
        || trimmed.startsWith("promoted[");
}

function headerNamesItem(header: string, itemName: string): boolean {
    return new RegExp(`(^|[^A-Za-z0-9_])${escapeRegExp(itemName)}\\s*[(<]`).test(header);
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function selectUniqueMatch(matches: Candidate[], what: string, symbol: NormalizedSymbol): string {
    if (matches.length === 0) {
        const lookedFor = [`def-name \`${symbol.defName}\``, `item name \`${symbol.itemName}\``];
        if (symbol.mangled) {
            lookedFor.push(`mangled \`${symbol.mangled}\``);
        } else if (symbol.mangledPrefix) {
            lookedFor.push(`mangled prefix \`${symbol.mangledPrefix}\``);
        }
        throw new NotFoundError(
            `No ${what} match found for \`${symbol.defName}\` (looked for ${lookedFor.join(", ")})`,
            { defName: symbol.defName }
        );
    }
    if (matches.length > 1) {
        throw new NotFoundError(
            `Multiple ${what} candidates matched \`${symbol.defName}\`: ${matches.map(match => match.header).join(", ")}`,
            { defName: symbol.defName, candidates: matches.map(match => match.header) }
        );
    }
    return matches[0].content;
}

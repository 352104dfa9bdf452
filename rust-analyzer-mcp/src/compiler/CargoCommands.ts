import { z } from "zod";
import type { IFileSystem } from "../platform/FileSystem.js";

export type OptLevel = "0" | "1" | "2" | "3" | "s" | "z";

export const OPT_LEVELS: readonly OptLevel[] = ["0", "1", "2", "3", "s", "z"];

export interface InspectionBuildOptions {
    manifestPath?: string;
    packageName?: string;
    target?: string;
    optLevel?: OptLevel;
    emit?: "llvm-ir" | "asm" | "mir";
    unpretty?: "mir" | "hir-tree" | "thir-tree";
    extraRustcArgs?: string[];
}

/** `cargo rustc --offline [...] -- [rustc flags]` */
export function buildInspectionArgs(options: InspectionBuildOptions): string[] {
    const args = ["rustc", "--offline"];
    if (options.manifestPath) args.push("--manifest-path", options.manifestPath);
    if (options.packageName) args.push("--package", options.packageName);
    if (options.target) args.push("--target", options.target);
    args.push("--");
    if (options.optLevel !== undefined) args.push(`-Copt-level=${options.optLevel}`);
    if (options.emit) args.push(`--emit=${options.emit}`);
    if (options.unpretty) args.push(`-Zunpretty=${options.unpretty}`);
    args.push(...(options.extraRustcArgs ?? []));
    return args;
}

export type DiagnosticCommand = "check" | "clippy";

export function buildDiagnosticArgs(command: DiagnosticCommand, options: { packageName?: string; allTargets?: boolean } = {}): string[] {
    const args = [command, "--message-format=json"];
    if (options.packageName) args.push("--package", options.packageName);
    if (options.allTargets) args.push("--all-targets");
    return args;
}

export function buildMetadataArgs(manifestPath?: string): string[] {
    const args = ["metadata", "--format-version", "1", "--no-deps", "--offline"];
    if (manifestPath) args.push("--manifest-path", manifestPath);
    return args;
}

const SpanSchema = z.object({
    file_name: z.string(),
    byte_start: z.number(),
    byte_end: z.number(),
    line_start: z.number(),
    line_end: z.number(),
    column_start: z.number(),
    column_end: z.number(),
    is_primary: z.boolean(),
    label: z.string().nullish(),
    suggested_replacement: z.string().nullish(),
    suggestion_applicability: z.string().nullish()
});

interface RawDiagnostic {
    message: string;
    code?: { code: string } | null;
    level: string;
    spans: Array<z.infer<typeof SpanSchema>>;
    children: RawDiagnostic[];
    rendered?: string | null;
}

const RawDiagnosticSchema: z.ZodType<RawDiagnostic> = z.lazy(() => z.object({
    message: z.string(),
    code: z.object({ code: z.string() }).nullish(),
    level: z.string(),
    spans: z.array(SpanSchema),
    children: z.array(RawDiagnosticSchema),
    rendered: z.string().nullish()
}));

const CompilerMessageLineSchema = z.object({
    reason: z.literal("compiler-message"),
    package_id: z.string().optional(),
    message: RawDiagnosticSchema
});

export interface CompilerSpan {
    file: string;
    lineStart: number;
    lineEnd: number;
    columnStart: number;
    columnEnd: number;
    byteStart: number;
    byteEnd: number;
    label?: string;
}

export interface CompilerSuggestion {
    file: string;
    byteStart: number;
    byteEnd: number;
    replacement: string;
    applicability: string;
    message: string;
}

export interface CompilerMessage {
    level: string;
    code?: string;
    message: string;
    primarySpan?: CompilerSpan;
    notes: string[];
    rendered?: string;
    suggestions: CompilerSuggestion[];
}

/** Parses `--message-format=json` output; lines that are not compiler messages are skipped. */
export function parseCompilerMessages(stdout: string): CompilerMessage[] {
    const messages: CompilerMessage[] = [];
    for (const line of stdout.split(/\r?\n/)) {
        const trimmed = line.trim();
        if (!trimmed.startsWith("{")) continue;
        let json: unknown;
        try {
            json = JSON.parse(trimmed);
        } catch {
            continue;
        }
        const parsed = CompilerMessageLineSchema.safeParse(json);
        if (!parsed.success) continue;
        messages.push(toCompilerMessage(parsed.data.message));
    }
    return messages;
}

function toCompilerMessage(raw: RawDiagnostic): CompilerMessage {
    const primary = raw.spans.find(span => span.is_primary) ?? raw.spans[0];
    const suggestions: CompilerSuggestion[] = [];
    collectSuggestions(raw, raw.message, suggestions);
    return {
        level: raw.level,
        code: raw.code?.code,
        message: raw.message,
        primarySpan: primary ? {
            file: primary.file_name,
            lineStart: primary.line_start,
            lineEnd: primary.line_end,
            columnStart: primary.column_start,
            columnEnd: primary.column_end,
            byteStart: primary.byte_start,
            byteEnd: primary.byte_end,
            label: primary.label ?? undefined
        } : undefined,
        notes: raw.children.map(child => `${child.level}: ${child.message}`),
        rendered: raw.rendered ?? undefined,
        suggestions
    };
}

function collectSuggestions(raw: RawDiagnostic, context: string, out: CompilerSuggestion[]): void {
    for (const span of raw.spans) {
        if (span.suggested_replacement === undefined || span.suggested_replacement === null) continue;
        out.push({
            file: span.file_name,
            byteStart: span.byte_start,
            byteEnd: span.byte_end,
            replacement: span.suggested_replacement,
            applicability: span.suggestion_applicability ?? "Unspecified",
            message: raw.message === context ? context : `${context}: ${raw.message}`
        });
    }
    for (const child of raw.children) {
        collectSuggestions(child, context, out);
    }
}

export function isMachineApplicable(suggestion: CompilerSuggestion): boolean {
    return suggestion.applicability === "MachineApplicable";
}

/**
 * Applies byte-offset replacements to one file's content. Overlapping
 * suggestions after the first are skipped and returned.
 */
export function applySuggestions(content: string, suggestions: CompilerSuggestion[]): { content: string; applied: CompilerSuggestion[]; skipped: CompilerSuggestion[] } {
    const buffer = Buffer.from(content, "utf-8");
    const ordered = [...suggestions].sort((a, b) => a.byteStart - b.byteStart || a.byteEnd - b.byteEnd);
    const applied: CompilerSuggestion[] = [];
    const skipped: CompilerSuggestion[] = [];
    let lastEnd = -1;
    for (const suggestion of ordered) {
        const valid = suggestion.byteStart >= 0
            && suggestion.byteEnd >= suggestion.byteStart
            && suggestion.byteEnd <= buffer.length;
        if (!valid || suggestion.byteStart < lastEnd) {
            skipped.push(suggestion);
            continue;
        }
        applied.push(suggestion);
        lastEnd = suggestion.byteEnd;
    }

    const parts: Buffer[] = [];
    let cursor = 0;
    for (const suggestion of applied) {
        parts.push(buffer.subarray(cursor, suggestion.byteStart));
        parts.push(Buffer.from(suggestion.replacement, "utf-8"));
        cursor = suggestion.byteEnd;
    }
    parts.push(buffer.subarray(cursor));
    return { content: Buffer.concat(parts).toString("utf-8"), applied, skipped };
}

export type FileSnapshot = Map<string, number>;

export async function snapshotFiles(fileSystem: IFileSystem, directory: string): Promise<FileSnapshot> {
    const snapshot: FileSnapshot = new Map();
    for (const file of await fileSystem.listFiles(directory)) {
        const stats = await fileSystem.stat(file);
        snapshot.set(file, stats.mtime);
    }
    return snapshot;
}

/** Files that are new in `after` or whose modification time moved. */
export function changedFiles(before: FileSnapshot, after: FileSnapshot): string[] {
    const changed: string[] = [];
    for (const [file, mtime] of after) {
        const previous = before.get(file);
        if (previous === undefined || previous !== mtime) {
            changed.push(file);
        }
    }
    return changed.sort();
}

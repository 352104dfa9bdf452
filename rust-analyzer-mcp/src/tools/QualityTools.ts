import * as path from "path";
import { z } from "zod";
import { findCrateRoot } from "../analyzer/SymbolIdentity.js";
import {
    applySuggestions,
    buildDiagnosticArgs,
    isMachineApplicable,
    parseCompilerMessages,
    type CompilerMessage,
    type CompilerSuggestion,
    type DiagnosticCommand
} from "../compiler/CargoCommands.js";
import type { CompilerRunResult } from "../compiler/GuardedCompilerRunner.js";
import { CompilerFailedError } from "../errors/BridgeError.js";
import { explainLifetimeCode, isLifetimeIssue } from "../quality/LifetimeDiagnostics.js";
import type { FileChangeSummary } from "../types.js";
import { displayPath, pathToUri } from "../utils/DocumentUri.js";
import type { QUALITY_TOOLS, ToolGroup } from "./ToolCatalog.js";
import type { ToolContext } from "./ToolContext.js";
import { defineTool } from "./ToolDefinition.js";
import { pluralize } from "./presentation.js";
import { jsonResponse } from "./responses.js";
import { applyArg, filePathArg, workspacePathArg } from "./schemas.js";

const MAX_LISTED_MESSAGES = 100;
const STDERR_TAIL_CHARS = 2_000;

const CargoCheckArgs = z.object({
    workspacePath: workspacePathArg,
    packageName: z.string().min(1).optional().describe("Check a single package (-p)"),
    allTargets: z.boolean().default(false).describe("Include tests, benches and examples")
});

const ClippyArgs = z.object({
    workspacePath: workspacePathArg,
    filePath: filePathArg.optional().describe("Only apply suggestions for this file"),
    apply: applyArg
});

const LifetimeArgs = z.object({
    filePath: filePathArg,
    refresh: z.boolean().default(false).describe("Run cargo check as well instead of relying on cached analyzer diagnostics")
});

export interface MessageSummary {
    level: string;
    code?: string;
    message: string;
    location?: string;
    notes: string[];
}

interface LifetimeIssue {
    source: string;
    severity: string;
    code?: string;
    line: number;
    character: number;
    message: string;
    explanation?: string;
}

/** Trailing "aborting due to ..." and "N warnings emitted" lines carry no location. */
export function isSummaryMessage(message: CompilerMessage): boolean {
    return !message.primarySpan && /^(aborting due to|\d+ warnings? emitted|warning: \d+ warnings?)/.test(message.message);
}

export function summarizeMessage(message: CompilerMessage, cwd: string, rootPath: string): MessageSummary {
    const span = message.primarySpan;
    return {
        level: message.level,
        code: message.code,
        message: message.message,
        location: span
            ? `${displayPath(pathToUri(path.resolve(cwd, span.file)), rootPath)}:${span.lineStart}:${span.columnStart}`
            : undefined,
        notes: message.notes
    };
}

export function createQualityTools(context: ToolContext): ToolGroup<typeof QUALITY_TOOLS> {
    const { analyzer, edits, fileSystem, rootPath } = context;

    const runCargo = async (command: DiagnosticCommand, cwd: string, options: { packageName?: string; allTargets?: boolean } = {}) => {
        const result = await context.runner.run({
            command: context.cargoPath,
            args: buildDiagnosticArgs(command, options),
            cwd
        });
        const messages = parseCompilerMessages(result.stdout).filter(message => !isSummaryMessage(message));
        if (!result.success && messages.length === 0) {
            throw new CompilerFailedError(`cargo ${command} exited with ${result.exitCode ?? result.signal} before reporting diagnostics`, {
                command: result.command,
                stderr: stderrTail(result)
            });
        }
        return { result, messages };
    };

    return {
        run_cargo_check: defineTool(
            "Run `cargo check` and report compiler errors and warnings with locations.",
            CargoCheckArgs,
            async ({ workspacePath, packageName, allTargets }) => {
                const cwd = workspacePath ? analyzer.resolvePath(workspacePath) : rootPath;
                const { result, messages } = await runCargo("check", cwd, { packageName, allTargets });
                const errors = messages.filter(message => message.level === "error").length;
                const warnings = messages.filter(message => message.level === "warning").length;
                return jsonResponse({
                    summary: `${result.success ? "Check passed" : "Check failed"}: ${pluralize(errors, "error")}, ${pluralize(warnings, "warning")}`,
                    success: result.success,
                    exitCode: result.exitCode,
                    elapsedMs: result.elapsedMs,
                    errors,
                    warnings,
                    messages: messages.slice(0, MAX_LISTED_MESSAGES).map(message => summarizeMessage(message, cwd, rootPath)),
                    truncated: messages.length > MAX_LISTED_MESSAGES || result.truncated
                });
            }
        ),

        apply_clippy_suggestions: defineTool(
            "Run `cargo clippy` and apply its machine-applicable suggestions. Previews unless `apply` is set.",
            ClippyArgs,
            async ({ workspacePath, filePath, apply }) => {
                const cwd = workspacePath ? analyzer.resolvePath(workspacePath) : rootPath;
                const onlyFile = filePath ? analyzer.resolvePath(filePath) : undefined;
                const { messages } = await runCargo("clippy", cwd);

                const byFile = new Map<string, CompilerSuggestion[]>();
                const seen = new Set<string>();
                for (const suggestion of messages.flatMap(message => message.suggestions).filter(isMachineApplicable)) {
                    const absolute = path.resolve(cwd, suggestion.file);
                    if (onlyFile && absolute !== onlyFile) continue;
                    const key = `${absolute}:${suggestion.byteStart}:${suggestion.byteEnd}:${suggestion.replacement}`;
                    if (seen.has(key)) continue;
                    seen.add(key);
                    byFile.set(absolute, [...(byFile.get(absolute) ?? []), suggestion]);
                }

                const changes: FileChangeSummary[] = [];
                const warnings: string[] = [];
                const appliedSuggestions: Array<{ filePath: string; message: string }> = [];
                let applied = false;
                for (const [absolute, suggestions] of byFile) {
                    const before = await fileSystem.readFile(absolute);
                    const result = applySuggestions(before, suggestions);
                    const outcome = await edits.replaceFile(absolute, result.content, apply);
                    changes.push(...outcome.changes);
                    applied = applied || outcome.applied;
                    const display = displayPath(pathToUri(absolute), rootPath);
                    appliedSuggestions.push(...result.applied.map(suggestion => ({ filePath: display, message: suggestion.message })));
                    if (result.skipped.length > 0) {
                        warnings.push(`${pluralize(result.skipped.length, "overlapping suggestion")} in ${display} skipped; run again after applying`);
                    }
                }

                const count = appliedSuggestions.length;
                return jsonResponse({
                    summary: count === 0
                        ? "No machine-applicable clippy suggestions"
                        : `${pluralize(count, "suggestion")} in ${pluralize(byFile.size, "file")}${applied ? "" : " (preview; pass apply: true to write)"}`,
                    applied,
                    suggestions: appliedSuggestions,
                    changes,
                    warnings
                });
            }
        ),

        validate_lifetimes: defineTool(
            "Report lifetime and borrow checker problems in a file, from analyzer diagnostics and optionally a fresh `cargo check`.",
            LifetimeArgs,
            async ({ filePath, refresh }) => {
                const document = await analyzer.openDocument(filePath);
                const issues: LifetimeIssue[] = analyzer.getDiagnostics(filePath).entries
                    .filter(entry => isLifetimeIssue(entry.code, entry.message))
                    .map(entry => ({
                        source: entry.source ?? "rust-analyzer",
                        severity: entry.severity,
                        code: entry.code,
                        line: entry.range.start.line + 1,
                        character: entry.range.start.character + 1,
                        message: entry.message,
                        explanation: explainLifetimeCode(entry.code)
                    }));

                if (refresh) {
                    const cwd = await findCrateRoot(fileSystem, document.path) ?? rootPath;
                    const { messages } = await runCargo("check", cwd);
                    for (const message of messages) {
                        const span = message.primarySpan;
                        if (!span || path.resolve(cwd, span.file) !== document.path) continue;
                        if (!isLifetimeIssue(message.code, message.message)) continue;
                        const duplicate = issues.some(issue => issue.line === span.lineStart && issue.code === message.code && issue.message === message.message);
                        if (duplicate) continue;
                        issues.push({
                            source: "cargo check",
                            severity: message.level,
                            code: message.code,
                            line: span.lineStart,
                            character: span.columnStart,
                            message: message.message,
                            explanation: explainLifetimeCode(message.code)
                        });
                    }
                }

                issues.sort((a, b) => a.line - b.line || a.character - b.character);
                return jsonResponse({
                    filePath: displayPath(document.uri, rootPath),
                    summary: issues.length === 0
                        ? "No lifetime or borrow issues found"
                        : `${pluralize(issues.length, "lifetime or borrow issue")} found`,
                    issues
                });
            }
        )
    };
}

function stderrTail(result: CompilerRunResult): string {
    return result.stderr.length > STDERR_TAIL_CHARS ? result.stderr.slice(-STDERR_TAIL_CHARS) : result.stderr;
}

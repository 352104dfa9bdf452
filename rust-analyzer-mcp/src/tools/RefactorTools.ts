import { z } from "zod";
import type { LspCodeAction, LspRange, LspTextEdit, LspWorkspaceEdit } from "../analyzer/protocol.js";
import { findEnclosingSymbol, isInspectableCategory, symbolCategory } from "../analyzer/SymbolIdentity.js";
import { itemSpan, replaceIdentifier, signatureSpan } from "../edits/RustSource.js";
import { endPosition, offsetAt, positionAt } from "../edits/WorkspaceEditApplier.js";
import { InvalidArgumentsError, NotFoundError } from "../errors/BridgeError.js";
import { appendItem, assertIdentifier } from "../generation/RustTemplates.js";
import type { EditOutcome } from "../types.js";
import { pathToUri } from "../utils/DocumentUri.js";
import type { REFACTOR_TOOLS, ToolGroup } from "./ToolCatalog.js";
import type { ToolAnalyzer, ToolContext } from "./ToolContext.js";
import { defineTool } from "./ToolDefinition.js";
import { displayLocation, pluralize } from "./presentation.js";
import { jsonResponse } from "./responses.js";
import { PositionArgs, applyArg, characterArg, filePathArg, lineArg } from "./schemas.js";

/** Name rust-analyzer gives the function it extracts. */
const EXTRACTED_PLACEHOLDER = "fun_name";

const RenameArgs = PositionArgs.extend({
    newName: z.string().min(1).describe("New identifier"),
    apply: applyArg
});

const ExtractFunctionArgs = z.object({
    filePath: filePathArg,
    startLine: lineArg,
    startCharacter: characterArg,
    endLine: lineArg,
    endCharacter: characterArg,
    functionName: z.string().min(1).describe("Name for the extracted function"),
    apply: applyArg
});

const InlineFunctionArgs = PositionArgs.extend({
    allCalls: z.boolean().default(false).describe("Inline every call instead of the one at the position"),
    apply: applyArg
});

const ChangeSignatureArgs = PositionArgs.extend({
    newSignature: z.string().min(1).describe("Replacement signature, e.g. `pub fn parse(input: &str, strict: bool) -> Result<Ast>`"),
    apply: applyArg
});

const FileEditArgs = z.object({
    filePath: filePathArg,
    apply: applyArg
});

const MoveItemsArgs = z.object({
    sourceFile: filePathArg,
    targetFile: filePathArg,
    itemNames: z.array(z.string().min(1)).min(1).describe("Top-level item names as shown in the file outline"),
    apply: applyArg
});

const IMPORT_ACTION_TITLES = [/^organi[sz]e imports/i, /^remove (all )?unused imports/i, /^merge imports/i];

export function createRefactorTools(context: ToolContext): ToolGroup<typeof REFACTOR_TOOLS> {
    const { analyzer, edits, rootPath } = context;

    return {
        rename_symbol: defineTool(
            "Rename the symbol at a position across the workspace. Previews unless `apply` is set.",
            RenameArgs,
            async ({ filePath, line, character, newName, apply }) => {
                await analyzer.openDocument(filePath);
                const edit = await analyzer.rename(filePath, line, character, newName);
                if (!edit) {
                    throw new NotFoundError(`Nothing to rename at ${filePath}:${line + 1}:${character + 1}`, { filePath, line, character });
                }
                const outcome = await edits.apply(edit, apply);
                return editResponse(`Rename to \`${newName}\` touches ${pluralize(outcome.changes.length, "file")}`, outcome);
            }
        ),

        extract_function: defineTool(
            "Extract the selected statements or expression into a new function.",
            ExtractFunctionArgs,
            async ({ filePath, startLine, startCharacter, endLine, endCharacter, functionName, apply }) => {
                assertIdentifier(functionName, "a function");
                await analyzer.openDocument(filePath);
                const range: LspRange = {
                    start: { line: startLine, character: startCharacter },
                    end: { line: endLine, character: endCharacter }
                };
                const action = await pickCodeAction(analyzer, filePath, range, ["refactor.extract"], "Extract into function",
                    actions => actions.find(candidate => /extract into function/i.test(candidate.title)));
                const edit = mapNewText(await resolveEdit(analyzer, action), text => replaceIdentifier(text, EXTRACTED_PLACEHOLDER, functionName));
                const outcome = await edits.apply(edit, apply);
                return editResponse(`Extracted \`${functionName}\``, outcome);
            }
        ),

        inline_function: defineTool(
            "Inline the function call at a position, or every call with `allCalls`.",
            InlineFunctionArgs,
            async ({ filePath, line, character, allCalls, apply }) => {
                await analyzer.openDocument(filePath);
                const position = { line, character };
                const action = await pickCodeAction(analyzer, filePath, { start: position, end: position }, ["refactor.inline"], "Inline",
                    actions => {
                        const inlines = actions.filter(candidate => /^inline/i.test(candidate.title));
                        return inlines.find(candidate => /\ball\b/i.test(candidate.title) === allCalls) ?? inlines[0];
                    });
                const outcome = await edits.apply(await resolveEdit(analyzer, action), apply);
                return editResponse(action.title, outcome);
            }
        ),

        change_signature: defineTool(
            "Replace the signature of the function at a position and list the call sites that may need updating.",
            ChangeSignatureArgs,
            async ({ filePath, line, character, newSignature, apply }) => {
                const document = await analyzer.openDocument(filePath);
                const functions = (await analyzer.documentSymbols(filePath))
                    .filter(symbol => isInspectableCategory(symbolCategory(symbol.kind)));
                const symbol = findEnclosingSymbol(functions, { line, character });
                if (!symbol) {
                    throw new NotFoundError(`No function at ${filePath}:${line + 1}:${character + 1}`, { filePath, line, character });
                }
                const text = document.text;
                const span = signatureSpan(text, offsetAt(text, symbol.selectionRange.start), offsetAt(text, symbol.range.end));
                if (!span) {
                    throw new NotFoundError(`Could not find the signature of \`${symbol.name}\``, { symbol: symbol.path.join("::") });
                }
                const callers = await analyzer.references(filePath, symbol.selectionRange.start.line, symbol.selectionRange.start.character, false);
                const replacement: LspTextEdit = {
                    range: { start: positionAt(text, span.start), end: positionAt(text, span.end) },
                    newText: newSignature.trim()
                };
                const outcome = await edits.apply({ changes: { [document.uri]: [replacement] } }, apply);
                return editResponse(
                    `Signature of \`${symbol.name}\` replaced; ${pluralize(callers.length, "call site")} may need updating`,
                    outcome,
                    {
                        previousSignature: text.slice(span.start, span.end),
                        callSites: callers.map(location => displayLocation(location.uri, location.range.start, rootPath))
                    }
                );
            }
        ),

        organize_imports: defineTool(
            "Sort, merge and prune `use` declarations in a file using the analyzer's import assists.",
            FileEditArgs,
            async ({ filePath, apply }) => {
                const document = await analyzer.openDocument(filePath);
                const range: LspRange = { start: { line: 0, character: 0 }, end: endPosition(document.text) };
                const actions = (await analyzer.codeActions(filePath, range)).filter(action => !action.disabled);
                const action = actions.find(candidate => candidate.kind?.startsWith("source.organizeImports"))
                    ?? IMPORT_ACTION_TITLES.map(pattern => actions.find(candidate => pattern.test(candidate.title))).find(Boolean);
                if (!action) {
                    return editResponse("No import changes suggested", { applied: false, changes: [], warnings: [] });
                }
                const outcome = await edits.apply(await resolveEdit(analyzer, action), apply);
                return editResponse(action.title, outcome);
            }
        ),

        format_code: defineTool(
            "Format a file with rustfmt through the analyzer (4-space indentation).",
            FileEditArgs,
            async ({ filePath, apply }) => {
                const document = await analyzer.openDocument(filePath);
                const textEdits = await analyzer.formatting(filePath, 4, true);
                if (textEdits.length === 0) {
                    return editResponse("Already formatted", { applied: false, changes: [], warnings: [] });
                }
                const outcome = await edits.apply({ changes: { [document.uri]: textEdits } }, apply);
                return editResponse(`Formatted ${outcome.changes[0]?.filePath ?? filePath}`, outcome);
            }
        ),

        move_items: defineTool(
            "Move top-level items (with their doc comments and attributes) from one file to the end of another.",
            MoveItemsArgs,
            async ({ sourceFile, targetFile, itemNames, apply }) => {
                const sourcePath = analyzer.resolvePath(sourceFile);
                const targetPath = analyzer.resolvePath(targetFile);
                if (sourcePath === targetPath) {
                    throw new InvalidArgumentsError("Source and target files are the same", { sourceFile, targetFile });
                }
                const source = await analyzer.openDocument(sourcePath);
                const topLevel = (await analyzer.documentSymbols(sourcePath)).filter(symbol => symbol.path.length === 1);
                const wanted = Array.from(new Set(itemNames));
                const missing = wanted.filter(name => !topLevel.some(symbol => symbol.name === name));
                if (missing.length > 0) {
                    throw new NotFoundError(`Items not found at the top level of ${sourceFile}: ${missing.join(", ")}`, {
                        missing,
                        available: topLevel.map(symbol => symbol.name)
                    });
                }

                const text = source.text;
                const spans = topLevel
                    .filter(symbol => wanted.includes(symbol.name))
                    .map(symbol => itemSpan(text, offsetAt(text, symbol.range.start), offsetAt(text, symbol.range.end)))
                    .sort((a, b) => a.start - b.start)
                    .filter((span, index, all) => index === 0 || span.start >= all[index - 1].end);
                const moved = spans.map(span => text.slice(span.start, span.end).replace(/\s+$/, "")).join("\n\n");

                const targetExists = await context.fileSystem.exists(targetPath);
                const existingTarget = targetExists ? await context.fileSystem.readFile(targetPath) : "";
                const targetUri = pathToUri(targetPath);
                const edit: LspWorkspaceEdit = {
                    documentChanges: [
                        {
                            textDocument: { uri: source.uri, version: null },
                            edits: spans.map(span => ({
                                range: { start: positionAt(text, span.start), end: positionAt(text, span.end) },
                                newText: ""
                            }))
                        },
                        ...(targetExists ? [] : [{ kind: "create" as const, uri: targetUri, options: { ignoreIfExists: true } }]),
                        {
                            textDocument: { uri: targetUri, version: null },
                            edits: [{
                                range: { start: { line: 0, character: 0 }, end: endPosition(existingTarget) },
                                newText: appendItem(existingTarget, `${moved}\n`)
                            }]
                        }
                    ]
                };
                const outcome = await edits.apply(edit, apply);
                outcome.warnings.push("Paths and `use` declarations referring to the moved items are not rewritten; run run_cargo_check afterwards.");
                if (!targetExists) {
                    outcome.warnings.push(`${targetFile} is new; declare it with create_module or a \`mod\` item.`);
                }
                return editResponse(`Moved ${pluralize(spans.length, "item")} to ${targetFile}`, outcome);
            }
        )
    };
}

function editResponse(summary: string, outcome: EditOutcome, extra: Record<string, unknown> = {}) {
    return jsonResponse({
        summary: outcome.applied || outcome.changes.length === 0 ? summary : `${summary} (preview; pass apply: true to write)`,
        ...outcome,
        ...extra
    });
}

async function pickCodeAction(
    analyzer: ToolAnalyzer,
    filePath: string,
    range: LspRange,
    only: string[],
    label: string,
    choose: (actions: LspCodeAction[]) => LspCodeAction | undefined
): Promise<LspCodeAction> {
    const actions = (await analyzer.codeActions(filePath, range, only)).filter(action => !action.disabled);
    const action = choose(actions);
    if (!action) {
        throw new NotFoundError(`rust-analyzer offered no "${label}" action here`, {
            filePath,
            range,
            available: actions.map(candidate => candidate.title)
        });
    }
    return action;
}

async function resolveEdit(analyzer: ToolAnalyzer, action: LspCodeAction): Promise<LspWorkspaceEdit> {
    const resolved = await analyzer.resolveCodeAction(action);
    if (!resolved.edit) {
        throw new NotFoundError(`Code action "${action.title}" produced no edit`, { title: action.title });
    }
    return resolved.edit;
}

export function mapNewText(edit: LspWorkspaceEdit, transform: (text: string) => string): LspWorkspaceEdit {
    const mapEdits = (textEdits: LspTextEdit[]) => textEdits.map(textEdit => ({ ...textEdit, newText: transform(textEdit.newText) }));
    return {
        changes: edit.changes
            ? Object.fromEntries(Object.entries(edit.changes).map(([uri, textEdits]) => [uri, mapEdits(textEdits)]))
            : undefined,
        documentChanges: edit.documentChanges?.map(change => "textDocument" in change
            ? { ...change, edits: mapEdits(change.edits) }
            : change)
    };
}

import type { LspPosition, LspTextEdit, LspWorkspaceEdit } from "../analyzer/protocol.js";
import { InvalidArgumentsError } from "../errors/BridgeError.js";
import type { IFileSystem } from "../platform/FileSystem.js";
import type { EditOutcome, FileChangeSummary } from "../types.js";
import { displayPath, pathToUri, uriToPath } from "../utils/DocumentUri.js";
import { createLogger } from "../utils/StructuredLogger.js";

export interface AppliedFileChange {
    path: string;
    kind: "created" | "changed" | "deleted";
}

export interface WorkspaceEditApplierOptions {
    rootPath: string;
    fileSystem: IFileSystem;
    /** Called once per apply with every file that was touched. */
    onFilesChanged?: (changes: AppliedFileChange[]) => Promise<void>;
}

type EditOperation =
    | { kind: "edit"; path: string; edits: LspTextEdit[] }
    | { kind: "create"; path: string; overwrite: boolean; ignoreIfExists: boolean }
    | { kind: "rename"; from: string; to: string; overwrite: boolean; ignoreIfExists: boolean }
    | { kind: "delete"; path: string; ignoreIfNotExists: boolean };

const MAX_PREVIEW_LINES = 40;

const logger = createLogger("WorkspaceEditApplier");

/** UTF-16 offset of an LSP position; characters past the line end clamp to it. */
export function offsetAt(text: string, position: LspPosition): number {
    let lineStart = 0;
    for (let line = 0; line < position.line; line++) {
        const next = text.indexOf("\n", lineStart);
        if (next < 0) return text.length;
        lineStart = next + 1;
    }
    let lineEnd = text.indexOf("\n", lineStart);
    if (lineEnd < 0) lineEnd = text.length;
    if (lineEnd > lineStart && text[lineEnd - 1] === "\r") lineEnd -= 1;
    return Math.min(lineStart + position.character, lineEnd);
}

export function positionAt(text: string, offset: number): LspPosition {
    const clamped = Math.max(0, Math.min(offset, text.length));
    let line = 0;
    let lineStart = 0;
    for (let index = text.indexOf("\n"); index >= 0 && index < clamped; index = text.indexOf("\n", index + 1)) {
        line++;
        lineStart = index + 1;
    }
    return { line, character: clamped - lineStart };
}

/** Position just past the last character. */
export function endPosition(text: string): LspPosition {
    return positionAt(text, text.length);
}

/**
 * Applies edits whose ranges refer to the original text. Edits at the same
 * position keep their array order.
 */
export function applyTextEdits(text: string, edits: LspTextEdit[]): string {
    const resolved = edits
        .map((edit, index) => ({
            start: offsetAt(text, edit.range.start),
            end: offsetAt(text, edit.range.end),
            newText: edit.newText,
            index
        }))
        .sort((a, b) => a.start - b.start || a.end - b.end || a.index - b.index);

    let result = "";
    let cursor = 0;
    for (const edit of resolved) {
        if (edit.end < edit.start) {
            throw new InvalidArgumentsError("Text edit range ends before it starts", { start: edit.start, end: edit.end });
        }
        if (edit.start < cursor) {
            throw new InvalidArgumentsError("Text edits overlap", { start: edit.start, previousEnd: cursor });
        }
        result += text.slice(cursor, edit.start) + edit.newText;
        cursor = edit.end;
    }
    return result + text.slice(cursor);
}

/** Changed region as `-`/`+` lines, with common leading and trailing lines dropped. */
export function previewChange(before: string, after: string): string {
    const oldLines = before.split("\n");
    const newLines = after.split("\n");
    let prefix = 0;
    while (prefix < oldLines.length && prefix < newLines.length && oldLines[prefix] === newLines[prefix]) {
        prefix++;
    }
    let suffix = 0;
    while (
        suffix < oldLines.length - prefix
        && suffix < newLines.length - prefix
        && oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
    ) {
        suffix++;
    }
    const removed = oldLines.slice(prefix, oldLines.length - suffix).map(line => `-${line}`);
    const added = newLines.slice(prefix, newLines.length - suffix).map(line => `+${line}`);
    const lines = [`@@ line ${prefix + 1} @@`, ...removed, ...added];
    if (lines.length > MAX_PREVIEW_LINES) {
        return [...lines.slice(0, MAX_PREVIEW_LINES), `... ${lines.length - MAX_PREVIEW_LINES} more lines`].join("\n");
    }
    return lines.join("\n");
}

/**
 * Previews or writes an LSP WorkspaceEdit. Nothing is written unless `apply`
 * is set; written files are reported through `onFilesChanged` so the analyzer
 * sees the new content.
 */
export class WorkspaceEditApplier {
    constructor(private readonly options: WorkspaceEditApplierOptions) {}

    public async apply(edit: LspWorkspaceEdit, apply: boolean): Promise<EditOutcome> {
        const operations = collectOperations(edit);
        const changes: FileChangeSummary[] = [];
        const warnings: string[] = [];
        const touched: AppliedFileChange[] = [];
        // Content as of the previous operation; previews never touch the disk.
        const overlay = new Map<string, string | null>();
        const read = async (filePath: string): Promise<string> => {
            const pending = overlay.get(filePath);
            if (pending !== undefined && pending !== null) return pending;
            return this.options.fileSystem.readFile(filePath);
        };
        const exists = async (filePath: string): Promise<boolean> => {
            const pending = overlay.get(filePath);
            if (pending !== undefined) return pending !== null;
            return this.options.fileSystem.exists(filePath);
        };

        for (const operation of operations) {
            switch (operation.kind) {
                case "edit": {
                    const before = await read(operation.path);
                    const after = applyTextEdits(before, operation.edits);
                    overlay.set(operation.path, after);
                    changes.push({
                        filePath: this.display(operation.path),
                        kind: "edit",
                        editCount: operation.edits.length,
                        preview: before === after ? undefined : previewChange(before, after)
                    });
                    if (apply && before !== after) {
                        await this.options.fileSystem.writeFile(operation.path, after);
                        touched.push({ path: operation.path, kind: "changed" });
                    }
                    break;
                }
                case "create": {
                    if (await exists(operation.path) && !operation.overwrite) {
                        if (!operation.ignoreIfExists) {
                            warnings.push(`${this.display(operation.path)} already exists; create skipped`);
                        }
                        break;
                    }
                    changes.push({ filePath: this.display(operation.path), kind: "create", editCount: 0 });
                    overlay.set(operation.path, "");
                    if (apply) {
                        await this.options.fileSystem.writeFile(operation.path, "");
                        touched.push({ path: operation.path, kind: "created" });
                    }
                    break;
                }
                case "rename": {
                    if (await exists(operation.to) && !operation.overwrite) {
                        if (!operation.ignoreIfExists) {
                            warnings.push(`${this.display(operation.to)} already exists; rename skipped`);
                        }
                        break;
                    }
                    changes.push({
                        filePath: this.display(operation.from),
                        kind: "rename",
                        editCount: 0,
                        newPath: this.display(operation.to)
                    });
                    overlay.set(operation.to, await read(operation.from));
                    overlay.set(operation.from, null);
                    if (apply) {
                        await this.options.fileSystem.rename(operation.from, operation.to);
                        touched.push({ path: operation.from, kind: "deleted" }, { path: operation.to, kind: "created" });
                    }
                    break;
                }
                case "delete": {
                    if (!await exists(operation.path)) {
                        if (!operation.ignoreIfNotExists) {
                            warnings.push(`${this.display(operation.path)} does not exist; delete skipped`);
                        }
                        break;
                    }
                    changes.push({ filePath: this.display(operation.path), kind: "delete", editCount: 0 });
                    overlay.set(operation.path, null);
                    if (apply) {
                        await this.options.fileSystem.deleteFile(operation.path);
                        touched.push({ path: operation.path, kind: "deleted" });
                    }
                    break;
                }
            }
        }

        if (touched.length > 0 && this.options.onFilesChanged) {
            logger.debug("workspace edit written", { files: touched.length });
            await this.options.onFilesChanged(touched);
        }
        return { applied: apply && touched.length > 0, changes, warnings };
    }

    /** Writes a whole-file replacement through the same reporting path. */
    public async replaceFile(filePath: string, content: string, apply: boolean): Promise<EditOutcome> {
        const exists = await this.options.fileSystem.exists(filePath);
        const before = exists ? await this.options.fileSystem.readFile(filePath) : "";
        const change: FileChangeSummary = {
            filePath: this.display(filePath),
            kind: exists ? "edit" : "create",
            editCount: before === content ? 0 : 1,
            preview: before === content ? undefined : previewChange(before, content)
        };
        if (!apply || before === content) {
            return { applied: false, changes: [change], warnings: [] };
        }
        await this.options.fileSystem.writeFile(filePath, content);
        if (this.options.onFilesChanged) {
            await this.options.onFilesChanged([{ path: filePath, kind: exists ? "changed" : "created" }]);
        }
        return { applied: true, changes: [change], warnings: [] };
    }

    private display(filePath: string): string {
        return displayPath(pathToUri(filePath), this.options.rootPath);
    }
}

function collectOperations(edit: LspWorkspaceEdit): EditOperation[] {
    const operations: EditOperation[] = [];
    if (edit.documentChanges) {
        for (const change of edit.documentChanges) {
            if ("textDocument" in change) {
                operations.push({ kind: "edit", path: uriToPath(change.textDocument.uri), edits: change.edits });
            } else if (change.kind === "create") {
                operations.push({
                    kind: "create",
                    path: uriToPath(change.uri),
                    overwrite: change.options?.overwrite ?? false,
                    ignoreIfExists: change.options?.ignoreIfExists ?? false
                });
            } else if (change.kind === "rename") {
                operations.push({
                    kind: "rename",
                    from: uriToPath(change.oldUri),
                    to: uriToPath(change.newUri),
                    overwrite: change.options?.overwrite ?? false,
                    ignoreIfExists: change.options?.ignoreIfExists ?? false
                });
            } else {
                operations.push({
                    kind: "delete",
                    path: uriToPath(change.uri),
                    ignoreIfNotExists: change.options?.ignoreIfNotExists ?? false
                });
            }
        }
        return operations;
    }
    for (const [uri, edits] of Object.entries(edit.changes ?? {})) {
        operations.push({ kind: "edit", path: uriToPath(uri), edits });
    }
    return operations;
}

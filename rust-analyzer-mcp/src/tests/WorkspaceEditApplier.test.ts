import { describe, expect, it } from "@jest/globals";
import {
    WorkspaceEditApplier,
    applyTextEdits,
    endPosition,
    offsetAt,
    positionAt,
    previewChange,
    type AppliedFileChange
} from "../edits/WorkspaceEditApplier.js";
import { pathToUri } from "../utils/DocumentUri.js";
import { MemoryFileSystem } from "./fixtures/MemoryFileSystem.js";

const ROOT = "/tmp/edit-ws";
const LIB = "fn old_name() {}\nfn main() { old_name(); }\n";

function range(startLine: number, startCharacter: number, endLine: number, endCharacter: number) {
    return { start: { line: startLine, character: startCharacter }, end: { line: endLine, character: endCharacter } };
}

function createApplier(files: Record<string, string> = { "src/lib.rs": LIB }) {
    const fileSystem = new MemoryFileSystem(ROOT, files);
    const notified: AppliedFileChange[][] = [];
    const applier = new WorkspaceEditApplier({
        rootPath: ROOT,
        fileSystem,
        onFilesChanged: async changes => {
            notified.push(changes);
        }
    });
    return { applier, fileSystem, notified };
}

describe("WorkspaceEditApplier", () => {
    describe("positions", () => {
        it("converts between positions and offsets", () => {
            const text = "ab\r\ncd\nef";

            expect(offsetAt(text, { line: 0, character: 10 })).toBe(2);
            expect(offsetAt(text, { line: 2, character: 1 })).toBe(8);
            expect(offsetAt(text, { line: 5, character: 0 })).toBe(9);
            expect(positionAt(text, 8)).toEqual({ line: 2, character: 1 });
            expect(endPosition("a\nbc")).toEqual({ line: 1, character: 2 });
            expect(endPosition("a\n")).toEqual({ line: 1, character: 0 });
        });
    });

    describe("applyTextEdits", () => {
        it("applies edits against the original text, keeping order at equal positions", () => {
            const result = applyTextEdits("one\ntwo\n", [
                { range: range(1, 0, 1, 3), newText: "TWO" },
                { range: range(0, 0, 0, 0), newText: "A" },
                { range: range(0, 0, 0, 0), newText: "B" }
            ]);

            expect(result).toBe("ABone\nTWO\n");
        });

        it("rejects overlapping edits", () => {
            expect(() => applyTextEdits("abcdef", [
                { range: range(0, 0, 0, 3), newText: "x" },
                { range: range(0, 2, 0, 3), newText: "y" }
            ])).toThrow("Text edits overlap");
        });
    });

    it("previews only the changed lines", () => {
        expect(previewChange("a\nb\nc", "a\nB\nc")).toBe("@@ line 2 @@\n-b\n+B");
    });

    describe("apply", () => {
        const renameEdit = {
            changes: {
                [pathToUri(`${ROOT}/src/lib.rs`)]: [
                    { range: range(0, 3, 0, 11), newText: "new_name" },
                    { range: range(1, 12, 1, 20), newText: "new_name" }
                ]
            }
        };

        it("previews without writing", async () => {
            const { applier, fileSystem, notified } = createApplier();

            const outcome = await applier.apply(renameEdit, false);

            expect(outcome).toEqual({
                applied: false,
                warnings: [],
                changes: [{
                    filePath: "src/lib.rs",
                    kind: "edit",
                    editCount: 2,
                    preview: "@@ line 1 @@\n-fn old_name() {}\n-fn main() { old_name(); }\n+fn new_name() {}\n+fn main() { new_name(); }"
                }]
            });
            expect(fileSystem.get("src/lib.rs")).toBe(LIB);
            expect(notified).toEqual([]);
        });

        it("writes and reports the files it changed", async () => {
            const { applier, fileSystem, notified } = createApplier();

            const outcome = await applier.apply(renameEdit, true);

            expect(outcome.applied).toBe(true);
            expect(fileSystem.get("src/lib.rs")).toBe("fn new_name() {}\nfn main() { new_name(); }\n");
            expect(notified).toEqual([[{ path: `${ROOT}/src/lib.rs`, kind: "changed" }]]);
        });

        it("runs resource operations in order and edits files created earlier in the same edit", async () => {
            const { applier, fileSystem, notified } = createApplier({ "src/lib.rs": LIB, "src/old.rs": "// old\n" });
            const utilUri = pathToUri(`${ROOT}/src/util.rs`);

            const outcome = await applier.apply({
                documentChanges: [
                    { kind: "create", uri: utilUri },
                    { textDocument: { uri: utilUri, version: null }, edits: [{ range: range(0, 0, 0, 0), newText: "pub fn helper() {}\n" }] },
                    { kind: "rename", oldUri: pathToUri(`${ROOT}/src/old.rs`), newUri: pathToUri(`${ROOT}/src/new.rs`) },
                    { kind: "delete", uri: pathToUri(`${ROOT}/src/gone.rs`) }
                ]
            }, true);

            expect(outcome.changes).toEqual([
                { filePath: "src/util.rs", kind: "create", editCount: 0 },
                { filePath: "src/util.rs", kind: "edit", editCount: 1, preview: "@@ line 1 @@\n+pub fn helper() {}" },
                { filePath: "src/old.rs", kind: "rename", editCount: 0, newPath: "src/new.rs" }
            ]);
            expect(outcome.warnings).toEqual(["src/gone.rs does not exist; delete skipped"]);
            expect(fileSystem.get("src/util.rs")).toBe("pub fn helper() {}\n");
            expect(fileSystem.get("src/new.rs")).toBe("// old\n");
            expect(fileSystem.get("src/old.rs")).toBeUndefined();
            expect(notified[0].map(change => change.kind)).toEqual(["created", "changed", "deleted", "created"]);
        });

        it("skips creating a file that already exists", async () => {
            const { applier, fileSystem } = createApplier();

            const outcome = await applier.apply({ documentChanges: [{ kind: "create", uri: pathToUri(`${ROOT}/src/lib.rs`) }] }, true);

            expect(outcome).toEqual({ applied: false, changes: [], warnings: ["src/lib.rs already exists; create skipped"] });
            expect(fileSystem.get("src/lib.rs")).toBe(LIB);
        });
    });

    describe("replaceFile", () => {
        it("creates a new file when applied", async () => {
            const { applier, fileSystem, notified } = createApplier();

            const outcome = await applier.replaceFile(`${ROOT}/src/gen.rs`, "pub fn generated() {}\n", true);

            expect(outcome).toEqual({
                applied: true,
                warnings: [],
                changes: [{ filePath: "src/gen.rs", kind: "create", editCount: 1, preview: "@@ line 1 @@\n+pub fn generated() {}" }]
            });
            expect(fileSystem.get("src/gen.rs")).toBe("pub fn generated() {}\n");
            expect(notified).toEqual([[{ path: `${ROOT}/src/gen.rs`, kind: "created" }]]);
        });

        it("does nothing when the content is unchanged", async () => {
            const { applier, notified } = createApplier();

            const outcome = await applier.replaceFile(`${ROOT}/src/lib.rs`, LIB, true);

            expect(outcome.applied).toBe(false);
            expect(outcome.changes).toEqual([{ filePath: "src/lib.rs", kind: "edit", editCount: 0 }]);
            expect(notified).toEqual([]);
        });
    });
});

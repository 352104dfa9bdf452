import { afterEach, describe, expect, it } from "@jest/globals";
import { AnalyzerClient } from "../analyzer/AnalyzerClient.js";
import { AnalyzerError, AnalyzerUnavailableError, DocumentNotOpenError } from "../errors/BridgeError.js";
import {
    FakeRpcError,
    createFakeSpawn,
    type FakeAnalyzer,
    type FakeSpawnOptions,
    type ReceivedMessage
} from "./fixtures/FakeAnalyzer.js";
import { MemoryFileSystem } from "./fixtures/MemoryFileSystem.js";

const ROOT = "/tmp/ra-workspace";
const LIB_URI = "file:///tmp/ra-workspace/src/lib.rs";
const RANGE = { start: { line: 2, character: 7 }, end: { line: 2, character: 12 } };

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/** Method name, followed by the file name of the document it targets. */
function describeMessage(message: ReceivedMessage): string {
    const params = message.params;
    const textDocument = typeof params === "object" && params !== null && "textDocument" in params ? params.textDocument : undefined;
    const uri = typeof textDocument === "object" && textDocument !== null && "uri" in textDocument ? textDocument.uri : undefined;
    return typeof uri === "string" ? `${message.method} ${uri.slice(uri.lastIndexOf("/") + 1)}` : message.method;
}

describe("AnalyzerClient", () => {
    const clients: AnalyzerClient[] = [];

    const createClient = (fakeOptions: FakeSpawnOptions = {}) => {
        const fake = createFakeSpawn(fakeOptions);
        const fileSystem = new MemoryFileSystem(ROOT, {
            "Cargo.toml": "[package]\nname = \"demo\"\n",
            "src/lib.rs": "pub fn add(a: i32, b: i32) -> i32 {\n    a + b\n}\n"
        });
        const client = new AnalyzerClient({
            rootPath: ROOT,
            analyzer: {
                executablePath: "rust-analyzer",
                args: [],
                requestTimeoutMs: 1_000,
                shutdownGraceMs: 50,
                maxRestarts: 2
            },
            spawn: fake.spawn,
            fileSystem
        });
        clients.push(client);
        return { client, fake, fileSystem };
    };

    const exitOf = (analyzer: FakeAnalyzer) => new Promise<void>(resolve => analyzer.once("exit", () => resolve()));

    afterEach(async () => {
        await Promise.all(clients.splice(0).map(client => client.shutdown()));
    });

    it("performs the handshake before opening the first document", async () => {
        const { client, fake } = createClient();

        const document = await client.openDocument("src/lib.rs");
        const analyzer = fake.processes[0];
        const didOpen = await analyzer.waitFor("textDocument/didOpen");

        expect(analyzer.methods()).toEqual(["initialize", "initialized", "textDocument/didOpen"]);
        expect(didOpen.params).toEqual({
            textDocument: {
                uri: LIB_URI,
                languageId: "rust",
                version: 1,
                text: "pub fn add(a: i32, b: i32) -> i32 {\n    a + b\n}\n"
            }
        });
        expect(document).toMatchObject({ uri: LIB_URI, version: 1, state: "synced" });
        expect(client.serverInfo).toEqual({ name: "rust-analyzer", version: "test" });
        expect(client.isRunning).toBe(true);
    });

    it("rejects position requests for documents that are not open without contacting the analyzer", async () => {
        const { client, fake } = createClient();

        const failure = client.definition("src/lib.rs", 0, 7);

        await expect(failure).rejects.toBeInstanceOf(DocumentNotOpenError);
        await expect(failure).rejects.toThrow(`Document is not open: ${LIB_URI}`);
        expect(fake.processes).toHaveLength(0);
    });

    it("pushes on-disk changes before the request that depends on them", async () => {
        const { client, fake, fileSystem } = createClient({
            configure: analyzer => {
                analyzer.handleRequest("textDocument/definition", () => [{
                    targetUri: LIB_URI,
                    targetRange: { start: { line: 2, character: 0 }, end: { line: 4, character: 1 } },
                    targetSelectionRange: RANGE
                }]);
            }
        });
        await client.openDocument("src/lib.rs");
        fileSystem.set("src/lib.rs", "// edited\npub fn add(a: i32, b: i32) -> i32 {\n    a + b\n}\n");

        const locations = await client.definition("src/lib.rs", 1, 7);
        const analyzer = fake.processes[0];
        const didChange = await analyzer.waitFor("textDocument/didChange");

        expect(locations).toEqual([{ uri: LIB_URI, range: RANGE }]);
        expect(analyzer.methods().slice(-2)).toEqual(["textDocument/didChange", "textDocument/definition"]);
        expect(didChange.params).toEqual({
            textDocument: { uri: LIB_URI, version: 2 },
            contentChanges: [{ text: "// edited\npub fn add(a: i32, b: i32) -> i32 {\n    a + b\n}\n" }]
        });
        expect(client.workspace.get(LIB_URI)).toMatchObject({ version: 2, state: "synced" });
    });

    it("caches published diagnostics per document", async () => {
        const { client, fake } = createClient({
            configure: analyzer => {
                analyzer.handleRequest("workspace/symbol", () => []);
            }
        });
        await client.openDocument("src/lib.rs");

        await fake.processes[0].notify("textDocument/publishDiagnostics", {
            uri: LIB_URI,
            version: 1,
            diagnostics: [{ range: RANGE, severity: 1, code: "E0308", source: "rustc", message: "mismatched types" }]
        });
        await client.workspaceSymbols("add");

        const snapshot = client.getDiagnostics("src/lib.rs");
        expect(snapshot.version).toBe(1);
        expect(snapshot.entries).toEqual([
            { severity: "error", range: RANGE, message: "mismatched types", code: "E0308", source: "rustc" }
        ]);
    });

    it("answers configuration requests and declines workspace/applyEdit", async () => {
        const { client, fake } = createClient();
        await client.openDocument("src/lib.rs");
        const analyzer = fake.processes[0];

        const configuration = await analyzer.request("workspace/configuration", { items: [{ section: "rust-analyzer" }, {}] });
        const applyEdit = await analyzer.request("workspace/applyEdit", { edit: { changes: {} } });

        expect(configuration.result).toEqual([{}, {}]);
        expect(applyEdit.result).toEqual({ applied: false, failureReason: "edits are applied by the tool layer" });
    });

    it("restarts a crashed analyzer and replays the open documents", async () => {
        const { client, fake } = createClient({
            configure: analyzer => {
                analyzer.handleRequest("workspace/symbol", () => []);
                analyzer.handleRequest("textDocument/hover", () => ({ contents: { kind: "markdown", value: "pub fn add(a: i32, b: i32) -> i32" } }));
            }
        });
        await client.openDocument("src/lib.rs");
        const first = fake.processes[0];
        await first.notify("textDocument/publishDiagnostics", {
            uri: LIB_URI,
            diagnostics: [{ range: RANGE, severity: 2, message: "unused variable" }]
        });
        await client.workspaceSymbols("add");
        expect(client.getDiagnostics("src/lib.rs").entries).toHaveLength(1);

        const exited = exitOf(first);
        first.crash();
        await exited;

        const hover = await client.hover("src/lib.rs", 0, 7);
        const second = fake.processes[1];
        const replayed = await second.waitFor("textDocument/didOpen");

        expect(hover).toBe("pub fn add(a: i32, b: i32) -> i32");
        expect(second.methods()).toEqual(["initialize", "initialized", "textDocument/didOpen", "textDocument/hover"]);
        expect(replayed.params).toMatchObject({ textDocument: { uri: LIB_URI, version: 1 } });
        expect(client.getDiagnostics("src/lib.rs").entries).toEqual([]);
        expect(client.stats()).toMatchObject({ generation: 2, restarts: 1, openDocuments: 1 });
    });

    it("holds concurrent requests until the restarted analyzer is initialized and replayed", async () => {
        const { client, fake, fileSystem } = createClient({
            configure: (analyzer, index) => {
                analyzer.handleRequest("textDocument/hover", () => ({ contents: "fn" }));
                if (index === 1) {
                    analyzer.handleRequest("initialize", async () => {
                        await delay(100);
                        return { capabilities: {}, serverInfo: { name: "rust-analyzer", version: "test" } };
                    });
                }
            }
        });
        fileSystem.set("src/main.rs", "fn main() {}\n");
        await client.openDocument("src/lib.rs");
        await client.openDocument("src/main.rs");
        const first = fake.processes[0];
        const exited = exitOf(first);
        first.crash();
        await exited;

        const libHover = client.hover("src/lib.rs", 0, 7);
        await delay(20);
        const mainHover = client.hover("src/main.rs", 0, 3);

        await expect(Promise.all([libHover, mainHover])).resolves.toEqual(["fn", "fn"]);
        const seen = fake.processes[1].received.map(describeMessage);
        expect(seen.slice(0, 4)).toEqual([
            "initialize",
            "initialized",
            "textDocument/didOpen lib.rs",
            "textDocument/didOpen main.rs"
        ]);
        expect(seen.slice(4).sort()).toEqual(["textDocument/hover lib.rs", "textDocument/hover main.rs"]);
    });

    it("fails every pending request when the analyzer exits", async () => {
        const { client, fake } = createClient({
            configure: analyzer => {
                const hang = () => new Promise<never>(() => undefined);
                analyzer.handleRequest("textDocument/hover", hang);
                analyzer.handleRequest("textDocument/definition", hang);
                analyzer.handleRequest("textDocument/references", hang);
            }
        });
        await client.openDocument("src/lib.rs");
        const analyzer = fake.processes[0];

        const pending = [
            client.hover("src/lib.rs", 0, 7),
            client.definition("src/lib.rs", 0, 7),
            client.references("src/lib.rs", 0, 7)
        ];
        const settled = Promise.allSettled(pending);
        await analyzer.waitFor("textDocument/references");
        analyzer.crash();
        const outcomes = await settled;

        expect(outcomes).toHaveLength(3);
        for (const outcome of outcomes) {
            expect(outcome.status).toBe("rejected");
            if (outcome.status === "rejected") {
                expect(outcome.reason).toBeInstanceOf(AnalyzerUnavailableError);
                expect(outcome.reason).toMatchObject({ message: expect.stringMatching(/^rust-analyzer is unavailable: analyzer /) });
            }
        }
    });

    it("closes a definition target it opened itself once its outline is read", async () => {
        const UTIL_URI = "file:///tmp/ra-workspace/src/util.rs";
        const { client, fake, fileSystem } = createClient({
            configure: analyzer => {
                analyzer.handleRequest("textDocument/definition", () => [{ uri: UTIL_URI, range: RANGE }]);
                analyzer.handleRequest("textDocument/documentSymbol", () => [{
                    name: "helper",
                    kind: 12,
                    range: { start: { line: 2, character: 0 }, end: { line: 4, character: 1 } },
                    selectionRange: RANGE
                }]);
            }
        });
        fileSystem.set("src/util.rs", "\n\npub fn helper() {\n}\n");
        await client.openDocument("src/lib.rs");

        const details = await client.definitionDetails("src/lib.rs", 1, 4);
        const analyzer = fake.processes[0];

        expect(details?.symbolPath).toEqual(["helper"]);
        expect(client.isDocumentOpen("src/util.rs")).toBe(false);
        expect(client.isDocumentOpen("src/lib.rs")).toBe(true);
        expect(client.workspace.size).toBe(1);
        expect(analyzer.received.map(describeMessage).slice(-3)).toEqual([
            "textDocument/didOpen util.rs",
            "textDocument/documentSymbol util.rs",
            "textDocument/didClose util.rs"
        ]);
    });

    it("closes documents once", async () => {
        const { client, fake } = createClient();
        await client.openDocument("src/lib.rs");

        await expect(client.closeDocument("src/lib.rs")).resolves.toBe(true);
        await expect(client.closeDocument("src/lib.rs")).resolves.toBe(false);
        const didClose = await fake.processes[0].waitFor("textDocument/didClose");

        expect(didClose.params).toEqual({ textDocument: { uri: LIB_URI } });
        expect(client.isDocumentOpen("src/lib.rs")).toBe(false);
    });

    it("forwards watched file changes with LSP change types", async () => {
        const { client, fake } = createClient();
        await client.openDocument("src/lib.rs");

        await client.notifyWatchedFilesChanged([
            { uri: "file:///tmp/ra-workspace/src/util.rs", kind: "created" },
            { uri: "file:///tmp/ra-workspace/Cargo.toml", kind: "changed" },
            { uri: "file:///tmp/ra-workspace/src/old.rs", kind: "deleted" }
        ]);
        const notice = await fake.processes[0].waitFor("workspace/didChangeWatchedFiles");

        expect(notice.params).toEqual({
            changes: [
                { uri: "file:///tmp/ra-workspace/src/util.rs", type: 1 },
                { uri: "file:///tmp/ra-workspace/Cargo.toml", type: 2 },
                { uri: "file:///tmp/ra-workspace/src/old.rs", type: 3 }
            ]
        });
    });

    it("kills the analyzer when initialize fails", async () => {
        const { client, fake } = createClient({
            configure: analyzer => {
                analyzer.handleRequest("initialize", () => {
                    throw new FakeRpcError(-32603, "workspace loading failed");
                });
            }
        });

        const failure = client.openDocument("src/lib.rs");

        await expect(failure).rejects.toBeInstanceOf(AnalyzerError);
        await expect(failure).rejects.toThrow("workspace loading failed");
        expect(fake.processes[0].signals).toEqual(["SIGKILL"]);
    });

    it("starts a fresh analyzer after a failed handshake instead of reusing the killed one", async () => {
        const { client, fake } = createClient({
            configure: (analyzer, index) => {
                if (index === 0) {
                    analyzer.handleRequest("initialize", () => {
                        throw new FakeRpcError(-32603, "workspace loading failed");
                    });
                }
            }
        });

        await expect(client.openDocument("src/lib.rs")).rejects.toThrow("workspace loading failed");
        const document = await client.openDocument("src/lib.rs");

        expect(fake.processes).toHaveLength(2);
        expect(fake.processes[1].methods()).toEqual(["initialize", "initialized", "textDocument/didOpen"]);
        expect(document).toMatchObject({ uri: LIB_URI, state: "synced" });
        expect(client.stats()).toMatchObject({ generation: 2 });
    });

    it("sends shutdown and exit, then refuses further work", async () => {
        const { client, fake } = createClient();
        await client.openDocument("src/lib.rs");
        const analyzer = fake.processes[0];

        await client.shutdown();
        await analyzer.waitFor("exit");

        expect(analyzer.methods().slice(-2)).toEqual(["shutdown", "exit"]);
        expect(analyzer.hasExited).toBe(true);
        expect(analyzer.signals).toEqual([]);
        await expect(client.openDocument("src/lib.rs")).rejects.toBeInstanceOf(AnalyzerUnavailableError);
    });
});

import { describe, expect, it } from "@jest/globals";
import { McpError } from "@modelcontextprotocol/sdk/types.js";
import { TOOL_NAMES } from "../tools/ToolCatalog.js";
import { createToolHarness, payloadOf } from "./fixtures/ToolHarness.js";

const LIB = "pub fn add(a: i32, b: i32) -> i32 {\n    a + b\n}\n";

describe("ToolDispatcher", () => {
    it("lists every tool with an object schema", () => {
        const { dispatcher } = createToolHarness();

        const tools = dispatcher.listTools();

        expect(tools.map(tool => tool.name)).toEqual([...TOOL_NAMES]);
        expect(tools.every(tool => tool.inputSchema.type === "object")).toBe(true);
        expect(tools.find(tool => tool.name === "find_definition")?.inputSchema.required)
            .toEqual(["filePath", "line", "character"]);
    });

    it("raises a protocol error for unknown tools", async () => {
        const { call } = createToolHarness();

        await expect(call("expand_macro", {})).rejects.toBeInstanceOf(McpError);
    });

    it("returns invalid arguments as an error payload", async () => {
        const { call } = createToolHarness({ files: { "src/lib.rs": LIB } });

        const response = await call("find_definition", { filePath: "src/lib.rs", line: -1, character: 0 });

        expect(response.isError).toBe(true);
        expect(payloadOf(response)).toMatchObject({
            errorCode: "InvalidArguments",
            message: "Invalid arguments: line: Number must be greater than or equal to 0"
        });
    });

    it("adds a hint and follow-up tools to bridge errors", async () => {
        const { call } = createToolHarness({ files: { "src/lib.rs": LIB } });

        const response = await call("find_definition", { filePath: "src/lib.rs", line: 0, character: 7 });

        expect(response.isError).toBe(true);
        expect(payloadOf(response)).toEqual({
            errorCode: "NotFound",
            message: "No definition found at src/lib.rs:1:8",
            details: {
                filePath: "src/lib.rs",
                line: 0,
                character: 7,
                nextActionHint: "Nothing matched. Check the position (0-based line and character) or search by name.",
                toolSuggestions: [{
                    toolName: "workspace_symbols",
                    rationale: "Finds the symbol by name across the workspace.",
                    priority: "high"
                }]
            }
        });
    });

    it("reports unexpected failures as internal errors", async () => {
        const { call } = createToolHarness({
            analyzer: {
                workspaceSymbols: async () => {
                    throw new Error("index corrupted");
                }
            }
        });

        const response = await call("workspace_symbols", { query: "add" });

        expect(response.isError).toBe(true);
        expect(payloadOf(response)).toEqual({ errorCode: "InternalError", message: "index corrupted" });
    });
});

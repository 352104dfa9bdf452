import { z } from "zod";
import type { InspectionViewName } from "../inspection/InspectionContext.js";
import type { InspectionRequest } from "../inspection/InspectionService.js";
import type { INSPECTION_TOOLS, ToolGroup } from "./ToolCatalog.js";
import type { ToolContext } from "./ToolContext.js";
import { defineTool, type ToolDefinition } from "./ToolDefinition.js";
import { jsonResponse } from "./responses.js";
import { characterArg, filePathArg, gatingModeArg, lineArg, optLevelArg } from "./schemas.js";

const CapabilitiesArgs = z.object({
    gatingMode: gatingModeArg
});

const symbolNameArg = z.string().min(1).optional()
    .describe("Item name or outline path (e.g. `Parser::parse`); used instead of the position when line/character are omitted");

const InspectArgs = z.object({
    view: z.string().min(1).describe("One of def, types, llvm-ir, asm, mir"),
    filePath: filePathArg,
    line: lineArg,
    character: characterArg,
    symbolName: symbolNameArg,
    optLevel: optLevelArg,
    target: z.string().min(1).optional().describe("Target triple for asm/llvm-ir builds"),
    gatingMode: gatingModeArg
});

const ViewArgs = z.object({
    filePath: filePathArg,
    line: lineArg.optional(),
    character: characterArg.optional(),
    symbolName: symbolNameArg,
    optLevel: optLevelArg,
    gatingMode: gatingModeArg
});

const AsmArgs = ViewArgs.extend({
    target: z.string().min(1).optional().describe("Target triple; defaults to the host")
});

export function createInspectionTools(context: ToolContext): ToolGroup<typeof INSPECTION_TOOLS> {
    const { inspection, inspectionContext } = context;

    const inspectView = (view: InspectionViewName, description: string, schema: typeof ViewArgs | typeof AsmArgs): ToolDefinition =>
        defineTool(description, schema, async args => {
            const request: InspectionRequest = { ...args, view };
            return jsonResponse(await inspection.inspect(request));
        });

    return {
        capabilities: defineTool(
            "Detected toolchain channel, the inspection views available under the gating mode, output limits and provenance.",
            CapabilitiesArgs,
            async ({ gatingMode }) => jsonResponse(await inspectionContext.capabilities(gatingMode))
        ),

        inspect: defineTool(
            "Inspect the symbol at a position: `def` and `types` come from the analyzer; `llvm-ir`, `asm` and `mir` come from an isolated `cargo rustc` build. Output is truncated to the configured limits.",
            InspectArgs,
            async args => jsonResponse(await inspection.inspect(args))
        ),

        inspect_mir: inspectView("mir", "MIR of a function or method (nightly toolchains only).", ViewArgs),

        inspect_llvm_ir: inspectView("llvm-ir", "LLVM IR of a function or method.", ViewArgs),

        inspect_asm: inspectView("asm", "Assembly of a function or method for the host or a given target triple.", AsmArgs)
    };
}

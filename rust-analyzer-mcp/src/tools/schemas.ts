import { z } from "zod";

// Argument fragments shared across tool groups. Positions are 0-based, as in LSP.

export const filePathArg = z.string().min(1)
    .describe("Rust source file, absolute or relative to the workspace root");

export const lineArg = z.number().int().nonnegative().describe("0-based line number");

export const characterArg = z.number().int().nonnegative().describe("0-based character offset (UTF-16)");

export const applyArg = z.boolean().default(false)
    .describe("Write the changes to disk. When false the tool only previews them.");

export const workspacePathArg = z.string().min(1).optional()
    .describe("Directory containing Cargo.toml; defaults to the workspace root");

export const gatingModeArg = z.enum(["strict", "lenient"]).optional()
    .describe("Override the configured gating mode for this call");

export const optLevelArg = z.enum(["0", "1", "2", "3", "s", "z"]).optional()
    .describe("rustc optimization level (-Copt-level)");

export const PositionArgs = z.object({
    filePath: filePathArg,
    line: lineArg,
    character: characterArg
});

export const FieldArg = z.object({
    name: z.string().min(1),
    type: z.string().min(1).describe("Rust type, written as in source"),
    visibility: z.enum(["pub", "pub(crate)", "private"]).optional(),
    doc: z.string().optional()
});

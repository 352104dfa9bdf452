import type { ToolDefinition } from "./ToolDefinition.js";

export const NAVIGATION_TOOLS = [
    "find_definition",
    "find_references",
    "workspace_symbols",
    "get_type_hierarchy",
    "get_diagnostics"
] as const;

export const REFACTOR_TOOLS = [
    "rename_symbol",
    "extract_function",
    "inline_function",
    "change_signature",
    "organize_imports",
    "format_code",
    "move_items"
] as const;

export const GENERATION_TOOLS = [
    "generate_struct",
    "generate_enum",
    "generate_trait_impl",
    "generate_tests",
    "create_module"
] as const;

export const QUALITY_TOOLS = [
    "run_cargo_check",
    "apply_clippy_suggestions",
    "validate_lifetimes"
] as const;

export const PROJECT_TOOLS = [
    "analyze_manifest",
    "suggest_dependencies"
] as const;

export const INSPECTION_TOOLS = [
    "capabilities",
    "inspect",
    "inspect_mir",
    "inspect_llvm_ir",
    "inspect_asm"
] as const;

export const TOOL_NAMES = [
    ...NAVIGATION_TOOLS,
    ...REFACTOR_TOOLS,
    ...GENERATION_TOOLS,
    ...QUALITY_TOOLS,
    ...PROJECT_TOOLS,
    ...INSPECTION_TOOLS
] as const;

export type ToolName = typeof TOOL_NAMES[number];

export type ToolRegistry = Record<ToolName, ToolDefinition>;

/** One group's slice of the registry, keyed by the group's tool names. */
export type ToolGroup<Names extends readonly ToolName[]> = Record<Names[number], ToolDefinition>;

export function isToolName(name: string): name is ToolName {
    return TOOL_NAMES.some(candidate => candidate === name);
}

import type { EnhancedErrorDetails, ToolSuggestion } from "../types.js";
import type { BridgeError, BridgeErrorCode } from "./BridgeError.js";

export class ErrorEnhancer {
    /**
     * Hint and follow-up tools for any bridge failure.
     */
    static enhance(error: BridgeError): EnhancedErrorDetails {
        switch (error.code) {
            case "DocumentNotOpen":
                return ErrorEnhancer.enhanceDocumentNotOpen(stringDetail(error, "uri"));
            case "Timeout":
                return ErrorEnhancer.enhanceTimeout(stringDetail(error, "operation"), numberDetail(error, "limitMs"));
            case "OutputTooLarge":
                return ErrorEnhancer.enhanceOutputTooLarge(numberDetail(error, "observed"), numberDetail(error, "limit"));
            case "AnalyzerUnavailable":
            case "SpawnFailed":
                return ErrorEnhancer.enhanceAnalyzerUnavailable(error.code);
            case "NotFound":
                return ErrorEnhancer.enhanceNotFound();
            case "CompilerFailed":
                return ErrorEnhancer.enhanceCompilerFailed();
            case "ConfigurationError":
                return {
                    nextActionHint: "Set RUST_ANALYZER_PATH to an executable rust-analyzer binary, or install it with `rustup component add rust-analyzer`."
                };
            default:
                return {};
        }
    }

    static enhanceDocumentNotOpen(uri?: string): EnhancedErrorDetails {
        return {
            nextActionHint: `${uri ? `The document ${uri}` : "The document"} is not open in the analyzer. Retry through a navigation tool, which opens the file first.`,
            toolSuggestions: [{
                toolName: "find_definition",
                rationale: "Opening a file through a navigation tool registers it with the analyzer.",
                priority: "medium"
            }]
        };
    }

    static enhanceTimeout(operation?: string, limitMs?: number): EnhancedErrorDetails {
        const suggestions: ToolSuggestion[] = [];
        if (operation?.startsWith("Inspection")) {
            suggestions.push({
                toolName: "inspect",
                rationale: "The `def` view answers from the analyzer without a compiler build.",
                exampleArgs: { view: "def" },
                priority: "high"
            });
        }
        return {
            nextActionHint: `${operation ?? "The operation"} did not finish within ${limitMs ?? "the configured"}ms. Narrow the request (a single symbol or package) or raise the timeout.`,
            toolSuggestions: suggestions
        };
    }

    static enhanceOutputTooLarge(observed?: number, limit?: number): EnhancedErrorDetails {
        return {
            nextActionHint: `Output reached ${observed ?? "?"} bytes against a cap of ${limit ?? "?"} bytes. Target a smaller package or symbol, or raise RUST_MCP_MAX_OUTPUT_BYTES.`,
            context: { observed, limit }
        };
    }

    static enhanceAnalyzerUnavailable(code: BridgeErrorCode): EnhancedErrorDetails {
        return {
            nextActionHint: code === "SpawnFailed"
                ? "rust-analyzer could not be started. Check RUST_ANALYZER_PATH and that the binary runs."
                : "rust-analyzer stopped responding. The next call restarts it; if restarts keep failing, check the analyzer logs.",
            toolSuggestions: [{
                toolName: "capabilities",
                rationale: "Reports the detected toolchain and analyzer versions.",
                priority: "low"
            }]
        };
    }

    static enhanceNotFound(): EnhancedErrorDetails {
        return {
            nextActionHint: "Nothing matched. Check the position (0-based line and character) or search by name.",
            toolSuggestions: [{
                toolName: "workspace_symbols",
                rationale: "Finds the symbol by name across the workspace.",
                priority: "high"
            }]
        };
    }

    static enhanceCompilerFailed(): EnhancedErrorDetails {
        return {
            nextActionHint: "The crate does not build. Fix the reported errors first.",
            toolSuggestions: [{
                toolName: "run_cargo_check",
                rationale: "Lists the compiler errors with their locations.",
                priority: "high"
            }]
        };
    }
}

function stringDetail(error: BridgeError, key: string): string | undefined {
    const value = error.details[key];
    return typeof value === "string" ? value : undefined;
}

function numberDetail(error: BridgeError, key: string): number | undefined {
    const value = error.details[key];
    return typeof value === "number" ? value : undefined;
}

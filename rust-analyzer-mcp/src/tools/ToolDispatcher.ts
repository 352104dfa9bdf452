import { ErrorCode, McpError, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { describeError, isBridgeError } from "../errors/BridgeError.js";
import { ErrorEnhancer } from "../errors/ErrorEnhancer.js";
import type { ToolResponse } from "../types.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { createGenerationTools } from "./GenerationTools.js";
import { createInspectionTools } from "./InspectionTools.js";
import { createNavigationTools } from "./NavigationTools.js";
import { createProjectTools } from "./ProjectTools.js";
import { createQualityTools } from "./QualityTools.js";
import { createRefactorTools } from "./RefactorTools.js";
import { TOOL_NAMES, isToolName, type ToolRegistry } from "./ToolCatalog.js";
import type { ToolContext } from "./ToolContext.js";
import { errorResponse } from "./responses.js";

const logger = createLogger("ToolDispatcher");

export function createToolRegistry(context: ToolContext): ToolRegistry {
    return {
        ...createNavigationTools(context),
        ...createRefactorTools(context),
        ...createGenerationTools(context),
        ...createQualityTools(context),
        ...createProjectTools(context),
        ...createInspectionTools(context)
    };
}

/**
 * Routes MCP tool calls. Bridge failures come back as `isError` payloads with
 * a hint and follow-up tools; only an unknown tool name is a protocol error.
 */
export class ToolDispatcher {
    private readonly tools: ToolRegistry;

    constructor(context: ToolContext) {
        this.tools = createToolRegistry(context);
    }

    public listTools(): Tool[] {
        return TOOL_NAMES.map(name => ({
            name,
            description: this.tools[name].description,
            inputSchema: this.tools[name].inputSchema
        }));
    }

    public async call(name: string, args: unknown): Promise<ToolResponse> {
        if (!isToolName(name)) {
            throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
        }
        const startedAt = Date.now();
        try {
            const response = await this.tools[name].execute(args);
            logger.debug("tool completed", { tool: name, elapsedMs: Date.now() - startedAt });
            return response;
        } catch (error) {
            if (error instanceof McpError) {
                throw error;
            }
            if (isBridgeError(error)) {
                logger.warn("tool failed", { tool: name, code: error.code, error: error.message });
                return errorResponse(error.code, error.message, { ...error.details, ...ErrorEnhancer.enhance(error) });
            }
            logger.error("tool failed unexpectedly", { tool: name, error: describeError(error) });
            return errorResponse("InternalError", describeError(error));
        }
    }
}

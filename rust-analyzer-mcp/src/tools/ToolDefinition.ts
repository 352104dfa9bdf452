import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { InvalidArgumentsError } from "../errors/BridgeError.js";
import type { ToolResponse } from "../types.js";

export type ToolInputSchema = Tool["inputSchema"];

export interface ToolDefinition {
    description: string;
    inputSchema: ToolInputSchema;
    execute(rawArgs: unknown): Promise<ToolResponse>;
}

/** Binds a handler to its argument schema; arguments are validated before the handler runs. */
export function defineTool<S extends z.ZodTypeAny>(
    description: string,
    schema: S,
    handler: (args: z.output<S>) => Promise<ToolResponse>
): ToolDefinition {
    return {
        description,
        inputSchema: toInputSchema(schema),
        execute: async rawArgs => handler(parseArguments(schema, rawArgs))
    };
}

export function parseArguments<S extends z.ZodTypeAny>(schema: S, rawArgs: unknown): z.output<S> {
    const result = schema.safeParse(rawArgs ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "arguments"}: ${issue.message}`);
        throw new InvalidArgumentsError(`Invalid arguments: ${issues.join("; ")}`, { issues });
    }
    return result.data;
}

export function toInputSchema(schema: z.ZodType): ToolInputSchema {
    const json = zodToJsonSchema<"jsonSchema7">(schema, { $refStrategy: "none" });
    const properties = "properties" in json && isRecord(json.properties) ? json.properties : {};
    const required = "required" in json && Array.isArray(json.required)
        ? json.required.filter((key): key is string => typeof key === "string")
        : [];
    return required.length > 0
        ? { type: "object", properties, required }
        : { type: "object", properties };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

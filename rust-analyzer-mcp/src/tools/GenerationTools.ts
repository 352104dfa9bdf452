import * as path from "path";
import { z } from "zod";
import { InvalidArgumentsError } from "../errors/BridgeError.js";
import {
    appendItem,
    insertModuleDeclaration,
    renderEnum,
    renderModuleFile,
    renderStruct,
    renderTestModule,
    renderTraitImpl
} from "../generation/RustTemplates.js";
import type { EditOutcome } from "../types.js";
import type { GENERATION_TOOLS, ToolGroup } from "./ToolCatalog.js";
import type { ToolContext } from "./ToolContext.js";
import { defineTool } from "./ToolDefinition.js";
import { jsonResponse } from "./responses.js";
import { FieldArg, applyArg, filePathArg } from "./schemas.js";

const visibilityArg = z.enum(["pub", "pub(crate)", "private"]).optional().describe("Item visibility; defaults to pub");

const GenerateStructArgs = z.object({
    filePath: filePathArg.describe("File to append the struct to; created when missing"),
    structName: z.string().min(1),
    fields: z.array(FieldArg).default([]),
    derives: z.array(z.string().min(1)).optional().describe("Traits for #[derive(...)], e.g. [\"Debug\", \"Clone\"]"),
    visibility: visibilityArg,
    doc: z.string().optional(),
    apply: applyArg
});

const GenerateEnumArgs = z.object({
    filePath: filePathArg.describe("File to append the enum to; created when missing"),
    enumName: z.string().min(1),
    variants: z.array(z.object({
        name: z.string().min(1),
        tupleFields: z.array(z.string().min(1)).optional(),
        fields: z.array(FieldArg).optional(),
        discriminant: z.string().optional(),
        doc: z.string().optional()
    })).min(1),
    derives: z.array(z.string().min(1)).optional(),
    visibility: visibilityArg,
    doc: z.string().optional(),
    apply: applyArg
});

const GenerateTraitImplArgs = z.object({
    filePath: filePathArg,
    traitName: z.string().min(1).describe("Trait path, e.g. `Display` or `std::str::FromStr`"),
    typeName: z.string().min(1),
    apply: applyArg
});

const GenerateTestsArgs = z.object({
    filePath: filePathArg.describe("File containing the function under test"),
    targetFunction: z.string().min(1),
    testCases: z.array(z.object({
        name: z.string().optional(),
        input: z.string().optional().describe("Argument list, verbatim"),
        expected: z.string().optional().describe("Expected value, verbatim")
    })).optional(),
    apply: applyArg
});

const CreateModuleArgs = z.object({
    moduleName: z.string().min(1),
    modulePath: z.string().min(1).default("src").describe("Directory that will hold the module file, relative to the workspace root"),
    isPublic: z.boolean().default(false),
    apply: applyArg
});

export function createGenerationTools(context: ToolContext): ToolGroup<typeof GENERATION_TOOLS> {
    const { analyzer, edits, fileSystem } = context;

    const appendTo = async (filePath: string, item: string, apply: boolean): Promise<EditOutcome> => {
        const absolute = analyzer.resolvePath(filePath);
        const existing = await fileSystem.exists(absolute) ? await fileSystem.readFile(absolute) : "";
        return edits.replaceFile(absolute, appendItem(existing, item), apply);
    };

    return {
        generate_struct: defineTool(
            "Append a struct definition to a file.",
            GenerateStructArgs,
            async ({ filePath, structName, fields, derives, visibility, doc, apply }) => {
                const code = renderStruct({ name: structName, fields, derives, visibility, doc });
                return generatedResponse(code, await appendTo(filePath, code, apply));
            }
        ),

        generate_enum: defineTool(
            "Append an enum definition to a file.",
            GenerateEnumArgs,
            async ({ filePath, enumName, variants, derives, visibility, doc, apply }) => {
                const code = renderEnum({ name: enumName, variants, derives, visibility, doc });
                return generatedResponse(code, await appendTo(filePath, code, apply));
            }
        ),

        generate_trait_impl: defineTool(
            "Append an `impl Trait for Type` skeleton. Common std traits get their required methods stubbed with `todo!()`.",
            GenerateTraitImplArgs,
            async ({ filePath, traitName, typeName, apply }) => {
                const code = renderTraitImpl({ traitName, typeName });
                return generatedResponse(code, await appendTo(filePath, code, apply));
            }
        ),

        generate_tests: defineTool(
            "Append a #[cfg(test)] module with test cases for a function.",
            GenerateTestsArgs,
            async ({ filePath, targetFunction, testCases, apply }) => {
                const absolute = analyzer.resolvePath(filePath);
                const existing = await fileSystem.exists(absolute) ? await fileSystem.readFile(absolute) : "";
                const hasTestsModule = /^\s*mod\s+tests\s*\{/m.test(existing);
                const code = renderTestModule({
                    targetFunction,
                    cases: testCases,
                    moduleName: hasTestsModule ? `${targetFunction}_tests` : "tests"
                });
                return generatedResponse(code, await edits.replaceFile(absolute, appendItem(existing, code), apply));
            }
        ),

        create_module: defineTool(
            "Create `<modulePath>/<moduleName>.rs` and declare it in the parent module (lib.rs, main.rs, mod.rs or the sibling file).",
            CreateModuleArgs,
            async ({ moduleName, modulePath, isPublic, apply }) => {
                const directory = analyzer.resolvePath(modulePath);
                const moduleFile = path.join(directory, `${moduleName}.rs`);
                if (await fileSystem.exists(moduleFile) || await fileSystem.exists(path.join(directory, moduleName, "mod.rs"))) {
                    throw new InvalidArgumentsError(`Module \`${moduleName}\` already exists in ${modulePath}`, { moduleName, modulePath });
                }
                const created = await edits.replaceFile(moduleFile, renderModuleFile(moduleName), apply);
                const parent = await findParentModule(context, directory);
                const warnings: string[] = [];
                const changes = [...created.changes];
                let applied = created.applied;
                if (parent) {
                    const parentContent = await fileSystem.readFile(parent);
                    const declared = await edits.replaceFile(parent, insertModuleDeclaration(parentContent, moduleName, isPublic), apply);
                    changes.push(...declared.changes.filter(change => change.editCount > 0));
                    applied = applied || declared.applied;
                } else {
                    warnings.push(`No parent module file found for ${modulePath}; add \`${isPublic ? "pub " : ""}mod ${moduleName};\` manually.`);
                }
                return jsonResponse({
                    summary: applied ? `Created module \`${moduleName}\`` : `Module \`${moduleName}\` (preview; pass apply: true to write)`,
                    applied,
                    changes,
                    warnings
                });
            }
        )
    };
}

/** lib.rs or main.rs for a crate source root, then mod.rs, then the 2018-style sibling `<dir>.rs`. */
export async function findParentModule(context: Pick<ToolContext, "fileSystem">, directory: string): Promise<string | undefined> {
    const candidates = [
        path.join(directory, "lib.rs"),
        path.join(directory, "main.rs"),
        path.join(directory, "mod.rs"),
        `${directory}.rs`
    ];
    for (const candidate of candidates) {
        if (await context.fileSystem.exists(candidate)) {
            return candidate;
        }
    }
    return undefined;
}

function generatedResponse(code: string, outcome: EditOutcome) {
    const target = outcome.changes[0]?.filePath;
    return jsonResponse({
        summary: outcome.applied ? `Wrote ${target}` : `Generated code for ${target} (preview; pass apply: true to write)`,
        code,
        ...outcome
    });
}

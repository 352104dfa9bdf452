/**
 * Rust source skeletons for the generation tools.
 *
 * Output uses four-space indentation and `\n` line endings, which is what
 * rustfmt produces by default; callers can run `format_code` afterwards.
 */

import keywordData from "../data/rust-keywords.json";
import { InvalidArgumentsError } from "../errors/BridgeError.js";

export type RustVisibility = "pub" | "pub(crate)" | "private";

export interface FieldDefinition {
    name: string;
    type: string;
    visibility?: RustVisibility;
    doc?: string;
}

export interface VariantDefinition {
    name: string;
    /** Tuple payload types, e.g. `["String", "u32"]`. */
    tupleFields?: string[];
    /** Struct-like payload; ignored when `tupleFields` is set. */
    fields?: FieldDefinition[];
    discriminant?: string;
    doc?: string;
}

export interface StructTemplate {
    name: string;
    fields: FieldDefinition[];
    derives?: string[];
    visibility?: RustVisibility;
    doc?: string;
}

export interface EnumTemplate {
    name: string;
    variants: VariantDefinition[];
    derives?: string[];
    visibility?: RustVisibility;
    doc?: string;
}

export interface TraitImplTemplate {
    traitName: string;
    typeName: string;
}

export interface TestCaseDefinition {
    name?: string;
    /** Argument list passed to the function under test, verbatim. */
    input?: string;
    /** Expected value, verbatim; omitted cases only call the function. */
    expected?: string;
}

export interface TestModuleTemplate {
    targetFunction: string;
    cases?: TestCaseDefinition[];
    /** Defaults to `tests`. */
    moduleName?: string;
}

const INDENT = "    ";

const RUST_KEYWORDS = new Set<string>(keywordData.keywords);

/** Method skeletons for traits whose required items are well known. */
const KNOWN_TRAIT_BODIES: Record<string, readonly string[]> = {
    Display: [
        "fn fmt(&self, f: &mut std::fmt::Formatter<'_>) -> std::fmt::Result {",
        `${INDENT}todo!()`,
        "}"
    ],
    Debug: [
        "fn fmt(&self, f: &mut std::fmt::Formatter<'_>) -> std::fmt::Result {",
        `${INDENT}todo!()`,
        "}"
    ],
    Default: [
        "fn default() -> Self {",
        `${INDENT}todo!()`,
        "}"
    ],
    Clone: [
        "fn clone(&self) -> Self {",
        `${INDENT}todo!()`,
        "}"
    ],
    PartialEq: [
        "fn eq(&self, other: &Self) -> bool {",
        `${INDENT}todo!()`,
        "}"
    ],
    Drop: [
        "fn drop(&mut self) {",
        `${INDENT}todo!()`,
        "}"
    ],
    Iterator: [
        "type Item = ();",
        "",
        "fn next(&mut self) -> Option<Self::Item> {",
        `${INDENT}todo!()`,
        "}"
    ],
    FromStr: [
        "type Err = String;",
        "",
        "fn from_str(s: &str) -> Result<Self, Self::Err> {",
        `${INDENT}todo!()`,
        "}"
    ],
    Error: []
};

export function isRustIdentifier(name: string): boolean {
    return /^[A-Za-z_][A-Za-z0-9_]*$/.test(name) && name !== "_" && !RUST_KEYWORDS.has(name);
}

export function assertIdentifier(name: string, role: string): void {
    if (!isRustIdentifier(name)) {
        throw new InvalidArgumentsError(`\`${name}\` is not a valid Rust identifier for ${role}`, { name, role });
    }
}

function visibilityPrefix(visibility: RustVisibility | undefined, fallback: RustVisibility): string {
    const effective = visibility ?? fallback;
    return effective === "private" ? "" : `${effective} `;
}

function docLines(doc: string | undefined, indent = ""): string[] {
    if (!doc) return [];
    return doc.split("\n").map(line => `${indent}///${line.length > 0 ? ` ${line}` : ""}`);
}

function deriveLine(derives: string[] | undefined): string[] {
    const unique = Array.from(new Set((derives ?? []).map(derive => derive.trim()).filter(Boolean)));
    return unique.length > 0 ? [`#[derive(${unique.join(", ")})]`] : [];
}

export function renderStruct(template: StructTemplate): string {
    assertIdentifier(template.name, "a struct");
    const header = `${visibilityPrefix(template.visibility, "pub")}struct ${template.name}`;
    const lines = [...docLines(template.doc), ...deriveLine(template.derives)];
    if (template.fields.length === 0) {
        lines.push(`${header};`);
        return lines.join("\n") + "\n";
    }
    lines.push(`${header} {`);
    for (const field of template.fields) {
        assertIdentifier(field.name, "a field");
        lines.push(...docLines(field.doc, INDENT));
        lines.push(`${INDENT}${visibilityPrefix(field.visibility, "pub")}${field.name}: ${field.type},`);
    }
    lines.push("}");
    return lines.join("\n") + "\n";
}

export function renderEnum(template: EnumTemplate): string {
    assertIdentifier(template.name, "an enum");
    if (template.variants.length === 0) {
        throw new InvalidArgumentsError(`Enum \`${template.name}\` needs at least one variant`, { name: template.name });
    }
    const lines = [
        ...docLines(template.doc),
        ...deriveLine(template.derives),
        `${visibilityPrefix(template.visibility, "pub")}enum ${template.name} {`
    ];
    for (const variant of template.variants) {
        assertIdentifier(variant.name, "an enum variant");
        lines.push(...docLines(variant.doc, INDENT));
        if (variant.tupleFields && variant.tupleFields.length > 0) {
            lines.push(`${INDENT}${variant.name}(${variant.tupleFields.join(", ")}),`);
        } else if (variant.fields && variant.fields.length > 0) {
            lines.push(`${INDENT}${variant.name} {`);
            for (const field of variant.fields) {
                assertIdentifier(field.name, "a variant field");
                lines.push(`${INDENT}${INDENT}${field.name}: ${field.type},`);
            }
            lines.push(`${INDENT}},`);
        } else if (variant.discriminant !== undefined) {
            lines.push(`${INDENT}${variant.name} = ${variant.discriminant},`);
        } else {
            lines.push(`${INDENT}${variant.name},`);
        }
    }
    lines.push("}");
    return lines.join("\n") + "\n";
}

/** `impl Trait for Type`; unknown traits get an empty body to fill in. */
export function renderTraitImpl(template: TraitImplTemplate): string {
    const baseTrait = template.traitName.split("::").pop()?.replace(/<.*$/, "") ?? template.traitName;
    const body = Object.hasOwn(KNOWN_TRAIT_BODIES, baseTrait)
        ? KNOWN_TRAIT_BODIES[baseTrait]
        : ["// required items go here"];
    const lines = [`impl ${template.traitName} for ${template.typeName} {`];
    for (const line of body) {
        lines.push(line.length > 0 ? `${INDENT}${line}` : "");
    }
    lines.push("}");
    return lines.join("\n") + "\n";
}

export function renderTestModule(template: TestModuleTemplate): string {
    assertIdentifier(template.targetFunction, "the function under test");
    const cases: TestCaseDefinition[] = template.cases && template.cases.length > 0 ? template.cases : [{}];
    const moduleName = template.moduleName ?? "tests";
    assertIdentifier(moduleName, "the test module");
    const lines = ["#[cfg(test)]", `mod ${moduleName} {`, `${INDENT}use super::*;`];
    const used = new Set<string>();
    cases.forEach((testCase, index) => {
        const name = uniqueTestName(testCase.name ?? (cases.length === 1 ? "works" : `case_${index + 1}`), template.targetFunction, used);
        const call = `${template.targetFunction}(${testCase.input ?? ""})`;
        lines.push("", `${INDENT}#[test]`, `${INDENT}fn ${name}() {`);
        if (testCase.expected !== undefined) {
            lines.push(`${INDENT}${INDENT}assert_eq!(${call}, ${testCase.expected});`);
        } else {
            lines.push(`${INDENT}${INDENT}let _ = ${call};`);
        }
        lines.push(`${INDENT}}`);
    });
    lines.push("}");
    return lines.join("\n") + "\n";
}

function uniqueTestName(raw: string, target: string, used: Set<string>): string {
    const slug = raw.toLowerCase().replace(/[^a-z0-9_]+/g, "_").replace(/^_+|_+$/g, "") || "case";
    let name = `test_${target}_${slug}`;
    let suffix = 2;
    while (used.has(name)) {
        name = `test_${target}_${slug}_${suffix++}`;
    }
    used.add(name);
    return name;
}

export function renderModuleFile(moduleName: string): string {
    assertIdentifier(moduleName, "a module");
    return `//! ${moduleName} module.\n`;
}

export function renderModuleDeclaration(moduleName: string, isPublic: boolean): string {
    assertIdentifier(moduleName, "a module");
    return `${isPublic ? "pub " : ""}mod ${moduleName};`;
}

/** Appends an item after existing content, separated by one blank line. */
export function appendItem(existing: string, item: string): string {
    const trimmed = existing.replace(/\s+$/, "");
    if (trimmed.length === 0) return item.endsWith("\n") ? item : `${item}\n`;
    const body = item.endsWith("\n") ? item : `${item}\n`;
    return `${trimmed}\n\n${body}`;
}

/**
 * Inserts a `mod` declaration after the last existing one, or at the top
 * after inner attributes and doc comments. Returns the content unchanged when
 * the module is already declared.
 */
export function insertModuleDeclaration(content: string, moduleName: string, isPublic: boolean): string {
    const declaration = renderModuleDeclaration(moduleName, isPublic);
    const lines = content.split("\n");
    const alreadyDeclared = new RegExp(`^\\s*(pub(\\([^)]*\\))?\\s+)?mod\\s+${moduleName}\\s*[;{]`);
    if (lines.some(line => alreadyDeclared.test(line))) return content;

    let lastDeclaration = -1;
    lines.forEach((line, index) => {
        if (/^\s*(pub(\([^)]*\))?\s+)?mod\s+[A-Za-z_][A-Za-z0-9_]*\s*;/.test(line)) {
            lastDeclaration = index;
        }
    });
    if (lastDeclaration >= 0) {
        return [...lines.slice(0, lastDeclaration + 1), declaration, ...lines.slice(lastDeclaration + 1)].join("\n");
    }

    let headerEnd = 0;
    while (headerEnd < lines.length && /^\s*(\/\/!|#!\[)/.test(lines[headerEnd])) {
        headerEnd++;
    }
    const header = lines.slice(0, headerEnd);
    const rest = lines.slice(headerEnd);
    while (rest.length > 0 && rest[0].trim().length === 0) {
        rest.shift();
    }
    const result = [
        ...header,
        ...(header.length > 0 ? [""] : []),
        declaration,
        ...(rest.length > 0 ? ["", ...rest] : [])
    ].join("\n");
    return result.endsWith("\n") ? result : `${result}\n`;
}

import * as path from "path";
import type { AnalyzerClient } from "../analyzer/AnalyzerClient.js";
import type { FlatSymbol, LspLocation, LspTypeHierarchyItem } from "../analyzer/protocol.js";
import {
    findCrateRoot,
    findSymbolByName,
    isInspectableCategory,
    parsePackageName,
    resolveSymbolIdentity,
    type SymbolIdentity
} from "../analyzer/SymbolIdentity.js";
import {
    extractAsm,
    extractLlvmIr,
    extractMir,
    normalizeSymbol,
    type NormalizedSymbol,
    type TargetedAssembly
} from "../compiler/ArtifactExtractor.js";
import { buildInspectionArgs, changedFiles, snapshotFiles, type OptLevel } from "../compiler/CargoCommands.js";
import { describeCommand, type CompilerRunResult } from "../compiler/GuardedCompilerRunner.js";
import type { GatingMode } from "../config/ServerConfig.js";
import {
    AnalyzerError,
    CompilerFailedError,
    InvalidArgumentsError,
    NotFoundError,
    TimeoutError
} from "../errors/BridgeError.js";
import type { IFileSystem } from "../platform/FileSystem.js";
import { uriToPath } from "../utils/DocumentUri.js";
import { createLogger } from "../utils/StructuredLogger.js";
import {
    INSPECTION_VIEWS,
    findView,
    isViewAdvertised,
    isViewRunnable,
    truncateWithLimits,
    truncationNote,
    type InspectionContext,
    type InspectionProvenance,
    type InspectionView,
    type InspectionViewName
} from "./InspectionContext.js";

/** The analyzer requests an inspection needs. */
export type InspectionAnalyzer = Pick<
    AnalyzerClient,
    | "openDocument"
    | "definitionDetails"
    | "documentSymbols"
    | "hover"
    | "prepareTypeHierarchy"
    | "typeHierarchySupertypes"
    | "typeHierarchySubtypes"
    | "resolvePath"
>;

export interface InspectionRequest {
    view: string;
    filePath: string;
    line?: number;
    character?: number;
    /** Overrides the item name taken from the analyzer outline. */
    symbolName?: string;
    target?: string;
    optLevel?: OptLevel;
    gatingMode?: GatingMode;
}

export interface InspectionResult {
    view: InspectionViewName;
    symbol?: string;
    text: string;
    truncated: boolean;
    diagnostics: string[];
    provenance: InspectionProvenance;
}

export interface InspectionServiceOptions {
    context: InspectionContext;
    analyzer: InspectionAnalyzer;
    fileSystem: IFileSystem;
    cargoPath: string;
}

interface ResolvedSymbol {
    definitionPath: string;
    identity: SymbolIdentity;
    symbol: FlatSymbol;
}

const METHOD_NOT_FOUND = -32601;

const logger = createLogger("InspectionService");

/**
 * Answers `inspect` requests: definition and type views come from the
 * analyzer, MIR, LLVM IR and assembly from an isolated `cargo rustc` build.
 */
export class InspectionService {
    constructor(private readonly options: InspectionServiceOptions) {}

    public async inspect(request: InspectionRequest): Promise<InspectionResult> {
        const { context } = this.options;
        const view = findView(request.view);
        if (!view) {
            throw new InvalidArgumentsError(`Unknown inspection view \`${request.view}\``, {
                view: request.view,
                available: INSPECTION_VIEWS.map(candidate => candidate.name)
            });
        }

        const gatingMode = request.gatingMode ?? context.gatingMode;
        const toolchain = await context.toolchain();
        if (!isViewAdvertised(view, toolchain.channel, gatingMode)) {
            throw new InvalidArgumentsError(
                `View \`${view.name}\` is not available under ${gatingMode} gating for ${toolchain.channel}`,
                { view: view.name, gatingMode, toolchainChannel: toolchain.channel }
            );
        }

        const provenance = await context.provenance(gatingMode);
        if (!isViewRunnable(view, toolchain.channel)) {
            return {
                view: view.name,
                text: "",
                truncated: false,
                diagnostics: [`View \`${view.name}\` requires a nightly toolchain (detected ${toolchain.channel})`],
                provenance
            };
        }

        return context.lockWorkspace(async () => {
            provenance.workspaceLocked = true;
            const diagnostics: string[] = [];
            const { text, symbol } = await this.render(view, request, provenance, diagnostics);

            const limited = truncateWithLimits(text, context.limits);
            if (limited.summary) {
                provenance.truncation = limited.summary;
                diagnostics.push(truncationNote(limited.summary));
            }
            return {
                view: view.name,
                symbol,
                text: limited.text,
                truncated: limited.truncated,
                diagnostics,
                provenance
            };
        });
    }

    private async render(
        view: InspectionView,
        request: InspectionRequest,
        provenance: InspectionProvenance,
        diagnostics: string[]
    ): Promise<{ text: string; symbol?: string }> {
        switch (view.name) {
            case "def":
                return this.renderDefinition(request);
            case "types":
                return this.renderTypes(request, diagnostics);
            default:
                return this.renderCompiled(view, request, provenance, diagnostics);
        }
    }

    private async renderDefinition(request: InspectionRequest): Promise<{ text: string; symbol?: string }> {
        const { line, character } = requirePosition(request);
        const { analyzer } = this.options;
        await analyzer.openDocument(request.filePath);
        const details = await analyzer.definitionDetails(request.filePath, line, character);
        if (!details) {
            throw new NotFoundError(`No definition found at ${request.filePath}:${line + 1}:${character + 1}`, {
                filePath: request.filePath,
                line,
                character
            });
        }
        const symbolPath = details.symbolPath.join("::");
        return {
            text: formatDefinition(details.location, symbolPath),
            symbol: symbolPath || undefined
        };
    }

    private async renderTypes(request: InspectionRequest, diagnostics: string[]): Promise<{ text: string; symbol?: string }> {
        const definition = await this.renderDefinition(request);
        const { line, character } = requirePosition(request);
        const { analyzer } = this.options;

        const sections: string[] = [];
        try {
            const items = await analyzer.prepareTypeHierarchy(request.filePath, line, character);
            const item = items[0];
            if (item) {
                const supertypes = await analyzer.typeHierarchySupertypes(item);
                const subtypes = await analyzer.typeHierarchySubtypes(item);
                sections.push(
                    `Item: ${describeHierarchyItem(item)}`,
                    `Supertypes: ${formatHierarchy(supertypes)}`,
                    `Subtypes: ${formatHierarchy(subtypes)}`
                );
            }
        } catch (error) {
            if (!(error instanceof AnalyzerError) || error.rpcCode !== METHOD_NOT_FOUND) {
                throw error;
            }
            diagnostics.push("Type hierarchy is not supported by this rust-analyzer; showing hover information only");
        }

        const hover = await analyzer.hover(request.filePath, line, character);
        if (hover) {
            sections.push(hover);
        }
        const info = sections.length > 0 ? sections.join("\n") : "No type information available";
        return { text: `Types: ${definition.text}\n${info}`, symbol: definition.symbol };
    }

    private async renderCompiled(
        view: InspectionView,
        request: InspectionRequest,
        provenance: InspectionProvenance,
        diagnostics: string[]
    ): Promise<{ text: string; symbol?: string }> {
        const { context, fileSystem } = this.options;
        const resolved = await this.resolveSymbol(request);
        if (!isInspectableCategory(resolved.identity.category)) {
            throw new InvalidArgumentsError(
                `View \`${view.name}\` requires a function or method; \`${resolved.identity.itemName}\` is a ${resolved.identity.category}`,
                { view: view.name, category: resolved.identity.category }
            );
        }
        const normalized = normalizeSymbol(resolved.identity);

        const crateRoot = await findCrateRoot(fileSystem, resolved.definitionPath);
        if (!crateRoot) {
            throw new NotFoundError(`No Cargo.toml found above ${resolved.definitionPath}`, { filePath: resolved.definitionPath });
        }
        const manifestPath = path.join(crateRoot, "Cargo.toml");
        const packageName = parsePackageName(await fileSystem.readFile(manifestPath));

        const before = await snapshotFiles(fileSystem, context.targetDir);
        const result = await this.runCompiler(view, normalized, {
            manifestPath,
            packageName,
            target: request.target,
            optLevel: request.optLevel
        });
        provenance.command = describeCommand(result.command);

        if (result.stderr.trim().length > 0) {
            const stderr = truncateWithLimits(result.stderr, context.limits);
            diagnostics.push(`${stderr.truncated ? "Compiler stderr (truncated):" : "Compiler stderr:"}\n${stderr.text}`);
        }
        if (!result.success) {
            throw new CompilerFailedError(
                `cargo rustc exited with ${result.exitCode ?? result.signal ?? "unknown status"} while inspecting \`${normalized.defName}\``,
                { exitCode: result.exitCode, signal: result.signal, command: provenance.command }
            );
        }

        switch (view.name) {
            case "mir":
                return { text: extractMir([result.stdout], normalized), symbol: normalized.defName };
            case "llvm-ir": {
                const artifacts = await this.newArtifacts(before, ".ll");
                if (artifacts.length === 0) {
                    throw new NotFoundError(`No LLVM IR artifacts were produced under ${context.targetDir}`, {
                        targetDir: context.targetDir
                    });
                }
                const contents = await Promise.all(artifacts.map(file => context.runner.readArtifact(file)));
                return { text: extractLlvmIr(contents, normalized), symbol: normalized.defName };
            }
            case "asm": {
                const artifacts = await this.newArtifacts(before, ".s");
                if (artifacts.length === 0) {
                    throw new NotFoundError(`No assembly artifacts were produced under ${context.targetDir}`, {
                        targetDir: context.targetDir
                    });
                }
                const host = (await context.host()) ?? "host";
                const assemblies: TargetedAssembly[] = [];
                for (const file of artifacts) {
                    assemblies.push({
                        target: inferArtifactTarget(file, context.targetDir, host),
                        content: await context.runner.readArtifact(file)
                    });
                }
                const target = request.target ?? assemblies[0].target;
                return { text: extractAsm(assemblies, normalized, target), symbol: normalized.defName };
            }
            default:
                throw new InvalidArgumentsError(`View \`${view.name}\` does not run the compiler`, { view: view.name });
        }
    }

    private async runCompiler(
        view: InspectionView,
        symbol: NormalizedSymbol,
        build: { manifestPath: string; packageName?: string; target?: string; optLevel?: OptLevel }
    ): Promise<CompilerRunResult> {
        const { context, cargoPath } = this.options;
        const args = buildInspectionArgs({ ...build, emit: view.emit, unpretty: view.unpretty });
        logger.debug("running inspection build", { view: view.name, symbol: symbol.defName, args });
        try {
            return await context.runner.run({
                command: cargoPath,
                args,
                cwd: context.rootPath,
                env: context.env(),
                timeoutMs: context.limits.timeoutMs
            });
        } catch (error) {
            if (error instanceof TimeoutError) {
                throw new TimeoutError(`Inspection \`${view.name}\` of \`${symbol.defName}\``, error.limitMs);
            }
            throw error;
        }
    }

    private async resolveSymbol(request: InspectionRequest): Promise<ResolvedSymbol> {
        const { analyzer, fileSystem } = this.options;
        await analyzer.openDocument(request.filePath);

        if (request.line === undefined && request.character === undefined && request.symbolName) {
            const absolute = analyzer.resolvePath(request.filePath);
            const symbols = await analyzer.documentSymbols(request.filePath);
            const symbol = findSymbolByName(symbols, request.symbolName);
            if (!symbol) {
                throw new NotFoundError(`No symbol named \`${request.symbolName}\` in ${request.filePath}`, {
                    filePath: request.filePath,
                    symbolName: request.symbolName
                });
            }
            const identity = await resolveSymbolIdentity(fileSystem, absolute, symbol);
            return {
                definitionPath: absolute,
                identity,
                symbol
            };
        }

        const { line, character } = requirePosition(request);
        const details = await analyzer.definitionDetails(request.filePath, line, character);
        if (!details || !details.symbol) {
            throw new NotFoundError(`No symbol found at ${request.filePath}:${line + 1}:${character + 1}`, {
                filePath: request.filePath,
                line,
                character
            });
        }
        const definitionPath = uriToPath(details.location.uri);
        const identity = await resolveSymbolIdentity(fileSystem, definitionPath, details.symbol);
        if (request.symbolName) {
            identity.itemName = request.symbolName;
        }
        return { definitionPath, identity, symbol: details.symbol };
    }

    private async newArtifacts(before: Map<string, number>, extension: string): Promise<string[]> {
        const after = await snapshotFiles(this.options.fileSystem, this.options.context.targetDir);
        return changedFiles(before, after).filter(file => file.endsWith(extension));
    }
}

function requirePosition(request: InspectionRequest): { line: number; character: number } {
    if (request.line === undefined || request.character === undefined) {
        throw new InvalidArgumentsError("Both line and character are required to resolve a symbol", {
            line: request.line,
            character: request.character
        });
    }
    return { line: request.line, character: request.character };
}

export function formatDefinition(location: LspLocation, symbolPath: string): string {
    const start = location.range.start;
    const base = `Definition: ${location.uri}:${start.line + 1}:${start.character + 1}`;
    return symbolPath ? `${base} (${symbolPath})` : base;
}

function describeHierarchyItem(item: LspTypeHierarchyItem): string {
    return item.detail ? `${item.name} (${item.detail})` : item.name;
}

function formatHierarchy(items: LspTypeHierarchyItem[]): string {
    return items.length > 0 ? items.map(describeHierarchyItem).join(", ") : "none";
}

/**
 * Cross builds land in `<targetDir>/<triple>/<profile>/...`; host builds in
 * `<targetDir>/<profile>/...`.
 */
export function inferArtifactTarget(filePath: string, targetDir: string, hostTriple: string): string {
    const relative = path.relative(path.resolve(targetDir), path.resolve(filePath));
    const first = relative.split(path.sep)[0];
    if (!first || first === ".." || first === "debug" || first === "release") {
        return hostTriple;
    }
    return first;
}

import * as path from "path";
import { z } from "zod";

// Subset of `cargo metadata --format-version 1` that the manifest summary reads.

const DependencySchema = z.object({
    name: z.string(),
    req: z.string(),
    kind: z.string().nullable(),
    optional: z.boolean(),
    features: z.array(z.string()).default([]),
    rename: z.string().nullish(),
    target: z.string().nullish()
});

const TargetSchema = z.object({
    name: z.string(),
    kind: z.array(z.string()),
    src_path: z.string()
});

const PackageSchema = z.object({
    name: z.string(),
    version: z.string(),
    id: z.string(),
    edition: z.string().default("2015"),
    manifest_path: z.string(),
    description: z.string().nullish(),
    rust_version: z.string().nullish(),
    dependencies: z.array(DependencySchema),
    targets: z.array(TargetSchema),
    features: z.record(z.array(z.string())).default({})
});

export const CargoMetadataSchema = z.object({
    packages: z.array(PackageSchema),
    workspace_members: z.array(z.string()),
    workspace_root: z.string(),
    target_directory: z.string()
});

export type CargoMetadata = z.infer<typeof CargoMetadataSchema>;

export type DependencyKind = "normal" | "dev" | "build";

export interface DependencySummary {
    name: string;
    requirement: string;
    optional: boolean;
    features: string[];
    target?: string;
}

export interface PackageSummary {
    name: string;
    version: string;
    edition: string;
    manifestPath: string;
    description?: string;
    rustVersion?: string;
    targets: Array<{ name: string; kinds: string[]; srcPath: string }>;
    dependencies: Record<DependencyKind, DependencySummary[]>;
    features: Record<string, string[]>;
}

export interface ManifestSummary {
    summary: string;
    workspaceRoot: string;
    targetDirectory: string;
    isWorkspace: boolean;
    packages: PackageSummary[];
}

function relative(rootPath: string, filePath: string): string {
    const result = path.relative(rootPath, filePath);
    return result.length > 0 && !result.startsWith("..") ? result.split(path.sep).join("/") : filePath;
}

function dependencyKind(kind: string | null): DependencyKind {
    return kind === "dev" || kind === "build" ? kind : "normal";
}

export function summarizeMetadata(metadata: CargoMetadata, rootPath: string): ManifestSummary {
    const members = new Set(metadata.workspace_members);
    const packages = metadata.packages
        .filter(pkg => members.size === 0 || members.has(pkg.id))
        .map((pkg): PackageSummary => {
            const dependencies: Record<DependencyKind, DependencySummary[]> = { normal: [], dev: [], build: [] };
            for (const dependency of pkg.dependencies) {
                dependencies[dependencyKind(dependency.kind)].push({
                    name: dependency.rename ?? dependency.name,
                    requirement: dependency.req,
                    optional: dependency.optional,
                    features: dependency.features,
                    ...(dependency.target ? { target: dependency.target } : {})
                });
            }
            return {
                name: pkg.name,
                version: pkg.version,
                edition: pkg.edition,
                manifestPath: relative(rootPath, pkg.manifest_path),
                description: pkg.description ?? undefined,
                rustVersion: pkg.rust_version ?? undefined,
                targets: pkg.targets.map(target => ({
                    name: target.name,
                    kinds: target.kind,
                    srcPath: relative(rootPath, target.src_path)
                })),
                dependencies,
                features: pkg.features
            };
        });

    const dependencyCount = packages.reduce(
        (total, pkg) => total + pkg.dependencies.normal.length + pkg.dependencies.dev.length + pkg.dependencies.build.length,
        0
    );
    return {
        summary: `${packages.length} package${packages.length === 1 ? "" : "s"}, ${dependencyCount} declared dependenc${dependencyCount === 1 ? "y" : "ies"}`,
        workspaceRoot: metadata.workspace_root,
        targetDirectory: metadata.target_directory,
        isWorkspace: packages.length > 1,
        packages
    };
}

import catalogData from "../data/crate-catalog.json";

export interface CatalogCrate {
    name: string;
    version: string;
    description: string;
    keywords: string[];
}

export interface DependencySuggestion {
    name: string;
    version: string;
    description: string;
    score: number;
    matchedKeywords: string[];
    alreadyDeclared: boolean;
    /** Line to paste under `[dependencies]`. */
    cargoToml: string;
}

export const CRATE_CATALOG: readonly CatalogCrate[] = catalogData.crates;

const DEPENDENCY_TABLE = /(^|\.)(dev-|build-)?dependencies$/;
const DEPENDENCY_SUBTABLE = /(?:^|\.)(?:dev-|build-)?dependencies\.([A-Za-z0-9_-]+)$/;

/** crates.io treats `-` and `_` as the same character in names. */
export function normalizeCrateName(name: string): string {
    return name.trim().toLowerCase().replace(/-/g, "_");
}

/**
 * Names declared in any dependency table of a Cargo.toml, including
 * `[workspace.dependencies]`, target-specific tables and `[dependencies.foo]`
 * sub-tables. Names come back normalized.
 */
export function parseDeclaredDependencies(manifest: string): Set<string> {
    const declared = new Set<string>();
    let inDependencies = false;
    for (const raw of manifest.split(/\r?\n/)) {
        const line = raw.replace(/#.*$/, "").trim();
        if (line.length === 0) continue;
        if (line.startsWith("[")) {
            const header = line.replace(/^\[+/, "").replace(/\]+$/, "").trim();
            const subtable = DEPENDENCY_SUBTABLE.exec(header);
            if (subtable) {
                declared.add(normalizeCrateName(subtable[1]));
                inDependencies = false;
            } else {
                inDependencies = DEPENDENCY_TABLE.test(header);
            }
            continue;
        }
        if (!inDependencies) continue;
        const entry = /^([A-Za-z0-9_-]+)\s*=/.exec(line);
        if (entry) {
            declared.add(normalizeCrateName(entry[1]));
        }
    }
    return declared;
}

export function queryTerms(query: string): string[] {
    return Array.from(new Set(query.toLowerCase().split(/[^a-z0-9_-]+/).filter(term => term.length > 1)));
}

/**
 * Ranks catalog crates for a free-text need: an exact crate name scores 5, each
 * matching keyword 2, each query term of four or more letters found in the
 * description 1. Crates scoring 0 are dropped.
 */
export function suggestDependencies(
    query: string,
    declared: ReadonlySet<string> = new Set(),
    limit = 10,
    catalog: readonly CatalogCrate[] = CRATE_CATALOG
): DependencySuggestion[] {
    const terms = queryTerms(query);
    const scored: DependencySuggestion[] = [];
    for (const crate of catalog) {
        const nameHit = terms.some(term => normalizeCrateName(term) === normalizeCrateName(crate.name));
        const matchedKeywords = crate.keywords.filter(keyword => terms.includes(keyword));
        const description = crate.description.toLowerCase();
        const descriptionHits = terms.filter(term => term.length >= 4 && description.includes(term)).length;
        const score = (nameHit ? 5 : 0) + matchedKeywords.length * 2 + descriptionHits;
        if (score === 0) continue;
        scored.push({
            name: crate.name,
            version: crate.version,
            description: crate.description,
            score,
            matchedKeywords,
            alreadyDeclared: declared.has(normalizeCrateName(crate.name)),
            cargoToml: `${crate.name} = "${crate.version}"`
        });
    }
    return scored
        .sort((a, b) => b.score - a.score || a.name.localeCompare(b.name))
        .slice(0, limit);
}

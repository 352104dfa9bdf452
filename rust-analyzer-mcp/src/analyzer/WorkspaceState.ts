import { normalizeUri } from "../utils/DocumentUri.js";

/**
 * `open`: didOpen (or a didChange) has been queued but not yet flushed.
 * `synced`: the analyzer has been sent the current text.
 * Closed documents are not tracked at all.
 */
export type DocumentSyncState = "open" | "synced";

export interface TrackedDocument {
    readonly uri: string;
    readonly path: string;
    readonly languageId: string;
    readonly version: number;
    readonly text: string;
    readonly state: DocumentSyncState;
}

/**
 * Client-side view of the documents the analyzer knows about. Every method is
 * synchronous, so a read-modify-write never interleaves with another caller.
 */
export class WorkspaceState {
    private readonly documents = new Map<string, TrackedDocument>();

    constructor(public readonly rootPath: string) {}

    public get(uri: string): TrackedDocument | undefined {
        return this.documents.get(normalizeUri(uri));
    }

    public isOpen(uri: string): boolean {
        return this.documents.has(normalizeUri(uri));
    }

    public open(uri: string, path: string, text: string, languageId = "rust"): TrackedDocument {
        const key = normalizeUri(uri);
        const document: TrackedDocument = { uri: key, path, languageId, version: 1, text, state: "open" };
        this.documents.set(key, document);
        return document;
    }

    /** Records new full text for an open document and bumps its version. */
    public change(uri: string, text: string): TrackedDocument | undefined {
        const key = normalizeUri(uri);
        const existing = this.documents.get(key);
        if (!existing) return undefined;
        const next: TrackedDocument = { ...existing, text, version: existing.version + 1, state: "open" };
        this.documents.set(key, next);
        return next;
    }

    /** Marks the document synced if `version` is still its latest version. */
    public markSynced(uri: string, version: number): void {
        const key = normalizeUri(uri);
        const existing = this.documents.get(key);
        if (existing && existing.version === version) {
            this.documents.set(key, { ...existing, state: "synced" });
        }
    }

    public close(uri: string): TrackedDocument | undefined {
        const key = normalizeUri(uri);
        const existing = this.documents.get(key);
        this.documents.delete(key);
        return existing;
    }

    /**
     * After a restart the new analyzer knows nothing; every tracked document
     * goes back to `open` at version 1 and is returned for replay.
     */
    public resetForReplay(): TrackedDocument[] {
        const replay: TrackedDocument[] = [];
        for (const [key, document] of this.documents) {
            const reset: TrackedDocument = { ...document, version: 1, state: "open" };
            this.documents.set(key, reset);
            replay.push(reset);
        }
        return replay;
    }

    public clear(): void {
        this.documents.clear();
    }

    public get size(): number {
        return this.documents.size;
    }
}

import { normalizeUri } from "../utils/DocumentUri.js";
import { severityLabel, type LspPublishDiagnostics, type LspRange, type SeverityLabel } from "./protocol.js";

export interface DiagnosticEntry {
    severity: SeverityLabel;
    range: LspRange;
    message: string;
    code?: string;
    source?: string;
    suggestedFix?: string;
    related?: Array<{ uri: string; range: LspRange; message: string }>;
}

export interface DiagnosticsSnapshot {
    uri: string;
    version?: number;
    entries: readonly DiagnosticEntry[];
    /** Absent when no publication has been received for the document yet. */
    receivedAt?: number;
}

/** Latest publication per document; each publication replaces the previous one. */
export class DiagnosticsCache {
    private readonly snapshots = new Map<string, DiagnosticsSnapshot>();

    public publish(params: LspPublishDiagnostics): DiagnosticsSnapshot {
        const uri = normalizeUri(params.uri);
        const entries: DiagnosticEntry[] = params.diagnostics.map(diagnostic => {
            const related = (diagnostic.relatedInformation ?? []).map(info => ({
                uri: info.location.uri,
                range: info.location.range,
                message: info.message
            }));
            const entry: DiagnosticEntry = {
                severity: severityLabel(diagnostic.severity),
                range: diagnostic.range,
                message: diagnostic.message
            };
            if (diagnostic.code !== undefined && diagnostic.code !== null) entry.code = String(diagnostic.code);
            if (diagnostic.source) entry.source = diagnostic.source;
            if (related.length > 0) {
                entry.related = related;
                entry.suggestedFix = related[0].message;
            }
            return entry;
        });

        const snapshot: DiagnosticsSnapshot = Object.freeze({
            uri,
            version: params.version ?? undefined,
            entries: Object.freeze(entries),
            receivedAt: Date.now()
        });
        this.snapshots.set(uri, snapshot);
        return snapshot;
    }

    public get(uri: string): DiagnosticsSnapshot {
        const key = normalizeUri(uri);
        return this.snapshots.get(key) ?? { uri: key, entries: [] };
    }

    public all(): DiagnosticsSnapshot[] {
        return Array.from(this.snapshots.values());
    }

    public clear(): void {
        this.snapshots.clear();
    }
}

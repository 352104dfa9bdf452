import * as path from "path";
import { NotFoundError } from "../../errors/BridgeError.js";
import type { FileStats, IFileSystem } from "../../platform/FileSystem.js";

/** In-memory IFileSystem keyed by absolute path. Directories are implied by their files. */
export class MemoryFileSystem implements IFileSystem {
    private readonly files = new Map<string, { content: string; mtime: number }>();
    private clock = 1;

    constructor(private readonly rootPath: string, initial: Record<string, string> = {}) {
        for (const [file, content] of Object.entries(initial)) {
            this.set(file, content);
        }
    }

    public set(targetPath: string, content: string): void {
        this.files.set(this.resolvePath(targetPath), { content, mtime: this.clock++ });
    }

    public get(targetPath: string): string | undefined {
        return this.files.get(this.resolvePath(targetPath))?.content;
    }

    public paths(): string[] {
        return Array.from(this.files.keys()).sort();
    }

    public resolvePath(targetPath: string): string {
        if (!targetPath) return this.rootPath;
        return path.isAbsolute(targetPath) ? path.normalize(targetPath) : path.join(this.rootPath, targetPath);
    }

    async readFile(targetPath: string): Promise<string> {
        const entry = this.files.get(this.resolvePath(targetPath));
        if (!entry) {
            throw new NotFoundError(`File not found: ${targetPath}`, { path: this.resolvePath(targetPath) });
        }
        return entry.content;
    }

    async writeFile(targetPath: string, content: string): Promise<void> {
        this.set(targetPath, content);
    }

    async rename(from: string, to: string): Promise<void> {
        const source = this.resolvePath(from);
        const entry = this.files.get(source);
        if (!entry) {
            throw new NotFoundError(`File not found: ${from}`, { path: source });
        }
        this.files.delete(source);
        this.files.set(this.resolvePath(to), { content: entry.content, mtime: this.clock++ });
    }

    async deleteFile(targetPath: string): Promise<void> {
        const resolved = this.resolvePath(targetPath);
        for (const file of Array.from(this.files.keys())) {
            if (file === resolved || file.startsWith(resolved + path.sep)) {
                this.files.delete(file);
            }
        }
    }

    async exists(targetPath: string): Promise<boolean> {
        const resolved = this.resolvePath(targetPath);
        return this.files.has(resolved) || this.isDirectory(resolved);
    }

    async stat(targetPath: string): Promise<FileStats> {
        const resolved = this.resolvePath(targetPath);
        const entry = this.files.get(resolved);
        if (entry) {
            return { size: Buffer.byteLength(entry.content), mtime: entry.mtime, isDirectory: () => false };
        }
        if (this.isDirectory(resolved)) {
            return { size: 0, mtime: 0, isDirectory: () => true };
        }
        throw new NotFoundError(`File not found: ${targetPath}`, { path: resolved });
    }

    async listFiles(basePath: string): Promise<string[]> {
        const prefix = this.resolvePath(basePath) + path.sep;
        return Array.from(this.files.keys()).filter(file => file.startsWith(prefix)).sort();
    }

    private isDirectory(resolved: string): boolean {
        const prefix = resolved + path.sep;
        return Array.from(this.files.keys()).some(file => file.startsWith(prefix));
    }
}

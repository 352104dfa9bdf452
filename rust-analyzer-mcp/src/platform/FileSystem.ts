import * as path from "path";
import { promises as fsPromises, constants as fsConstants, type Dirent } from "fs";
import { NotFoundError } from "../errors/BridgeError.js";

export interface FileStats {
    size: number;
    mtime: number;
    isDirectory(): boolean;
}

export interface IFileSystem {
    readFile(path: string): Promise<string>;
    writeFile(path: string, content: string): Promise<void>;
    rename(from: string, to: string): Promise<void>;
    deleteFile(path: string): Promise<void>;
    exists(path: string): Promise<boolean>;
    stat(path: string): Promise<FileStats>;
    listFiles(basePath: string): Promise<string[]>;
    resolvePath(targetPath: string): string;
}

export class NodeFileSystem implements IFileSystem {
    private readonly rootPath: string;

    constructor(rootPath: string) {
        this.rootPath = path.resolve(rootPath);
    }

    public resolvePath(targetPath: string): string {
        if (!targetPath) {
            return this.rootPath;
        }
        return path.isAbsolute(targetPath)
            ? path.normalize(targetPath)
            : path.join(this.rootPath, targetPath);
    }

    async readFile(targetPath: string): Promise<string> {
        const resolved = this.resolvePath(targetPath);
        try {
            return await fsPromises.readFile(resolved, "utf-8");
        } catch (error) {
            if (isErrnoCode(error, "ENOENT")) {
                throw new NotFoundError(`File not found: ${targetPath}`, { path: resolved });
            }
            throw error;
        }
    }

    async writeFile(targetPath: string, content: string): Promise<void> {
        const resolved = this.resolvePath(targetPath);
        await fsPromises.mkdir(path.dirname(resolved), { recursive: true });
        await fsPromises.writeFile(resolved, content, "utf-8");
    }

    async rename(from: string, to: string): Promise<void> {
        const target = this.resolvePath(to);
        await fsPromises.mkdir(path.dirname(target), { recursive: true });
        await fsPromises.rename(this.resolvePath(from), target);
    }

    async deleteFile(targetPath: string): Promise<void> {
        await fsPromises.rm(this.resolvePath(targetPath), { recursive: true, force: true });
    }

    async exists(targetPath: string): Promise<boolean> {
        try {
            await fsPromises.access(this.resolvePath(targetPath), fsConstants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    async stat(targetPath: string): Promise<FileStats> {
        const stats = await fsPromises.stat(this.resolvePath(targetPath));
        return {
            size: stats.size,
            mtime: stats.mtimeMs,
            isDirectory: () => stats.isDirectory(),
        };
    }

    /**
     * Regular files under `basePath`, depth first. Symlinks are not followed and
     * a missing base directory yields no files.
     */
    async listFiles(basePath: string): Promise<string[]> {
        const results: string[] = [];
        const pending = [this.resolvePath(basePath)];
        while (pending.length > 0) {
            const directory = pending.pop();
            if (directory === undefined) break;
            let entries: Dirent[];
            try {
                entries = await fsPromises.readdir(directory, { withFileTypes: true });
            } catch (error) {
                // The build may remove directories while they are listed.
                if (isErrnoCode(error, "ENOENT")) continue;
                throw error;
            }
            for (const entry of entries) {
                const entryPath = path.join(directory, entry.name);
                if (entry.isDirectory()) {
                    pending.push(entryPath);
                } else if (entry.isFile()) {
                    results.push(entryPath);
                }
            }
        }
        return results.sort();
    }
}

export function isErrnoCode(error: unknown, code: string): boolean {
    return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

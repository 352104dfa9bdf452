import * as path from "path";
import { fileURLToPath, pathToFileURL } from "url";

export function pathToUri(filePath: string): string {
    return pathToFileURL(path.resolve(filePath)).href;
}

export function uriToPath(uri: string): string {
    return fileURLToPath(uri);
}

/** Canonical form used as the key for documents and diagnostics. */
export function normalizeUri(uri: string): string {
    if (!uri.startsWith("file:")) {
        return uri;
    }
    return pathToUri(uriToPath(uri));
}

export function displayPath(uri: string, rootPath: string): string {
    if (!uri.startsWith("file:")) return uri;
    const absolute = uriToPath(uri);
    const relative = path.relative(rootPath, absolute);
    return relative && !relative.startsWith("..") && !path.isAbsolute(relative)
        ? relative.split(path.sep).join("/")
        : absolute;
}

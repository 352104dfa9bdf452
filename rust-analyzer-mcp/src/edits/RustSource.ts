// Text spans over Rust source, in UTF-16 offsets.

export interface TextSpan {
    start: number;
    end: number;
}

/**
 * Signature of the item whose name starts at `nameOffset`: from the first
 * non-blank character of that line up to the body `{` or the `;` of a bodiless
 * declaration, without trailing whitespace.
 */
export function signatureSpan(text: string, nameOffset: number, limit = text.length): TextSpan | undefined {
    const lineStart = text.lastIndexOf("\n", nameOffset - 1) + 1;
    let start = lineStart;
    while (start < nameOffset && (text[start] === " " || text[start] === "\t")) {
        start++;
    }

    let depth = 0;
    const stop = Math.min(limit, text.length);
    for (let index = nameOffset; index < stop; index++) {
        const char = text[index];
        if (char === "(" || char === "[" || char === "<") {
            depth++;
        } else if (char === ")" || char === "]" || (char === ">" && text[index - 1] !== "-")) {
            depth = Math.max(0, depth - 1);
        } else if ((char === "{" || char === ";") && depth === 0) {
            let end = index;
            while (end > nameOffset && /\s/.test(text[end - 1])) {
                end--;
            }
            return { start, end };
        }
    }
    return undefined;
}

/**
 * Whole lines of an item plus the doc comments and attributes directly above
 * it, and one trailing blank line when present.
 */
export function itemSpan(text: string, start: number, end: number): TextSpan {
    let spanStart = text.lastIndexOf("\n", start - 1) + 1;
    while (spanStart > 0) {
        const previousStart = text.lastIndexOf("\n", spanStart - 2) + 1;
        const previous = text.slice(previousStart, spanStart - 1).trim();
        if (previousStart < spanStart && (previous.startsWith("///") || previous.startsWith("#["))) {
            spanStart = previousStart;
        } else {
            break;
        }
    }

    const lineEnd = text.indexOf("\n", end);
    let spanEnd = lineEnd < 0 ? text.length : lineEnd + 1;
    const nextLineEnd = text.indexOf("\n", spanEnd);
    if (nextLineEnd >= 0 && text.slice(spanEnd, nextLineEnd).trim().length === 0) {
        spanEnd = nextLineEnd + 1;
    }
    return { start: spanStart, end: spanEnd };
}

/** Replaces whole-word occurrences of an identifier. */
export function replaceIdentifier(text: string, from: string, to: string): string {
    return text.replace(new RegExp(`\\b${from}\\b`, "g"), to);
}

import util from "util";

export interface StdoutGuardOptions {
    /** Leave `console.log` on stdout; breaks the MCP stream. */
    allowStdoutLogs: boolean;
    debug: boolean;
}

export function stdoutGuardOptionsFromEnv(env: NodeJS.ProcessEnv): StdoutGuardOptions {
    return {
        allowStdoutLogs: env.RUST_MCP_ALLOW_STDOUT_LOGS === "true",
        debug: env.RUST_MCP_DEBUG === "true" || (env.RUST_MCP_LOG_LEVEL ?? "").trim().toLowerCase() === "debug"
    };
}

/**
 * Points `log`, `info` and `debug` of `target` at `write` (stderr by default).
 * stdout belongs to the MCP transport.
 */
export function redirectConsole(
    target: Pick<Console, "log" | "info" | "debug">,
    options: StdoutGuardOptions,
    write: (text: string) => void = text => {
        process.stderr.write(text);
    }
): boolean {
    if (options.allowStdoutLogs) return false;
    const forward = (...args: unknown[]) => write(`${util.format(...args)}\n`);
    target.log = forward;
    target.info = forward;
    target.debug = options.debug ? forward : () => undefined;
    return true;
}

redirectConsole(console, stdoutGuardOptionsFromEnv(process.env));

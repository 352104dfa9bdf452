/** Borrow checker and lifetime error codes with a one-line explanation each. */
export const LIFETIME_ERROR_CODES: Readonly<Record<string, string>> = {
    E0106: "missing lifetime specifier",
    E0261: "use of an undeclared lifetime name",
    E0495: "cannot infer an appropriate lifetime",
    E0499: "value borrowed as mutable more than once at a time",
    E0502: "value borrowed as mutable while also borrowed as immutable",
    E0505: "value moved out while it is borrowed",
    E0506: "value assigned to while it is borrowed",
    E0597: "borrowed value does not live long enough",
    E0621: "explicit lifetime required in a parameter type",
    E0700: "hidden type captures a lifetime that does not appear in its bounds",
    E0716: "temporary value dropped while borrowed"
};

const LIFETIME_MESSAGE = /lifetime|borrow|does not live long enough/i;

export function isLifetimeIssue(code: string | undefined, message: string): boolean {
    if (code !== undefined && Object.hasOwn(LIFETIME_ERROR_CODES, code)) return true;
    return LIFETIME_MESSAGE.test(message);
}

export function explainLifetimeCode(code: string | undefined): string | undefined {
    return code !== undefined && Object.hasOwn(LIFETIME_ERROR_CODES, code) ? LIFETIME_ERROR_CODES[code] : undefined;
}

import { describe, expect, it } from "@jest/globals";
import { explainLifetimeCode, isLifetimeIssue } from "../quality/LifetimeDiagnostics.js";

describe("LifetimeDiagnostics", () => {
    it("recognizes borrow checker codes and messages", () => {
        expect(isLifetimeIssue("E0597", "`x` dropped here")).toBe(true);
        expect(isLifetimeIssue(undefined, "cannot borrow `v` as mutable more than once")).toBe(true);
        expect(isLifetimeIssue("E0308", "mismatched types")).toBe(false);
    });

    it("explains known codes only", () => {
        expect(explainLifetimeCode("E0106")).toBe("missing lifetime specifier");
        expect(explainLifetimeCode("E0308")).toBeUndefined();
        expect(explainLifetimeCode("toString")).toBeUndefined();
        expect(explainLifetimeCode(undefined)).toBeUndefined();
    });
});

import { describe, expect, it } from "@jest/globals";
import { CargoMetadataSchema, summarizeMetadata } from "../project/CargoMetadata.js";

const ROOT = "/tmp/meta-ws";
const DEMO_ID = "path+file:///tmp/meta-ws#demo@0.1.0";

const RAW = {
    packages: [
        {
            name: "demo",
            version: "0.1.0",
            id: DEMO_ID,
            edition: "2021",
            manifest_path: `${ROOT}/Cargo.toml`,
            description: null,
            dependencies: [
                { name: "serde", req: "^1", kind: null, optional: false, features: ["derive"] },
                { name: "tempfile", req: "^3", kind: "dev", optional: false, features: [], rename: "tmp" },
                { name: "cc", req: "^1", kind: "build", optional: true, features: [], target: "cfg(unix)" }
            ],
            targets: [{ name: "demo", kind: ["lib"], src_path: `${ROOT}/src/lib.rs` }],
            features: { default: ["std"], std: [] }
        },
        {
            name: "serde",
            version: "1.0.200",
            id: "registry+https://github.com/rust-lang/crates.io-index#serde@1.0.200",
            manifest_path: "/home/dev/.cargo/registry/serde/Cargo.toml",
            dependencies: [],
            targets: []
        }
    ],
    workspace_members: [DEMO_ID],
    workspace_root: ROOT,
    target_directory: `${ROOT}/target`
};

describe("CargoMetadata", () => {
    it("summarizes workspace members and groups dependencies by kind", () => {
        const summary = summarizeMetadata(CargoMetadataSchema.parse(RAW), ROOT);

        expect(summary.summary).toBe("1 package, 3 declared dependencies");
        expect(summary.isWorkspace).toBe(false);
        expect(summary.targetDirectory).toBe(`${ROOT}/target`);
        expect(summary.packages).toEqual([{
            name: "demo",
            version: "0.1.0",
            edition: "2021",
            manifestPath: "Cargo.toml",
            targets: [{ name: "demo", kinds: ["lib"], srcPath: "src/lib.rs" }],
            dependencies: {
                normal: [{ name: "serde", requirement: "^1", optional: false, features: ["derive"] }],
                dev: [{ name: "tmp", requirement: "^3", optional: false, features: [] }],
                build: [{ name: "cc", requirement: "^1", optional: true, features: [], target: "cfg(unix)" }]
            },
            features: { default: ["std"], std: [] }
        }]);
    });

    it("fills defaults for fields older cargo releases omit", () => {
        const metadata = CargoMetadataSchema.parse({ ...RAW, workspace_members: [] });
        const serde = metadata.packages[1];

        expect(serde.edition).toBe("2015");
        expect(serde.features).toEqual({});
    });

    it("keeps every package when there are no workspace members", () => {
        const summary = summarizeMetadata(CargoMetadataSchema.parse({ ...RAW, workspace_members: [] }), ROOT);

        expect(summary.summary).toBe("2 packages, 3 declared dependencies");
        expect(summary.isWorkspace).toBe(true);
        expect(summary.packages[1].manifestPath).toBe("/home/dev/.cargo/registry/serde/Cargo.toml");
    });

    it("rejects output that is not cargo metadata", () => {
        expect(CargoMetadataSchema.safeParse({ packages: [] }).success).toBe(false);
    });
});

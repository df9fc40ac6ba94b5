import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";

import { DependencyAggregator } from "../../engine/aggregate";
import { CyclicDependencyError, DefinitionError } from "../../engine/errors";
import { createProject, loadProject, parseKilnfile } from "../kilnfile";

describe("parseKilnfile", () => {
    it("fills in defaults", () => {
        const kilnfile = parseKilnfile(
            { steps: { views: { tool: "template", sources: ["app/views"], dest: "out/views" } } },
            "Kilnfile.json"
        );

        expect(kilnfile.modules).toEqual({});
        expect(kilnfile.steps.views).toEqual({
            tool: "template",
            toolPaths: [],
            sources: ["app/views"],
            patterns: ["**/*"],
            dest: "out/views",
            strictFormats: false,
            settings: {},
            toolOptions: {}
        });
    });

    it("names the offending field", () => {
        expect(() => parseKilnfile({ steps: { web: { tool: "template", sources: ["views"] } } }, "Kilnfile.json")).toThrow(
            new DefinitionError("Kilnfile.json: steps.web.dest: Required")
        );
    });

    it("rejects unknown keys", () => {
        expect(() => parseKilnfile({ targets: {} }, "Kilnfile.json")).toThrow(DefinitionError);
    });
});

describe("createProject", () => {
    it("resolves step paths against the project root", () => {
        const project = createProject(
            parseKilnfile(
                { steps: { fmt: { tool: "shell", toolPaths: ["bin/scalafmt"], sources: ["src"], dest: "out", jobs: 2 } } },
                "Kilnfile.json"
            ),
            "/work/project"
        );

        expect(project.steps.get("fmt")).toMatchObject({
            name: "fmt",
            toolPaths: [path.resolve("/work/project", "bin/scalafmt")],
            sources: [path.resolve("/work/project", "src")],
            dest: path.resolve("/work/project", "out"),
            options: { jobs: 2, strictFormats: false }
        });
    });

    it("rejects cyclic modules up front", () => {
        const kilnfile = parseKilnfile({ modules: { a: { dependsOn: ["b"] }, b: { dependsOn: ["a"] } } }, "Kilnfile.json");

        expect(() => createProject(kilnfile, "/work")).toThrow(CyclicDependencyError);
    });

    it("rejects manifests of unknown modules", () => {
        const kilnfile = parseKilnfile({ manifests: { web: { module: "web", dest: "out" } } }, "Kilnfile.json");

        expect(() => createProject(kilnfile, "/work")).toThrow("manifest web: unknown module: web");
    });
});

describe("loadProject", () => {
    let tempRoot: string;

    beforeEach(async () => {
        tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), "kiln-config-"));
    });

    afterEach(async () => {
        await fs.rm(tempRoot, { recursive: true, force: true });
    });

    it("turns modules into aggregatable facts, reading fragment files", async () => {
        await fs.writeFile(path.join(tempRoot, "props.js"), "export default {};");
        await fs.writeFile(
            path.join(tempRoot, "Kilnfile.json"),
            JSON.stringify({
                modules: {
                    core: { dependencies: { uuid: "8.1.0" }, fragmentFiles: { "props.js": "props.js" } },
                    web: { dependsOn: ["core"], devDependencies: { mocha: "10.0.0" } }
                }
            })
        );

        const project = await loadProject(path.join(tempRoot, "Kilnfile.json"));
        const result = await new DependencyAggregator(project.graph).aggregateModule("web");

        expect(result.dependencies).toEqual([
            { kind: "dependency", name: "uuid", version: "8.1.0", scope: "runtime" },
            { kind: "dependency", name: "mocha", version: "10.0.0", scope: "dev" }
        ]);
        expect(result.fragments.get("props.js")).toEqual({ content: "export default {};", origin: "core" });
    });

    it("reports unreadable files", async () => {
        await fs.writeFile(path.join(tempRoot, "Kilnfile.json"), "{ not json");

        await expect(loadProject(path.join(tempRoot, "Kilnfile.json"))).rejects.toThrow(DefinitionError);
    });
});

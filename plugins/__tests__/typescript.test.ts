import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";

import { emittedName, TypeScriptPlugin } from "../typescript";

describe("emittedName", () => {
    it("maps TypeScript extensions to their JavaScript ones", () => {
        expect(emittedName("src/a.ts")).toBe("src/a.js");
        expect(emittedName("b.tsx")).toBe("b.js");
        expect(emittedName("c.mts")).toBe("c.mjs");
        expect(emittedName("d.cts")).toBe("d.cjs");
        expect(emittedName("e.json")).toBe("e.json");
    });
});

describe("TypeScriptPlugin", () => {
    let tempRoot: string;
    let src: string;
    let out: string;

    beforeEach(async () => {
        tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), "kiln-ts-"));
        src = path.join(tempRoot, "src");
        out = path.join(tempRoot, "out");
        await fs.mkdir(path.join(src, "lib"), { recursive: true });
    });

    afterEach(async () => {
        await fs.rm(tempRoot, { recursive: true, force: true });
    });

    it("transpiles one file below the output root", async () => {
        const input = path.join(src, "lib", "answer.ts");
        await fs.writeFile(input, "const x: number = 1;\nexport default x;\n");
        const handle = await TypeScriptPlugin.instance.createHandle([], {});

        const written = await handle.invoke(input, src, out, "TxtFormat", {});

        expect(written).toEqual([path.join(out, "lib", "answer.js")]);
        const output = await fs.readFile(path.join(out, "lib", "answer.js"), "utf-8");
        expect(output).toContain("const x = 1;");
        expect(output).toContain("exports.default = x;");
        expect(handle.concurrentSafe).toBe(true);
    });

    it("fails with the syntax error position", async () => {
        const input = path.join(src, "broken.ts");
        await fs.writeFile(input, "let x = ;\n");
        const handle = await TypeScriptPlugin.instance.createHandle([], {});

        await expect(handle.invoke(input, src, out, "TxtFormat", {})).rejects.toThrow(
            `Error ${input} (1,9): Expression expected.`
        );
    });

    it("rejects invalid compiler options", async () => {
        await expect(TypeScriptPlugin.instance.createHandle([], { compilerOptions: { target: "es1" } })).rejects.toThrow(
            /target/
        );
    });

    it("rejects modules that are not a compiler", async () => {
        const fake = path.join(tempRoot, "not-typescript.js");
        await fs.writeFile(fake, "module.exports = { version: '1.0.0' };\n");

        await expect(TypeScriptPlugin.instance.createHandle([fake], {})).rejects.toThrow(`${fake} is not a TypeScript compiler`);
    });
});

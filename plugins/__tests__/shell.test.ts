import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";

import { parseShellSettings, ShellPlugin, substituteArgs } from "../shell";

const COPY_SCRIPT = "const [a, b] = process.argv.slice(-2); require('fs').copyFileSync(a, b);";

describe("substituteArgs", () => {
    it("replaces known placeholders and keeps unknown ones", () => {
        expect(substituteArgs(["--in={input}", "{output}", "{nope}"], { input: "a.scala", output: "b.scala" })).toEqual([
            "--in=a.scala",
            "b.scala",
            "{nope}"
        ]);
    });

    it("ignores names inherited from Object.prototype", () => {
        expect(substituteArgs(["{constructor}", "{toString}", "{input}"], { input: "a.scala" })).toEqual([
            "{constructor}",
            "{toString}",
            "a.scala"
        ]);
    });
});

describe("parseShellSettings", () => {
    it("requires a list of string arguments", () => {
        expect(parseShellSettings({ args: ["-q"] })).toEqual({ args: ["-q"], concurrent: false });
        expect(() => parseShellSettings({ args: "-q" })).toThrow("shell: 'args' must be a list of strings");
    });
});

describe("ShellPlugin", () => {
    let tempRoot: string;
    let src: string;
    let out: string;

    beforeEach(async () => {
        tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), "kiln-shell-"));
        src = path.join(tempRoot, "src");
        out = path.join(tempRoot, "out");
        await fs.mkdir(src);
        await fs.writeFile(path.join(src, "Main.scala"), "object Main");
    });

    afterEach(async () => {
        await fs.rm(tempRoot, { recursive: true, force: true });
    });

    it("runs the executable once per file", async () => {
        const handle = await ShellPlugin.instance.createHandle([process.execPath], {
            args: ["-e", COPY_SCRIPT, "{input}", "{output}"]
        });

        const written = await handle.invoke(path.join(src, "Main.scala"), src, out, "TxtFormat", {});

        expect(written).toEqual([path.join(out, "Main.scala")]);
        expect(await fs.readFile(path.join(out, "Main.scala"), "utf-8")).toBe("object Main");
        expect(handle.concurrentSafe).toBe(false);
    });

    it("fails with the exit code and output of the command", async () => {
        const handle = await ShellPlugin.instance.createHandle([process.execPath], {
            args: ["-e", "process.stderr.write('bad input\\n'); process.exit(3)"]
        });

        await expect(handle.invoke(path.join(src, "Main.scala"), src, out, "TxtFormat", {})).rejects.toThrow(
            /failed \(exit code 3\):\nbad input$/
        );
    });

    it("refuses a missing executable", async () => {
        await expect(ShellPlugin.instance.createHandle([path.join(tempRoot, "scalafmt")], {})).rejects.toMatchObject({
            code: "ENOENT"
        });
        await expect(ShellPlugin.instance.createHandle([], {})).rejects.toThrow("shell: no executable given");
    });
});

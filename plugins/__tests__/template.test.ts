import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";

import { projectRequire } from "../protocol";
import { TemplatePlugin, templateOutputPath } from "../template";

function loadRender(modulePath: string): (data: Record<string, unknown>) => string {
    const loaded: unknown = projectRequire()(modulePath);
    if (typeof loaded !== "object" || loaded === null || !("render" in loaded) || typeof loaded.render !== "function") {
        throw new Error(`${modulePath} exports no render function`);
    }
    const render = loaded.render;
    return data => String(render(data));
}

describe("TemplatePlugin", () => {
    let tempRoot: string;
    let views: string;
    let out: string;
    let helpers: string;

    beforeEach(async () => {
        tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), "kiln-template-"));
        views = path.join(tempRoot, "views");
        out = path.join(tempRoot, "out");
        helpers = path.join(tempRoot, "helpers.js");
        await fs.mkdir(views);
        await fs.writeFile(helpers, "module.exports = { shout: s => String(s).toUpperCase() };\n");
    });

    afterEach(async () => {
        await fs.rm(tempRoot, { recursive: true, force: true });
    });

    it("compiles html templates with escaping and helpers in scope", async () => {
        const input = path.join(views, "page.scala.html");
        await fs.writeFile(input, "<h1><%- title %></h1><p><%= shout(name) %></p>");
        const handle = await TemplatePlugin.instance.createHandle([helpers], {});

        const written = await handle.invoke(input, views, out, "HtmlFormat", {});

        expect(written).toEqual([path.join(out, "html", "page.scala.html.js")]);
        const render = loadRender(written[0]);
        expect(render({ title: "<b>", name: "ada" })).toBe("<h1>&lt;b&gt;</h1><p>ADA</p>");
    });

    it("does not escape plain text", async () => {
        const input = path.join(views, "mail.scala.txt");
        await fs.writeFile(input, "Hi <%- who %>");
        const handle = await TemplatePlugin.instance.createHandle([], {});

        const [written] = await handle.invoke(input, views, out, "TxtFormat", {});

        expect(written).toBe(path.join(out, "txt", "mail.scala.txt.js"));
        expect(loadRender(written)({ who: "<x>" })).toBe("Hi <x>");
    });

    it("reports template syntax errors", async () => {
        const input = path.join(views, "broken.scala.html");
        await fs.writeFile(input, "<% if ( %>");
        const handle = await TemplatePlugin.instance.createHandle([], {});

        await expect(handle.invoke(input, views, out, "HtmlFormat", {})).rejects.toThrow();
        await expect(fs.stat(templateOutputPath(input, views, out, "HtmlFormat"))).rejects.toMatchObject({ code: "ENOENT" });
    });

    it("rejects helpers that export nothing usable", async () => {
        const bad = path.join(tempRoot, "bad.js");
        await fs.writeFile(bad, "module.exports = 42;\n");

        await expect(TemplatePlugin.instance.createHandle([bad], {})).rejects.toThrow(
            `${bad}: template helpers must export an object`
        );
    });
});

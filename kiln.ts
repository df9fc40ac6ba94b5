#!/usr/bin/env node

//
// kiln command line: run generation steps and write manifests from a Kilnfile.json.
//

import yargs from "yargs";

import { loadProject } from "./config/kilnfile";
import { KilnError } from "./engine/errors";
import { createLogger } from "./engine/log";
import { checkJobs, KILN_DEFAULTS, KilnParams, KilnRunner, succeeded } from "./runner";
import { watchUntilSignal } from "./watch";

// tslint:disable:no-console

const log = createLogger("kiln");

interface CliCommand {
    command: "generate" | "manifest";
    names: string[];
    params: KilnParams;
}

function parseArgs(argv: string[]): CliCommand {
    let command: CliCommand["command"] = "generate";
    const cliArgs = yargs(argv)
        .scriptName("kiln")
        .option("file", {
            alias: "f",
            describe: "Kilnfile to load",
            type: "string",
            default: KILN_DEFAULTS.file
        })
        .option("watch", {
            alias: "w",
            describe: "watch mode",
            type: "boolean",
            default: KILN_DEFAULTS.watch
        })
        .option("keepGoing", {
            alias: "k",
            describe: "keep going after failures",
            type: "boolean",
            default: KILN_DEFAULTS.keepGoing
        })
        .option("jobs", {
            alias: "j",
            describe: "number of parallel jobs",
            type: "number",
            default: KILN_DEFAULTS.jobsMax
        })
        .command("generate [names..]", "run generation steps (all by default)", () => undefined, () => {
            command = "generate";
        })
        .command("manifest [names..]", "write manifests (all by default)", () => undefined, () => {
            command = "manifest";
        })
        .strict()
        .help()
        .parseSync();

    const names = Array.isArray(cliArgs.names) ? cliArgs.names.map(String) : [];
    return {
        command,
        names,
        params: {
            file: cliArgs.file,
            watch: cliArgs.watch,
            keepGoing: cliArgs.keepGoing,
            jobsMax: checkJobs(cliArgs.jobs)
        }
    };
}

async function main(argv: string[]): Promise<number> {
    const { command, names, params } = parseArgs(argv);
    const project = await loadProject(params.file);
    const runner = new KilnRunner(project, params);

    try {
        if (command === "manifest") {
            await runner.writeManifests(names);
            return 0;
        }
        if (params.watch) {
            await watchUntilSignal(runner, names);
            return 0;
        }
        const runs = await runner.generate(names);
        const failed = runs.filter(run => !succeeded(run));
        if (failed.length > 0) {
            log.info(`failure (FAILED: ${failed.map(run => run.step).join(", ")})`);
            return 1;
        }
        log.info(`success (ok: ${runs.length})`);
        return 0;
    } finally {
        await runner.close();
    }
}

main(process.argv.slice(2))
    .then(exitCode => {
        process.exit(exitCode);
    })
    .catch(error => {
        if (error instanceof KilnError) {
            console.error(`kiln: ${error.message}`);
        } else {
            console.error("kiln: uncaught exception", error);
        }
        process.exit(2);
    });

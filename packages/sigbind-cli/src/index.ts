#!/usr/bin/env node
import cac from "cac";
import { version } from "../package.json";
import { generate } from "./commands/generate";
import { scan } from "./commands/scan";

const cli = cac("sigbind");

cli.command("scan", "List the signals and listener declarations found in the sources")
    .option("-s, --src <dir>", "Source directory", { default: "src" })
    .action(scan);

cli.command("generate", "Generate the signal list for a manual registry")
    .option("-s, --src <dir>", "Source directory", { default: "src" })
    .option("-o, --output <dir>", "Output directory", { default: ".sigbind" })
    .action(generate);

cli.help();
cli.version(version);
cli.parse(process.argv, { run: false });

try {
    await cli.runMatchedCommand();
} catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
}

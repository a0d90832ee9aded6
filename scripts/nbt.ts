import { runNbtCli } from "../src/cli.ts";

process.exitCode = runNbtCli(process.argv.slice(2));

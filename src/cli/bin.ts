#!/usr/bin/env node
import { runCLI } from "./index";

const result = await runCLI(process.argv.slice(2), {
	stdout: (text) => process.stdout.write(`${text}\n`),
	stderr: (text) => process.stderr.write(`${text}\n`),
});

process.exitCode = result.exitCode;

#!/usr/bin/env node
import * as fs from "fs";
import { runCli } from "./cli";

process.exitCode = runCli(process.argv.slice(2), {
	readFile: path => fs.readFileSync(path, "utf8"),
	readStdin: () => fs.readFileSync(0, "utf8"),
	stdout: text => console.log(text),
	stderr: text => console.error(text),
	env: process.env
});

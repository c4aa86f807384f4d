import { runSapling } from "./sapling";

export interface CliIO {
	readFile(path: string): string;
	readStdin(): string;
	stdout(text: string): void;
	stderr(text: string): void;
	env: Record<string, string | undefined>;
}

export const usage = "usage: sapling [file] [--trace]";

const isEnabled = (flag: string | undefined) => flag !== undefined && flag !== "" && flag !== "0" && flag !== "false";

/** Returns the process exit code. */
export function runCli(args: string[], io: CliIO): number {
	if (args.includes("--help") || args.includes("-h")) {
		io.stdout(usage);
		return 0;
	}

	const trace = args.includes("--trace") || isEnabled(io.env.SAPLING_TRACE);
	const files = args.filter(a => !a.startsWith("-"));
	const unknown = args.filter(a => a.startsWith("-") && a !== "--trace");
	if (files.length > 1 || unknown.length > 0) {
		io.stderr(usage);
		return 2;
	}

	let src: string;
	try {
		src = files.length === 1 ? io.readFile(files[0]) : io.readStdin();
	} catch (e) {
		io.stderr(`sapling: cannot read ${files[0] ?? "stdin"}: ${e instanceof Error ? e.message : String(e)}`);
		return 1;
	}

	let output = "";
	const ok = runSapling(src.trim(), text => { output = text; }, { trace });
	if (ok) {
		io.stdout(output);
		return 0;
	}
	io.stderr(output);
	return 1;
}

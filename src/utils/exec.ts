import { spawn } from "node:child_process";

export type CommandResult = {
	code: number;
	stdout: string;
	stderr: string;
	/** stdout and stderr interleaved in arrival order */
	output: string;
	/** Set when the process was killed by the abort signal */
	aborted: boolean;
};

export type CommandOptions = {
	cwd?: string;
	/** Written to stdin, which is then closed */
	input?: string;
	signal?: AbortSignal;
	env?: NodeJS.ProcessEnv;
};

export type CommandRunner = (
	args: string[],
	options?: CommandOptions,
) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (args, options) => {
	const [cmd, ...rest] = args;
	if (!cmd) throw new Error("runCommand requires at least one argument");
	options?.signal?.throwIfAborted();

	return new Promise((resolve, reject) => {
		const proc = spawn(cmd, rest, {
			stdio: ["pipe", "pipe", "pipe"],
			cwd: options?.cwd,
			env: options?.env,
		});

		const stdoutChunks: Buffer[] = [];
		const stderrChunks: Buffer[] = [];
		const outputChunks: Buffer[] = [];
		let aborted = false;

		const onAbort = () => {
			aborted = true;
			proc.kill("SIGTERM");
		};
		options?.signal?.addEventListener("abort", onAbort, { once: true });

		proc.stdout?.on("data", (chunk: Buffer) => {
			stdoutChunks.push(chunk);
			outputChunks.push(chunk);
		});
		proc.stderr?.on("data", (chunk: Buffer) => {
			stderrChunks.push(chunk);
			outputChunks.push(chunk);
		});

		proc.on("error", (error) => {
			options?.signal?.removeEventListener("abort", onAbort);
			reject(error);
		});
		proc.on("close", (code) => {
			options?.signal?.removeEventListener("abort", onAbort);
			resolve({
				code: code ?? 1,
				stdout: Buffer.concat(stdoutChunks).toString("utf-8"),
				stderr: Buffer.concat(stderrChunks).toString("utf-8"),
				output: Buffer.concat(outputChunks).toString("utf-8"),
				aborted,
			});
		});

		// A command that exits before reading stdin surfaces as EPIPE here.
		proc.stdin?.on("error", () => undefined);
		proc.stdin?.end(options?.input);
	});
};

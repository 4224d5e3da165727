import os from "node:os";
import type { CommandContext } from "@stricli/core";

// Commands read the environment and working directory from here, never from globals.
export type LocalContext = CommandContext & {
	readonly process: NodeJS.Process;
	readonly cwd: string;
	readonly homeDir: string;
};

export function buildContext(process: NodeJS.Process): LocalContext {
	return { process, cwd: process.cwd(), homeDir: os.homedir() };
}

import { rename, rm, stat } from "node:fs/promises";
import { DownloadError, errorMessage, hasErrorCode } from "../errors.js";
import type { DownloadTask } from "../sync/diff.js";
import { type CommandRunner, runCommand } from "../utils/exec.js";
import { type Quality, selectBestUrl } from "./quality.js";

export type FetchResult = {
	succeeded: boolean;
	/** Combined downloader output, or the reason nothing was started */
	log: string;
	aborted?: boolean;
};

export interface Downloader {
	fetch(
		task: DownloadTask,
		token: string | null,
		signal?: AbortSignal,
	): Promise<FetchResult>;
}

export type CurlDownloaderOptions = {
	curlBin?: string;
	curlOpts?: readonly string[];
	maxQuality?: Quality;
	run?: CommandRunner;
};

type PartialState = "none" | "resume" | "complete";

/**
 * Fetches one video stream with curl into `<target>.part` and
 * renames it into place on success, so the library never shows a file the
 * scanner would mistake for a finished download.
 */
export class CurlDownloader implements Downloader {
	private readonly curlBin: string;
	private readonly curlOpts: readonly string[];
	private readonly maxQuality?: Quality;
	private readonly run: CommandRunner;

	constructor(options: CurlDownloaderOptions = {}) {
		this.curlBin = options.curlBin ?? "curl";
		this.curlOpts = options.curlOpts ?? [];
		this.maxQuality = options.maxQuality;
		this.run = options.run ?? runCommand;
	}

	async fetch(
		task: DownloadTask,
		token: string | null,
		signal?: AbortSignal,
	): Promise<FetchResult> {
		const player = selectBestUrl(task.video.playerUrls, this.maxQuality);
		if (!player) {
			throw new DownloadError(
				`No stream available${this.maxQuality ? ` at or below ${this.maxQuality}` : ""}`,
			);
		}

		const partPath = `${task.targetPath}.part`;
		try {
			const partial = await this.inspectPartial(partPath, player.url, signal);
			if (partial === "complete") {
				await rename(partPath, task.targetPath);
				return { succeeded: true, log: `Completed from existing ${partPath}` };
			}

			const args = [this.curlBin, "-L", "--fail", "-sS", ...this.curlOpts];
			if (partial === "resume") args.push("-C", "-");
			if (token) args.push("-H", `Authorization: Bearer ${token}`);
			args.push("-o", partPath, player.url);

			const result = await this.run(args, { signal });
			if (result.code !== 0) {
				return {
					succeeded: false,
					log: result.output.trim() || `${this.curlBin} exited with code ${result.code}`,
					aborted: result.aborted,
				};
			}

			await rename(partPath, task.targetPath);
			return { succeeded: true, log: result.output.trim() };
		} catch (error) {
			return { succeeded: false, log: errorMessage(error) };
		}
	}

	/** A partial larger than the remote file is corrupt and starts over. */
	private async inspectPartial(
		partPath: string,
		url: string,
		signal?: AbortSignal,
	): Promise<PartialState> {
		const localSize = await fileSize(partPath);
		if (localSize === null) return "none";

		const remoteSize = await this.remoteSize(url, signal);
		if (remoteSize !== null && localSize > remoteSize) {
			await rm(partPath, { force: true });
			return "none";
		}
		if (remoteSize !== null && localSize === remoteSize) return "complete";
		return "resume";
	}

	private async remoteSize(url: string, signal?: AbortSignal): Promise<number | null> {
		const result = await this.run(
			[this.curlBin, "-sI", "-L", ...this.curlOpts, url],
			{ signal },
		);
		if (result.code !== 0) return null;
		return parseContentLength(result.stdout);
	}
}

/** Last Content-Length in a header dump, i.e. the one after redirects. */
export function parseContentLength(headers: string): number | null {
	let length: number | null = null;
	for (const line of headers.split(/\r?\n/)) {
		const match = /^content-length:\s*(\d+)/i.exec(line);
		if (match?.[1]) length = Number(match[1]);
	}
	return length;
}

async function fileSize(filePath: string): Promise<number | null> {
	try {
		return (await stat(filePath)).size;
	} catch (error) {
		if (hasErrorCode(error, "ENOENT")) return null;
		throw error;
	}
}

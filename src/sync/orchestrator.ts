import { existsSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../errors.js";
import { episodeLabel } from "../library/naming.js";
import type { Downloader } from "../media/downloader.js";
import type { MetadataWriter } from "../media/metadata.js";
import type { Notifier } from "../notify/dispatcher.js";
import { log, logItemResult } from "../ui/logger.js";
import type { DownloadTask } from "./diff.js";

export type DownloadResult = {
	task: DownloadTask;
	succeeded: boolean;
	log: string;
	aborted: boolean;
};

export type DownloadOrchestratorOptions = {
	downloader: Downloader;
	notifier: Notifier;
	metadata?: MetadataWriter;
};

export class DownloadOrchestrator {
	private readonly downloader: Downloader;
	private readonly notifier: Notifier;
	private readonly metadata?: MetadataWriter;

	constructor(options: DownloadOrchestratorOptions) {
		this.downloader = options.downloader;
		this.notifier = options.notifier;
		this.metadata = options.metadata;
	}

	/**
	 * Downloads one task into its target path. Never throws for content
	 * problems: they come back as a failed result.
	 */
	async process(
		task: DownloadTask,
		token: string | null,
		signal?: AbortSignal,
	): Promise<DownloadResult> {
		// Existing media is never replaced.
		if (existsSync(task.targetPath)) {
			return {
				task,
				succeeded: false,
				log: `Refusing to overwrite existing file ${task.targetPath}`,
				aborted: false,
			};
		}

		try {
			await mkdir(path.dirname(task.targetPath), { recursive: true });
			const outcome = await this.downloader.fetch(task, token, signal);
			if (outcome.succeeded) {
				await this.embedMetadata(task, signal);
			}
			return {
				task,
				succeeded: outcome.succeeded,
				log: outcome.log,
				aborted: outcome.aborted ?? false,
			};
		} catch (error) {
			return { task, succeeded: false, log: errorMessage(error), aborted: false };
		}
	}

	/**
	 * Processes tasks one at a time in the given order, notifying after each.
	 * A failed task does not stop the ones after it; an aborted run does.
	 */
	async processAll(
		tasks: readonly DownloadTask[],
		token: string | null,
		signal?: AbortSignal,
	): Promise<DownloadResult[]> {
		const results: DownloadResult[] = [];

		for (const task of tasks) {
			signal?.throwIfAborted();
			const name = `${episodeLabel(task)} - ${task.post.title}`;
			log.info(`Downloading '${name}'`, { channel: task.post.channel });

			const result = await this.process(task, token, signal);
			results.push(result);
			if (result.aborted) {
				signal?.throwIfAborted();
			}

			logItemResult({
				channel: task.post.channel,
				status: result.succeeded ? "downloaded" : "failed",
				name,
				reason: result.succeeded ? undefined : firstLine(result.log),
			});

			await this.notifier.notify({
				channel: task.post.channel,
				season: task.season,
				episode: task.episode,
				title: task.post.title,
				postUrl: task.post.blogUrl,
				succeeded: result.succeeded,
				log: result.log,
				path: result.succeeded ? task.targetPath : undefined,
			});
		}

		return results;
	}

	private async embedMetadata(task: DownloadTask, signal?: AbortSignal): Promise<void> {
		if (!this.metadata) return;
		try {
			await this.metadata.embed(task.targetPath, task.post, task.video, signal);
		} catch (error) {
			log.warn(`Failed to embed metadata: ${errorMessage(error)}`, {
				channel: task.post.channel,
			});
		}
	}
}

function firstLine(text: string): string {
	const line = text.split("\n").find((l) => l.trim().length > 0) ?? "";
	return line.length > 200 ? `${line.slice(0, 197)}...` : line;
}

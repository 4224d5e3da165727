import type { TokenSource } from "../auth/token-manager.js";
import type { CatalogSource } from "../catalog/crawler.js";
import type { CatalogEntry, ChannelRef, Post } from "../catalog/types.js";
import type { SyncConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { type LibraryLayout, channelDirectory, videoFiles } from "../library/naming.js";
import type { LibraryIndex } from "../library/scanner.js";
import type { MetadataWriter } from "../media/metadata.js";
import type { LibraryRefresher } from "../refresh/client.js";
import {
	log,
	logChannelCompleted,
	logChannelFound,
	logChannelStarted,
	logItemResult,
} from "../ui/logger.js";
import { type DownloadTask, diff } from "./diff.js";
import type { LockManager } from "./lock.js";
import type { DownloadOrchestrator } from "./orchestrator.js";

export type SyncServices = {
	lock: LockManager;
	/** null for an anonymous run */
	tokens: TokenSource | null;
	catalog: CatalogSource;
	library: LibraryIndex;
	orchestrator: DownloadOrchestrator;
	metadata?: MetadataWriter;
	refresher: LibraryRefresher;
};

export type SyncOptions = Pick<
	SyncConfig,
	| "channels"
	| "daysBack"
	| "updateMetadata"
	| "forceTokenRefresh"
	| "lockFile"
	| "refreshTargets"
	| "outputDir"
	| "layout"
>;

export type ChannelSummary = {
	channel: string;
	found: number;
	downloaded: number;
	updated: number;
	failed: number;
	/** Set when the channel was abandoned before or during its crawl */
	error?: string;
};

export type RunSummary = {
	channels: ChannelSummary[];
	downloaded: number;
	updated: number;
	failed: number;
	refreshed: number;
};

/**
 * One scheduled run: holds the lock for its whole duration, processes
 * channels one after another and refreshes the media servers once at the end.
 * Only a lock failure or an abort escapes; everything else stays inside the
 * channel it happened in.
 */
export async function runSync(
	options: SyncOptions,
	services: SyncServices,
	signal?: AbortSignal,
): Promise<RunSummary> {
	const handle = await services.lock.acquire(options.lockFile);
	try {
		const layout: LibraryLayout = { outputDir: options.outputDir, ...options.layout };
		const channels = new ChannelRunner(options, services, layout, signal);
		const summaries: ChannelSummary[] = [];

		for (const [channel, refs] of groupByChannel(options.channels)) {
			signal?.throwIfAborted();
			summaries.push(await channels.run(channel, refs));
		}

		const summary: RunSummary = {
			channels: summaries,
			downloaded: sum(summaries, "downloaded"),
			updated: sum(summaries, "updated"),
			failed: sum(summaries, "failed"),
			refreshed: 0,
		};

		if (summary.downloaded + summary.updated > 0) {
			for (const target of options.refreshTargets) {
				if (await services.refresher.refresh(target)) summary.refreshed++;
			}
		} else if (options.refreshTargets.length > 0) {
			log.debug("Nothing new, skipping library refresh");
		}

		return summary;
	} finally {
		await services.lock.release(handle);
	}
}

class ChannelRunner {
	private forceRefreshPending: boolean;

	constructor(
		private readonly options: SyncOptions,
		private readonly services: SyncServices,
		private readonly layout: LibraryLayout,
		private readonly signal?: AbortSignal,
	) {
		this.forceRefreshPending = options.forceTokenRefresh;
	}

	async run(channel: string, refs: readonly ChannelRef[]): Promise<ChannelSummary> {
		const started = Date.now();
		const summary: ChannelSummary = {
			channel,
			found: 0,
			downloaded: 0,
			updated: 0,
			failed: 0,
		};

		try {
			logChannelStarted(channel, this.options.daysBack);
			const token = await this.token();
			const entries = await this.collect(channel, refs, token);

			const channelDir = channelDirectory(this.layout, channel);
			const existing = await this.services.library.scan(channelDir);
			const { tasks, skipped } = diff(entries, existing, this.layout);

			for (const { post } of skipped.filter((s) => s.reason === "no-access")) {
				logItemResult({ channel, status: "skipped", name: post.title, reason: "no access" });
			}

			summary.found = entries.filter((e) => e.media.mediaType === "video").length;
			logChannelFound(channel, summary.found, tasks.length);

			if (this.options.updateMetadata) {
				await this.updateMetadata(channelDir, entries, summary);
			} else {
				await this.download(tasks, token, summary);
			}
		} catch (error) {
			if (this.signal?.aborted) throw error;
			summary.error = errorMessage(error);
			log.error(`Skipping channel: ${summary.error}`, { channel });
		}

		logChannelCompleted(
			channel,
			{ downloaded: summary.downloaded + summary.updated, failed: summary.failed },
			Date.now() - started,
		);
		return summary;
	}

	/** A forced refresh applies to the first token request of the run only. */
	private async token(): Promise<string | null> {
		if (!this.services.tokens) return null;
		const force = this.forceRefreshPending;
		this.forceRefreshPending = false;
		const token = await this.services.tokens.getValidToken(force);
		return token.value;
	}

	private async collect(
		channel: string,
		refs: readonly ChannelRef[],
		token: string | null,
	): Promise<CatalogEntry[]> {
		const entries: CatalogEntry[] = [];
		const postIds = refs.map((ref) => ref.postId);

		if (postIds.some((id) => id === undefined)) {
			const feed = this.services.catalog.crawl(channel, token, {
				daysBack: this.options.daysBack,
				signal: this.signal,
			});
			for await (const entry of feed) entries.push(entry);
			return entries;
		}

		for (const postId of new Set(postIds)) {
			if (postId === undefined) continue;
			this.signal?.throwIfAborted();
			entries.push(await this.services.catalog.crawlPost(channel, postId, token));
		}
		return entries;
	}

	private async download(
		tasks: readonly DownloadTask[],
		token: string | null,
		summary: ChannelSummary,
	): Promise<void> {
		const results = await this.services.orchestrator.processAll(tasks, token, this.signal);
		for (const result of results) {
			if (result.succeeded) summary.downloaded++;
			else summary.failed++;
		}
	}

	/** Re-embeds metadata into every mirrored file whose post and video are still listed. */
	private async updateMetadata(
		channelDir: string,
		entries: readonly CatalogEntry[],
		summary: ChannelSummary,
	): Promise<void> {
		const { metadata } = this.services;
		if (!metadata) return;

		const posts = new Map<string, Post>();
		for (const { post, media } of entries) {
			if (media.mediaType === "video") posts.set(post.id, post);
		}

		for (const file of await this.services.library.files(channelDir)) {
			const post = posts.get(file.embeddedPostId);
			const video = post
				? videoFiles(post).find(({ fileId }) => fileId === file.fileId)?.video
				: undefined;
			if (!post || !video) continue;
			this.signal?.throwIfAborted();

			try {
				await metadata.embed(file.path, post, video, this.signal);
				summary.updated++;
				logItemResult({ channel: post.channel, status: "updated", name: post.title });
			} catch (error) {
				if (this.signal?.aborted) throw error;
				summary.failed++;
				logItemResult({
					channel: post.channel,
					status: "failed",
					name: post.title,
					reason: errorMessage(error),
				});
			}
		}
	}
}

/** Keeps first-seen order; a bare channel ref means the whole channel. */
function groupByChannel(refs: readonly ChannelRef[]): Map<string, ChannelRef[]> {
	const groups = new Map<string, ChannelRef[]>();
	for (const ref of refs) {
		const group = groups.get(ref.channel);
		if (group) group.push(ref);
		else groups.set(ref.channel, [ref]);
	}
	return groups;
}

function sum(
	summaries: readonly ChannelSummary[],
	key: "downloaded" | "updated" | "failed",
): number {
	return summaries.reduce((total, summary) => total + summary[key], 0);
}

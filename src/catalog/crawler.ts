import { ParseError, errorMessage } from "../errors.js";
import { log } from "../ui/logger.js";
import {
	DEFAULT_RETRY_POLICY,
	type RetryPolicy,
	withRetry,
} from "../utils/retry.js";
import type { CatalogApi } from "./client.js";
import {
	isPlayableVideo,
	mediaAlbumEntrySchema,
	parseMediaEntries,
	rawPostSchema,
	toPost,
	VIDEO_MEDIA_TYPE,
} from "./schemas.js";
import type { CatalogEntry, MediaType, Page, Post } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export type CrawlOptions = {
	/** Stop the posts feed at the first post older than this many days */
	daysBack?: number;
	signal?: AbortSignal;
};

export interface CatalogSource {
	crawl(
		channel: string,
		token: string | null,
		options?: CrawlOptions,
	): AsyncIterable<CatalogEntry>;
	crawlPost(
		channel: string,
		postId: string,
		token: string | null,
	): Promise<CatalogEntry>;
}

export type CatalogCrawlerOptions = {
	retryPolicy?: RetryPolicy;
	now?: () => Date;
};

/**
 * Walks the posts feed and the media album feed of a channel. The album is
 * only used to tell which posts are videos; posts missing from it count as
 * `other`. Both feeds are newest-first, so entries come out newest-first too.
 */
export class CatalogCrawler implements CatalogSource {
	private readonly retryPolicy: RetryPolicy;
	private readonly now: () => Date;

	constructor(
		private readonly api: CatalogApi,
		options: CatalogCrawlerOptions = {},
	) {
		this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
		this.now = options.now ?? (() => new Date());
	}

	async *crawl(
		channel: string,
		token: string | null,
		options: CrawlOptions = {},
	): AsyncGenerator<CatalogEntry> {
		const cutoff =
			options.daysBack !== undefined
				? new Date(this.now().getTime() - options.daysBack * DAY_MS)
				: null;

		const videoPostIds = await this.classify(channel, token, cutoff, options.signal);

		for await (const post of this.posts(channel, token, cutoff, options.signal)) {
			const mediaType: MediaType = videoPostIds.has(post.id) ? "video" : "other";
			yield { post, media: { postId: post.id, mediaType } };
		}
	}

	async crawlPost(
		channel: string,
		postId: string,
		token: string | null,
	): Promise<CatalogEntry> {
		const body = await withRetry(
			() => this.api.getPost(channel, postId, token),
			this.retryPolicy,
			{ onRetry: retryLogger(channel, `post ${postId}`) },
		);
		const parsed = rawPostSchema.safeParse(body);
		if (!parsed.success) {
			throw new ParseError(`Unexpected post ${postId}: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
		}

		const post = toPost(channel, parsed.data);
		const isVideo = parseMediaEntries(parsed.data.data ?? []).some(isPlayableVideo);
		return {
			post,
			media: { postId: post.id, mediaType: isVideo ? "video" : "other" },
		};
	}

	/** Drains the media album feed into the set of post ids that carry a video. */
	private async classify(
		channel: string,
		token: string | null,
		cutoff: Date | null,
		signal?: AbortSignal,
	): Promise<Set<string>> {
		const videoPostIds = new Set<string>();
		const pages = this.pages("media album", channel, signal, (offset) =>
			this.api.listMediaAlbumPage(channel, { token, offset }),
		);

		for await (const items of pages) {
			for (const item of items) {
				const parsed = mediaAlbumEntrySchema.safeParse(item);
				if (!parsed.success) {
					log.warn("Skipping malformed media album entry", { channel }, {
						error: parsed.error.issues[0]?.message ?? "invalid shape",
					});
					continue;
				}

				const { post, media } = parsed.data;
				if (cutoff && post.createdAt && post.createdAt * 1000 < cutoff.getTime()) {
					return videoPostIds;
				}
				if (parseMediaEntries(media).some((entry) => entry.type === VIDEO_MEDIA_TYPE)) {
					videoPostIds.add(post.id);
				}
			}
		}

		return videoPostIds;
	}

	private async *posts(
		channel: string,
		token: string | null,
		cutoff: Date | null,
		signal?: AbortSignal,
	): AsyncGenerator<Post> {
		const pages = this.pages("posts", channel, signal, (offset) =>
			this.api.listPostsPage(channel, { token, offset }),
		);

		for await (const items of pages) {
			for (const item of items) {
				const parsed = rawPostSchema.safeParse(item);
				if (!parsed.success) {
					log.warn("Skipping malformed post", { channel }, {
						error: parsed.error.issues[0]?.message ?? "invalid shape",
					});
					continue;
				}

				const post = toPost(channel, parsed.data);
				if (cutoff && post.createdAt < cutoff) {
					return;
				}
				yield post;
			}
		}
	}

	/** Follows the offset cursor until the server reports no further page. */
	private async *pages(
		feed: string,
		channel: string,
		signal: AbortSignal | undefined,
		fetchPage: (offset: string | null) => Promise<Page<unknown>>,
	): AsyncGenerator<unknown[]> {
		let offset: string | null = null;

		do {
			signal?.throwIfAborted();
			const cursor: string | null = offset;
			const page: Page<unknown> = await withRetry(
				() => fetchPage(cursor),
				this.retryPolicy,
				{ signal, onRetry: retryLogger(channel, `${feed} page`) },
			);
			yield page.items;
			offset = page.nextOffset;
		} while (offset);
	}
}

function retryLogger(channel: string, what: string) {
	return (attempt: number, delayMs: number, error: unknown): void => {
		log.warn(`Fetching ${what} failed (attempt ${attempt}), retrying`, { channel }, {
			delay: `${delayMs}ms`,
			error: errorMessage(error),
		});
	};
}

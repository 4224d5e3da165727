import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { TokenSource } from "../auth/token-manager.js";
import type { CatalogSource } from "../catalog/crawler.js";
import type { CatalogEntry, MediaType } from "../catalog/types.js";
import { AuthError, LockError, NetworkError } from "../errors.js";
import type { LibraryIndex, LocalFile } from "../library/scanner.js";
import type { Downloader } from "../media/downloader.js";
import type { MetadataWriter } from "../media/metadata.js";
import type { Notifier } from "../notify/dispatcher.js";
import type { LibraryRefresher } from "../refresh/client.js";
import type { PlexTarget } from "../refresh/types.js";
import { LockManager } from "./lock.js";
import { DownloadOrchestrator } from "./orchestrator.js";
import { type SyncOptions, type SyncServices, runSync } from "./run.js";

function entry(channel: string, id: string, iso: string, mediaType: MediaType): CatalogEntry {
	return {
		post: {
			id,
			channel,
			createdAt: new Date(iso),
			title: `Post ${id}`,
			blogUrl: `https://boosty.to/${channel}/posts/${id}`,
			hasAccess: true,
			videos: [{ id: `${id}-video`, title: "", playerUrls: [] }],
		},
		media: { postId: id, mediaType },
	};
}

const DEMO = [
	entry("demo", "P1", "2024-05-03T10:00:00Z", "video"),
	entry("demo", "P2", "2024-05-02T10:00:00Z", "video"),
	entry("demo", "P3", "2024-05-01T10:00:00Z", "other"),
];

const plex: PlexTarget = {
	kind: "plex",
	url: "http://plex.local:32400",
	token: "test-plex-token",
	section: "Boosty",
	timeoutMs: 1000,
};

function catalogOf(feeds: Record<string, CatalogEntry[] | Error>) {
	return {
		crawl: vi.fn<CatalogSource["crawl"]>(async function* (channel) {
			const feed = feeds[channel];
			if (feed instanceof Error) throw feed;
			yield* feed ?? [];
		}),
		crawlPost: vi.fn<CatalogSource["crawlPost"]>(async (channel, postId) => {
			const feed = feeds[channel];
			const found = Array.isArray(feed) ? feed.find((e) => e.post.id === postId) : undefined;
			if (!found) throw new NetworkError(`post ${postId} not found`, { status: 404, retryable: false });
			return found;
		}),
	};
}

describe("runSync", () => {
	let dir: string;
	let lockFile: string;
	let fetch: Mock<Downloader["fetch"]>;
	let notify: Mock<Notifier["notify"]>;
	let refresh: Mock<LibraryRefresher["refresh"]>;
	let existing: Set<string>;
	let files: LocalFile[];

	beforeEach(async () => {
		dir = await mkdtemp(path.join(os.tmpdir(), "run-"));
		lockFile = path.join(dir, "sync.lock");
		fetch = vi.fn<Downloader["fetch"]>().mockResolvedValue({ succeeded: true, log: "" });
		notify = vi.fn<Notifier["notify"]>().mockResolvedValue();
		refresh = vi.fn<LibraryRefresher["refresh"]>().mockResolvedValue(true);
		existing = new Set(["P1"]);
		files = [];
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	function options(overrides: Partial<SyncOptions> = {}): SyncOptions {
		return {
			channels: [{ channel: "demo" }],
			daysBack: undefined,
			updateMetadata: false,
			forceTokenRefresh: false,
			lockFile,
			refreshTargets: [plex],
			outputDir: path.join(dir, "library"),
			layout: { channelDir: true, seasonDir: true },
			...overrides,
		};
	}

	function services(overrides: Partial<SyncServices> = {}): SyncServices {
		const library: LibraryIndex = {
			scan: async () => existing,
			files: async () => files,
		};
		return {
			lock: new LockManager({ isAlive: () => true }),
			tokens: null,
			catalog: catalogOf({ demo: DEMO }),
			library,
			orchestrator: new DownloadOrchestrator({ downloader: { fetch }, notifier: { notify } }),
			refresher: { refresh },
			...overrides,
		};
	}

	it("downloads only the new video post and refreshes once", async () => {
		const summary = await runSync(options(), services());

		expect(fetch).toHaveBeenCalledTimes(1);
		const [task] = fetch.mock.calls[0] ?? [];
		expect(task?.post.id).toBe("P2");
		expect(task?.targetPath).toBe(
			path.join(dir, "library", "demo", "Season 2024", "s2024e050201 - Post P2 [P2].mp4"),
		);
		expect(notify).toHaveBeenCalledTimes(1);
		expect(notify).toHaveBeenCalledWith(expect.objectContaining({ title: "Post P2", succeeded: true }));
		expect(refresh).toHaveBeenCalledTimes(1);
		expect(refresh).toHaveBeenCalledWith(plex);
		expect(summary).toMatchObject({ downloaded: 1, failed: 0, updated: 0, refreshed: 1 });
		expect(summary.channels).toEqual([
			{ channel: "demo", found: 2, downloaded: 1, updated: 0, failed: 0 },
		]);
	});

	it("does nothing at all while another run holds the lock", async () => {
		const other = new LockManager({ pid: 111 });
		const held = await other.acquire(lockFile);
		const catalog = catalogOf({ demo: DEMO });

		try {
			await expect(
				runSync(options(), services({ catalog, lock: new LockManager({ pid: 222, isAlive: () => true }) })),
			).rejects.toBeInstanceOf(LockError);
		} finally {
			await other.release(held);
		}

		expect(catalog.crawl).not.toHaveBeenCalled();
		expect(fetch).not.toHaveBeenCalled();
		expect(notify).not.toHaveBeenCalled();
		expect(refresh).not.toHaveBeenCalled();
	});

	it("releases the lock when the run ends", async () => {
		const lock = new LockManager({ isAlive: () => true });
		await runSync(options(), services({ lock }));

		const again = await lock.acquire(lockFile);
		await lock.release(again);
	});

	it("skips a channel whose crawl fails and carries on with the next", async () => {
		const catalog = catalogOf({
			broken: new NetworkError("Catalog API error: 503", { status: 503 }),
			demo: DEMO,
		});

		const summary = await runSync(
			options({ channels: [{ channel: "broken" }, { channel: "demo" }] }),
			services({ catalog }),
		);

		expect(summary.channels.map((c) => [c.channel, c.error])).toEqual([
			["broken", "Catalog API error: 503"],
			["demo", undefined],
		]);
		expect(fetch).toHaveBeenCalledTimes(1);
	});

	it("skips every channel when the token cannot be refreshed", async () => {
		const failure = new AuthError("Access token refresh failed: 401");
		const tokens: TokenSource = { getValidToken: vi.fn().mockRejectedValue(failure) };

		const summary = await runSync(options(), services({ tokens }));

		expect(summary.channels[0]?.error).toBe("Access token refresh failed: 401");
		expect(fetch).not.toHaveBeenCalled();
		expect(refresh).not.toHaveBeenCalled();
	});

	it("passes the token to the crawl and downloads, forcing a refresh only once", async () => {
		const getValidToken = vi
			.fn<TokenSource["getValidToken"]>()
			.mockResolvedValue({ value: "test-token", refreshToken: "r", expiresAt: new Date() });
		const catalog = catalogOf({ demo: DEMO, other: [] });

		await runSync(
			options({ channels: [{ channel: "demo" }, { channel: "other" }], forceTokenRefresh: true }),
			services({ tokens: { getValidToken }, catalog }),
		);

		expect(getValidToken.mock.calls).toEqual([[true], [false]]);
		expect(catalog.crawl).toHaveBeenCalledWith("demo", "test-token", expect.anything());
		expect(fetch.mock.calls[0]?.[1]).toBe("test-token");
	});

	it("does not refresh the library when nothing was downloaded", async () => {
		existing = new Set(["P1", "P2"]);

		const summary = await runSync(options(), services());

		expect(fetch).not.toHaveBeenCalled();
		expect(refresh).not.toHaveBeenCalled();
		expect(summary.refreshed).toBe(0);
	});

	it("crawls single posts given by URL", async () => {
		const catalog = catalogOf({ demo: DEMO });

		await runSync(options({ channels: [{ channel: "demo", postId: "P2" }] }), services({ catalog }));

		expect(catalog.crawl).not.toHaveBeenCalled();
		expect(catalog.crawlPost).toHaveBeenCalledWith("demo", "P2", null);
		expect(fetch).toHaveBeenCalledTimes(1);
	});

	it("re-embeds metadata instead of downloading in update mode", async () => {
		const p1File = path.join(dir, "library", "demo", "Season 2024", "s2024e050301 - Post P1 [P1].mp4");
		files = [
			{ fileId: "P1", embeddedPostId: "P1", path: p1File },
			{ fileId: "P1_removed", embeddedPostId: "P1", path: path.join(dir, "old [P1_removed].mp4") },
			{ fileId: "gone", embeddedPostId: "gone", path: path.join(dir, "old [gone].mp4") },
		];
		const embed = vi.fn<MetadataWriter["embed"]>().mockResolvedValue();

		const summary = await runSync(
			options({ updateMetadata: true }),
			services({ metadata: { embed } }),
		);

		expect(fetch).not.toHaveBeenCalled();
		expect(embed).toHaveBeenCalledTimes(1);
		expect(embed).toHaveBeenCalledWith(p1File, DEMO[0]?.post, DEMO[0]?.post.videos[0], undefined);
		expect(summary).toMatchObject({ updated: 1, downloaded: 0, refreshed: 1 });
	});

	it("stops and releases the lock when aborted", async () => {
		const controller = new AbortController();
		controller.abort(new Error("Interrupted by SIGINT"));
		const lock = new LockManager({ isAlive: () => true });

		await expect(runSync(options(), services({ lock }), controller.signal)).rejects.toThrow(
			"Interrupted by SIGINT",
		);

		expect(fetch).not.toHaveBeenCalled();
		await lock.release(await lock.acquire(lockFile));
	});
});

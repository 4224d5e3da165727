import type { CatalogEntry, Post, VideoEntry } from "../catalog/types.js";
import {
	assignEpisodeCodes,
	type LibraryLayout,
	targetPath,
	videoFiles,
} from "../library/naming.js";

export type DownloadTask = {
	post: Post;
	video: VideoEntry;
	/** Id embedded in the target file name */
	fileId: string;
	season: number;
	episode: string;
	targetPath: string;
};

/** "no-video": a video post whose uploads are not playable yet */
export type SkipReason = "not-video" | "no-video" | "exists" | "no-access";

export type SkippedPost = {
	post: Post;
	reason: SkipReason;
};

export type DiffResult = {
	tasks: DownloadTask[];
	skipped: SkippedPost[];
};

/**
 * Picks the videos that are not on disk yet, keeping feed order.
 * Episode numbers are assigned over every playable video in the input,
 * mirrored or not, so a file keeps its code from one run to the next.
 */
export function diff(
	entries: readonly CatalogEntry[],
	existingIds: ReadonlySet<string>,
	layout: LibraryLayout,
): DiffResult {
	const videos = entries
		.filter((entry) => entry.media.mediaType === "video")
		.map((entry) => entry.post);
	const codes = assignEpisodeCodes(videos);

	const tasks: DownloadTask[] = [];
	const skipped: SkippedPost[] = [];

	for (const { post, media } of entries) {
		if (media.mediaType !== "video") {
			skipped.push({ post, reason: "not-video" });
			continue;
		}

		const files = videoFiles(post);
		const missing = files.filter((file) => !existingIds.has(file.fileId));
		if (existingIds.has(post.id) && missing.length === 0) {
			skipped.push({ post, reason: "exists" });
			continue;
		}
		if (!post.hasAccess) {
			skipped.push({ post, reason: "no-access" });
			continue;
		}
		if (files.length === 0) {
			skipped.push({ post, reason: "no-video" });
			continue;
		}

		for (const file of missing) {
			const code = codes.get(file.fileId);
			if (!code) continue;
			tasks.push({
				post,
				video: file.video,
				fileId: file.fileId,
				season: code.season,
				episode: code.episode,
				targetPath: targetPath(layout, post, code, file),
			});
		}
	}

	return { tasks, skipped };
}

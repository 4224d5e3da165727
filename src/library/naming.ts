import path from "node:path";
import type { Post, VideoEntry } from "../catalog/types.js";

export const VIDEO_EXTENSION = ".mp4";

const MAX_TITLE_LENGTH = 150;

/** Joins post and video id in the file id of a post's second and later videos. */
const EXTRA_VIDEO_SEPARATOR = "_";

export type LibraryLayout = {
	outputDir: string;
	/** Nest files under a directory per channel */
	channelDir: boolean;
	/** Nest files under "Season <year>" */
	seasonDir: boolean;
};

export type EpisodeCode = {
	season: number;
	/** MMDDNN: month, day, and the post's position among that day's videos */
	episode: string;
};

function pad2(value: number): string {
	return String(value).padStart(2, "0");
}

/** Dates are read in UTC so a code never changes with the host's timezone. */
export function episodeCode(createdAt: Date, indexInDay = 1): EpisodeCode {
	return {
		season: createdAt.getUTCFullYear(),
		episode: `${pad2(createdAt.getUTCMonth() + 1)}${pad2(createdAt.getUTCDate())}${pad2(indexInDay)}`,
	};
}

export function episodeLabel(code: EpisodeCode): string {
	return `s${code.season}e${code.episode}`;
}

function dayKey(date: Date): string {
	return date.toISOString().slice(0, 10);
}

export type VideoFile = {
	video: VideoEntry;
	/** Id written into the file name: the post id for the first video */
	fileId: string;
	title: string;
};

/**
 * The files a post maps to, one per playable video in post order. The first
 * is filed under the post id, so a single-video post is found by its id alone;
 * later ones under `<postId>_<videoId>`.
 */
export function videoFiles(post: Post): VideoFile[] {
	return post.videos.map((video, index) =>
		index === 0
			? { video, fileId: post.id, title: post.title }
			: {
					video,
					fileId: `${post.id}${EXTRA_VIDEO_SEPARATOR}${video.id}`,
					title: video.title || `${post.title} ${index + 1}`,
				},
	);
}

export function postIdOfFileId(fileId: string): string {
	const at = fileId.indexOf(EXTRA_VIDEO_SEPARATOR);
	return at < 0 ? fileId : fileId.slice(0, at);
}

/**
 * Numbers the videos that share a publish day in ascending publish order,
 * so the first video of 2024-05-03 is 050301 and the second 050302. Codes
 * are keyed by file id; posts without a playable video take no number.
 */
export function assignEpisodeCodes(
	posts: readonly Post[],
): Map<string, EpisodeCode> {
	const byDay = new Map<string, Post[]>();
	for (const post of posts) {
		const key = dayKey(post.createdAt);
		const day = byDay.get(key) ?? [];
		day.push(post);
		byDay.set(key, day);
	}

	const codes = new Map<string, EpisodeCode>();
	for (const day of byDay.values()) {
		const ordered = [...day].sort(
			(a, b) =>
				a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id),
		);
		let index = 0;
		for (const post of ordered) {
			for (const file of videoFiles(post)) {
				index++;
				codes.set(file.fileId, episodeCode(post.createdAt, index));
			}
		}
	}
	return codes;
}

export function sanitizeTitle(title: string): string {
	const cleaned = title
		.replace(/[<>:"/\\|?*\u0000-\u001f]/g, "")
		.replace(/\s+/g, " ")
		.trim();
	return cleaned.length > MAX_TITLE_LENGTH
		? cleaned.slice(0, MAX_TITLE_LENGTH).trimEnd()
		: cleaned;
}

/** `<sYYYYeMMDDNN> - <title> [<file id>].mp4`; the bracketed id is what the scanner reads back. */
export function buildFileName(
	code: EpisodeCode,
	title: string,
	fileId: string,
	extension = VIDEO_EXTENSION,
): string {
	const safeTitle = sanitizeTitle(title) || fileId;
	return `${episodeLabel(code)} - ${safeTitle} [${fileId}]${extension}`;
}

export function channelDirectory(layout: LibraryLayout, channel: string): string {
	return layout.channelDir
		? path.join(layout.outputDir, channel)
		: layout.outputDir;
}

export function targetDirectory(
	layout: LibraryLayout,
	channel: string,
	season: number,
): string {
	const base = channelDirectory(layout, channel);
	return layout.seasonDir ? path.join(base, `Season ${season}`) : base;
}

export function targetPath(
	layout: LibraryLayout,
	post: Post,
	code: EpisodeCode,
	file: Pick<VideoFile, "fileId" | "title"> = { fileId: post.id, title: post.title },
): string {
	return path.join(
		targetDirectory(layout, post.channel, code.season),
		buildFileName(code, file.title, file.fileId),
	);
}

import { z } from "zod";
import type { Post, VideoEntry } from "./types.js";

export const VIDEO_MEDIA_TYPE = "ok_video";

const playerUrlSchema = z.object({
	type: z.string(),
	url: z.string().nullish(),
});

export const mediaEntrySchema = z.object({
	type: z.string(),
	id: z.string().nullish(),
	title: z.string().nullish(),
	complete: z.boolean().nullish(),
	status: z.string().nullish(),
	playerUrls: z.array(playerUrlSchema).nullish(),
	preview: z.string().nullish(),
	defaultPreview: z.string().nullish(),
});

export type MediaEntry = z.infer<typeof mediaEntrySchema>;

export const rawPostSchema = z.object({
	id: z.string().min(1),
	title: z.string().nullish(),
	/** Unix seconds */
	createdAt: z.number(),
	hasAccess: z.boolean().nullish(),
	data: z.array(z.unknown()).nullish(),
});

export type RawPost = z.infer<typeof rawPostSchema>;

const extraSchema = z
	.object({
		offset: z.union([z.string(), z.number()]).nullish(),
		isLast: z.boolean().nullish(),
	})
	.nullish();

export const postsPageSchema = z.object({
	data: z.array(z.unknown()),
	extra: extraSchema,
});

export const mediaAlbumPageSchema = z.object({
	data: z.object({
		mediaPosts: z.array(z.unknown()).default([]),
	}),
	extra: extraSchema,
});

export const mediaAlbumEntrySchema = z.object({
	post: z.object({
		id: z.string().min(1),
		createdAt: z.number().nullish(),
	}),
	media: z.array(z.unknown()).default([]),
});

export const tokenResponseSchema = z.object({
	access_token: z.string().min(1),
	refresh_token: z.string().min(1),
	/** Seconds */
	expires_in: z.number(),
});

export const apiErrorSchema = z.object({
	error: z.string(),
	error_description: z.string().nullish(),
});

export function nextOffset(extra: z.infer<typeof extraSchema>): string | null {
	if (!extra || extra.isLast) return null;
	if (extra.offset === null || extra.offset === undefined) return null;
	const offset = String(extra.offset);
	return offset.length > 0 ? offset : null;
}

export function isPlayableVideo(entry: MediaEntry): boolean {
	return (
		entry.type === VIDEO_MEDIA_TYPE &&
		entry.complete === true &&
		entry.status === "ok"
	);
}

/** Media entries that fail validation are dropped; they carry nothing to download. */
export function parseMediaEntries(data: readonly unknown[]): MediaEntry[] {
	const entries: MediaEntry[] = [];
	for (const item of data) {
		const parsed = mediaEntrySchema.safeParse(item);
		if (parsed.success) entries.push(parsed.data);
	}
	return entries;
}

export function toPost(channel: string, raw: RawPost): Post {
	const title = raw.title?.trim() ?? "";
	const videos: VideoEntry[] = parseMediaEntries(raw.data ?? [])
		.filter(isPlayableVideo)
		.map((entry) => ({
			id: entry.id ?? raw.id,
			title: entry.title?.trim() || title,
			playerUrls: (entry.playerUrls ?? []).flatMap((player) =>
				player.url ? [{ type: player.type, url: player.url }] : [],
			),
			preview: entry.preview ?? entry.defaultPreview ?? undefined,
		}));

	return {
		id: raw.id,
		channel,
		createdAt: new Date(raw.createdAt * 1000),
		title: title || raw.id,
		blogUrl: `https://boosty.to/${channel}/posts/${raw.id}`,
		hasAccess: raw.hasAccess ?? true,
		videos,
	};
}

export type MediaType = "video" | "other";

export type PlayerUrl = {
	/** Quality name, e.g. "full_hd" */
	type: string;
	url: string;
};

export type VideoEntry = {
	id: string;
	title: string;
	playerUrls: PlayerUrl[];
	preview?: string;
};

export type Post = {
	id: string;
	channel: string;
	createdAt: Date;
	title: string;
	blogUrl: string;
	hasAccess: boolean;
	/** Complete, playable video attachments in post order */
	videos: VideoEntry[];
};

export type MediaItem = {
	postId: string;
	mediaType: MediaType;
};

export type CatalogEntry = {
	post: Post;
	media: MediaItem;
};

/** A positional argument: a whole channel, or one post of it. */
export type ChannelRef = {
	channel: string;
	postId?: string;
};

export type Page<T> = {
	items: T[];
	/** null once the server reports the last page */
	nextOffset: string | null;
};

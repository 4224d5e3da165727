export type PlexTarget = {
	kind: "plex";
	url: string;
	token: string;
	/** Section title or key */
	section: string;
	timeoutMs: number;
};

export type JellyfinTarget = {
	kind: "jellyfin";
	url: string;
	token: string;
	/** Library item name or id */
	item: string;
	timeoutMs: number;
};

export type RefreshTarget = PlexTarget | JellyfinTarget;

export type FetchFn = typeof fetch;

import { z } from "zod";
import { LibraryRefreshError, errorMessage } from "../errors.js";
import type { FetchFn, JellyfinTarget } from "./types.js";

const itemsSchema = z.object({
	Items: z
		.array(
			z.object({
				Id: z.string(),
				Name: z.string(),
			}),
		)
		.default([]),
});

async function jellyfinRequest(
	fetchImpl: FetchFn,
	target: JellyfinTarget,
	path: string,
	method: "GET" | "POST" = "GET",
): Promise<Response> {
	const url = `${target.url.replace(/\/+$/, "")}${path}`;
	let response: Response;
	try {
		response = await fetchImpl(url, {
			method,
			headers: { Authorization: `MediaBrowser Token="${target.token}"` },
			signal: AbortSignal.timeout(target.timeoutMs),
		});
	} catch (error) {
		throw new LibraryRefreshError(`Jellyfin request failed: ${errorMessage(error)}`, error);
	}
	if (!response.ok) {
		throw new LibraryRefreshError(
			`Jellyfin responded ${response.status} ${response.statusText} for ${path.split("?")[0]}`,
		);
	}
	return response;
}

/** Matches the library folder id first, then its exact name. */
export async function resolveJellyfinItem(
	fetchImpl: FetchFn,
	target: JellyfinTarget,
): Promise<string | null> {
	const params = new URLSearchParams({
		Recursive: "True",
		IncludeItemTypes: "CollectionFolder",
	});
	const response = await jellyfinRequest(fetchImpl, target, `/Items?${params}`);
	const parsed = itemsSchema.safeParse(await response.json());
	if (!parsed.success) {
		throw new LibraryRefreshError("Unexpected Jellyfin items response", parsed.error);
	}

	const items = parsed.data.Items;
	const match =
		items.find((item) => item.Id === target.item) ??
		items.find((item) => item.Name === target.item);
	return match?.Id ?? null;
}

export async function refreshJellyfinItem(
	fetchImpl: FetchFn,
	target: JellyfinTarget,
	itemId: string,
): Promise<void> {
	const params = new URLSearchParams({
		Recursive: "true",
		MetadataRefreshMode: "Default",
		ImageRefreshMode: "Default",
		ReplaceAllImages: "false",
		ReplaceAllMetadata: "false",
	});
	await jellyfinRequest(
		fetchImpl,
		target,
		`/Items/${encodeURIComponent(itemId)}/Refresh?${params}`,
		"POST",
	);
}

import { z } from "zod";
import { LibraryRefreshError, errorMessage } from "../errors.js";
import type { FetchFn, PlexTarget } from "./types.js";

const sectionsSchema = z.object({
	MediaContainer: z.object({
		Directory: z
			.array(
				z.object({
					key: z.union([z.string(), z.number()]).transform(String),
					title: z.string(),
				}),
			)
			.default([]),
	}),
});

async function plexRequest(
	fetchImpl: FetchFn,
	target: PlexTarget,
	path: string,
): Promise<Response> {
	const url = `${target.url.replace(/\/+$/, "")}${path}`;
	let response: Response;
	try {
		response = await fetchImpl(url, {
			headers: { "X-Plex-Token": target.token, Accept: "application/json" },
			signal: AbortSignal.timeout(target.timeoutMs),
		});
	} catch (error) {
		throw new LibraryRefreshError(`Plex request failed: ${errorMessage(error)}`, error);
	}
	if (!response.ok) {
		throw new LibraryRefreshError(
			`Plex responded ${response.status} ${response.statusText} for ${path}`,
		);
	}
	return response;
}

/** Matches the section key first, then its exact title. */
export async function resolvePlexSection(
	fetchImpl: FetchFn,
	target: PlexTarget,
): Promise<string | null> {
	const response = await plexRequest(fetchImpl, target, "/library/sections");
	const parsed = sectionsSchema.safeParse(await response.json());
	if (!parsed.success) {
		throw new LibraryRefreshError("Unexpected Plex sections response", parsed.error);
	}

	const sections = parsed.data.MediaContainer.Directory;
	const match =
		sections.find((section) => section.key === target.section) ??
		sections.find((section) => section.title === target.section);
	return match?.key ?? null;
}

export async function refreshPlexSection(
	fetchImpl: FetchFn,
	target: PlexTarget,
	sectionKey: string,
): Promise<void> {
	await plexRequest(
		fetchImpl,
		target,
		`/library/sections/${encodeURIComponent(sectionKey)}/refresh`,
	);
}

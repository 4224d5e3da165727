import { errorMessage } from "../errors.js";
import { log } from "../ui/logger.js";
import { refreshJellyfinItem, resolveJellyfinItem } from "./jellyfin.js";
import { refreshPlexSection, resolvePlexSection } from "./plex.js";
import type { FetchFn, RefreshTarget } from "./types.js";

export interface LibraryRefresher {
	refresh(target: RefreshTarget): Promise<boolean>;
}

function describe(target: RefreshTarget): string {
	return target.kind === "plex"
		? `Plex library section '${target.section}'`
		: `Jellyfin library item '${target.item}'`;
}

/**
 * Asks a media server to rescan one library. Never throws: an unknown name,
 * a timeout or a bad status is logged and reported as `false`.
 */
export class LibraryRefreshClient implements LibraryRefresher {
	private readonly fetchImpl: FetchFn;

	constructor(options: { fetch?: FetchFn } = {}) {
		this.fetchImpl = options.fetch ?? fetch;
	}

	async refresh(target: RefreshTarget): Promise<boolean> {
		const what = describe(target);
		log.info(`Requesting ${what} refresh`);

		try {
			const id =
				target.kind === "plex"
					? await resolvePlexSection(this.fetchImpl, target)
					: await resolveJellyfinItem(this.fetchImpl, target);

			if (!id) {
				log.warn(`Could not resolve ${what}, skipping refresh`);
				return false;
			}

			if (target.kind === "plex") {
				await refreshPlexSection(this.fetchImpl, target, id);
			} else {
				await refreshJellyfinItem(this.fetchImpl, target, id);
			}
			return true;
		} catch (error) {
			log.warn(`${what} refresh failed: ${errorMessage(error)}`);
			return false;
		}
	}
}

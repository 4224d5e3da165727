import type { PlayerUrl } from "../catalog/types.js";

/** Lowest to highest */
export const QUALITIES = [
	"tiny",
	"lowest",
	"low",
	"medium",
	"high",
	"full_hd",
	"quad_hd",
	"ultra_hd",
] as const;

export type Quality = (typeof QUALITIES)[number];

function rank(type: string): number {
	return QUALITIES.findIndex((quality) => quality === type);
}

/**
 * The best offered stream not above `maxQuality`, or the best overall when no
 * cap is given. Unknown quality names (HLS/DASH manifests) are ignored.
 */
export function selectBestUrl(
	playerUrls: readonly PlayerUrl[],
	maxQuality?: Quality,
): PlayerUrl | null {
	const cap = maxQuality ? rank(maxQuality) : QUALITIES.length - 1;
	let best: PlayerUrl | null = null;

	for (const player of playerUrls) {
		const r = rank(player.type);
		if (r < 0 || r > cap || !player.url) continue;
		if (!best || r > rank(best.type)) best = player;
	}

	return best;
}

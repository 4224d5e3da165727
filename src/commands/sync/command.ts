import { buildCommand } from "@stricli/core";
import { logLevelSchema, qualitySchema } from "../../config.js";
import { parseCount, parsePositiveNumber } from "../parsers.js";

export const syncCommand = buildCommand({
	loader: async () => {
		const { sync } = await import("./impl.js");
		return sync;
	},
	parameters: {
		positional: {
			kind: "array",
			parameter: {
				brief: "Channel name, channel URL or post URL (https://boosty.to/<channel>/posts/<id>)",
				parse: String,
				placeholder: "channel",
			},
		},
		flags: {
			config: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "YAML file with default settings; flags override it",
			},
			cookies: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief:
					"Netscape cookie file holding the auth cookie (default: cookies.txt, .boosty.cookies.txt, ~/.boosty.cookies.txt)",
			},
			forceTokenRefresh: {
				kind: "boolean",
				optional: true,
				brief: "Refresh the access token even if it has not expired",
			},
			output: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Library root; must already exist (default: current directory)",
			},
			maxQuality: {
				kind: "enum",
				values: qualitySchema.options,
				optional: true,
				brief: "Highest stream quality to download",
			},
			daysBack: {
				kind: "parsed",
				parse: parseCount,
				optional: true,
				brief: "Only look at posts published in the last N days",
			},
			updateMetadata: {
				kind: "boolean",
				optional: true,
				brief: "Re-embed metadata into already downloaded files instead of downloading",
			},
			channelDir: {
				kind: "boolean",
				optional: true,
				brief: "Put each channel in its own directory (default: on)",
			},
			seasonDir: {
				kind: "boolean",
				optional: true,
				brief: "Put each year in a 'Season YYYY' directory (default: on)",
			},
			lockFile: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Lock file guarding against overlapping runs",
			},
			runTimeout: {
				kind: "parsed",
				parse: parsePositiveNumber,
				optional: true,
				brief: "Abort the run after this many minutes",
			},
			plexSection: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Plex library section (name or key) to refresh after new downloads",
			},
			plexUrl: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Plex server URL (default: http://localhost:32400)",
			},
			plexToken: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Plex token (default: $PLEX_TOKEN)",
			},
			plexTimeout: {
				kind: "parsed",
				parse: parsePositiveNumber,
				optional: true,
				brief: "Plex request timeout in seconds (default: 30)",
			},
			jellyfinItem: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Jellyfin library (name or id) to refresh after new downloads",
			},
			jellyfinUrl: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Jellyfin server URL (default: http://localhost:8096)",
			},
			jellyfinToken: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Jellyfin API key (default: $JELLYFIN_TOKEN)",
			},
			jellyfinTimeout: {
				kind: "parsed",
				parse: parsePositiveNumber,
				optional: true,
				brief: "Jellyfin request timeout in seconds (default: 30)",
			},
			emailTo: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Mail a report for every downloaded or failed post to this address",
			},
			logLevel: {
				kind: "enum",
				values: logLevelSchema.options,
				optional: true,
				brief: "Log verbosity (default: $LOG_LEVEL or info)",
			},
		},
		aliases: {
			c: "cookies",
			o: "output",
			q: "maxQuality",
			d: "daysBack",
		},
	},
	docs: {
		brief: "Mirror new video posts of the given channels into the local library",
		fullDescription:
			"Downloads every video post that is not in the library yet, named sYYYYeMMDDNN - <title> [<post id>].mp4 so media servers see one season per year. Runs are guarded by a lock file and meant to be scheduled (e.g. hourly).",
	},
});

import { buildCommand } from "@stricli/core";
import { logLevelSchema } from "../../config.js";

export const tokenCommand = buildCommand({
	loader: async () => {
		const { token } = await import("./impl.js");
		return token;
	},
	parameters: {
		flags: {
			cookies: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Netscape cookie file holding the auth cookie",
			},
			force: {
				kind: "boolean",
				optional: true,
				brief: "Exchange the refresh token now and store the new access token",
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
			f: "force",
		},
	},
	docs: {
		brief: "Check the stored access token and refresh it when needed",
		fullDescription:
			"Loads the auth cookie, refreshes the access token when less than a day is left (or with --force) and writes it back to the cookie file.",
	},
});

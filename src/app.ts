import { buildApplication, buildRouteMap, run } from "@stricli/core";
import { syncCommand } from "./commands/sync/command.js";
import { tokenCommand } from "./commands/token/command.js";
import { buildContext } from "./context.js";

const routes = buildRouteMap({
	routes: {
		sync: syncCommand,
		token: tokenCommand,
	},
	docs: {
		brief: "Mirror Boosty video posts into a Plex/Jellyfin friendly library.",
	},
});

export const app = buildApplication(routes, {
	name: "boosty-sync",
	versionInfo: {
		currentVersion: "0.3.0",
	},
	scanner: {
		caseStyle: "allow-kebab-for-camel",
	},
});

await run(app, process.argv.slice(2), buildContext(process));

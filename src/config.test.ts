import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	DEFAULT_LOCK_FILE,
	buildSyncConfig,
	findDefaultCookiesFile,
	loadConfigFile,
	parseChannelRef,
	splitArgs,
} from "./config.js";
import { ConfigError } from "./errors.js";

describe("parseChannelRef", () => {
	it("accepts names, channel URLs and post URLs", () => {
		expect(parseChannelRef("demo")).toEqual({ channel: "demo" });
		expect(parseChannelRef("https://boosty.to/demo")).toEqual({ channel: "demo" });
		expect(parseChannelRef("https://boosty.to/demo/")).toEqual({ channel: "demo" });
		expect(parseChannelRef("https://boosty.to/demo/posts/abc-1?share=1")).toEqual({
			channel: "demo",
			postId: "abc-1",
		});
	});

	it("rejects other sites and malformed names", () => {
		expect(() => parseChannelRef("https://example.com/demo")).toThrow(ConfigError);
		expect(() => parseChannelRef("https://boosty.to/")).toThrow(ConfigError);
		expect(() => parseChannelRef("demo/posts")).toThrow(ConfigError);
		expect(() => parseChannelRef("  ")).toThrow(ConfigError);
	});
});

describe("splitArgs", () => {
	it("splits on whitespace and keeps quoted segments together", () => {
		expect(splitArgs(`--retry 3 -H "X-Test: a b" '--user-agent' x`)).toEqual([
			"--retry",
			"3",
			"-H",
			"X-Test: a b",
			"--user-agent",
			"x",
		]);
		expect(splitArgs(undefined)).toEqual([]);
	});
});

describe("buildSyncConfig", () => {
	it("fills in defaults", () => {
		const config = buildSyncConfig({ channels: ["demo"], flags: {}, env: {} });

		expect(config).toEqual({
			channels: [{ channel: "demo" }],
			cookiesFile: undefined,
			forceTokenRefresh: false,
			outputDir: ".",
			maxQuality: undefined,
			daysBack: undefined,
			updateMetadata: false,
			layout: { channelDir: true, seasonDir: true },
			lockFile: DEFAULT_LOCK_FILE,
			runTimeoutMs: undefined,
			refreshTargets: [],
			emailTo: undefined,
			logLevel: "info",
			tools: {
				curlBin: "curl",
				curlOpts: [],
				exiftoolBin: "exiftool",
				sendmailBin: "/usr/sbin/sendmail",
			},
		});
	});

	it("prefers flags over the file and the file over the environment", () => {
		const config = buildSyncConfig({
			channels: [],
			flags: { output: "/flag-out", seasonDir: false },
			env: { PLEX_TOKEN: "env-token", CURL_OPTS: "--limit-rate 1M", LOG_LEVEL: "warn" },
			file: {
				channels: ["from-file"],
				output: "/file-out",
				seasonDir: true,
				channelDir: false,
				plex: { section: "Boosty", token: "file-token", timeout: 45 },
			},
		});

		expect(config.channels).toEqual([{ channel: "from-file" }]);
		expect(config.outputDir).toBe("/flag-out");
		expect(config.layout).toEqual({ channelDir: false, seasonDir: false });
		expect(config.logLevel).toBe("warn");
		expect(config.tools.curlOpts).toEqual(["--limit-rate", "1M"]);
		expect(config.refreshTargets).toEqual([
			{
				kind: "plex",
				url: "http://localhost:32400",
				token: "file-token",
				section: "Boosty",
				timeoutMs: 45_000,
			},
		]);
	});

	it("takes media server tokens from the environment", () => {
		const config = buildSyncConfig({
			channels: ["demo"],
			flags: { jellyfinItem: "Boosty", jellyfinUrl: "http://media:8096" },
			env: { JELLYFIN_TOKEN: "test-jellyfin-token" },
		});

		expect(config.refreshTargets).toEqual([
			{
				kind: "jellyfin",
				url: "http://media:8096",
				token: "test-jellyfin-token",
				item: "Boosty",
				timeoutMs: 30_000,
			},
		]);
	});

	it("converts the run timeout from minutes", () => {
		const config = buildSyncConfig({ channels: ["demo"], flags: { runTimeout: 1.5 }, env: {} });
		expect(config.runTimeoutMs).toBe(90_000);
	});

	it("rejects a refresh target without a token", () => {
		expect(() =>
			buildSyncConfig({ channels: ["demo"], flags: { plexSection: "Boosty" }, env: {} }),
		).toThrow("A Plex section needs a token");
	});

	it("requires at least one channel", () => {
		expect(() => buildSyncConfig({ channels: [], flags: {}, env: {} })).toThrow(
			"Invalid configuration: channels: At least one channel is required",
		);
	});

	it("rejects an unknown log level from the environment", () => {
		expect(() =>
			buildSyncConfig({ channels: ["demo"], flags: {}, env: { LOG_LEVEL: "loud" } }),
		).toThrow(ConfigError);
	});
});

describe("config files", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(os.tmpdir(), "config-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("loads YAML settings", async () => {
		const file = path.join(dir, "sync.yaml");
		await writeFile(
			file,
			"\uFEFFchannels:\n  - demo\noutput: /media/boosty\nmaxQuality: full_hd\ndaysBack: 7\njellyfin:\n  item: Boosty\n",
		);

		await expect(loadConfigFile(file)).resolves.toEqual({
			channels: ["demo"],
			output: "/media/boosty",
			maxQuality: "full_hd",
			daysBack: 7,
			jellyfin: { item: "Boosty" },
		});
	});

	it("rejects unknown keys", async () => {
		const file = path.join(dir, "sync.yaml");
		await writeFile(file, "channels: [demo]\nouput: typo\n");

		await expect(loadConfigFile(file)).rejects.toThrow(ConfigError);
	});

	it("reports a missing file as a config error", async () => {
		await expect(loadConfigFile(path.join(dir, "missing.yaml"))).rejects.toThrow(ConfigError);
	});

	it("finds the first existing cookies file", async () => {
		const home = path.join(dir, "home");
		const cwd = path.join(dir, "work");
		await mkdir(home);
		await mkdir(cwd);

		expect(findDefaultCookiesFile(cwd, home)).toBeNull();

		await writeFile(path.join(home, ".boosty.cookies.txt"), "");
		expect(findDefaultCookiesFile(cwd, home)).toBe(path.join(home, ".boosty.cookies.txt"));

		await writeFile(path.join(cwd, ".boosty.cookies.txt"), "");
		expect(findDefaultCookiesFile(cwd, home)).toBe(path.join(cwd, ".boosty.cookies.txt"));

		await writeFile(path.join(cwd, "cookies.txt"), "");
		expect(findDefaultCookiesFile(cwd, home)).toBe(path.join(cwd, "cookies.txt"));
	});
});

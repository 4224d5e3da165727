import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parse } from "yaml";
import { z } from "zod";
import type { ChannelRef } from "./catalog/types.js";
import { ConfigError, errorMessage } from "./errors.js";
import { QUALITIES } from "./media/quality.js";
import { DEFAULT_SENDMAIL_BIN } from "./notify/mailer.js";
import type { RefreshTarget } from "./refresh/types.js";

const BOOSTY_URL_PREFIX = "https://boosty.to/";

export const DEFAULT_PLEX_URL = "http://localhost:32400";
export const DEFAULT_JELLYFIN_URL = "http://localhost:8096";
export const DEFAULT_SERVER_TIMEOUT_SECONDS = 30;
export const DEFAULT_LOCK_FILE = path.join(os.tmpdir(), "boosty-sync.lock");

export const logLevelSchema = z.enum([
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"fatal",
	"silent",
]);

export type LogLevel = z.infer<typeof logLevelSchema>;

export const qualitySchema = z.enum(QUALITIES);

const serverTargetSchema = z
	.object({
		url: z.string().url().optional(),
		token: z.string().min(1).optional(),
		timeout: z.coerce.number().int().positive().optional(),
	})
	.strict();

/** Shape of the optional YAML file given with --config. */
export const fileConfigSchema = z
	.object({
		channels: z.array(z.string()).default([]),
		cookies: z.string().optional(),
		output: z.string().optional(),
		maxQuality: qualitySchema.optional(),
		daysBack: z.coerce.number().int().nonnegative().optional(),
		seasonDir: z.boolean().optional(),
		channelDir: z.boolean().optional(),
		lockFile: z.string().optional(),
		runTimeout: z.coerce.number().positive().optional(),
		emailTo: z.string().email().optional(),
		logLevel: logLevelSchema.optional(),
		plex: serverTargetSchema.extend({ section: z.string().min(1).optional() }).optional(),
		jellyfin: serverTargetSchema.extend({ item: z.string().min(1).optional() }).optional(),
	})
	.strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

const channelRefSchema = z.object({
	channel: z.string().min(1),
	postId: z.string().min(1).optional(),
});

const refreshTargetSchema = z.discriminatedUnion("kind", [
	z.object({
		kind: z.literal("plex"),
		url: z.string().url(),
		token: z.string().min(1),
		section: z.string().min(1),
		timeoutMs: z.number().int().positive(),
	}),
	z.object({
		kind: z.literal("jellyfin"),
		url: z.string().url(),
		token: z.string().min(1),
		item: z.string().min(1),
		timeoutMs: z.number().int().positive(),
	}),
]);

export const syncConfigSchema = z.object({
	channels: z.array(channelRefSchema).min(1, "At least one channel is required"),
	/** Explicit --cookies path; discovery happens at startup when absent */
	cookiesFile: z.string().optional(),
	forceTokenRefresh: z.boolean(),
	outputDir: z.string().min(1),
	maxQuality: qualitySchema.optional(),
	daysBack: z.number().int().nonnegative().optional(),
	updateMetadata: z.boolean(),
	layout: z.object({
		channelDir: z.boolean(),
		seasonDir: z.boolean(),
	}),
	lockFile: z.string().min(1),
	runTimeoutMs: z.number().int().positive().optional(),
	refreshTargets: z.array(refreshTargetSchema),
	emailTo: z.string().email().optional(),
	logLevel: logLevelSchema,
	tools: z.object({
		curlBin: z.string().min(1),
		curlOpts: z.array(z.string()),
		exiftoolBin: z.string().min(1),
		sendmailBin: z.string().min(1),
	}),
});

export type SyncConfig = z.infer<typeof syncConfigSchema>;

/** Command-line values; undefined means "not given". */
export type SyncFlags = {
	cookies?: string;
	forceTokenRefresh?: boolean;
	output?: string;
	maxQuality?: z.infer<typeof qualitySchema>;
	daysBack?: number;
	updateMetadata?: boolean;
	seasonDir?: boolean;
	channelDir?: boolean;
	lockFile?: string;
	runTimeout?: number;
	plexSection?: string;
	plexUrl?: string;
	plexToken?: string;
	plexTimeout?: number;
	jellyfinItem?: string;
	jellyfinUrl?: string;
	jellyfinToken?: string;
	jellyfinTimeout?: number;
	emailTo?: string;
	logLevel?: LogLevel;
};

/**
 * Accepts `name`, `https://boosty.to/name` and
 * `https://boosty.to/name/posts/<id>` (query strings ignored).
 */
export function parseChannelRef(value: string): ChannelRef {
	const trimmed = value.trim();
	if (!/^https?:\/\//.test(trimmed)) {
		if (!trimmed || trimmed.includes("/")) {
			throw new ConfigError(`Invalid channel name: '${value}'`);
		}
		return { channel: trimmed };
	}

	if (!trimmed.startsWith(BOOSTY_URL_PREFIX)) {
		throw new ConfigError(`Invalid Boosty URL: ${value}`);
	}

	const [pathname = ""] = trimmed.slice(BOOSTY_URL_PREFIX.length).split(/[?#]/);
	const parts = pathname.split("/").filter(Boolean);
	const [channel, section, postId] = parts;
	if (!channel) {
		throw new ConfigError(`Boosty URL names no channel: ${value}`);
	}
	return section === "posts" && postId ? { channel, postId } : { channel };
}

/** Splits a CURL_OPTS style string, honouring single and double quotes. */
export function splitArgs(value: string | undefined): string[] {
	if (!value) return [];
	const args: string[] = [];
	for (const match of value.matchAll(/"([^"]*)"|'([^']*)'|(\S+)/g)) {
		args.push(match[1] ?? match[2] ?? match[3] ?? "");
	}
	return args;
}

export async function loadConfigFile(configPath: string): Promise<FileConfig> {
	let rawText: string;
	try {
		rawText = await readFile(configPath, "utf8");
	} catch (error) {
		throw new ConfigError(`Unable to read config file ${configPath}: ${errorMessage(error)}`, error);
	}

	const clean = rawText.replace(/^\uFEFF/, "");
	const result = fileConfigSchema.safeParse(parse(clean) ?? {});
	if (!result.success) {
		throw new ConfigError(`Invalid config file ${configPath}: ${formatIssues(result.error)}`);
	}
	return result.data;
}

export function buildSyncConfig(args: {
	channels: readonly string[];
	flags: SyncFlags;
	env: NodeJS.ProcessEnv;
	file?: FileConfig;
}): SyncConfig {
	const { flags, env } = args;
	const file = args.file ?? fileConfigSchema.parse({});

	const channelArgs = args.channels.length > 0 ? args.channels : file.channels;
	const channels = channelArgs.map(parseChannelRef);

	const refreshTargets: RefreshTarget[] = [];
	const plexSection = flags.plexSection ?? file.plex?.section;
	const plexToken = flags.plexToken ?? file.plex?.token ?? env.PLEX_TOKEN;
	if (plexSection) {
		if (!plexToken) {
			throw new ConfigError("A Plex section needs a token (--plexToken or PLEX_TOKEN)");
		}
		refreshTargets.push({
			kind: "plex",
			url: flags.plexUrl ?? file.plex?.url ?? DEFAULT_PLEX_URL,
			token: plexToken,
			section: plexSection,
			timeoutMs:
				(flags.plexTimeout ?? file.plex?.timeout ?? DEFAULT_SERVER_TIMEOUT_SECONDS) * 1000,
		});
	}

	const jellyfinItem = flags.jellyfinItem ?? file.jellyfin?.item;
	const jellyfinToken = flags.jellyfinToken ?? file.jellyfin?.token ?? env.JELLYFIN_TOKEN;
	if (jellyfinItem) {
		if (!jellyfinToken) {
			throw new ConfigError(
				"A Jellyfin item needs a token (--jellyfinToken or JELLYFIN_TOKEN)",
			);
		}
		refreshTargets.push({
			kind: "jellyfin",
			url: flags.jellyfinUrl ?? file.jellyfin?.url ?? DEFAULT_JELLYFIN_URL,
			token: jellyfinToken,
			item: jellyfinItem,
			timeoutMs:
				(flags.jellyfinTimeout ?? file.jellyfin?.timeout ?? DEFAULT_SERVER_TIMEOUT_SECONDS) *
				1000,
		});
	}

	const runTimeout = flags.runTimeout ?? file.runTimeout;
	const candidate = {
		channels,
		cookiesFile: flags.cookies ?? file.cookies,
		forceTokenRefresh: flags.forceTokenRefresh ?? false,
		outputDir: flags.output ?? file.output ?? ".",
		maxQuality: flags.maxQuality ?? file.maxQuality,
		daysBack: flags.daysBack ?? file.daysBack,
		updateMetadata: flags.updateMetadata ?? false,
		layout: {
			channelDir: flags.channelDir ?? file.channelDir ?? true,
			seasonDir: flags.seasonDir ?? file.seasonDir ?? true,
		},
		lockFile: flags.lockFile ?? file.lockFile ?? DEFAULT_LOCK_FILE,
		runTimeoutMs: runTimeout !== undefined ? Math.round(runTimeout * 60_000) : undefined,
		refreshTargets,
		emailTo: flags.emailTo ?? file.emailTo,
		logLevel: flags.logLevel ?? file.logLevel ?? env.LOG_LEVEL ?? "info",
		tools: {
			curlBin: env.CURL_BIN || "curl",
			curlOpts: splitArgs(env.CURL_OPTS),
			exiftoolBin: env.EXIFTOOL_BIN || "exiftool",
			sendmailBin: env.SENDMAIL_BIN || DEFAULT_SENDMAIL_BIN,
		},
	};

	const result = syncConfigSchema.safeParse(candidate);
	if (!result.success) {
		throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
	}
	return result.data;
}

/** First of `cookies.txt`, `.boosty.cookies.txt`, `~/.boosty.cookies.txt` that exists. */
export function findDefaultCookiesFile(cwd: string, homeDir: string): string | null {
	const candidates = [
		path.join(cwd, "cookies.txt"),
		path.join(cwd, ".boosty.cookies.txt"),
		path.join(homeDir, ".boosty.cookies.txt"),
	];
	return candidates.find((candidate) => existsSync(candidate)) ?? null;
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}

import pc from "picocolors";
import pino from "pino";
import pretty from "pino-pretty";

// ── Types ──────────────────────────────────────────────────────────────

export type LogContext = {
	channel?: string;
};

export type LogParams = Record<string, string | number>;

export type ItemStatus = "downloaded" | "updated" | "skipped" | "failed";

type LogLevel = "debug" | "info" | "warn" | "error";

// ── Sink ───────────────────────────────────────────────────────────────

const stream = pretty({
	colorize: true,
	translateTime: "HH:MM:ss",
	ignore: "pid,hostname",
	messageFormat: "{msg}",
	singleLine: true,
});

export const logger = pino(
	{
		level: process.env.LOG_LEVEL ?? "info",
	},
	stream,
);

export function setLogLevel(level: string): void {
	logger.level = level;
}

// ── Formatting helpers ─────────────────────────────────────────────────

const COL_CHANNEL = 18;

function channelTag(channel?: string): string {
	if (!channel) return "".padEnd(COL_CHANNEL);
	const trimmed =
		channel.length > COL_CHANNEL
			? `${channel.slice(0, COL_CHANNEL - 3)}...`
			: channel;
	return pc.magenta(trimmed.padEnd(COL_CHANNEL));
}

function formatParams(params?: LogParams): string {
	if (!params || Object.keys(params).length === 0) return "";
	const pairs = Object.entries(params)
		.map(([k, v]) => `${pc.dim(`${k}:`)} ${pc.dim(pc.cyan(String(v)))}`)
		.join(" ");
	return ` ${pc.dim("[")}${pairs}${pc.dim("]")}`;
}

export function truncateTitle(title: string, max = 120): string {
	const cleaned = title.trim().replace(/\s+/g, " ");
	if (!cleaned) return "(untitled)";
	return cleaned.length > max ? `${cleaned.slice(0, max - 3)}...` : cleaned;
}

export function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`;
	if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
	return `${Math.floor(ms / 60_000)}m${Math.round((ms % 60_000) / 1000)}s`;
}

function formatStatus(status: ItemStatus): string {
	switch (status) {
		case "downloaded":
			return pc.green("downloaded");
		case "updated":
			return pc.blue("updated");
		case "skipped":
			return pc.yellow("skipped");
		case "failed":
			return pc.red("failed");
	}
}

// ── Core write ─────────────────────────────────────────────────────────

function write(
	level: LogLevel,
	message: string,
	context?: LogContext,
	params?: LogParams,
): void {
	if (!logger.isLevelEnabled(level)) return;
	logger[level](
		`${channelTag(context?.channel)} ${message}${formatParams(params)}`,
	);
}

// ── Public API ─────────────────────────────────────────────────────────

export const log = {
	debug(msg: string, ctx?: LogContext, params?: LogParams): void {
		write("debug", msg, ctx, params);
	},
	info(msg: string, ctx?: LogContext, params?: LogParams): void {
		write("info", msg, ctx, params);
	},
	warn(msg: string, ctx?: LogContext, params?: LogParams): void {
		write("warn", msg, ctx, params);
	},
	error(msg: string, ctx?: LogContext, params?: LogParams): void {
		write("error", msg, ctx, params);
	},
};

// ── Domain helpers ─────────────────────────────────────────────────────

export function logChannelStarted(channel: string, daysBack?: number): void {
	const suffix = daysBack !== undefined ? pc.dim(` (last ${daysBack} days)`) : "";
	log.info(`Fetching posts${suffix}`, { channel });
}

export function logChannelFound(
	channel: string,
	total: number,
	newCount: number,
): void {
	const newLabel = newCount > 0 ? pc.green(`${newCount} new`) : pc.dim("0 new");
	log.info(`Found ${newLabel} | ${pc.dim(`${total} total`)}`, { channel });
}

export function logChannelCompleted(
	channel: string,
	stats: { downloaded: number; failed: number },
	elapsedMs: number,
): void {
	log.info(`Complete ${pc.dim(`in ${formatDuration(elapsedMs)}`)}`, { channel }, {
		downloaded: stats.downloaded,
		failed: stats.failed,
	});
}

export function logItemResult(args: {
	channel: string;
	status: ItemStatus;
	name: string;
	reason?: string;
}): void {
	const { channel, status, name, reason } = args;
	const detail = reason ? ` ${pc.dim(`(${reason})`)}` : "";
	const message = `${formatStatus(status)} ${pc.cyan(`'${truncateTitle(name)}'`)}${detail}`;

	if (status === "failed") {
		log.warn(message, { channel });
	} else {
		log.info(message, { channel });
	}
}

export function logTokenExpiry(expiresAt: Date, now: Date = new Date()): void {
	const days = (expiresAt.getTime() - now.getTime()) / 86_400_000;
	log.info(`Access token loaded, expires in ${days.toFixed(1)} days`);
}

import { stat } from "node:fs/promises";
import path from "node:path";
import { openCredentialStore } from "../../auth/credentials.js";
import { AccessTokenManager } from "../../auth/token-manager.js";
import { CatalogClient } from "../../catalog/client.js";
import { CatalogCrawler } from "../../catalog/crawler.js";
import {
	type SyncConfig,
	type SyncFlags,
	buildSyncConfig,
	loadConfigFile,
} from "../../config.js";
import type { LocalContext } from "../../context.js";
import { ConfigError, SyncError } from "../../errors.js";
import { LocalLibraryScanner } from "../../library/scanner.js";
import { CurlDownloader } from "../../media/downloader.js";
import { ExiftoolMetadataWriter } from "../../media/metadata.js";
import { NotificationDispatcher } from "../../notify/dispatcher.js";
import { SendmailMailer } from "../../notify/mailer.js";
import { LibraryRefreshClient } from "../../refresh/client.js";
import { LockManager } from "../../sync/lock.js";
import { DownloadOrchestrator } from "../../sync/orchestrator.js";
import { type SyncServices, runSync } from "../../sync/run.js";
import { log, setLogLevel } from "../../ui/logger.js";
import { runCancellable } from "../cancellation.js";

export interface SyncCommandFlags extends SyncFlags {
	config?: string;
}

const INTERRUPTED_EXIT_CODE = 130;

export async function sync(
	this: LocalContext,
	flags: SyncCommandFlags,
	...channels: string[]
): Promise<void> {
	try {
		const file = flags.config
			? await loadConfigFile(path.resolve(this.cwd, flags.config))
			: undefined;
		const config = buildSyncConfig({ channels, flags, env: this.process.env, file });
		setLogLevel(config.logLevel);

		const outputDir = path.resolve(this.cwd, config.outputDir);
		await assertDirectory(outputDir);

		const services = await buildServices(this, config);
		const options = { ...config, outputDir };

		const outcome = await runCancellable(this.process, config.runTimeoutMs, (signal) =>
			runSync(options, services, signal),
		);
		if (outcome.status === "aborted") {
			log.error(`Run aborted: ${outcome.reason}`);
			this.process.exitCode = INTERRUPTED_EXIT_CODE;
			return;
		}

		const { downloaded, updated, failed, refreshed } = outcome.value;
		log.info("Run complete", undefined, { downloaded, updated, failed, refreshed });
	} catch (error) {
		// Config, lock and credential problems end the run; content failures never get here.
		if (error instanceof SyncError) {
			log.error(error.message);
			this.process.exitCode = 1;
			return;
		}
		throw error;
	}
}

async function buildServices(
	context: LocalContext,
	config: SyncConfig,
): Promise<SyncServices> {
	const jar = await openCredentialStore({
		explicitPath: config.cookiesFile,
		cwd: context.cwd,
		homeDir: context.homeDir,
	});

	const client = new CatalogClient();
	const { curlBin, curlOpts, exiftoolBin, sendmailBin } = config.tools;
	const metadata = new ExiftoolMetadataWriter({ exiftoolBin, curlBin, curlOpts });

	return {
		lock: new LockManager(),
		tokens: jar ? new AccessTokenManager({ jar, exchanger: client }) : null,
		catalog: new CatalogCrawler(client),
		library: new LocalLibraryScanner(),
		orchestrator: new DownloadOrchestrator({
			downloader: new CurlDownloader({ curlBin, curlOpts, maxQuality: config.maxQuality }),
			notifier: new NotificationDispatcher(new SendmailMailer(sendmailBin), config.emailTo),
			metadata,
		}),
		metadata,
		refresher: new LibraryRefreshClient(),
	};
}

async function assertDirectory(dir: string): Promise<void> {
	const info = await stat(dir).catch((error: unknown) => {
		throw new ConfigError(`Output directory ${dir} does not exist`, error);
	});
	if (!info.isDirectory()) {
		throw new ConfigError(`Output path ${dir} is not a directory`);
	}
}

import { openCredentialStore } from "../../auth/credentials.js";
import { AccessTokenManager } from "../../auth/token-manager.js";
import { CatalogClient } from "../../catalog/client.js";
import type { LogLevel } from "../../config.js";
import type { LocalContext } from "../../context.js";
import { ConfigError, SyncError } from "../../errors.js";
import { log, setLogLevel } from "../../ui/logger.js";

interface TokenCommandFlags {
	cookies?: string;
	force?: boolean;
	logLevel?: LogLevel;
}

export async function token(this: LocalContext, flags: TokenCommandFlags): Promise<void> {
	if (flags.logLevel) setLogLevel(flags.logLevel);

	try {
		const jar = await openCredentialStore({
			explicitPath: flags.cookies,
			cwd: this.cwd,
			homeDir: this.homeDir,
		});
		if (!jar) {
			throw new ConfigError("No credentials to refresh");
		}

		const manager = new AccessTokenManager({ jar, exchanger: new CatalogClient() });
		const current = await manager.getValidToken(flags.force ?? false);
		log.info(`Token is ${manager.state}`, undefined, {
			expires: current.expiresAt.toISOString(),
			store: jar.filePath,
		});
	} catch (error) {
		if (error instanceof SyncError) {
			log.error(error.message);
			this.process.exitCode = 1;
			return;
		}
		throw error;
	}
}

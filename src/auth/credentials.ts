import { existsSync } from "node:fs";
import path from "node:path";
import { findDefaultCookiesFile } from "../config.js";
import { ConfigError, errorMessage } from "../errors.js";
import { log } from "../ui/logger.js";
import { CookieJar } from "./cookie-jar.js";
import { AUTH_COOKIE_DOMAIN, AUTH_COOKIE_NAME } from "./token-manager.js";

/**
 * Opens the cookie jar the run authenticates with. A file named on the
 * command line must exist and hold the auth cookie; a discovered one that
 * does not hold it is ignored. Returns null for an anonymous run.
 */
export async function openCredentialStore(options: {
	explicitPath?: string;
	cwd: string;
	homeDir: string;
}): Promise<CookieJar | null> {
	const { explicitPath, cwd, homeDir } = options;

	if (explicitPath) {
		const filePath = path.resolve(cwd, explicitPath);
		if (!existsSync(filePath)) {
			throw new ConfigError(`Cookies file not found: ${filePath}`);
		}
		const jar = new CookieJar(filePath);
		if (!(await hasAuthCookie(jar))) {
			throw new ConfigError(
				`No '${AUTH_COOKIE_NAME}' cookie for ${AUTH_COOKIE_DOMAIN} in ${filePath}`,
			);
		}
		return jar;
	}

	const discovered = findDefaultCookiesFile(cwd, homeDir);
	if (!discovered) {
		log.warn("No cookies file found, only free posts will be downloaded");
		return null;
	}

	const jar = new CookieJar(discovered);
	if (!(await hasAuthCookie(jar))) {
		log.warn(`No '${AUTH_COOKIE_NAME}' cookie in ${discovered}, running anonymously`);
		return null;
	}
	log.debug(`Using cookies from ${discovered}`);
	return jar;
}

async function hasAuthCookie(jar: CookieJar): Promise<boolean> {
	try {
		return (await jar.read(AUTH_COOKIE_DOMAIN, AUTH_COOKIE_NAME)) !== null;
	} catch (error) {
		throw new ConfigError(`Unable to read ${jar.filePath}: ${errorMessage(error)}`, error);
	}
}

import { readFile, rename, writeFile } from "node:fs/promises";

/**
 * Netscape cookies.txt store
 *
 * Format (tab-separated):
 * domain  includeSubdomains  path  secure  expiration  name  value
 *
 * Lines starting with # are comments, except the "#HttpOnly_" domain prefix
 * written by curl and browser exporters. Values are kept URL-encoded on disk.
 */

export type CookieEntry = {
	domain: string;
	path: string;
	secure: boolean;
	expires: number;
	name: string;
	value: string;
};

const FIELD_COUNT = 7;
const HTTP_ONLY_PREFIX = "#HttpOnly_";

type CookieLine = {
	prefix: string;
	parts: string[];
};

function splitLine(line: string): CookieLine | null {
	let trimmed = line.trim();
	let prefix = "";
	if (trimmed.startsWith(HTTP_ONLY_PREFIX)) {
		prefix = HTTP_ONLY_PREFIX;
		trimmed = trimmed.slice(HTTP_ONLY_PREFIX.length);
	}
	if (!trimmed || trimmed.startsWith("#")) return null;
	const parts = trimmed.split("\t");
	return parts.length >= FIELD_COUNT ? { prefix, parts } : null;
}

export function parseCookies(raw: string): CookieEntry[] {
	const cookies: CookieEntry[] = [];
	for (const line of raw.split(/\r?\n/)) {
		const parsed = splitLine(line);
		if (!parsed) continue;

		const [domain = "", , path = "/", secure = "", expiration = "", name = "", value = ""] =
			parsed.parts;
		const expires = Number(expiration);
		cookies.push({
			domain,
			path: path || "/",
			secure: secure.toLowerCase() === "true",
			expires: Number.isFinite(expires) ? expires : 0,
			name,
			value: safeDecode(value),
		});
	}
	return cookies;
}

function safeDecode(value: string): string {
	try {
		return decodeURIComponent(value);
	} catch {
		return value;
	}
}

export class CookieJar {
	constructor(readonly filePath: string) {}

	async read(domain: string, name: string): Promise<string | null> {
		const raw = await readFile(this.filePath, "utf8");
		const match = parseCookies(raw).find(
			(cookie) => cookie.domain === domain && cookie.name === name,
		);
		return match?.value ?? null;
	}

	/**
	 * Replaces the value of an existing cookie, leaving every other line as it
	 * was. The file is rewritten through a temp file so an interrupted write
	 * never truncates the jar.
	 */
	async update(domain: string, name: string, value: string): Promise<void> {
		const raw = await readFile(this.filePath, "utf8");
		const lines = raw.split("\n");
		let found = false;

		const updated = lines.map((line) => {
			const parsed = splitLine(line);
			if (!parsed) return line;
			const { prefix, parts } = parsed;
			if (parts[0] !== domain || parts[5] !== name) return line;
			found = true;
			parts[6] = encodeURIComponent(value);
			const ending = line.endsWith("\r") ? "\r" : "";
			return `${prefix}${parts.join("\t")}${ending}`;
		});

		if (!found) {
			throw new Error(`Cookie '${name}' for ${domain} not found in ${this.filePath}`);
		}

		const tmp = `${this.filePath}.tmp`;
		await writeFile(tmp, updated.join("\n"), "utf8");
		await rename(tmp, this.filePath);
	}
}

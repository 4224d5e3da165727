import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";
import { hasErrorCode } from "../errors.js";
import { postIdOfFileId } from "./naming.js";

export const MEDIA_EXTENSIONS: ReadonlySet<string> = new Set([
	".mp4",
	".mkv",
	".webm",
	".mov",
]);

/** `[<id>]` immediately before the extension */
const EMBEDDED_ID_PATTERN = /\[([^[\]]+)\]$/;

export type LocalFile = {
	/** The bracketed id as written: a post id, or `<postId>_<videoId>` */
	fileId: string;
	embeddedPostId: string;
	path: string;
};

/**
 * What has already been mirrored. The filesystem implementation below reads
 * it back from file names; nothing else in the sync depends on how.
 */
export interface LibraryIndex {
	/** File ids present; a post's first video is filed under the bare post id. */
	scan(channelDir: string): Promise<Set<string>>;
	files(channelDir: string): Promise<LocalFile[]>;
}

export function embeddedFileId(fileName: string): string | null {
	const extension = path.extname(fileName).toLowerCase();
	if (!MEDIA_EXTENSIONS.has(extension)) return null;
	const stem = fileName.slice(0, -extension.length);
	const match = EMBEDDED_ID_PATTERN.exec(stem);
	return match?.[1] ?? null;
}

export class LocalLibraryScanner implements LibraryIndex {
	async scan(channelDir: string): Promise<Set<string>> {
		const files = await this.files(channelDir);
		return new Set(files.map((file) => file.fileId));
	}

	async files(channelDir: string): Promise<LocalFile[]> {
		const found: LocalFile[] = [];
		await walk(channelDir, found);
		return found;
	}
}

async function walk(dir: string, found: LocalFile[]): Promise<void> {
	let entries: Dirent[];
	try {
		entries = await readdir(dir, { withFileTypes: true });
	} catch (error) {
		if (hasErrorCode(error, "ENOENT", "ENOTDIR")) return;
		throw error;
	}

	for (const entry of entries) {
		const fullPath = path.join(dir, entry.name);
		if (entry.isDirectory()) {
			await walk(fullPath, found);
			continue;
		}
		if (!entry.isFile()) continue;

		const fileId = embeddedFileId(entry.name);
		if (fileId) {
			found.push({ fileId, embeddedPostId: postIdOfFileId(fileId), path: fullPath });
		}
	}
}


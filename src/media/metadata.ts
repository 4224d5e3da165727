import { rm } from "node:fs/promises";
import type { Post, VideoEntry } from "../catalog/types.js";
import { type CommandRunner, runCommand } from "../utils/exec.js";

export interface MetadataWriter {
	/** `video` is the attachment the file holds; it supplies the title and cover. */
	embed(
		filePath: string,
		post: Post,
		video?: VideoEntry,
		signal?: AbortSignal,
	): Promise<void>;
}

export type ExiftoolMetadataWriterOptions = {
	exiftoolBin?: string;
	curlBin?: string;
	curlOpts?: readonly string[];
	run?: CommandRunner;
};

/**
 * Writes title, channel, post URL and the preview image into the media file
 * with exiftool. Throws when exiftool fails; callers decide whether that
 * matters.
 */
export class ExiftoolMetadataWriter implements MetadataWriter {
	private readonly exiftoolBin: string;
	private readonly curlBin: string;
	private readonly curlOpts: readonly string[];
	private readonly run: CommandRunner;

	constructor(options: ExiftoolMetadataWriterOptions = {}) {
		this.exiftoolBin = options.exiftoolBin ?? "exiftool";
		this.curlBin = options.curlBin ?? "curl";
		this.curlOpts = options.curlOpts ?? [];
		this.run = options.run ?? runCommand;
	}

	async embed(
		filePath: string,
		post: Post,
		video?: VideoEntry,
		signal?: AbortSignal,
	): Promise<void> {
		const title = video?.title || post.title;
		const previewPath = video?.preview
			? await this.downloadPreview(video.preview, `${filePath}.preview.jpg`, signal)
			: null;

		try {
			const args = [this.exiftoolBin, `-Title=${title}`, `-Artist=${post.channel}`];
			if (previewPath) args.push(`-CoverArt<=${previewPath}`);
			args.push(`-Comment=${post.blogUrl}`, "-overwrite_original", "-q", filePath);

			const result = await this.run(args, { signal });
			if (result.code !== 0) {
				throw new Error(
					`${this.exiftoolBin} exited with code ${result.code}: ${result.stderr.trim()}`,
				);
			}
		} finally {
			if (previewPath) await rm(previewPath, { force: true });
		}
	}

	private async downloadPreview(
		url: string,
		target: string,
		signal?: AbortSignal,
	): Promise<string | null> {
		const result = await this.run(
			[this.curlBin, "-s", "-L", "--fail", ...this.curlOpts, "-o", target, url],
			{ signal },
		);
		return result.code === 0 ? target : null;
	}
}

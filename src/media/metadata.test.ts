import { describe, expect, it, vi } from "vitest";
import type { Post } from "../catalog/types.js";
import type { CommandResult, CommandRunner } from "../utils/exec.js";
import { ExiftoolMetadataWriter } from "./metadata.js";

function result(code = 0, stderr = ""): CommandResult {
	return { code, stdout: "", stderr, output: stderr, aborted: false };
}

function post(preview?: string): Post {
	return {
		id: "p1",
		channel: "demo",
		createdAt: new Date("2024-05-03T10:00:00Z"),
		title: "Post title",
		blogUrl: "https://boosty.to/demo/posts/p1",
		hasAccess: true,
		videos: [{ id: "v1", title: "Video title", playerUrls: [], preview }],
	};
}

describe("ExiftoolMetadataWriter", () => {
	it("embeds title, channel, post url and the downloaded preview", async () => {
		const run = vi.fn<CommandRunner>().mockResolvedValue(result());
		const writer = new ExiftoolMetadataWriter({ exiftoolBin: "exiftool", curlBin: "curl", run });

		const p = post("https://img.example/p1.jpg");
		await writer.embed("/lib/a [p1].mp4", p, p.videos[0]);

		expect(run.mock.calls.map(([args]) => args)).toEqual([
			["curl", "-s", "-L", "--fail", "-o", "/lib/a [p1].mp4.preview.jpg", "https://img.example/p1.jpg"],
			[
				"exiftool",
				"-Title=Video title",
				"-Artist=demo",
				"-CoverArt<=/lib/a [p1].mp4.preview.jpg",
				"-Comment=https://boosty.to/demo/posts/p1",
				"-overwrite_original",
				"-q",
				"/lib/a [p1].mp4",
			],
		]);
	});

	it("goes without cover art when the preview cannot be fetched", async () => {
		const run = vi
			.fn<CommandRunner>()
			.mockResolvedValueOnce(result(22))
			.mockResolvedValueOnce(result());
		const writer = new ExiftoolMetadataWriter({ run });

		const p = post("https://img.example/p1.jpg");
		await writer.embed("/lib/a [p1].mp4", p, p.videos[0]);

		const exiftool = run.mock.calls[1]?.[0] ?? [];
		expect(exiftool.some((arg) => arg.startsWith("-CoverArt"))).toBe(false);
	});

	it("throws when exiftool fails", async () => {
		const run = vi.fn<CommandRunner>().mockResolvedValue(result(1, "Error: not a valid MP4\n"));
		const writer = new ExiftoolMetadataWriter({ run });

		await expect(writer.embed("/lib/a [p1].mp4", post())).rejects.toThrow(
			"exiftool exited with code 1: Error: not a valid MP4",
		);
		expect(run).toHaveBeenCalledTimes(1);
	});

	it("falls back to the post title without a video", async () => {
		const run = vi.fn<CommandRunner>().mockResolvedValue(result());
		const writer = new ExiftoolMetadataWriter({ run });

		await writer.embed("/lib/a [p1].mp4", post("https://img.example/p1.jpg"));

		expect(run).toHaveBeenCalledTimes(1);
		expect(run.mock.calls[0]?.[0]).toContain("-Title=Post title");
	});
});

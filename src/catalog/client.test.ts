import { describe, expect, it } from "vitest";
import { NetworkError, ParseError } from "../errors.js";
import { CatalogClient } from "./client.js";

type Call = { url: string; init?: RequestInit };

function fakeFetch(...responses: Array<Response | Error>) {
	const calls: Call[] = [];
	const impl: typeof fetch = async (input, init) => {
		calls.push({ url: String(input), init });
		const next = responses.shift();
		if (!next) throw new Error("unexpected request");
		if (next instanceof Error) throw next;
		return next;
	};
	return { impl, calls };
}

function json(body: unknown): Response {
	return new Response(JSON.stringify(body), {
		headers: { "Content-Type": "application/json" },
	});
}

describe("CatalogClient", () => {
	it("requests a posts page with the bearer token and returns its cursor", async () => {
		const { impl, calls } = fakeFetch(
			json({ data: [{ id: "p1" }], extra: { offset: "cursor-2", isLast: false } }),
		);
		const client = new CatalogClient({ fetch: impl });

		const page = await client.listPostsPage("demo", { token: "test-token", offset: null });

		expect(page).toEqual({ items: [{ id: "p1" }], nextOffset: "cursor-2" });
		expect(calls[0]?.url).toBe("https://api.boosty.to/v1/blog/demo/post/?limit=25");
		expect(new Headers(calls[0]?.init?.headers).get("Authorization")).toBe("Bearer test-token");
	});

	it("sends no authorization header anonymously", async () => {
		const { impl, calls } = fakeFetch(json({ data: [], extra: {} }));
		const client = new CatalogClient({ fetch: impl });

		const page = await client.listPostsPage("demo", { token: null, offset: null });

		expect(page.nextOffset).toBeNull();
		expect(new Headers(calls[0]?.init?.headers).has("Authorization")).toBe(false);
	});

	it("treats isLast as the end of the feed even with a cursor", async () => {
		const { impl } = fakeFetch(json({ data: [], extra: { offset: "x", isLast: true } }));
		const client = new CatalogClient({ fetch: impl });

		const page = await client.listPostsPage("demo", { token: null, offset: "prev" });
		expect(page.nextOffset).toBeNull();
	});

	it("requests the video media album with the cursor", async () => {
		const { impl, calls } = fakeFetch(
			json({
				data: { mediaPosts: [{ post: { id: "p1" }, media: [] }] },
				extra: { offset: 17, isLast: false },
			}),
		);
		const client = new CatalogClient({ fetch: impl, pageSize: 10 });

		const page = await client.listMediaAlbumPage("demo", { token: null, offset: "o1" });

		expect(calls[0]?.url).toBe(
			"https://api.boosty.to/v1/blog/demo/media_album/?limit=10&offset=o1&type=video&limit_by=media",
		);
		expect(page).toEqual({ items: [{ post: { id: "p1" }, media: [] }], nextOffset: "17" });
	});

	it("maps server errors to retryable network errors", async () => {
		const { impl } = fakeFetch(new Response("<html>bad gateway</html>", { status: 502 }));
		const client = new CatalogClient({ fetch: impl });

		const error = await client.listPostsPage("demo", { token: null, offset: null }).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(NetworkError);
		expect(error).toMatchObject({ status: 502, retryable: true });
	});

	it("maps client errors to non-retryable network errors", async () => {
		const { impl } = fakeFetch(
			new Response(JSON.stringify({ error: "blog_not_found" }), {
				status: 404,
				statusText: "Not Found",
			}),
		);
		const client = new CatalogClient({ fetch: impl });

		const error = await client.listPostsPage("nobody", { token: null, offset: null }).catch((e: unknown) => e);

		expect(error).toMatchObject({ status: 404, retryable: false });
		expect(error).toHaveProperty("message", "Catalog API error: 404 Not Found (blog_not_found)");
	});

	it("treats a transport failure as retryable", async () => {
		const { impl } = fakeFetch(new TypeError("fetch failed"));
		const client = new CatalogClient({ fetch: impl });

		await expect(client.getPost("demo", "p1", null)).rejects.toMatchObject({
			code: "network",
			retryable: true,
		});
	});

	it("reports malformed JSON as a parse error", async () => {
		const { impl } = fakeFetch(new Response("not json", { status: 200 }));
		const client = new CatalogClient({ fetch: impl });

		await expect(client.getPost("demo", "p1", null)).rejects.toBeInstanceOf(ParseError);
	});

	it("reports an unexpected page shape as a parse error", async () => {
		const { impl } = fakeFetch(json({ items: [] }));
		const client = new CatalogClient({ fetch: impl });

		await expect(client.listPostsPage("demo", { token: null, offset: null })).rejects.toBeInstanceOf(
			ParseError,
		);
	});

	it("surfaces an error body as a non-retryable network error", async () => {
		const { impl } = fakeFetch(json({ error: "invalid_grant", error_description: "expired" }));
		const client = new CatalogClient({ fetch: impl });

		await expect(client.exchangeRefreshToken("test-refresh", "client-1")).rejects.toMatchObject({
			message: "API error: invalid_grant (expired)",
			retryable: false,
		});
	});

	it("exchanges a refresh token through the form endpoint", async () => {
		const now = new Date("2024-06-01T00:00:00Z");
		const { impl, calls } = fakeFetch(
			json({ access_token: "new-access", refresh_token: "new-refresh", expires_in: 3600 }),
		);
		const client = new CatalogClient({ fetch: impl, now: () => now });

		const token = await client.exchangeRefreshToken("test-refresh", "client-1");

		expect(token).toEqual({
			value: "new-access",
			refreshToken: "new-refresh",
			expiresAt: new Date("2024-06-01T01:00:00Z"),
		});
		expect(calls[0]?.url).toBe("https://api.boosty.to/oauth/token/");
		expect(calls[0]?.init?.method).toBe("POST");
		expect(Object.fromEntries(new URLSearchParams(String(calls[0]?.init?.body)))).toEqual({
			grant_type: "refresh_token",
			device_os: "web",
			device_id: "client-1",
			refresh_token: "test-refresh",
		});
	});
});

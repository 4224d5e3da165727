import type { z } from "zod";
import type { AccessToken, TokenExchanger } from "../auth/token-manager.js";
import { NetworkError, ParseError, errorMessage } from "../errors.js";
import {
	apiErrorSchema,
	mediaAlbumPageSchema,
	nextOffset,
	postsPageSchema,
	tokenResponseSchema,
} from "./schemas.js";
import type { Page } from "./types.js";

export const BOOSTY_API_URL = "https://api.boosty.to";
const DEFAULT_PAGE_SIZE = 25;
const DEFAULT_TIMEOUT_MS = 30_000;

export type PageRequest = {
	token: string | null;
	offset: string | null;
	limit?: number;
};

export interface CatalogApi {
	listPostsPage(channel: string, request: PageRequest): Promise<Page<unknown>>;
	listMediaAlbumPage(
		channel: string,
		request: PageRequest,
	): Promise<Page<unknown>>;
	getPost(channel: string, postId: string, token: string | null): Promise<unknown>;
}

export type CatalogClientOptions = {
	baseUrl?: string;
	fetch?: typeof fetch;
	timeoutMs?: number;
	pageSize?: number;
	now?: () => Date;
};

export class CatalogClient implements CatalogApi, TokenExchanger {
	private readonly baseUrl: string;
	private readonly fetchImpl: typeof fetch;
	private readonly timeoutMs: number;
	private readonly pageSize: number;
	private readonly now: () => Date;

	constructor(options: CatalogClientOptions = {}) {
		this.baseUrl = (options.baseUrl ?? BOOSTY_API_URL).replace(/\/+$/, "");
		this.fetchImpl = options.fetch ?? fetch;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
		this.now = options.now ?? (() => new Date());
	}

	async listPostsPage(
		channel: string,
		request: PageRequest,
	): Promise<Page<unknown>> {
		const params = this.pageParams(request);
		const body = await this.getJson(
			`/v1/blog/${encodeURIComponent(channel)}/post/?${params}`,
			request.token,
		);
		const page = parseWith(postsPageSchema, body, `posts page of ${channel}`);
		return { items: page.data, nextOffset: nextOffset(page.extra) };
	}

	async listMediaAlbumPage(
		channel: string,
		request: PageRequest,
	): Promise<Page<unknown>> {
		const params = this.pageParams(request);
		params.set("type", "video");
		params.set("limit_by", "media");
		const body = await this.getJson(
			`/v1/blog/${encodeURIComponent(channel)}/media_album/?${params}`,
			request.token,
		);
		const page = parseWith(
			mediaAlbumPageSchema,
			body,
			`media album page of ${channel}`,
		);
		return { items: page.data.mediaPosts, nextOffset: nextOffset(page.extra) };
	}

	async getPost(
		channel: string,
		postId: string,
		token: string | null,
	): Promise<unknown> {
		return this.getJson(
			`/v1/blog/${encodeURIComponent(channel)}/post/${encodeURIComponent(postId)}`,
			token,
		);
	}

	async exchangeRefreshToken(
		refreshToken: string,
		clientId: string,
	): Promise<AccessToken> {
		const form = new URLSearchParams({
			grant_type: "refresh_token",
			device_os: "web",
			device_id: clientId,
			refresh_token: refreshToken,
		});
		const body = await this.request("/oauth/token/", {
			method: "POST",
			headers: { "Content-Type": "application/x-www-form-urlencoded" },
			body: form.toString(),
		});
		const parsed = parseWith(tokenResponseSchema, body, "token refresh response");

		return {
			value: parsed.access_token,
			refreshToken: parsed.refresh_token,
			expiresAt: new Date(this.now().getTime() + parsed.expires_in * 1000),
		};
	}

	private pageParams(request: PageRequest): URLSearchParams {
		const params = new URLSearchParams({
			limit: String(request.limit ?? this.pageSize),
		});
		if (request.offset) params.set("offset", request.offset);
		return params;
	}

	private getJson(path: string, token: string | null): Promise<unknown> {
		const headers: Record<string, string> = { Accept: "application/json" };
		if (token) headers.Authorization = `Bearer ${token}`;
		return this.request(path, { method: "GET", headers });
	}

	private async request(path: string, init: RequestInit): Promise<unknown> {
		const url = `${this.baseUrl}${path}`;
		let response: Response;
		let text: string;
		try {
			response = await this.fetchImpl(url, {
				...init,
				signal: AbortSignal.timeout(this.timeoutMs),
			});
			text = await response.text();
		} catch (error) {
			throw new NetworkError(`Request to ${url} failed: ${errorMessage(error)}`, {
				cause: error,
			});
		}

		if (!response.ok) {
			throw new NetworkError(
				`Catalog API error: ${response.status} ${response.statusText}${describeApiError(text)}`,
				{
					status: response.status,
					retryable: response.status === 429 || response.status >= 500,
				},
			);
		}

		const body = parseJson(text, url);
		const apiError = apiErrorSchema.safeParse(body);
		if (apiError.success) {
			throw new NetworkError(
				`API error: ${apiError.data.error} (${apiError.data.error_description ?? "no details"})`,
				{ status: response.status, retryable: false },
			);
		}

		return body;
	}
}

function parseJson(text: string, url: string): unknown {
	try {
		return JSON.parse(text);
	} catch (error) {
		throw new ParseError(`Invalid JSON from ${url}: ${errorMessage(error)}`, error);
	}
}

function describeApiError(text: string): string {
	try {
		const parsed = apiErrorSchema.safeParse(JSON.parse(text));
		return parsed.success ? ` (${parsed.data.error})` : "";
	} catch {
		return "";
	}
}

function parseWith<T extends z.ZodTypeAny>(
	schema: T,
	body: unknown,
	what: string,
): z.infer<T> {
	const result = schema.safeParse(body);
	if (!result.success) {
		throw new ParseError(
			`Unexpected ${what}: ${result.error.issues[0]?.message ?? "invalid shape"}`,
			result.error,
		);
	}
	return result.data;
}

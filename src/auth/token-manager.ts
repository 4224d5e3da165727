import { z } from "zod";
import { AuthError, errorMessage } from "../errors.js";
import { log, logTokenExpiry } from "../ui/logger.js";
import {
	DEFAULT_RETRY_POLICY,
	type RetryPolicy,
	withRetry,
} from "../utils/retry.js";
import type { CookieJar } from "./cookie-jar.js";

export const AUTH_COOKIE_DOMAIN = ".boosty.to";
export const AUTH_COOKIE_NAME = "auth";
export const CLIENT_ID_COOKIE_NAME = "_clientId";

const DAY_MS = 24 * 60 * 60 * 1000;

/** A token with less than this left is refreshed ahead of time. */
export const TOKEN_REFRESH_THRESHOLD_MS = DAY_MS;

export type AccessToken = {
	value: string;
	expiresAt: Date;
	refreshToken: string;
};

/**
 * unknown → valid → expired → refreshing → valid | failed.
 * `failed` sticks for the lifetime of the manager. A refresh that fails while
 * the stored token has not reached `expiresAt` goes back to `valid` with it.
 */
export type TokenState = "unknown" | "valid" | "expired" | "refreshing" | "failed";

/** What a run needs from the credential side: a token it may use right now. */
export interface TokenSource {
	getValidToken(forceRefresh?: boolean): Promise<AccessToken>;
}

export interface TokenExchanger {
	exchangeRefreshToken(
		refreshToken: string,
		clientId: string,
	): Promise<AccessToken>;
}

const authCookieSchema = z.object({
	accessToken: z.string().min(1),
	refreshToken: z.string().default(""),
	expiresAt: z.coerce.number(),
});

export type AccessTokenManagerOptions = {
	jar: CookieJar;
	exchanger: TokenExchanger;
	retryPolicy?: RetryPolicy;
	refreshThresholdMs?: number;
	now?: () => Date;
};

export class AccessTokenManager implements TokenSource {
	private readonly jar: CookieJar;
	private readonly exchanger: TokenExchanger;
	private readonly retryPolicy: RetryPolicy;
	private readonly refreshThresholdMs: number;
	private readonly now: () => Date;

	private current: AccessToken | null = null;
	private clientId: string | null = null;
	private pending: Promise<AccessToken> | null = null;
	private failure: AuthError | null = null;
	/** Set once an early refresh failed; the stored token is then kept until it expires. */
	private refreshDeferred = false;
	private _state: TokenState = "unknown";

	constructor(options: AccessTokenManagerOptions) {
		this.jar = options.jar;
		this.exchanger = options.exchanger;
		this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
		this.refreshThresholdMs =
			options.refreshThresholdMs ?? TOKEN_REFRESH_THRESHOLD_MS;
		this.now = options.now ?? (() => new Date());
	}

	get state(): TokenState {
		return this._state;
	}

	/**
	 * Returns the cached token while it is valid, otherwise refreshes it.
	 * Concurrent callers share a single refresh.
	 *
	 * @throws AuthError when the store cannot be read, or the exchange fails
	 * and the stored token has already expired
	 */
	async getValidToken(forceRefresh = false): Promise<AccessToken> {
		if (this.failure) throw this.failure;
		if (this.pending) return this.pending;

		if (
			this.current &&
			this._state === "valid" &&
			!forceRefresh &&
			!this.isExpiring(this.current)
		) {
			return this.current;
		}

		this.pending = this.resolve(forceRefresh).finally(() => {
			this.pending = null;
		});
		return this.pending;
	}

	private async resolve(forceRefresh: boolean): Promise<AccessToken> {
		const token = this.current ?? (await this.load());

		if (!forceRefresh && !this.isExpiring(token)) {
			this._state = "valid";
			logTokenExpiry(token.expiresAt, this.now());
			return token;
		}

		this._state = "expired";
		this.logRefreshReason(token, forceRefresh);
		try {
			return await this.refresh(token);
		} catch (error) {
			const failure =
				error instanceof AuthError
					? error
					: new AuthError(`Access token refresh failed: ${errorMessage(error)}`, error);
			if (this.isExpired(token)) throw this.fail(failure);

			this.refreshDeferred = true;
			this._state = "valid";
			log.warn(`${failure.message}; using the stored token until it expires`);
			logTokenExpiry(token.expiresAt, this.now());
			return token;
		}
	}

	private async load(): Promise<AccessToken> {
		try {
			const raw = await this.jar.read(AUTH_COOKIE_DOMAIN, AUTH_COOKIE_NAME);
			if (!raw) {
				throw new AuthError(
					`Required '${AUTH_COOKIE_NAME}' cookie not found in ${this.jar.filePath}`,
				);
			}

			const parsed = authCookieSchema.parse(JSON.parse(raw));
			this.clientId = await this.jar.read(
				AUTH_COOKIE_DOMAIN,
				CLIENT_ID_COOKIE_NAME,
			);
			const token: AccessToken = {
				value: parsed.accessToken,
				refreshToken: parsed.refreshToken,
				expiresAt: new Date(parsed.expiresAt),
			};
			this.current = token;
			return token;
		} catch (error) {
			throw this.fail(
				error instanceof AuthError
					? error
					: new AuthError(`Unable to parse auth cookie: ${errorMessage(error)}`, error),
			);
		}
	}

	private async refresh(token: AccessToken): Promise<AccessToken> {
		this._state = "refreshing";
		try {
			if (!token.refreshToken) {
				throw new AuthError("No refresh token available");
			}
			const clientId = this.clientId;
			if (!clientId) {
				throw new AuthError(`Required '${CLIENT_ID_COOKIE_NAME}' cookie not found`);
			}

			const next = await withRetry(
				() => this.exchanger.exchangeRefreshToken(token.refreshToken, clientId),
				this.retryPolicy,
				{
					onRetry: (attempt, delayMs, error) =>
						log.warn(`Token refresh attempt ${attempt} failed, retrying`, undefined, {
							delay: `${delayMs}ms`,
							error: errorMessage(error),
						}),
				},
			);

			await this.persist(next);
			this.current = next;
			this._state = "valid";

			const days = (next.expiresAt.getTime() - this.now().getTime()) / DAY_MS;
			log.info(`Access token refreshed, expires in ${days.toFixed(1)} days`);
			return next;
		} catch (error) {
			throw error instanceof AuthError
				? error
				: new AuthError(`Access token refresh failed: ${errorMessage(error)}`, error);
		}
	}

	private async persist(token: AccessToken): Promise<void> {
		const value = JSON.stringify({
			accessToken: token.value,
			refreshToken: token.refreshToken,
			expiresAt: token.expiresAt.getTime(),
		});
		await this.jar.update(AUTH_COOKIE_DOMAIN, AUTH_COOKIE_NAME, value);
	}

	private fail(error: AuthError): AuthError {
		this._state = "failed";
		this.failure = error;
		log.error(error.message);
		return error;
	}

	private isExpiring(token: AccessToken): boolean {
		const thresholdMs = this.refreshDeferred ? 0 : this.refreshThresholdMs;
		return token.expiresAt.getTime() - this.now().getTime() < thresholdMs;
	}

	private isExpired(token: AccessToken): boolean {
		return token.expiresAt.getTime() <= this.now().getTime();
	}

	private logRefreshReason(token: AccessToken, forced: boolean): void {
		const remainingMs = token.expiresAt.getTime() - this.now().getTime();
		if (forced) {
			log.info("Forcing access token refresh");
		} else if (remainingMs < 0) {
			log.warn("Access token expired, refreshing");
		} else {
			const hours = remainingMs / (60 * 60 * 1000);
			log.warn(`Access token expires in ${hours.toFixed(1)} hours, refreshing`);
		}
	}
}

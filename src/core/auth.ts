import { z } from "zod";
import { InterfaceError } from "./errors";

/**
 * Supplies bearer tokens to the HTTP transport. The driver never inspects
 * the token; it only asks for one per request and drops it after a 401.
 */
export interface Auth {
	getToken(fetchImpl: typeof fetch): Promise<string>;
	invalidate(): void;
}

/** A fixed, externally managed access token. */
export class TokenAuth implements Auth {
	constructor(private readonly token: string) {
		if (!token) {
			throw new InterfaceError("Access token is required");
		}
	}

	async getToken(): Promise<string> {
		return this.token;
	}

	invalidate(): void {}
}

export interface ClientCredentialsOptions {
	/** Identity endpoint host, e.g. `id.app.firebolt.io`. */
	authEndpoint?: string;
	audience?: string;
}

const tokenResponseSchema = z.object({
	access_token: z.string().min(1),
	expires_in: z.number().positive(),
});

/**
 * OAuth client-credentials flow. The token is cached until it expires or
 * the transport invalidates it after an authentication failure.
 */
export class ClientCredentialsAuth implements Auth {
	private readonly tokenUrl: string;
	private readonly audience: string;
	private token: string | null = null;
	private expiresAt = 0;
	private pending: Promise<string> | null = null;

	constructor(
		private readonly clientId: string,
		private readonly clientSecret: string,
		options: ClientCredentialsOptions = {},
	) {
		if (!clientId) {
			throw new InterfaceError("Client ID is required");
		}
		if (!clientSecret) {
			throw new InterfaceError("Client secret is required");
		}
		const endpoint = (options.authEndpoint ?? "id.app.firebolt.io").replace(
			/\/+$/,
			"",
		);
		this.tokenUrl = `${endpoint.startsWith("http") ? endpoint : `https://${endpoint}`}/oauth/token`;
		this.audience = options.audience ?? "https://api.firebolt.io";
	}

	async getToken(fetchImpl: typeof fetch): Promise<string> {
		if (this.token && Date.now() < this.expiresAt) {
			return this.token;
		}
		// Concurrent callers share one token request.
		this.pending ??= this.requestToken(fetchImpl).finally(() => {
			this.pending = null;
		});
		return await this.pending;
	}

	invalidate(): void {
		this.token = null;
		this.expiresAt = 0;
	}

	private async requestToken(fetchImpl: typeof fetch): Promise<string> {
		const response = await fetchImpl(this.tokenUrl, {
			method: "POST",
			headers: {
				"Content-Type": "application/x-www-form-urlencoded",
				Accept: "application/json",
			},
			body: new URLSearchParams({
				client_id: this.clientId,
				client_secret: this.clientSecret,
				grant_type: "client_credentials",
				audience: this.audience,
			}).toString(),
		});
		const text = await response.text();
		if (!response.ok) {
			throw new InterfaceError(
				`Failed to authenticate: ${response.status} ${text || response.statusText}`,
			);
		}

		let json: unknown;
		try {
			json = text ? JSON.parse(text) : undefined;
		} catch {
			json = undefined;
		}
		const parsed = tokenResponseSchema.safeParse(json);
		if (!parsed.success) {
			throw new InterfaceError("Failed to authenticate: malformed token response");
		}

		this.token = parsed.data.access_token;
		this.expiresAt = Date.now() + parsed.data.expires_in * 1000;
		return this.token;
	}
}

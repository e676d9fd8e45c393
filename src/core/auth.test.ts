import { beforeEach, describe, expect, it, vi } from "vitest";
import { jsonResponse, textResponse } from "../test-utils";
import { ClientCredentialsAuth, TokenAuth } from "./auth";

describe("TokenAuth", () => {
	it("should return the configured token", async () => {
		await expect(new TokenAuth("test-token").getToken()).resolves.toBe("test-token");
	});

	it("should require a token", () => {
		expect(() => new TokenAuth("")).toThrow("Access token is required");
	});
});

describe("ClientCredentialsAuth", () => {
	let mockFetch: ReturnType<typeof vi.fn>;

	beforeEach(() => {
		mockFetch = vi.fn();
		mockFetch.mockImplementation(async () =>
			jsonResponse({ access_token: "issued-token", expires_in: 3600 }),
		);
	});

	it("should validate its credentials", () => {
		expect(() => new ClientCredentialsAuth("", "test-secret")).toThrow(
			"Client ID is required",
		);
		expect(() => new ClientCredentialsAuth("test-client", "")).toThrow(
			"Client secret is required",
		);
	});

	it("should exchange client credentials for a token", async () => {
		const auth = new ClientCredentialsAuth("test-client", "test-secret");

		await expect(auth.getToken(mockFetch)).resolves.toBe("issued-token");

		expect(mockFetch).toHaveBeenCalledWith(
			"https://id.app.firebolt.io/oauth/token",
			expect.objectContaining({
				method: "POST",
				body: "client_id=test-client&client_secret=test-secret&grant_type=client_credentials&audience=https%3A%2F%2Fapi.firebolt.io",
			}),
		);
	});

	it("should honor a custom endpoint and audience", async () => {
		const auth = new ClientCredentialsAuth("test-client", "test-secret", {
			authEndpoint: "http://localhost:9000/",
			audience: "test-audience",
		});

		await auth.getToken(mockFetch);

		expect(mockFetch).toHaveBeenCalledWith(
			"http://localhost:9000/oauth/token",
			expect.objectContaining({
				body: expect.stringContaining("audience=test-audience"),
			}),
		);
	});

	it("should cache the token until invalidated", async () => {
		const auth = new ClientCredentialsAuth("test-client", "test-secret");

		await auth.getToken(mockFetch);
		await auth.getToken(mockFetch);
		expect(mockFetch).toHaveBeenCalledTimes(1);

		auth.invalidate();
		await auth.getToken(mockFetch);
		expect(mockFetch).toHaveBeenCalledTimes(2);
	});

	it("should request a new token after expiry", async () => {
		vi.useFakeTimers();
		try {
			const auth = new ClientCredentialsAuth("test-client", "test-secret");
			await auth.getToken(mockFetch);

			vi.advanceTimersByTime(3601 * 1000);
			await auth.getToken(mockFetch);

			expect(mockFetch).toHaveBeenCalledTimes(2);
		} finally {
			vi.useRealTimers();
		}
	});

	it("should share one request between concurrent callers", async () => {
		const auth = new ClientCredentialsAuth("test-client", "test-secret");

		const tokens = await Promise.all([auth.getToken(mockFetch), auth.getToken(mockFetch)]);

		expect(tokens).toEqual(["issued-token", "issued-token"]);
		expect(mockFetch).toHaveBeenCalledTimes(1);
	});

	it("should report a rejected login", async () => {
		mockFetch.mockImplementation(async () => textResponse("bad credentials", 401));
		const auth = new ClientCredentialsAuth("test-client", "test-secret");

		await expect(auth.getToken(mockFetch)).rejects.toThrow(
			"Failed to authenticate: 401 bad credentials",
		);
	});

	it("should reject a malformed token response", async () => {
		mockFetch.mockImplementation(async () => jsonResponse({ token: "x" }));
		const auth = new ClientCredentialsAuth("test-client", "test-secret");

		await expect(auth.getToken(mockFetch)).rejects.toThrow(
			"Failed to authenticate: malformed token response",
		);
	});
});

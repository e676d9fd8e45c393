import { describe, expect, it } from "vitest";
import {
	Decimal,
	DriverError,
	EngineNotFoundError,
	NoDataError,
	QueryStatus,
	TokenAuth,
	connect,
	isDriverError,
	sqlDate,
	withConnection,
} from "./index";
import {
	TEST_ACCOUNT,
	TEST_API_ENDPOINT,
	TEST_TOKEN,
	USER_ENGINE_HOST,
	createFakeEngine,
	queryResult,
} from "./test-utils";
import { silentLogger } from "./core/logger";

describe("public API", () => {
	it("should expose the error taxonomy with codes", () => {
		const error = new EngineNotFoundError("reporting");

		expect(error).toBeInstanceOf(DriverError);
		expect(error.name).toBe("EngineNotFoundError");
		expect(isDriverError(error, "ENGINE_NOT_FOUND")).toBe(true);
		expect(isDriverError(error, "NO_DATA")).toBe(false);
		expect(isDriverError(new Error("plain"))).toBe(false);
		expect(new NoDataError().message).toBe("No rows to fetch");
	});

	it("should expose query statuses", () => {
		expect(QueryStatus.ENDED_SUCCESSFULLY).toBe("ENDED_SUCCESSFULLY");
	});

	it("should run a parameterized query end to end", async () => {
		const engine = createFakeEngine();
		engine.onQuery((request) =>
			request.host === USER_ENGINE_HOST && request.body.startsWith("SELECT order_id")
				? queryResult(
						[
							["order_id", "long"],
							["total", "decimal(12, 2)"],
							["placed_on", "date"],
							["tags", "array(text)"],
						],
						[["9007199254740993", "19.90", "2024-02-29", ["new", "gift"]]],
					)
				: undefined,
		);

		const rows = await withConnection(
			{
				auth: new TokenAuth(TEST_TOKEN),
				accountName: TEST_ACCOUNT,
				engineName: "my_engine",
				apiEndpoint: TEST_API_ENDPOINT,
				fetch: engine.fetch,
				logger: silentLogger,
			},
			async (connection) => {
				const cursor = connection.cursor();
				await cursor.execute(
					"SELECT order_id, total, placed_on, tags FROM orders WHERE placed_on = ? AND total > ?",
					[sqlDate(2024, 2, 29), new Decimal("10.5")],
				);
				return await cursor.fetchall();
			},
		);

		expect(engine.queries(USER_ENGINE_HOST)[0]?.body).toBe(
			"SELECT order_id, total, placed_on, tags FROM orders WHERE placed_on = '2024-02-29' AND total > 10.5",
		);
		expect(rows).toHaveLength(1);
		const [orderId, total, placedOn, tags] = rows[0] ?? [];
		expect(orderId).toBe(9007199254740993n);
		expect(String(total)).toBe("19.9");
		expect(placedOn).toEqual(new Date(Date.UTC(2024, 1, 29)));
		expect(tags).toEqual(["new", "gift"]);
	});

	it("should connect with a token and no engine", async () => {
		const engine = createFakeEngine();

		const connection = await connect({
			auth: new TokenAuth(TEST_TOKEN),
			accountName: TEST_ACCOUNT,
			apiEndpoint: TEST_API_ENDPOINT,
			fetch: engine.fetch,
			logger: silentLogger,
		});

		expect(connection.isSystem).toBe(true);
		await connection.close();
	});
});

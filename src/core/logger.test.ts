import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger, silentLogger } from "./logger";

describe("createConsoleLogger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should drop entries below the threshold", () => {
		const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

		const logger = createConsoleLogger("warn");
		logger.debug("hidden");
		logger.warn("shown");

		expect(debug).not.toHaveBeenCalled();
		expect(warn).toHaveBeenCalledTimes(1);
	});

	it("should prefix level and module and append context", () => {
		vi.useFakeTimers();
		vi.setSystemTime(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)));
		const info = vi.spyOn(console, "info").mockImplementation(() => {});

		try {
			createConsoleLogger("debug").info("Query done", {
				module: "CURSOR",
				rows: 3,
			});
		} finally {
			vi.useRealTimers();
		}

		expect(info).toHaveBeenCalledWith(
			'[2024-01-02T03:04:05.000Z] [INFO] [CURSOR] Query done {"rows":3}',
		);
	});

	it("should stay quiet when silent", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});

		silentLogger.error("nothing");

		expect(error).not.toHaveBeenCalled();
	});
});

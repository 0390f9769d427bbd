import { afterEach, describe, expect, it, vi } from "vitest";

import { createLogger } from "./logger";

afterEach(() => {
	vi.restoreAllMocks();
});

describe("createLogger", () => {
	it("writes to stderr with a timestamp and level", () => {
		const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const logger = createLogger();

		logger.error("Cannot download blob");
		logger.info("Using registry");

		expect(spy).toHaveBeenCalledTimes(2);
		expect(spy.mock.calls[0].slice(1)).toEqual(["ERROR", "Cannot download blob"]);
		expect(spy.mock.calls[1].slice(1)).toEqual(["Using registry"]);
		expect(String(spy.mock.calls[0][0])).toMatch(/^\d{4}-\d{2}-\d{2}T/);
	});

	it("drops debug output until enabled, per instance", () => {
		const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const quiet = createLogger();
		const verbose = createLogger({ debug: true });

		quiet.debug("hidden");
		verbose.debug("shown");
		quiet.enableDebug();
		quiet.debug("now shown");

		expect(spy.mock.calls.map((c) => c.slice(1))).toEqual([
			["DEBUG", "shown"],
			["DEBUG", "now shown"],
		]);
	});
});

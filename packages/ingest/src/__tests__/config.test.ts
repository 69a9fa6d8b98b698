import { describe, expect, it } from "vitest";
import { createExtractionContext } from "../lib/config";

const fixedClock = () => new Date("2024-05-01T12:30:00Z");

describe("createExtractionContext", () => {
	it("stamps the clock time and configured version", () => {
		expect(
			createExtractionContext({ USC_ENGINE_VERSION: " 2.0.0 " }, fixedClock),
		).toEqual({
			extractedAt: "2024-05-01T12:30:00.000Z",
			engineVersion: "2.0.0",
		});
	});

	it("falls back to the package version", () => {
		expect(createExtractionContext({}, fixedClock).engineVersion).toBe(
			"0.1.0",
		);
		expect(
			createExtractionContext({ USC_ENGINE_VERSION: "  " }, fixedClock)
				.engineVersion,
		).toBe("0.1.0");
	});
});

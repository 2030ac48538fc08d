import { describe, expect, it } from "vitest";

import { parseTraderOptions } from "./options";

describe("trader CLI options", () => {
	it("reads the mode override", () => {
		expect(parseTraderOptions(["--mode", "live", "--once"])).toEqual({
			configDir: undefined,
			mode: "live",
			once: true,
			help: false,
		});
	});

	it("rejects unknown modes", () => {
		expect(() => parseTraderOptions(["--mode=margin"])).toThrow(
			'--mode must be paper or live, got "margin"'
		);
	});
});

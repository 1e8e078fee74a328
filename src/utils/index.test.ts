import { describe, test, expect } from "vitest";
import { toAscii, toTitleCase, percentage, roundTo, cacheKey } from "./index.js";

describe("utils", () => {
	test("toAscii strips accents", () => {
		expect(toAscii("Björk")).toBe("Bjork");
		expect(toAscii("Sigur Rós")).toBe("Sigur Ros");
	});

	test("toAscii transliterates other scripts", () => {
		expect(toAscii("Борис")).toBe("Boris");
		expect(toAscii("深圳")).toBe("ShenZhen");
	});

	test("toAscii replaces characters without an ASCII form", () => {
		expect(toAscii("a\uE000b")).toBe("a_b");
		expect(toAscii("a\uE000b", "-")).toBe("a-b");
	});

	test("toTitleCase capitalizes every alphabetic run", () => {
		expect(toTitleCase("hip hop")).toBe("Hip Hop");
		expect(toTitleCase("hip-hop")).toBe("Hip-Hop");
		expect(toTitleCase("DRUM AND BASS")).toBe("Drum And Bass");
		expect(toTitleCase("rock'n'roll")).toBe("Rock'N'Roll");
		expect(toTitleCase("80s")).toBe("80S");
	});

	test("percentage rounds to one decimal and handles zero totals", () => {
		expect(percentage(1, 3)).toBe(33.3);
		expect(percentage(2, 3)).toBe(66.7);
		expect(percentage(5, 0)).toBe(0);
		expect(roundTo(12.345, 1)).toBe(12.3);
	});

	test("cacheKey distinguishes missing parts from empty strings", () => {
		expect(cacheKey("a", undefined)).toBe('["a",null]');
		expect(cacheKey("a", "")).toBe('["a",""]');
		expect(cacheKey("a", undefined)).not.toBe(cacheKey("a", ""));
	});
});

import { describe, it, expect } from "vitest";
import {
	isWithinTradingHours,
	parseClockTime,
	readZonedClock,
	validateTradingHours,
	type TradingHours,
} from "./tradingHours";

const NSE_HOURS: TradingHours = {
	start: "08:55",
	end: "16:05",
	timezone: "Asia/Kolkata",
	weekdaysOnly: true,
};

describe("trading hours", () => {
	it("parses HH:MM to minutes", () => {
		expect(parseClockTime("08:55")).toBe(535);
		expect(parseClockTime("23:59")).toBe(1439);
		expect(() => parseClockTime("24:00")).toThrow("expected HH:MM");
	});

	it("reads wall-clock time in the target zone", () => {
		// 2024-03-04 is a Monday; 03:30Z is 09:00 IST
		expect(
			readZonedClock(Date.parse("2024-03-04T03:30:00Z"), "Asia/Kolkata")
		).toEqual({ weekday: 1, minutes: 540 });
	});

	it("is open inside the weekday session", () => {
		expect(
			isWithinTradingHours(Date.parse("2024-03-04T03:30:00Z"), NSE_HOURS)
		).toBe(true);
		// 16:05 IST is the inclusive end
		expect(
			isWithinTradingHours(Date.parse("2024-03-04T10:35:00Z"), NSE_HOURS)
		).toBe(true);
	});

	it("is closed before the open and after the close", () => {
		// 08:54 IST
		expect(
			isWithinTradingHours(Date.parse("2024-03-04T03:24:00Z"), NSE_HOURS)
		).toBe(false);
		// 16:06 IST
		expect(
			isWithinTradingHours(Date.parse("2024-03-04T10:36:00Z"), NSE_HOURS)
		).toBe(false);
	});

	it("is closed on weekends when weekdaysOnly is set", () => {
		// 2024-03-09 is a Saturday
		const saturday = Date.parse("2024-03-09T05:00:00Z");
		expect(isWithinTradingHours(saturday, NSE_HOURS)).toBe(false);
		expect(
			isWithinTradingHours(saturday, { ...NSE_HOURS, weekdaysOnly: false })
		).toBe(true);
	});

	it("supports windows that wrap past midnight", () => {
		const overnight: TradingHours = {
			start: "22:00",
			end: "02:00",
			timezone: "UTC",
			weekdaysOnly: false,
		};
		expect(
			isWithinTradingHours(Date.parse("2024-03-04T23:30:00Z"), overnight)
		).toBe(true);
		expect(
			isWithinTradingHours(Date.parse("2024-03-04T12:00:00Z"), overnight)
		).toBe(false);
	});

	it("rejects unknown time zones", () => {
		expect(() =>
			validateTradingHours({ ...NSE_HOURS, timezone: "Mars/Olympus" })
		).toThrow();
	});
});

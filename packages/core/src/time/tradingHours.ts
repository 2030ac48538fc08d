export interface TradingHours {
	/** Local session start, "HH:MM". */
	start: string;
	/** Local session end, "HH:MM", inclusive. */
	end: string;
	/** IANA zone the start/end are expressed in, e.g. "Asia/Kolkata". */
	timezone: string;
	weekdaysOnly: boolean;
}

export interface ZonedClockReading {
	weekday: number;
	minutes: number;
}

const HHMM = /^([01]\d|2[0-3]):([0-5]\d)$/;

const WEEKDAYS: Record<string, number> = {
	Sun: 0,
	Mon: 1,
	Tue: 2,
	Wed: 3,
	Thu: 4,
	Fri: 5,
	Sat: 6,
};

const formatters = new Map<string, Intl.DateTimeFormat>();

const formatterFor = (timezone: string): Intl.DateTimeFormat => {
	let formatter = formatters.get(timezone);
	if (!formatter) {
		formatter = new Intl.DateTimeFormat("en-US", {
			timeZone: timezone,
			weekday: "short",
			hour: "2-digit",
			minute: "2-digit",
			hourCycle: "h23",
		});
		formatters.set(timezone, formatter);
	}
	return formatter;
};

export const parseClockTime = (value: string): number => {
	const match = value.trim().match(HHMM);
	if (!match) {
		throw new Error(`Invalid clock time "${value}", expected HH:MM`);
	}
	return parseInt(match[1], 10) * 60 + parseInt(match[2], 10);
};

export const readZonedClock = (
	ts: number,
	timezone: string
): ZonedClockReading => {
	let weekday = -1;
	let hour = 0;
	let minute = 0;
	for (const part of formatterFor(timezone).formatToParts(new Date(ts))) {
		if (part.type === "weekday") {
			weekday = WEEKDAYS[part.value] ?? -1;
		} else if (part.type === "hour") {
			hour = parseInt(part.value, 10);
		} else if (part.type === "minute") {
			minute = parseInt(part.value, 10);
		}
	}
	if (weekday < 0) {
		throw new Error(`Unable to resolve weekday in timezone ${timezone}`);
	}
	return { weekday, minutes: hour * 60 + minute };
};

/**
 * True when `ts` falls inside the configured daily window. Windows whose end
 * is before their start wrap past midnight.
 */
export const isWithinTradingHours = (
	ts: number,
	hours: TradingHours
): boolean => {
	const { weekday, minutes } = readZonedClock(ts, hours.timezone);
	if (hours.weekdaysOnly && (weekday === 0 || weekday === 6)) {
		return false;
	}
	const start = parseClockTime(hours.start);
	const end = parseClockTime(hours.end);
	if (start <= end) {
		return minutes >= start && minutes <= end;
	}
	return minutes >= start || minutes <= end;
};

export const validateTradingHours = (hours: TradingHours): void => {
	parseClockTime(hours.start);
	parseClockTime(hours.end);
	formatterFor(hours.timezone);
};

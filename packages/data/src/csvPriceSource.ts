import { readFile, stat } from "node:fs/promises";
import path from "node:path";

import {
	createLogger,
	DataError,
	DataUnavailableError,
	normalizeSeries,
	timeframeToMs,
	type Candle,
	type Instrument,
	type PriceDataSource,
} from "@algorunner/core";

const csvLogger = createLogger("data:csv");

const REQUIRED_COLUMNS = ["timestamp", "open", "high", "low", "close", "volume"] as const;

interface CachedSeries {
	mtimeMs: number;
	bars: Candle[];
}

export const slugify = (value: string): string =>
	value.trim().replace(/[^A-Za-z0-9]+/g, "_").replace(/^_+|_+$/g, "");

const HAS_ZONE = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

/**
 * Epoch seconds or milliseconds, a date, or a date-time. Values without an
 * explicit zone are read as UTC.
 */
export const parseTimestamp = (raw: string): number => {
	const value = raw.trim();
	if (/^\d+$/.test(value)) {
		const numeric = Number(value);
		return numeric < 1e11 ? numeric * 1000 : numeric;
	}
	if (/^\d{4}-\d{2}-\d{2}$/.test(value)) {
		return Date.parse(`${value}T00:00:00Z`);
	}
	const isoLike = value.replace(" ", "T");
	return Date.parse(HAS_ZONE.test(isoLike) ? isoLike : `${isoLike}Z`);
};

/**
 * Parse an OHLCV CSV with a header row. Column order follows the header;
 * rows with unparseable numbers are skipped. Later rows win on duplicate
 * timestamps.
 */
export const parseCsvCandles = (
	content: string,
	symbol: string,
	timeframe: string,
	source = "csv"
): Candle[] => {
	const lines = content
		.split(/\r?\n/u)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
	if (lines.length === 0) {
		return [];
	}

	const header = lines[0].split(",").map((column) => column.trim().toLowerCase());
	const indexes = REQUIRED_COLUMNS.map((column) => {
		const index = header.indexOf(column);
		if (index === -1) {
			throw new DataError(`${source} is missing the ${column} column`);
		}
		return index;
	});
	const [tsIdx, openIdx, highIdx, lowIdx, closeIdx, volumeIdx] = indexes;

	const bars = new Map<number, Candle>();
	let skipped = 0;
	for (const line of lines.slice(1)) {
		const cells = line.split(",").map((cell) => cell.trim());
		const timestamp = parseTimestamp(cells[tsIdx] ?? "");
		const open = Number(cells[openIdx]);
		const high = Number(cells[highIdx]);
		const low = Number(cells[lowIdx]);
		const close = Number(cells[closeIdx]);
		const volume = Number(cells[volumeIdx] ?? 0);
		if (![timestamp, open, high, low, close].every(Number.isFinite)) {
			skipped += 1;
			continue;
		}
		bars.set(timestamp, {
			symbol,
			timeframe,
			timestamp,
			open,
			high,
			low,
			close,
			volume: Number.isFinite(volume) ? volume : 0,
		});
	}
	if (skipped > 0) {
		csvLogger.warn("csv_rows_skipped", { source, skipped });
	}
	return Array.from(bars.values()).sort((a, b) => a.timestamp - b.timestamp);
};

export interface CsvPriceSourceOptions {
	dataDir: string;
}

/**
 * Reads `<dataDir>/<symbol>_<timeframe>.csv`. Parsed files are cached until
 * their mtime changes.
 */
export class CsvPriceSource implements PriceDataSource {
	private readonly cache = new Map<string, CachedSeries>();

	constructor(private readonly options: CsvPriceSourceOptions) {}

	resolvePath(instrument: Instrument, interval: string): string {
		return path.join(
			this.options.dataDir,
			`${slugify(instrument.symbol)}_${slugify(interval)}.csv`
		);
	}

	async fetchSeries(
		instrument: Instrument,
		from: number,
		to: number,
		interval: string,
		signal?: AbortSignal
	): Promise<Candle[]> {
		signal?.throwIfAborted();
		const bars = await this.load(instrument, interval, from, to);
		return normalizeSeries(bars, from, to);
	}

	async coverageEnd(instrument: Instrument, interval: string): Promise<number | null> {
		const bars = await this.load(instrument, interval, 0, 0);
		if (!bars.length) {
			return null;
		}
		return bars[bars.length - 1].timestamp + timeframeToMs(interval);
	}

	private async load(
		instrument: Instrument,
		interval: string,
		from: number,
		to: number
	): Promise<Candle[]> {
		const filePath = this.resolvePath(instrument, interval);
		let mtimeMs: number;
		try {
			mtimeMs = (await stat(filePath)).mtimeMs;
		} catch (error) {
			throw new DataUnavailableError(instrument.symbol, from, to, {
				cause: error,
			});
		}

		const cached = this.cache.get(filePath);
		if (cached && cached.mtimeMs === mtimeMs) {
			return cached.bars;
		}

		let content: string;
		try {
			content = await readFile(filePath, "utf-8");
		} catch (error) {
			throw new DataUnavailableError(instrument.symbol, from, to, {
				cause: error,
			});
		}
		const bars = parseCsvCandles(content, instrument.symbol, interval, filePath);
		this.cache.set(filePath, { mtimeMs, bars });
		csvLogger.debug("csv_loaded", { path: filePath, bars: bars.length });
		return bars;
	}
}

import fs from "node:fs";
import path from "node:path";

import { isRecord, readJsonFile } from "../config";
import { ConfigError } from "../errors";
import type { Instrument } from "../types";

const readField = (
	entry: Record<string, unknown>,
	keys: readonly string[]
): unknown => {
	for (const key of keys) {
		if (entry[key] !== undefined && entry[key] !== "") {
			return entry[key];
		}
	}
	return undefined;
};

const toNumber = (value: unknown, fallback: number): number => {
	if (typeof value === "number" && Number.isFinite(value)) {
		return value;
	}
	if (typeof value === "string" && value.trim() !== "") {
		const parsed = Number(value);
		if (Number.isFinite(parsed)) {
			return parsed;
		}
	}
	return fallback;
};

/**
 * Normalize one master-list row. Broker exports disagree on field names
 * (`lot_size` vs `lotsize`, `exch_seg` vs `exchange`), so both spellings are
 * accepted.
 */
export const parseInstrument = (
	segment: string,
	entry: unknown,
	field: string
): Instrument => {
	if (!isRecord(entry)) {
		throw new ConfigError(`${field} must be an object`);
	}
	const symbol = readField(entry, ["symbol", "tradingsymbol"]);
	if (typeof symbol !== "string" || symbol.trim() === "") {
		throw new ConfigError(`${field} is missing a symbol`);
	}
	const lotSize = toNumber(readField(entry, ["lotSize", "lot_size", "lotsize"]), 1);
	const tickSize = toNumber(readField(entry, ["tickSize", "tick_size"]), 0.05);
	if (lotSize <= 0 || tickSize <= 0) {
		throw new ConfigError(`${field} must have a positive lot and tick size`);
	}
	const exchange = readField(entry, ["exchange", "exch_seg"]);
	const token = readField(entry, ["token", "symboltoken"]);
	const name = readField(entry, ["name"]);
	const tradingSymbol = readField(entry, ["tradingsymbol"]);
	return Object.freeze({
		symbol: symbol.trim(),
		segment,
		exchange: typeof exchange === "string" ? exchange : "",
		lotSize,
		tickSize,
		token: token === undefined ? "" : String(token),
		...(typeof name === "string" && name ? { name } : {}),
		...(typeof tradingSymbol === "string" && tradingSymbol !== symbol
			? { tradingSymbol }
			: {}),
	});
};

/**
 * In-memory master list keyed by segment. Lookups ignore case and also match
 * the broker trading symbol.
 */
export class InstrumentCatalog {
	private readonly bySegment = new Map<string, Map<string, Instrument>>();

	constructor(instruments: Iterable<Instrument> = []) {
		for (const instrument of instruments) {
			this.add(instrument);
		}
	}

	static fromDirectory(dir: string, segments: Iterable<string>): InstrumentCatalog {
		const catalog = new InstrumentCatalog();
		for (const segment of new Set(segments)) {
			const filePath = path.join(dir, `${segment}.json`);
			if (!fs.existsSync(filePath)) {
				throw new ConfigError(`Master list not found for ${segment}: ${filePath}`);
			}
			const rows = readJsonFile(filePath);
			if (!Array.isArray(rows)) {
				throw new ConfigError(`Master list ${filePath} must be an array`);
			}
			rows.forEach((row, index) =>
				catalog.add(parseInstrument(segment, row, `${segment}[${index}]`))
			);
		}
		return catalog;
	}

	add(instrument: Instrument): void {
		let segment = this.bySegment.get(instrument.segment);
		if (!segment) {
			segment = new Map();
			this.bySegment.set(instrument.segment, segment);
		}
		segment.set(instrument.symbol.toUpperCase(), instrument);
		if (instrument.tradingSymbol) {
			segment.set(instrument.tradingSymbol.toUpperCase(), instrument);
		}
	}

	find(segment: string, symbol: string): Instrument | undefined {
		return this.bySegment.get(segment)?.get(symbol.trim().toUpperCase());
	}

	get(segment: string, symbol: string): Instrument {
		const instrument = this.find(segment, symbol);
		if (!instrument) {
			throw new ConfigError(`Unknown instrument ${symbol} in segment ${segment}`);
		}
		return instrument;
	}

	list(segment: string): Instrument[] {
		const entries = this.bySegment.get(segment);
		return entries ? Array.from(new Set(entries.values())) : [];
	}

	/** Instruments whose symbol or trading symbol contains `query`, sorted by symbol. */
	search(segment: string, query: string): Instrument[] {
		const needle = query.trim().toUpperCase();
		if (!needle) {
			return [];
		}
		return this.sorted(segment).filter(
			(instrument) =>
				instrument.symbol.toUpperCase().includes(needle) ||
				(instrument.tradingSymbol?.toUpperCase().includes(needle) ?? false)
		);
	}

	/**
	 * Instruments whose symbol starts with `prefix`; `"0-9"` selects symbols
	 * starting with a digit.
	 */
	filterByPrefix(segment: string, prefix: string): Instrument[] {
		const wanted = prefix.trim().toUpperCase();
		return this.sorted(segment).filter((instrument) => {
			const symbol = instrument.symbol.toUpperCase();
			return wanted === "0-9" ? /^[0-9]/.test(symbol) : symbol.startsWith(wanted);
		});
	}

	segments(): string[] {
		return Array.from(this.bySegment.keys());
	}

	private sorted(segment: string): Instrument[] {
		return this.list(segment).sort((a, b) => a.symbol.localeCompare(b.symbol));
	}
}

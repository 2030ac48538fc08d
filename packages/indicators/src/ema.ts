export type EmaSeed = "sma" | "first";

/**
 * Exponential moving average of the whole series.
 */
export function ema(
	values: readonly number[],
	length: number,
	seed: EmaSeed = "sma"
): number | null {
	const series = emaSeries(values, length, seed);
	return series.length ? series[series.length - 1] : null;
}

/**
 * EMA aligned with `values`: entry `i` is the EMA through `values[i]`.
 *
 * With the default `"sma"` seed the first `length - 1` entries are `null` and
 * the EMA starts from the simple average of the first `length` values. The
 * `"first"` seed starts from `values[0]` and is defined from the first bar on
 * (the recursive form charting packages use).
 */
export function emaSeries(
	values: readonly number[],
	length: number,
	seed: EmaSeed = "sma"
): (number | null)[] {
	if (!Number.isInteger(length) || length <= 0) {
		throw new Error(`EMA length must be a positive integer, got ${length}`);
	}
	const out: (number | null)[] = new Array(values.length).fill(null);
	const multiplier = 2 / (length + 1);

	if (seed === "first") {
		let emaValue = values[0];
		for (let i = 0; i < values.length; i += 1) {
			emaValue = i === 0 ? values[0] : (values[i] - emaValue) * multiplier + emaValue;
			out[i] = emaValue;
		}
		return out;
	}

	if (values.length < length) {
		return out;
	}

	let emaValue = average(values.slice(0, length));
	out[length - 1] = emaValue;

	for (let i = length; i < values.length; i += 1) {
		emaValue = (values[i] - emaValue) * multiplier + emaValue;
		out[i] = emaValue;
	}

	return out;
}

const average = (nums: readonly number[]): number => {
	const sum = nums.reduce((acc, value) => acc + value, 0);
	return sum / nums.length;
};

export function sma(values: readonly number[], period: number): number | null {
	if (period <= 0 || values.length < period) {
		return null;
	}

	const window = values.slice(values.length - period);
	const sum = window.reduce((acc, value) => acc + value, 0);
	return Number((sum / period).toFixed(6));
}

export function smaSeries(
	values: readonly number[],
	period: number
): (number | null)[] {
	if (!Number.isInteger(period) || period <= 0) {
		throw new Error(`SMA period must be a positive integer, got ${period}`);
	}
	const out: (number | null)[] = [];
	let sum = 0;
	for (let i = 0; i < values.length; i += 1) {
		sum += values[i];
		if (i >= period) {
			sum -= values[i - period];
		}
		out.push(i >= period - 1 ? Number((sum / period).toFixed(6)) : null);
	}
	return out;
}

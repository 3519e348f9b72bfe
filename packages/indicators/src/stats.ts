export function mean(values: readonly number[]): number | null {
	if (values.length === 0) {
		return null;
	}
	const sum = values.reduce((acc, value) => acc + value, 0);
	return sum / values.length;
}

/** Variance over the values themselves (divides by n, not n - 1). */
export function populationVariance(values: readonly number[]): number | null {
	const avg = mean(values);
	if (avg === null) {
		return null;
	}
	const squared = values.reduce((acc, value) => acc + (value - avg) ** 2, 0);
	return squared / values.length;
}

export const clamp = (value: number, min: number, max: number): number =>
	Math.min(max, Math.max(min, value));

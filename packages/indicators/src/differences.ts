import type {
	DifferenceMethod,
	Series,
	ZeroChangePolicy,
} from "@slopecast/core";
import { SeriesIndexError } from "@slopecast/core";

/** A rate of change, or null where the required neighbor does not exist. */
export type Difference = number | null;

const assertIndex = (values: Series, index: number): void => {
	if (!Number.isInteger(index) || index < 0 || index >= values.length) {
		throw new SeriesIndexError(index, values.length);
	}
};

export function forwardDifference(values: Series, index: number): Difference {
	assertIndex(values, index);
	if (index === values.length - 1) {
		return null;
	}
	return values[index + 1] - values[index];
}

export function backwardDifference(values: Series, index: number): Difference {
	assertIndex(values, index);
	if (index === 0) {
		return null;
	}
	return values[index] - values[index - 1];
}

export function centralDifference(values: Series, index: number): Difference {
	assertIndex(values, index);
	if (index === 0 || index === values.length - 1) {
		return null;
	}
	return (values[index + 1] - values[index - 1]) / 2;
}

const ESTIMATORS: Record<
	DifferenceMethod,
	(values: Series, index: number) => Difference
> = {
	forward: forwardDifference,
	backward: backwardDifference,
	central: centralDifference,
};

export const differenceAt = (
	method: DifferenceMethod,
	values: Series,
	index: number
): Difference => ESTIMATORS[method](values, index);

/** Per-index differences for the whole series, null at the boundaries. */
export const differenceSeries = (
	values: Series,
	method: DifferenceMethod
): Difference[] => values.map((_, index) => differenceAt(method, values, index));

/**
 * Drops undefined entries and, under the `exclude` policy, exact zeros, leaving
 * the samples that take part in an average.
 */
export const usableDifferences = (
	differences: readonly Difference[],
	policy: ZeroChangePolicy = "include"
): number[] =>
	differences.filter(
		(value): value is number =>
			value !== null && (policy === "include" || value !== 0)
	);

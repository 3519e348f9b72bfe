/** Observations ordered oldest to newest, one per time step. */
export type Series = readonly number[];

export type DifferenceMethod = "forward" | "backward" | "central";

/**
 * How exact zero changes are treated when averaging differences. `include`
 * keeps them as genuine observations; `exclude` drops them alongside the
 * undefined boundary entries, matching the legacy sentinel-zero averaging.
 */
export type ZeroChangePolicy = "include" | "exclude";

/**
 * Finite-difference next-value estimation. `Predictor` is the only model; the
 * report types are what reporting and the CLI consume.
 */
export * from "./predictor";

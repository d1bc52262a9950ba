/** Duration category for command timeouts. */
export type DurationCategory = "instant" | "quick" | "normal" | "slow";

/** Timeout in ms per duration category. Package installs and pip builds on a Pi are slow. */
export const DURATION_TIMEOUTS: Record<DurationCategory, number> = {
  instant: 5_000,
  quick: 15_000,
  normal: 60_000,
  slow: 30 * 60_000,
};

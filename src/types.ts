/** A single daily observation reported by one station. */
export interface Observation {
	/** The identifier of the reporting station. */
	station: string;
	/** The calendar day of the observation (yyyy-mm-dd). */
	date: string;
	/** The observed temperature, or null if the station did not report one. */
	tobs: number | null;
	/** The precipitation amount, or null if the station did not report one. */
	prcp: number | null;
}

/**
 * An inclusive span of calendar days. `end` is omitted for an open range. When both bounds are set, `start` is never
 * after `end`.
 */
export interface DateRange {
	start: string;
	end?: string;
}

/** Minimum, average and maximum temperature over a set of observations. */
export interface TemperatureStats {
	min: number;
	avg: number;
	max: number;
}

/** Raw aggregate row as returned by a repository. All fields are null when no rows qualified. */
export interface TemperatureAggregateRow {
	min: number | null;
	avg: number | null;
	max: number | null;
}

/** A (date, precipitation) pair in repository fetch order. */
export interface DatePrecipitation {
	date: string;
	prcp: number | null;
}

/** Precipitation keyed by date, iterated in ascending date order. */
export type PrecipitationSeries = ReadonlyMap<string, number | null>;

import type { DatePrecipitation, TemperatureAggregateRow } from "../types";

/**
 * Read-only access to the observation dataset. Implementations are opened once at process start, shared by all
 * requests and closed at shutdown.
 */
export interface ObservationRepository {
	/** The most recent observation date in the dataset. */
	maxDate(): Promise<string>;

	/**
	 * Minimum, average and maximum of all non-null temperatures dated on or after `start` and, if given, on or before
	 * `end`. Every field is null when no row qualifies.
	 */
	queryTemperatureStats( start: string, end?: string ): Promise<TemperatureAggregateRow>;

	/** All (date, precipitation) pairs dated on or after `sinceDate`, in fetch order. */
	queryDatePrcp( sinceDate: string ): Promise<DatePrecipitation[]>;

	/** All temperatures (nulls included) dated on or after `sinceDate`, in fetch order. */
	queryTobs( sinceDate: string ): Promise<( number | null )[]>;

	/** Every station identifier referenced by the dataset, once each. */
	distinctStations(): Promise<string[]>;

	/** Releases any resources held by the repository. */
	close(): Promise<void>;
}

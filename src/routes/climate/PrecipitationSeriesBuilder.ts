import type { PrecipitationSeries } from "../../types";
import type { ObservationRepository } from "../../repositories/ObservationRepository";
import { currentWindowStart } from "./TrailingWindow";

/**
 * Builds the precipitation series for the trailing year of the dataset.
 *
 * Each date appears once. When several stations report the same date, the row fetched last wins; no averaging is
 * done across stations.
 */
export async function buildPrecipitationSeries( repository: ObservationRepository ): Promise<PrecipitationSeries> {
	const windowStart = await currentWindowStart( repository );
	const rows = await repository.queryDatePrcp( windowStart );

	const byDate = new Map<string, number | null>();
	for ( const row of rows ) {
		byDate.set( row.date, row.prcp );
	}

	return new Map( Array.from( byDate ).sort( ( [ a ], [ b ] ) => a < b ? -1 : a > b ? 1 : 0 ) );
}

/** Converts a series to a plain object for JSON output. Keys keep ascending date order. */
export function seriesToObject( series: PrecipitationSeries ): Record<string, number | null> {
	return Object.fromEntries( series );
}

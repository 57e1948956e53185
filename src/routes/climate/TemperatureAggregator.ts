import type { DateRange, TemperatureStats } from "../../types";
import type { ObservationRepository } from "../../repositories/ObservationRepository";

/**
 * Computes the minimum, average and maximum temperature over a date range. Observations without a temperature are
 * ignored.
 * @return The statistics, or undefined if no observation with a temperature falls within the range.
 */
export async function aggregateTemperatures(
	repository: ObservationRepository,
	range: DateRange
): Promise<TemperatureStats | undefined> {
	const { min, avg, max } = await repository.queryTemperatureStats( range.start, range.end );

	if ( min === null || avg === null || max === null ) {
		return undefined;
	}

	return { min, avg, max };
}

import { format, isValid, parse, subDays } from "date-fns";

import type { ObservationRepository } from "../../repositories/ObservationRepository";
import { CodedError, ErrorCode } from "../../errors";

export const DATE_FORMAT = "yyyy-MM-dd";

/** Length of the trailing window, in calendar days. */
export const TRAILING_WINDOW_DAYS = 365;

/** True if `value` is an existing calendar day written as yyyy-mm-dd, so "2017-02-30" is rejected. */
export function isCalendarDate( value: string ): boolean {
	return /^[0-9]{4}-[0-9]{2}-[0-9]{2}$/.test( value ) && isValid( parse( value, DATE_FORMAT, new Date() ) );
}

/**
 * Returns the first day of the window that ends on `latest`, counting back `days` calendar days.
 * @param latest The last day of the window (yyyy-mm-dd).
 */
export function trailingWindowStart( latest: string, days: number = TRAILING_WINDOW_DAYS ): string {
	const anchor = parse( latest, DATE_FORMAT, new Date() );
	if ( !isValid( anchor ) ) {
		throw new CodedError( ErrorCode.InvalidDataset, `Latest observation date '${ latest }' is not a valid date` );
	}

	return format( subDays( anchor, days ), DATE_FORMAT );
}

/** The first day of the trailing window anchored at the most recent date in the dataset. */
export async function currentWindowStart( repository: ObservationRepository ): Promise<string> {
	return trailingWindowStart( await repository.maxDate() );
}

import type { DateRange } from "../../types";
import { CodedError, ErrorCode } from "../../errors";

/** Only the prefix is checked, so values such as "2017-08-23T00:00" are accepted as given. */
const DATE_PREFIX = /^[0-9]{4}-[0-9]{2}-[0-9]{2}/;

export type DateField = "start" | "end";

/** Thrown when a start or end date does not begin with a yyyy-mm-dd date. */
export class DateValidationError extends CodedError {
	/** The inputs that failed the format check. */
	public readonly fields: readonly DateField[];

	public constructor(
		fields: readonly DateField[],
		public readonly start: string,
		public readonly end?: string
	) {
		super( ErrorCode.InvalidDateFormat, describe( fields, start, end ) );
		this.name = "DateValidationError";
		this.fields = fields;
	}
}

function describe( fields: readonly DateField[], start: string, end?: string ): string {
	const values = fields.map( field => `${ field } '${ field === "start" ? start : end }'` );
	return `Invalid ${ values.join( " and " ) }: expected the form yyyy-mm-dd (year-month-day)`;
}

export function isDateLike( value: string ): boolean {
	return DATE_PREFIX.test( value );
}

/**
 * Validates a start date and an optional end date and returns them as an ascending range. Reversed bounds are
 * swapped.
 * @throws DateValidationError naming every input that failed the format check.
 */
export function validateDateRange( start: string, end?: string ): DateRange {
	const invalid: DateField[] = [];
	if ( !isDateLike( start ) ) {
		invalid.push( "start" );
	}
	if ( end !== undefined && !isDateLike( end ) ) {
		invalid.push( "end" );
	}
	if ( invalid.length > 0 ) {
		throw new DateValidationError( invalid, start, end );
	}

	if ( end === undefined ) {
		return { start };
	}

	return start > end ? { start: end, end: start } : { start, end };
}

import type { ObservationRepository } from "../../repositories/ObservationRepository";
import { CodedError, ErrorCode } from "../../errors";
import { DateValidationError, validateDateRange } from "./DateRangeValidator";
import { aggregateTemperatures } from "./TemperatureAggregator";
import { buildPrecipitationSeries, seriesToObject } from "./PrecipitationSeriesBuilder";
import { recentTemperatures } from "./RecentObservationsQuery";
import { listStations } from "./StationCatalog";

export const API_PREFIX = "/api/v1.0";

export type ApiResponse =
	| { status: number, kind: "json", body: unknown }
	| { status: number, kind: "text", body: string };

export interface ClimateApiOptions {
	/**
	 * If true, rejected dates are answered with 400 and unmatched ranges with 404. Otherwise every answer uses 200, which
	 * is what existing clients receive.
	 */
	errorStatusCodes: boolean;
}

function warn( message: string ) {
	console.warn( `[ClimateApi] ${ message }` );
}

/** Exact wording is relied upon by existing clients. */
const messages = {
	invalidStart: ( start: string ) =>
		`Your search of '${ start }' is not in the correct format.<br/>` +
		"Please, search for a start date in the form yyyy-mm-dd (year-month-day).",
	noMatchStart: ( start: string ) =>
		`Your search of ${ start } did not match any records. Please, search for an earlier date.<br/>`,
	invalidRange: ( start: string, end: string ) =>
		`Your search beginning with '${ start }' and ending with '${ end }' is not in the correct format.<br/>` +
		"Please, verify that both start and end dates are in the form yyyy-mm-dd (year-month-day).",
	noMatchRange: ( start: string, end: string ) =>
		`Your search beginning with '${ start }' and ending with '${ end }' did not match any records. ` +
		"Please, search for a different date range.<br/>"
};

/**
 * Answers the climate routes against a repository. Responses are transport-neutral so the HTTP layer only has to write
 * them out.
 */
export class ClimateApi {
	private readonly repository: ObservationRepository;
	private readonly options: ClimateApiOptions;

	public constructor( repository: ObservationRepository, options: ClimateApiOptions = { errorStatusCodes: false } ) {
		this.repository = repository;
		this.options = options;
	}

	public index(): ApiResponse {
		const routes = [
			`${ API_PREFIX }/precipitation`,
			`${ API_PREFIX }/stations`,
			`${ API_PREFIX }/tobs`,
			`${ API_PREFIX }/<start>`,
			`${ API_PREFIX }/<start>/<end>`
		];
		return { status: 200, kind: "text", body: `Available Routes:<br/>${ routes.join( "<br/>" ) }` };
	}

	public async precipitation(): Promise<ApiResponse> {
		const series = await buildPrecipitationSeries( this.repository );
		return { status: 200, kind: "json", body: seriesToObject( series ) };
	}

	public async stations(): Promise<ApiResponse> {
		return { status: 200, kind: "json", body: await listStations( this.repository ) };
	}

	public async tobs(): Promise<ApiResponse> {
		return { status: 200, kind: "json", body: await recentTemperatures( this.repository ) };
	}

	/**
	 * Minimum, average and maximum temperature from `start` onwards, or between `start` and `end` inclusive. The bounds
	 * may be given in either order.
	 */
	public async temperatureStats( start: string, end?: string ): Promise<ApiResponse> {
		try {
			const range = validateDateRange( start, end );
			const stats = await aggregateTemperatures( this.repository, range );
			if ( !stats ) {
				throw new CodedError( ErrorCode.NoMatchingRecords );
			}
			return { status: 200, kind: "json", body: [ stats.min, stats.avg, stats.max ] };
		} catch ( err ) {
			if ( err instanceof DateValidationError ) {
				warn( err.message );
				return this.invalidDates( start, end );
			}
			if ( err instanceof CodedError && err.errCode === ErrorCode.NoMatchingRecords ) {
				const body = end === undefined ? messages.noMatchStart( start ) : messages.noMatchRange( start, end );
				return this.errorResponse( err.errCode, body );
			}
			throw err;
		}
	}

	/** The answer for date inputs that cannot be read at all, such as a path segment that fails to decode. */
	public invalidDates( start: string, end?: string ): ApiResponse {
		const body = end === undefined ? messages.invalidStart( start ) : messages.invalidRange( start, end );
		return this.errorResponse( ErrorCode.InvalidDateFormat, body );
	}

	private errorResponse( errCode: ErrorCode, body: string ): ApiResponse {
		if ( !this.options.errorStatusCodes ) {
			return { status: 200, kind: "text", body };
		}
		return { status: errCode === ErrorCode.InvalidDateFormat ? 400 : 404, kind: "text", body };
	}
}

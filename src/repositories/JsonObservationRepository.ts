import fs from "fs";
import { z } from "zod";

import type { DatePrecipitation, Observation, TemperatureAggregateRow } from "../types";
import type { ObservationRepository } from "./ObservationRepository";
import { CodedError, ErrorCode } from "../errors";
import { isCalendarDate } from "../routes/climate/TrailingWindow";

const ObservationRow = z.object( {
	station: z.string().min( 1 ),
	date: z.string()
		.regex( /^[0-9]{4}-[0-9]{2}-[0-9]{2}$/, "expected a yyyy-mm-dd date" )
		.refine( isCalendarDate, "not a calendar date" ),
	tobs: z.number().finite().nullable().default( null ),
	prcp: z.number().finite().nullable().default( null )
} );

const ObservationFile = z.array( ObservationRow ).min( 1, "the dataset contains no observations" );

function log( message: string ) {
	console.log( `[JsonObservationRepository] ${ message }` );
}

/**
 * Parses and validates the contents of an observations file.
 * @param raw The JSON text of the file.
 * @param source A name for the data used in error messages.
 */
export function parseObservations( raw: string, source: string ): Observation[] {
	let json: unknown;
	try {
		json = JSON.parse( raw );
	} catch ( err ) {
		throw new CodedError( ErrorCode.InvalidDataset, `${ source } is not valid JSON: ${ String( err ) }` );
	}

	const result = ObservationFile.safeParse( json );
	if ( !result.success ) {
		const issue = result.error.issues[ 0 ];
		const where = issue.path.length > 0 ? ` at ${ issue.path.join( "." ) }` : "";
		throw new CodedError( ErrorCode.InvalidDataset, `${ source } is invalid${ where }: ${ issue.message }` );
	}

	return result.data;
}

/**
 * An ObservationRepository over a static dataset held in memory. Rows keep the order in which they appear in the
 * source, which is the order every query returns them in.
 */
export class JsonObservationRepository implements ObservationRepository {
	private observations: readonly Observation[] | undefined;

	private constructor( observations: readonly Observation[] ) {
		this.observations = observations;
	}

	/**
	 * Loads the dataset from a JSON file containing an array of observations.
	 * @throws CodedError with ErrorCode.InvalidDataset if the file is missing, malformed or empty.
	 */
	public static open( filePath: string ): JsonObservationRepository {
		if ( !fs.existsSync( filePath ) ) {
			throw new CodedError( ErrorCode.InvalidDataset, `Observation file ${ filePath } does not exist` );
		}

		const observations = parseObservations( fs.readFileSync( filePath, "utf8" ), filePath );
		log( `Loaded ${ observations.length } observations from ${ filePath }` );
		return new JsonObservationRepository( observations );
	}

	public static fromObservations( observations: readonly Observation[] ): JsonObservationRepository {
		if ( observations.length === 0 ) {
			throw new CodedError( ErrorCode.InvalidDataset, "the dataset contains no observations" );
		}
		return new JsonObservationRepository( [ ...observations ] );
	}

	private get rows(): readonly Observation[] {
		if ( this.observations === undefined ) {
			throw new Error( "The observation repository has been closed." );
		}
		return this.observations;
	}

	public async maxDate(): Promise<string> {
		return this.rows.reduce( ( max, obs ) => obs.date > max ? obs.date : max, this.rows[ 0 ].date );
	}

	public async queryTemperatureStats( start: string, end?: string ): Promise<TemperatureAggregateRow> {
		let min: number | null = null, max: number | null = null, sum = 0, count = 0;

		for ( const obs of this.rows ) {
			if ( obs.date < start || ( end !== undefined && obs.date > end ) || obs.tobs === null ) {
				continue;
			}
			min = min === null || obs.tobs < min ? obs.tobs : min;
			max = max === null || obs.tobs > max ? obs.tobs : max;
			sum += obs.tobs;
			count++;
		}

		return { min, avg: count > 0 ? sum / count : null, max };
	}

	public async queryDatePrcp( sinceDate: string ): Promise<DatePrecipitation[]> {
		return this.rows
			.filter( obs => obs.date >= sinceDate )
			.map( obs => ( { date: obs.date, prcp: obs.prcp } ) );
	}

	public async queryTobs( sinceDate: string ): Promise<( number | null )[]> {
		return this.rows
			.filter( obs => obs.date >= sinceDate )
			.map( obs => obs.tobs );
	}

	public async distinctStations(): Promise<string[]> {
		return Array.from( new Set( this.rows.map( obs => obs.station ) ) );
	}

	public async close(): Promise<void> {
		this.observations = undefined;
	}
}

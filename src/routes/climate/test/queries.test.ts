import { describe, it, expect } from "vitest";

import type { Observation } from "../../../types";
import { JsonObservationRepository } from "../../../repositories/JsonObservationRepository";
import { aggregateTemperatures } from "../TemperatureAggregator";
import { buildPrecipitationSeries, seriesToObject } from "../PrecipitationSeriesBuilder";
import { recentTemperatures } from "../RecentObservationsQuery";
import { listStations } from "../StationCatalog";

function obs( station: string, date: string, tobs: number | null, prcp: number | null = 0 ): Observation {
	return { station, date, tobs, prcp };
}

describe( "aggregateTemperatures", () => {
	const repository = JsonObservationRepository.fromObservations( [
		obs( "A", "2010-01-01", 60 ),
		obs( "A", "2010-01-02", 70 ),
		obs( "B", "2010-01-02", null ),
		obs( "B", "2010-01-03", 65 ),
		obs( "A", "2010-01-10", 80 )
	] );

	it( "aggregates a closed range inclusively", async () => {
		const stats = await aggregateTemperatures( repository, { start: "2010-01-01", end: "2010-01-03" } );
		expect( stats ).toEqual( { min: 60, avg: 65, max: 70 } );
	} );

	it( "aggregates an open range", async () => {
		const stats = await aggregateTemperatures( repository, { start: "2010-01-02" } );
		expect( stats?.min ).toBe( 65 );
		expect( stats?.avg ).toBeCloseTo( 215 / 3 );
		expect( stats?.max ).toBe( 80 );
	} );

	it( "ignores missing temperatures", async () => {
		const stats = await aggregateTemperatures( repository, { start: "2010-01-02", end: "2010-01-02" } );
		expect( stats ).toEqual( { min: 70, avg: 70, max: 70 } );
	} );

	it( "returns undefined when nothing matches", async () => {
		await expect( aggregateTemperatures( repository, { start: "2020-01-01" } ) ).resolves.toBeUndefined();
		await expect( aggregateTemperatures( repository, { start: "2010-01-04", end: "2010-01-09" } ) ).resolves.toBeUndefined();
	} );

	it( "returns undefined when only missing temperatures match", async () => {
		const sparse = JsonObservationRepository.fromObservations( [ obs( "A", "2010-01-01", null ) ] );
		await expect( aggregateTemperatures( sparse, { start: "2010-01-01" } ) ).resolves.toBeUndefined();
	} );

	it( "keeps zero temperatures distinct from no match", async () => {
		const frozen = JsonObservationRepository.fromObservations( [ obs( "A", "2010-01-01", 0 ) ] );
		await expect( aggregateTemperatures( frozen, { start: "2010-01-01" } ) ).resolves.toEqual( { min: 0, avg: 0, max: 0 } );
	} );
} );

describe( "buildPrecipitationSeries", () => {
	const repository = JsonObservationRepository.fromObservations( [
		obs( "A", "2017-08-23", 75, 0 ),
		obs( "A", "2017-08-01", 74, 0.5 ),
		obs( "A", "2016-08-22", 73, 9 ),
		obs( "A", "2016-08-23", 72, 0.2 ),
		obs( "B", "2017-08-01", 76, 0.8 ),
		obs( "B", "2017-05-10", 71, null )
	] );

	it( "covers the trailing year in ascending date order", async () => {
		const series = await buildPrecipitationSeries( repository );

		expect( Array.from( series ) ).toEqual( [
			[ "2016-08-23", 0.2 ],
			[ "2017-05-10", null ],
			[ "2017-08-01", 0.8 ],
			[ "2017-08-23", 0 ]
		] );
	} );

	it( "lets the row fetched last win for a repeated date", async () => {
		const series = await buildPrecipitationSeries( repository );
		expect( series.get( "2017-08-01" ) ).toBe( 0.8 );
	} );

	it( "serializes with keys in date order", async () => {
		const body = seriesToObject( await buildPrecipitationSeries( repository ) );

		expect( Object.keys( body ) ).toEqual( [ "2016-08-23", "2017-05-10", "2017-08-01", "2017-08-23" ] );
		expect( body ).toEqual( {
			"2016-08-23": 0.2,
			"2017-05-10": null,
			"2017-08-01": 0.8,
			"2017-08-23": 0
		} );
	} );
} );

describe( "recentTemperatures", () => {
	it( "lists every reading in the trailing year in fetch order, nulls included", async () => {
		const repository = JsonObservationRepository.fromObservations( [
			obs( "A", "2017-08-23", 75 ),
			obs( "A", "2016-08-22", 60 ),
			obs( "B", "2016-08-23", 62 ),
			obs( "B", "2017-01-01", null ),
			obs( "A", "2017-01-01", 68 )
		] );

		await expect( recentTemperatures( repository ) ).resolves.toEqual( [ 75, 62, null, 68 ] );
	} );
} );

describe( "listStations", () => {
	it( "lists each station once regardless of row count", async () => {
		const repository = JsonObservationRepository.fromObservations( [
			obs( "STN-WINDWARD", "2010-01-01", 65 ),
			obs( "STN-LEEWARD", "2010-01-01", 63 ),
			obs( "STN-WINDWARD", "2010-01-02", 66 ),
			obs( "STN-LEEWARD", "2010-01-02", 64 ),
			obs( "STN-WINDWARD", "2010-01-03", 67 )
		] );

		await expect( listStations( repository ) ).resolves.toEqual( [ "STN-WINDWARD", "STN-LEEWARD" ] );
	} );
} );

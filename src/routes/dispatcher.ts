import express from "express";

import { API_PREFIX, type ApiResponse, type ClimateApi } from "./climate/ClimateApi";

type Handler = ( req: express.Request ) => ApiResponse | Promise<ApiResponse>;

function send( res: express.Response, response: ApiResponse ) {
	res.status( response.status );
	if ( response.kind === "json" ) {
		res.json( response.body );
	} else {
		res.type( "text/plain" ).send( response.body );
	}
}

/** Adapts a handler to Express 4, which does not forward rejected promises to the error middleware by itself. */
function route( handler: Handler ): express.RequestHandler {
	return ( req, res, next ) => {
		Promise.resolve()
			.then( () => handler( req ) )
			.then( response => send( res, response ) )
			.catch( next );
	};
}

/**
 * Returns the raw, still percent-encoded date segments of a date route path, or undefined if the path is not one.
 */
function rawDateSegments( path: string ): [ string, string? ] | undefined {
	if ( !path.startsWith( `${ API_PREFIX }/` ) ) {
		return undefined;
	}
	const segments = path.slice( API_PREFIX.length + 1 ).split( "/" );
	if ( segments.length === 1 ) {
		return [ segments[ 0 ] ];
	}
	if ( segments.length === 2 ) {
		return [ segments[ 0 ], segments[ 1 ] ];
	}
	return undefined;
}

/**
 * Creates the router for the climate API. The fixed routes are registered before the date routes so that, for example,
 * "stations" is never read as a start date.
 */
export function createClimateRouter( api: ClimateApi ): express.Router {
	const router = express.Router();

	router.get( "/", route( () => api.index() ) );
	router.get( `${ API_PREFIX }/precipitation`, route( () => api.precipitation() ) );
	router.get( `${ API_PREFIX }/stations`, route( () => api.stations() ) );
	router.get( `${ API_PREFIX }/tobs`, route( () => api.tobs() ) );
	router.get( `${ API_PREFIX }/:start`, route( req => api.temperatureStats( req.params.start ) ) );
	router.get( `${ API_PREFIX }/:start/:end`, route( req => api.temperatureStats( req.params.start, req.params.end ) ) );

	// Express fails with a URIError when a path parameter is not valid percent-encoding. On a date route that is a
	// malformed date like any other.
	router.use( ( err: unknown, req: express.Request, res: express.Response, next: express.NextFunction ) => {
		const segments = err instanceof URIError ? rawDateSegments( req.path ) : undefined;
		if ( !segments ) {
			next( err );
			return;
		}
		console.warn( `[ClimateApi] Undecodable date in ${ req.path }` );
		send( res, api.invalidDates( segments[ 0 ], segments[ 1 ] ) );
	} );

	return router;
}

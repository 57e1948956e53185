import express from "express";
import { createServer } from "http";

import { type Config, loadConfig } from "./config";
import { makeCodedError } from "./errors";
import { JsonObservationRepository } from "./repositories/JsonObservationRepository";
import type { ObservationRepository } from "./repositories/ObservationRepository";
import { ClimateApi } from "./routes/climate/ClimateApi";
import { createClimateRouter } from "./routes/dispatcher";

/** The 4xx status Express or a middleware attached to `err`, if any. */
function clientErrorStatus( err: unknown ): number | undefined {
	if ( typeof err !== "object" || err === null ) {
		return undefined;
	}
	const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
	return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

/** Builds the Express app serving the climate API from `repository`. */
export function createApp( repository: ObservationRepository, config: Pick<Config, "errorStatusCodes"> ): express.Express {
	const app = express();
	const api = new ClimateApi( repository, { errorStatusCodes: config.errorStatusCodes } );

	app.use( createClimateRouter( api ) );

	// Express recognizes error middleware by its four parameters.
	app.use( ( err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction ) => {
		const status = clientErrorStatus( err );
		if ( status !== undefined ) {
			console.warn( `[Server] ${ req.method } ${ req.originalUrl } rejected with ${ status }: ${ String( err ) }` );
			res.status( status ).type( "text/plain" ).send( "Bad request." );
			return;
		}

		const coded = makeCodedError( err );
		console.error( `[Server] ${ req.method } ${ req.originalUrl } failed (error code ${ coded.errCode }):`, err );
		res.status( 500 ).type( "text/plain" ).send( "An unexpected error occurred." );
	} );

	return app;
}

interface Closable {
	close( callback: () => void ): unknown;
}

/**
 * Returns a signal handler that stops accepting connections, then closes the repository and exits. Signals after the
 * first are ignored.
 */
export function createShutdown(
	server: Closable,
	repository: ObservationRepository,
	exit: ( code: number ) => void = process.exit
): ( signal: string ) => void {
	let shuttingDown = false;

	return ( signal: string ) => {
		if ( shuttingDown ) {
			console.log( `[Server] Received ${ signal }, already shutting down` );
			return;
		}
		shuttingDown = true;
		console.log( `[Server] Received ${ signal }, shutting down` );
		server.close( () => {
			repository.close().then(
				() => exit( 0 ),
				( err: unknown ) => {
					console.error( "[Server] Error closing the observation repository:", err );
					exit( 1 );
				}
			);
		} );
	};
}

async function startServer() {
	const config = loadConfig();
	const repository = JsonObservationRepository.open( config.observationsPath );
	const server = createServer( createApp( repository, config ) );

	const shutdown = createShutdown( server, repository );
	process.on( "SIGINT", shutdown );
	process.on( "SIGTERM", shutdown );

	server.listen( config.port, config.host, () => {
		console.log( `[Server] Climate API listening on http://${ config.host }:${ config.port }/` );
	} );
}

if ( require.main === module ) {
	startServer().catch( ( err: unknown ) => {
		console.error( "[Server] Failed to start:", err );
		process.exit( 1 );
	} );
}

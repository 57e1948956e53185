import path from "path";

export interface Config {
	host: string;
	port: number;
	/** Absolute path of the observations JSON file. */
	observationsPath: string;
	/** Answer rejected or unmatched date queries with 400/404 instead of 200. */
	errorStatusCodes: boolean;
}

const DEFAULT_PORT = 5000;

function parsePort( value: string | undefined ): number {
	if ( value === undefined || value === "" ) {
		return DEFAULT_PORT;
	}
	const port = Number( value );
	if ( !Number.isInteger( port ) || port < 1 || port > 65535 ) {
		console.warn( `[Config] Ignoring invalid PORT '${ value }', using ${ DEFAULT_PORT }` );
		return DEFAULT_PORT;
	}
	return port;
}

function parseFlag( value: string | undefined ): boolean {
	return value !== undefined && [ "1", "true", "yes", "on" ].includes( value.trim().toLowerCase() );
}

/** Reads the configuration from environment variables. */
export function loadConfig( env: NodeJS.ProcessEnv = process.env ): Config {
	// The dataset lives beside the sources by default, both in src/ and in the compiled dist/.
	const dataDir = env.PERSISTENCE_LOCATION || path.join( __dirname, "..", "data" );

	return {
		host: env.HOST || "127.0.0.1",
		port: parsePort( env.PORT ),
		observationsPath: path.resolve( dataDir, env.OBSERVATIONS_FILE || "observations.json" ),
		errorStatusCodes: parseFlag( env.ERROR_STATUS_CODES )
	};
}

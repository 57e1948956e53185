export enum ErrorCode {
	/** A start or end date did not begin with a yyyy-mm-dd prefix. */
	InvalidDateFormat = 10,
	/** A validated date range did not match any temperature observations. */
	NoMatchingRecords = 11,
	/** The observation dataset could not be loaded or is empty. */
	InvalidDataset = 20,
	/** An error was not properly handled and assigned a more specific error code. */
	UnexpectedError = 99
}

/** An error with a numeric code that can be used to identify the type of error. */
export class CodedError extends Error {
	public readonly errCode: ErrorCode;

	public constructor( errCode: ErrorCode, message?: string ) {
		super( message ?? ErrorCode[ errCode ] );
		this.name = "CodedError";
		this.errCode = errCode;
	}
}

/**
 * Returns a CodedError representing the specified error. This function can be used to ensure that errors caught in try-catch
 * statements have an error code and do not contain any sensitive information in the error message. If `err` is a
 * CodedError, the same object will be returned. If `err` is not a CodedError, it is assumed that the error wasn't
 * properly handled, so a CodedError with a generic message and an "UnexpectedError" code will be returned.
 */
export function makeCodedError( err: unknown ): CodedError {
	if ( err instanceof CodedError ) {
		return err;
	} else {
		return new CodedError( ErrorCode.UnexpectedError );
	}
}

export class ConfigurationError extends Error {
	code = 'CONFIGURATION';

	constructor(message: string) {
		super(message);
		this.name = 'ConfigurationError';
	}
}

export class NoInputError extends Error {
	code = 'NO_INPUT';

	constructor(message = 'The conversation has no user message') {
		super(message);
		this.name = 'NoInputError';
	}
}

/**
 * A single request to the inference endpoint did not produce usable text.
 * status is the HTTP status when the endpoint answered at all.
 */
export class EndpointError extends Error {
	code = 'ENDPOINT';

	constructor(
		message: string,
		public readonly status?: number,
	) {
		super(message);
		this.name = 'EndpointError';
	}
}

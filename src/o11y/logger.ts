import Pino from 'pino';

const logLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();

// https://cloud.google.com/logging/docs/reference/v2/rest/v2/LogEntry#logseverity
const PinoLevelToSeverityLookup: Record<string, string> = {
	trace: 'DEBUG',
	debug: 'DEBUG',
	info: 'INFO',
	warn: 'WARNING',
	error: 'ERROR',
	fatal: 'CRITICAL',
};

// When running locally log in a human-readable format and not JSON
const transport =
	process.env.LOG_PRETTY === 'true'
		? {
				target: 'pino-pretty',
				options: {
					colorize: true,
				},
			}
		: undefined;

/**
 * Shared pino logger. Structured fields go first, the message second, e.g.
 * `logger.warn({ attempt, status }, 'Generation request failed')`
 */
export const logger: Pino.Logger = Pino({
	name: 'best-of-n',
	level: logLevel,
	formatters: {
		level(label: string, number: number) {
			return { severity: PinoLevelToSeverityLookup[label] ?? 'INFO', level: number };
		},
		log(object: Record<string, unknown>) {
			const err = object.err;
			const stackProp = err instanceof Error && err.stack ? { stack_trace: err.stack } : {};
			return { ...object, ...stackProp };
		},
	},
	transport,
});

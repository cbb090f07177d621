/**
 * Logger Configuration
 * Winston-based structured logging
 */

import winston from 'winston';

/**
 * Minimal logging surface consumed by engine components
 */
export interface Logger {
	debug(message: string, meta?: Record<string, unknown>): void;
	info(message: string, meta?: Record<string, unknown>): void;
	warn(message: string, meta?: Record<string, unknown>): void;
	error(message: string, meta?: Record<string, unknown>): void;
}

export interface LoggerOptions {
	level?: string;
	format?: 'json' | 'pretty';
}

// Custom format for pretty printing
const prettyFormat = winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
	let msg = `${timestamp} [${level}] ${service}: ${message}`;

	if (Object.keys(metadata).length > 0) {
		msg += ` ${JSON.stringify(metadata)}`;
	}

	return msg;
});

export function createLogger(service: string, options: LoggerOptions = {}): winston.Logger {
	const level = options.level || process.env.LOG_LEVEL || 'info';
	const format = options.format || (process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json');

	return winston.createLogger({
		level,
		format: winston.format.combine(
			winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
			winston.format.errors({ stack: true }),
			winston.format.json()
		),
		defaultMeta: { service },
		transports: [
			new winston.transports.Console({
				format: format === 'pretty'
					? winston.format.combine(
						winston.format.colorize(),
						winston.format.timestamp({ format: 'HH:mm:ss' }),
						prettyFormat
					)
					: winston.format.json(),
			}),
		],
	});
}

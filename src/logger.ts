/**
 * Logger module: structured engine logging.
 *
 * A preconfigured Winston logger shared by every system. Files receive
 * plain-text lines with JSON metadata; the console receives colorized lines
 * and is switched off while the node:test runner is active.
 *
 * Transports
 * - File (errors): `logs/error-YYYY-MM-DD-HHMMSS[.test].log` at level `error`
 * - File (engine): `logs/app-YYYY-MM-DD-HHMMSS[.test].log` at level `debug`
 * - Console: colorized at `LOG_LEVEL` (default `info`), disabled when
 *   `process.env.NODE_TEST_CONTEXT` is set
 *
 * @example
 * ```ts
 * import logger from './logger.js';
 *
 * logger.info('Enemy appears', { enemy: 'orc', level: 3 });
 * logger.debug('Encounter roll', { distance: 4, appeared: false });
 * ```
 *
 * @module logger
 */
import winston from "winston";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const isTestMode = process.env.NODE_TEST_CONTEXT;

// log file names carry the session start (YYYY-MM-DD-HHMMSS)
const [date, time] = new Date().toISOString().split("T");
const HMS = time.split(".")[0].split(":").join("");
const testSuffix = isTestMode ? ".test" : "";
const LOG_DIRECTORY = path.join(__dirname, "..", "logs");

const fileFormat = winston.format.combine(
	winston.format.uncolorize(),
	winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
	winston.format.printf(
		({ timestamp, level, message, ...meta }) =>
			`[${timestamp}] ${level.toUpperCase()}: ${message}${
				Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
			}`
	)
);

function fileTransport(prefix: string, level: string) {
	return new winston.transports.File({
		filename: path.join(LOG_DIRECTORY, `${prefix}-${date}-${HMS}${testSuffix}.log`),
		level,
		format: fileFormat,
	});
}

const logger = winston.createLogger({
	level: "debug",
	format: winston.format.combine(
		winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.json()
	),
	defaultMeta: { service: "dirquest" },
	transports: [
		fileTransport("error", "error"),
		fileTransport("app", "debug"),
		...(!isTestMode
			? [
					new winston.transports.Console({
						level: process.env.LOG_LEVEL || "info",
						format: winston.format.combine(
							winston.format.colorize(),
							winston.format.timestamp({ format: "HH:mm:ss" }),
							winston.format.printf(
								({ timestamp, level, message, service, ...meta }) =>
									`[${timestamp}] ${level}: ${message}${
										Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
									}`
							)
						),
					}),
			  ]
			: []),
	],
});

export default logger;

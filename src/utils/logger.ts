import { existsSync, mkdirSync } from 'fs';
import log4js from 'log4js';
import { join, resolve } from 'path';

const TEN_MEGABYTES = 10485760;

/**
 * Installs the console appender and the rotating file appenders.
 * Until this is called log4js has no appenders for these categories and stays silent.
 *
 * @param level The level of the default category, e.g. `info` or `debug`.
 * @param directory The directory the log files are written to.
 */
export function configureLogging(level: string, directory: string) {
	const logsDir = resolve(directory);

	if (!existsSync(logsDir)) {
		mkdirSync(logsDir, { recursive: true });
	}

	const fileLayout = {
		type: 'pattern',
		pattern: '%d{yyyy-MM-dd hh:mm:ss} [%p] %m'
	};

	log4js.configure({
		appenders: {
			console: {
				type: 'console',
				layout: {
					type: 'pattern',
					pattern: '%[%d{yyyy-MM-dd hh:mm:ss} %p%] %m'
				}
			},
			file: {
				type: 'file',
				filename: join(logsDir, 'modem-link.log'),
				maxLogSize: TEN_MEGABYTES,
				backups: 5,
				compress: true,
				layout: fileLayout
			},
			errorFile: {
				type: 'file',
				filename: join(logsDir, 'modem-link-error.log'),
				maxLogSize: TEN_MEGABYTES,
				backups: 5,
				compress: true,
				layout: fileLayout
			}
		},
		categories: {
			default: {
				appenders: ['console', 'file'],
				level
			},
			error: {
				appenders: ['console', 'file', 'errorFile'],
				level: 'error'
			}
		}
	});
}

export const logger = log4js.getLogger();

export const errorLogger = log4js.getLogger('error');

import * as dotenv from 'dotenv';
import { Config } from './config';
import { ConnectionPool } from './ConnectionPool';
import { EventBus, Subscription } from './EventBus';
import { configureLogging, errorLogger, logger } from './utils/logger';

dotenv.config();

const config = new Config();
configureLogging(config.logLevel, config.logDir);
config.display();

const bus = new EventBus(config.eventBufferSize);
const pool = new ConnectionPool(bus, {
	patterns: config.portPatterns,
	baudRate: config.baudRate,
	session: config.sessionOptions()
});

const trace = bus.subscribe();

let rescanTimer: ReturnType<typeof setInterval> | null = null;
let shuttingDown = false;

/**
 * Writes everything the modems send unprompted to the debug log.
 */
async function traceModemOutput(subscription: Subscription) {
	for await (const message of subscription) {
		logger.debug(message.trimEnd());
	}

	if (subscription.dropped > 0) {
		logger.warn(`[Bus] Trace subscriber dropped ${subscription.dropped} messages`);
	}
}

async function scan() {
	const ports = await pool.scan();

	logger.info(`[Pool] ${ports.length} modem(s) registered${ports.length > 0 ? `: ${ports.map((port) => port.identifier).join(', ')}` : ''}`);
}

async function shutdown(signal: string) {
	if (shuttingDown) {
		return;
	}

	shuttingDown = true;
	logger.warn(`[ModemLink] Received ${signal} signal`);

	if (rescanTimer !== null) {
		clearInterval(rescanTimer);
		rescanTimer = null;
	}

	trace.cancel();
	await pool.closeAll();
}

traceModemOutput(trace).catch((error: Error) => {
	errorLogger.error('[ModemLink] Trace subscriber failed:', error.message);
});

process.on('SIGINT', () => {
	shutdown('SIGINT').catch((error: Error) => errorLogger.error('[ModemLink] Shutdown failed:', error.message));
});

process.on('SIGTERM', () => {
	shutdown('SIGTERM').catch((error: Error) => errorLogger.error('[ModemLink] Shutdown failed:', error.message));
});

process.on('unhandledRejection', (reason: unknown) => {
	errorLogger.error('[ModemLink] Unhandled rejection:', reason);
});

scan()
	.then(() => {
		if (config.scanInterval > 0 && !shuttingDown) {
			rescanTimer = setInterval(() => {
				scan().catch((error: Error) => errorLogger.error('[ModemLink] Scan failed:', error.message));
			}, config.scanInterval);
		}
	})
	.catch((error: Error) => {
		errorLogger.error('[ModemLink] Failed to start:', error.message);
	});

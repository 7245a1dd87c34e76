import { SmsMode } from './codec/types';
import { SessionOptions } from './utils/types';
import { logger } from './utils/logger';

const LOG_LEVELS = ['all', 'trace', 'debug', 'info', 'warn', 'error', 'fatal', 'mark', 'off'];

export class Config {
	public readonly portPatterns: string[];
	public readonly baudRate: number;
	public readonly smsMode: SmsMode;
	public readonly commandTimeout: number;
	public readonly verifyTimeout: number;
	public readonly sendTimeout: number;
	public readonly readErrorBackoff: number;
	public readonly eventBufferSize: number;
	public readonly scanInterval: number;
	public readonly logLevel: string;
	public readonly logDir: string;

	constructor(env: NodeJS.ProcessEnv = process.env) {
		this.portPatterns = this.parseList(env.MODEM_PORT_PATTERNS || '/dev/ttyUSB*,/dev/ttyACM*');
		this.baudRate = parseInt(env.MODEM_BAUD_RATE || '115200', 10);
		this.smsMode = this.parseMode(env.MODEM_SMS_MODE || 'PDU');

		this.commandTimeout = parseInt(env.AT_COMMAND_TIMEOUT || '3000', 10);
		this.verifyTimeout = parseInt(env.AT_VERIFY_TIMEOUT || '2000', 10);
		this.sendTimeout = parseInt(env.SMS_SEND_TIMEOUT || '60000', 10);
		this.readErrorBackoff = parseInt(env.READ_ERROR_BACKOFF || '100', 10);

		this.eventBufferSize = parseInt(env.EVENT_BUFFER_SIZE || '100', 10);
		this.scanInterval = parseInt(env.SCAN_INTERVAL || '0', 10);

		this.logLevel = (env.LOG_LEVEL || 'info').toLowerCase();
		this.logDir = env.LOG_DIR || 'logs';

		this.validate();
	}

	private parseList(value: string): string[] {
		return value
			.split(',')
			.map((entry) => entry.trim())
			.filter((entry) => entry.length > 0);
	}

	private parseMode(value: string): SmsMode {
		switch (value.trim().toUpperCase()) {
			case 'PDU':
				return SmsMode.PDU;
			case 'TEXT':
				return SmsMode.TEXT;
			default:
				throw new Error(`Invalid MODEM_SMS_MODE configuration: ${value}`);
		}
	}

	private validate(): void {
		if (this.portPatterns.length === 0) {
			throw new Error('MODEM_PORT_PATTERNS is required in configuration');
		}

		const positive = {
			MODEM_BAUD_RATE: this.baudRate,
			AT_COMMAND_TIMEOUT: this.commandTimeout,
			AT_VERIFY_TIMEOUT: this.verifyTimeout,
			SMS_SEND_TIMEOUT: this.sendTimeout,
			EVENT_BUFFER_SIZE: this.eventBufferSize
		};

		Object.entries(positive).forEach(([key, value]) => {
			if (isNaN(value) || value <= 0) {
				throw new Error(`Invalid ${key} configuration: ${value}`);
			}
		});

		if (isNaN(this.readErrorBackoff) || this.readErrorBackoff < 0) {
			throw new Error(`Invalid READ_ERROR_BACKOFF configuration: ${this.readErrorBackoff}`);
		}

		if (isNaN(this.scanInterval) || this.scanInterval < 0) {
			throw new Error(`Invalid SCAN_INTERVAL configuration: ${this.scanInterval}`);
		}

		if (!LOG_LEVELS.includes(this.logLevel)) {
			throw new Error(`Invalid LOG_LEVEL configuration: ${this.logLevel}`);
		}
	}

	/**
	 * The options every device session is opened with.
	 */
	public sessionOptions(): SessionOptions {
		return {
			smsMode: this.smsMode,
			commandTimeout: this.commandTimeout,
			verifyTimeout: this.verifyTimeout,
			readErrorBackoff: this.readErrorBackoff,
			sendTimeout: this.sendTimeout
		};
	}

	public display(): void {
		logger.info(
			`\n=== Modem Link Configuration ===\n` +
				`Port Patterns: ${this.portPatterns.join(', ')}\n` +
				`Baud Rate: ${this.baudRate}\n` +
				`SMS Mode: ${this.smsMode}\n` +
				`AT Command Timeout: ${this.commandTimeout}ms\n` +
				`AT Verify Timeout: ${this.verifyTimeout}ms\n` +
				`SMS Send Timeout: ${this.sendTimeout}ms\n` +
				`Read Error Backoff: ${this.readErrorBackoff}ms\n` +
				`Event Buffer Size: ${this.eventBufferSize}\n` +
				`Scan Interval: ${this.scanInterval > 0 ? `${this.scanInterval}ms` : 'DISABLED'}\n` +
				`Log Level: ${this.logLevel} (${this.logDir})\n` +
				`================================\n`
		);
	}
}

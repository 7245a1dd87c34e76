import { splitMessage, encodeSubmit } from './codec/encodeSubmit';
import { reassemble } from './codec/reassemble';
import { LogicalSms, SmsMode, Submission } from './codec/types';
import type { EventBus } from './EventBus';
import { Command } from './utils/Command';
import { CommandChannel } from './utils/CommandChannel';
import type { Communicator } from './utils/Communicator';
import { ModemError, ProtocolError } from './utils/errors';
import { EventTypes, Events } from './utils/Events';
import { logger } from './utils/logger';
import { parseOperator, parsePhoneNumber, parseSignal, parseSmsListing } from './utils/parsers';
import { DeleteResult, ModemIdentity, SendSmsFailed, SendSmsSuccess, SessionOptions } from './utils/types';
import { CmdStack, extractValue, resultCode } from './utils/utils';

// text mode submission parameters: SMS-SUBMIT with relative validity, 24 hours, UCS2
const CSMP_SINGLE = 'AT+CSMP=17,167,0,8';
const CSMP_CONCATENATED = 'AT+CSMP=81,167,0,8';

export const DEFAULT_SESSION_OPTIONS: SessionOptions = {
	smsMode: SmsMode.PDU,
	commandTimeout: 3000,
	verifyTimeout: 2000,
	readErrorBackoff: 100,
	sendTimeout: 60000
};

/**
 * One opened modem: the operations a caller runs against a single device.
 */
export class DeviceSession {
	// options
	private readonly options: SessionOptions;

	// system
	private readonly communicator: Communicator;
	private readonly events = new Events();
	private readonly channel: CommandChannel;

	constructor(communicator: Communicator, options: Partial<SessionOptions> = {}, bus: EventBus | null = null) {
		this.options = { ...DEFAULT_SESSION_OPTIONS, ...options };
		this.communicator = communicator;
		this.channel = new CommandChannel(this.communicator, this.events, this.options, bus);
	}

	/*
	 * ================================================
	 *                      Getter
	 * ================================================
	 */

	/**
	 * The port path of the device.
	 */
	get identifier() {
		return this.communicator.deviceIdentifier;
	}

	/**
	 * Whether the underlying link is open.
	 */
	get isConnected() {
		return this.communicator.isConnected;
	}

	get state() {
		return this.channel.state;
	}

	get smsMode() {
		return this.options.smsMode;
	}

	/*
	 * ================================================
	 *                Private functions
	 * ================================================
	 */

	/**
	 * Runs one query of a batch. A failure is logged and leaves the value empty.
	 */
	private async query(command: string) {
		try {
			const response = await this.channel.sendCommand(command);

			if (resultCode(response) === 'ERROR') {
				logger.warn(`[${this.identifier}] ${command} answered: ${extractValue(response)}`);
				return undefined;
			}

			return response;
		} catch (error) {
			if (!(error instanceof ModemError)) {
				throw error;
			}

			logger.warn(`[${this.identifier}] ${command} failed: ${error.message}`);
			return undefined;
		}
	}

	private setupCommands() {
		const commands = ['ATE0', `AT+CMGF=${this.options.smsMode === SmsMode.PDU ? 0 : 1}`, 'AT+CNMI=2,1,0,0,0'];

		if (this.options.smsMode === SmsMode.TEXT) {
			commands.push('AT+CSCS="UCS2"', CSMP_SINGLE);
		}

		return commands;
	}

	private submissionStack(submission: Submission): CmdStack {
		const expectPrompt = (response: string) => {
			if (resultCode(response) !== 'PROMPT') {
				throw new ProtocolError(this.identifier, 'Modem did not prompt for the message', response);
			}
		};

		const expectOk = (response: string) => {
			if (resultCode(response) !== 'OK') {
				throw new ProtocolError(this.identifier, 'Failed to send SMS!', response);
			}
		};

		if (submission.mode === SmsMode.PDU) {
			return {
				cmds: [
					new Command(`AT+CMGS=${submission.length}`, undefined, '\r', expectPrompt),
					new Command(submission.pdu, this.options.sendTimeout, '\x1a', expectOk)
				],
				cancelOnFailure: true
			};
		}

		return {
			cmds: [
				new Command(`AT+CMGS="${submission.destination}"`, undefined, '\r', expectPrompt),
				new Command(submission.payload, this.options.sendTimeout, '\x1a', expectOk)
			],
			cancelOnFailure: true
		};
	}

	private async submitParts(number: string, parts: string[]) {
		const reference = Math.floor(Math.random() * 256);

		for (const [i, part] of parts.entries()) {
			const concat = parts.length > 1 ? { reference, total: parts.length, sequence: i + 1 } : undefined;
			await this.channel.executeStack(this.submissionStack(encodeSubmit(number, part, this.options.smsMode, concat)));
		}
	}

	/*
	 * ================================================
	 *                 Public functions
	 * ================================================
	 */

	/**
	 * Opens the link, verifies the modem and issues the setup commands.
	 */
	async open() {
		await this.channel.open();
		await this.channel.initialize(this.setupCommands());
		this.channel.activate();

		logger.info(`[${this.identifier}] Session active (${this.options.smsMode} mode)`);
	}

	/**
	 * Closes the link. Pending commands are rejected.
	 */
	async close() {
		await this.channel.close();
		logger.info(`[${this.identifier}] Session closed`);
	}

	/**
	 * Reads manufacturer, model, IMEI, IMSI, operator and own number.
	 * Every field is queried on its own; a failing query leaves its field undefined.
	 */
	async getIdentity(): Promise<ModemIdentity> {
		const value = (response: string | undefined) => {
			const line = response !== undefined ? extractValue(response) : '';
			return line !== '' ? line : undefined;
		};

		const manufacturer = value(await this.query('AT+CGMI'));
		const model = value(await this.query('AT+CGMM'));
		const imei = value(await this.query('AT+CGSN'));
		const imsi = value(await this.query('AT+CIMI'));

		const cops = await this.query('AT+COPS?');
		const operator = cops !== undefined ? parseOperator(cops) : undefined;

		const cnum = await this.query('AT+CNUM');

		return {
			manufacturer,
			model,
			imei,
			imsi,
			operator: operator?.name,
			accessTechnology: operator?.accessTechnology,
			phoneNumber: cnum !== undefined ? parsePhoneNumber(cnum) : undefined
		};
	}

	/**
	 * Reads the received signal strength.
	 */
	async getSignal() {
		const response = await this.channel.sendCommand('AT+CSQ');

		if (resultCode(response) === 'ERROR') {
			throw new ProtocolError(this.identifier, 'The network signal could not be read!', response);
		}

		const signal = parseSignal(response);

		if (signal === null) {
			throw new ProtocolError(this.identifier, 'The signal strength could not be parsed!', response);
		}

		return signal;
	}

	/**
	 * Lists every stored message. Parts of concatenated messages are joined when all of them are stored.
	 * A record that cannot be decoded is returned with its raw payload as message.
	 */
	async listSms(): Promise<LogicalSms[]> {
		const command = this.options.smsMode === SmsMode.PDU ? 'AT+CMGL=4' : 'AT+CMGL="ALL"';
		const response = await this.channel.sendCommand(command);

		if (resultCode(response) === 'ERROR') {
			throw new ProtocolError(this.identifier, 'The messages could not be listed!', response);
		}

		const { fragments, errors } = parseSmsListing(response, this.options.smsMode);

		for (const error of errors) {
			logger.warn(`[${this.identifier}] ${error.message}`);
		}

		return reassemble(fragments);
	}

	/**
	 * Sends a message, split into as many parts as needed.
	 *
	 * @param number The recipient's phone number.
	 * @param message The text message to be sent.
	 */
	async sendSms(number: string, message: string) {
		const parts = splitMessage(message, this.options.smsMode);
		const data = { message, recipient: number, parts: parts.length };
		const concatenatedText = this.options.smsMode === SmsMode.TEXT && parts.length > 1;

		try {
			if (concatenatedText) {
				const response = await this.channel.sendCommand(CSMP_CONCATENATED);

				if (resultCode(response) !== 'OK') {
					throw new ProtocolError(this.identifier, 'Submission parameters could not be set!', response);
				}
			}

			try {
				await this.submitParts(number, parts);
			} finally {
				if (concatenatedText) {
					await this.channel.sendCommand(CSMP_SINGLE).catch((error: unknown) => {
						logger.warn(`[${this.identifier}] Restoring submission parameters failed: ${error instanceof Error ? error.message : String(error)}`);
					});
				}
			}
		} catch (error) {
			const failure = error instanceof Error ? error : new Error(String(error));
			const result: SendSmsFailed = { success: false, data, error: failure };

			this.events.emit('onSmsSentFailed', result);
			throw failure;
		}

		const result: SendSmsSuccess = { success: true, data };

		this.events.emit('onSmsSent', result);
		return result;
	}

	/**
	 * Deletes the message stored at one index.
	 */
	async deleteSms(index: number) {
		const response = await this.channel.sendCommand(`AT+CMGD=${index}`);

		if (resultCode(response) !== 'OK') {
			throw new ProtocolError(this.identifier, `Message ${index} could not be deleted!`, response);
		}
	}

	/**
	 * Deletes every stored part of a message, highest index first.
	 */
	async deleteMessage(sms: LogicalSms): Promise<DeleteResult> {
		const result: DeleteResult = { deleted: [], failed: [] };
		const indexes = [...new Set(sms.indexes.length > 0 ? sms.indexes : [sms.index])].sort((a, b) => b - a);

		for (const index of indexes) {
			try {
				await this.deleteSms(index);
				result.deleted.push(index);
			} catch (error) {
				if (!(error instanceof ModemError)) {
					throw error;
				}

				logger.warn(`[${this.identifier}] ${error.message}`);
				result.failed.push(index);
			}
		}

		return result;
	}

	/**
	 * Sends a command as given and returns the raw response.
	 *
	 * @param command The command, without line terminator.
	 * @param timeout Optional deadline in milliseconds.
	 */
	async sendRawCommand(command: string, timeout?: number) {
		return this.channel.sendCommand(command, timeout);
	}

	/*
	 * ================================================
	 *                 Event listener
	 * ================================================
	 */

	/**
	 * Adds a listener for a session event.
	 *
	 * @param eventName The name of the event.
	 * @param listener The function called with the event's data.
	 */
	on<T extends keyof EventTypes>(eventName: T, listener: EventTypes[T]) {
		this.events.on(eventName, listener);
		return this;
	}

	once<T extends keyof EventTypes>(eventName: T, listener: EventTypes[T]) {
		this.events.once(eventName, listener);
		return this;
	}

	removeListener<T extends keyof EventTypes>(eventName: T, listener: EventTypes[T]) {
		this.events.removeListener(eventName, listener);
		return this;
	}
}

import type { EventBus } from '../EventBus';
import { Command } from './Command';
import type { Communicator } from './Communicator';
import { CommandTimeoutError, ModemError, ProtocolError, TransportError } from './errors';
import { Events } from './Events';
import { errorLogger, logger } from './logger';
import { ChannelOptions, ChannelState, CommandExchange } from './types';
import { CmdStack, hasTerminalToken, resultCode } from './utils';

type QueueItem = {
	run: () => Promise<void>;
	reject: (error: Error) => void;
};

type PendingExchange = {
	buffer: string;
	// length of the buffer already scanned for indications
	scanned: number;
	settle: (result: string | Error) => void;
};

const NEW_SMS_INDICATION = /^\+CMTI:\s*"?[^",]*"?\s*,\s*(\d+)/i;

/**
 * Owns the link to one modem. Commands are queued and executed one at a time;
 * data read outside of a command exchange is handed to the listener.
 */
export class CommandChannel {
	// references
	private readonly communicator: Communicator;
	private readonly events: Events;
	private readonly bus: EventBus | null;
	private readonly options: ChannelOptions;

	// sending commands
	private readonly queue: QueueItem[] = [];
	private isLocked = false;
	private exchange: PendingExchange | null = null;

	// receiving data
	private channelState = ChannelState.Opening;
	private backoffTimer: ReturnType<typeof setTimeout> | null = null;
	private heldChunks: string[] = [];
	private partialLine = '';

	constructor(communicator: Communicator, events: Events, options: ChannelOptions, bus: EventBus | null = null) {
		this.communicator = communicator;
		this.events = events;
		this.options = options;
		this.bus = bus;

		this.communicator.onData((data) => this.dataReceived(data));
		this.communicator.onError((error) => this.linkError(error));
		this.communicator.onClose(() => this.linkClosed());
	}

	/*
	 * ================================================
	 *                      Getter
	 * ================================================
	 */

	get identifier() {
		return this.communicator.deviceIdentifier;
	}

	get state() {
		return this.channelState;
	}

	/**
	 * The number of commands and command stacks waiting for the link.
	 */
	get queueLength() {
		return this.queue.length;
	}

	/*
	 * ================================================
	 *            Sending commands to modem
	 * ================================================
	 */

	private setState(state: ChannelState) {
		if (this.channelState === state) {
			return;
		}

		logger.debug(`[${this.identifier}] ${this.channelState} -> ${state}`);
		this.channelState = state;
		this.events.emit('onStateChange', state);
	}

	private assertUsable() {
		switch (this.channelState) {
			case ChannelState.Verifying:
			case ChannelState.Initialized:
			case ChannelState.Active:
				return;
			default:
				throw new TransportError(this.identifier, `Channel is ${this.channelState.toLowerCase()}`);
		}
	}

	/**
	 * Queues a task behind the lock. The returned promise settles with the task.
	 */
	private enqueue<T>(task: () => Promise<T>) {
		return new Promise((resolve: (result: T) => void, reject: (error: Error) => void) => {
			this.assertUsable();
			this.queue.push({ run: () => task().then(resolve, reject), reject });
			this.executeNext();
		});
	}

	private executeNext() {
		if (this.isLocked) {
			return;
		}

		const item = this.queue.shift();

		if (item === undefined) {
			return;
		}

		this.isLocked = true;

		void item.run().finally(() => {
			this.isLocked = false;
			this.executeNext();
		});
	}

	private rejectQueued(error: Error) {
		for (const item of this.queue.splice(0)) {
			item.reject(error);
		}
	}

	/**
	 * Executes a single command while the lock is held.
	 * Resolves with the accumulated response once a terminal token was read.
	 */
	private async executeCMD(cmd: Command): Promise<CommandExchange> {
		this.assertUsable();

		const started = Date.now();
		const timeout = cmd.timeout ?? this.options.commandTimeout;

		const response = await new Promise((resolve: (response: string) => void, reject: (error: Error) => void) => {
			let settled = false;

			const exchange: PendingExchange = {
				buffer: '',
				scanned: 0,
				settle: (result) => {
					if (settled) {
						return;
					}

					settled = true;
					clearTimeout(timer);

					if (this.exchange === exchange) {
						this.exchange = null;
					}

					if (result instanceof Error) {
						reject(result);
					} else {
						resolve(result);
					}
				}
			};

			// the deadline covers flushing the input too
			const timer = setTimeout(() => exchange.settle(new CommandTimeoutError(this.identifier, cmd.ATCommand, timeout)), timeout);

			const send = () => {
				if (settled) {
					return;
				}

				this.assertUsable();
				this.exchange = exchange;

				const data = `${cmd.ATCommand}${cmd.terminator}`;
				this.events.emit('onWriteToModem', data);

				this.communicator.write(data).catch((error: unknown) => {
					const reason = error instanceof Error ? error.message : String(error);

					this.setState(ChannelState.Failed);
					this.rejectQueued(new TransportError(this.identifier, 'Link failed'));
					exchange.settle(new TransportError(this.identifier, `Write failed: ${reason}`));
				});
			};

			this.communicator
				.flush()
				.catch((error: unknown) => {
					logger.warn(`[${this.identifier}] Flushing the input failed: ${error instanceof Error ? error.message : String(error)}`);
				})
				.then(send)
				.catch((error: unknown) => exchange.settle(error instanceof Error ? error : new Error(String(error))));
		});

		if (cmd.check) {
			cmd.check(response);
		}

		return { command: cmd.ATCommand, response, elapsedMs: Date.now() - started };
	}

	/*
	 * ================================================
	 *            Receiving data from modem
	 * ================================================
	 */

	private dataReceived(chunk: string) {
		this.events.emit('onDataReceived', chunk);

		const exchange = this.exchange;

		if (exchange !== null) {
			exchange.buffer += chunk;

			const complete = exchange.buffer.lastIndexOf('\n') + 1;

			if (complete > exchange.scanned) {
				this.detectIndications(exchange.buffer.slice(exchange.scanned, complete).split(/\r?\n/));
				exchange.scanned = complete;
			}

			if (hasTerminalToken(exchange.buffer)) {
				exchange.settle(exchange.buffer);
			}

			return;
		}

		if (this.backoffTimer !== null) {
			this.heldChunks.push(chunk);
			return;
		}

		this.listen(chunk);
	}

	/**
	 * Handles a chunk read outside of any exchange.
	 */
	private listen(chunk: string) {
		if (this.channelState !== ChannelState.Active) {
			return;
		}

		this.bus?.broadcast(`[${this.identifier}] ${chunk}`);

		const lines = (this.partialLine + chunk).split(/\r?\n/);
		this.partialLine = lines.pop() ?? '';

		this.detectIndications(lines);
	}

	/**
	 * Emits `onNewSms` for every `+CMTI` line.
	 */
	private detectIndications(lines: string[]) {
		for (const line of lines) {
			const match = NEW_SMS_INDICATION.exec(line.trim());

			if (match !== null) {
				this.events.emit('onNewSms', Number(match[1]));
			}
		}
	}

	private linkError(error: Error) {
		errorLogger.error(`[${this.identifier}] Link error: ${error.message}`);

		if (this.backoffTimer !== null) {
			return;
		}

		this.backoffTimer = setTimeout(() => {
			this.backoffTimer = null;

			for (const chunk of this.heldChunks.splice(0)) {
				this.listen(chunk);
			}
		}, this.options.readErrorBackoff);
	}

	private linkClosed() {
		this.stopBackoff();

		const exchange = this.exchange;

		if (exchange !== null) {
			exchange.settle(exchange.buffer !== '' ? exchange.buffer : new TransportError(this.identifier, 'Link closed before a response was read'));
		}

		if (this.channelState !== ChannelState.Closed && this.channelState !== ChannelState.Failed) {
			logger.warn(`[${this.identifier}] Link closed unexpectedly`);
			this.setState(ChannelState.Failed);
			this.rejectQueued(new TransportError(this.identifier, 'Link closed'));
		}

		this.events.emit('onClose');
	}

	private stopBackoff() {
		if (this.backoffTimer !== null) {
			clearTimeout(this.backoffTimer);
			this.backoffTimer = null;
		}

		this.heldChunks = [];
	}

	/*
	 * ================================================
	 *                 Public functions
	 * ================================================
	 */

	/**
	 * Opens the link and verifies that a modem answers `AT` with `OK`.
	 * On failure the channel ends in `FAILED` and the link is released.
	 */
	async open() {
		if (this.channelState !== ChannelState.Opening) {
			throw new TransportError(this.identifier, `Channel cannot be opened while ${this.channelState.toLowerCase()}`);
		}

		try {
			await this.communicator.connect();
		} catch (error) {
			this.setState(ChannelState.Failed);
			throw new TransportError(this.identifier, `Failed to open: ${error instanceof Error ? error.message : String(error)}`);
		}

		this.events.emit('onOpen');
		this.setState(ChannelState.Verifying);

		try {
			const response = await this.sendCommand('AT', this.options.verifyTimeout);

			if (resultCode(response) !== 'OK') {
				throw new ProtocolError(this.identifier, 'Device did not answer AT with OK', response);
			}
		} catch (error) {
			this.setState(ChannelState.Failed);

			if (this.communicator.isConnected) {
				await this.communicator.disconnect().catch((reason: unknown) => {
					errorLogger.error(`[${this.identifier}] Releasing the link failed: ${reason instanceof Error ? reason.message : String(reason)}`);
				});
			}

			throw error;
		}
	}

	/**
	 * Issues the setup commands. A failing command is logged and the next one is sent.
	 *
	 * @param commands The setup commands, e.g. `ATE0`.
	 */
	async initialize(commands: string[]) {
		this.setState(ChannelState.Initialized);

		for (const command of commands) {
			try {
				const response = await this.sendCommand(command);

				if (resultCode(response) !== 'OK') {
					logger.warn(`[${this.identifier}] Setup command ${command} answered: ${response.trim()}`);
				}
			} catch (error) {
				if (!(error instanceof ModemError) || error instanceof TransportError) {
					throw error;
				}

				logger.warn(`[${this.identifier}] Setup command ${command} failed: ${error.message}`);
			}
		}

		this.events.emit('onInitialized');
	}

	/**
	 * Hands data read outside of exchanges to the listener from now on.
	 */
	activate() {
		this.assertUsable();
		this.setState(ChannelState.Active);
	}

	/**
	 * Sends one command and returns the raw response.
	 *
	 * @param text The command, without line terminator.
	 * @param timeout Deadline in milliseconds, defaults to the command timeout.
	 */
	async sendCommand(text: string, timeout?: number) {
		const result = await this.execute(new Command(text, timeout));
		return result.response;
	}

	/**
	 * Queues a command and resolves with its exchange.
	 */
	async execute(cmd: Command) {
		return this.enqueue(() => this.executeCMD(cmd));
	}

	/**
	 * Executes several commands under one hold of the lock.
	 * With `cancelOnFailure` the first failure aborts the stack and is thrown,
	 * otherwise failures are logged and the remaining commands still run.
	 *
	 * @returns The exchanges of the commands that completed.
	 */
	async executeStack(stack: CmdStack) {
		return this.enqueue(async () => {
			const exchanges: CommandExchange[] = [];

			for (const cmd of stack.cmds) {
				try {
					exchanges.push(await this.executeCMD(cmd));
				} catch (error) {
					if (stack.cancelOnFailure || error instanceof TransportError || !(error instanceof Error)) {
						throw error;
					}

					logger.warn(`[${this.identifier}] ${error.message}`);
				}
			}

			return exchanges;
		});
	}

	/**
	 * Closes the link. Queued and running commands are rejected, later ones are refused.
	 */
	async close() {
		if (this.channelState === ChannelState.Closed) {
			return;
		}

		this.setState(ChannelState.Closed);
		this.stopBackoff();

		const error = new TransportError(this.identifier, 'Channel closed');
		this.rejectQueued(error);
		this.exchange?.settle(error);

		if (this.communicator.isConnected) {
			await this.communicator.disconnect();
		}
	}
}

import { EventEmitter } from 'events';
import type { ChannelState, SendSmsFailed, SendSmsSuccess } from './types';

export class Events extends EventEmitter {
	constructor() {
		super();
		this.setMaxListeners(50);
	}

	emit<T extends keyof EventTypes>(event: T, ...parameters: Parameters<EventTypes[T]>) {
		return super.emit(event, ...parameters);
	}

	on<T extends keyof EventTypes>(event: T, listener: EventTypes[T]) {
		return super.on(event, listener);
	}

	once<T extends keyof EventTypes>(event: T, listener: EventTypes[T]) {
		return super.once(event, listener);
	}

	removeListener<T extends keyof EventTypes>(event: T, listener: EventTypes[T]) {
		return super.removeListener(event, listener);
	}
}

export type EventTypes = {
	/**
	 * Event triggered when the link to the modem is successfully opened.
	 */
	onOpen: () => void;

	/**
	 * Event triggered when the link to the modem is closed.
	 */
	onClose: () => void;

	/**
	 * Event triggered whenever the channel moves to another lifecycle state.
	 * @param state The state entered.
	 */
	onStateChange: (state: ChannelState) => void;

	/**
	 * Event triggered when the setup commands have been issued.
	 */
	onInitialized: () => void;

	/**
	 * Event triggered when data is written to the modem.
	 * @param data The data written to the modem.
	 */
	onWriteToModem: (data: string) => void;

	/**
	 * Event triggered for every chunk received from the modem.
	 * @param data The data received from the modem.
	 */
	onDataReceived: (data: string) => void;

	/**
	 * Event triggered when the modem reports a newly stored SMS.
	 * @param index The storage index of the received SMS.
	 */
	onNewSms: (index: number) => void;

	/**
	 * Event triggered when an SMS is successfully sent.
	 * @param data The successfully sent SMS.
	 */
	onSmsSent: (data: SendSmsSuccess) => void;

	/**
	 * Event triggered when an attempt to send an SMS fails.
	 * @param data The failed SMS.
	 */
	onSmsSentFailed: (data: SendSmsFailed) => void;
};

import type { SmsMode } from '../codec/types';

export type { EventTypes } from './Events';

/*
 * Channel lifecycle and options
 */

export enum ChannelState {
	Opening = 'OPENING',
	Verifying = 'VERIFYING',
	Initialized = 'INITIALIZED',
	Active = 'ACTIVE',
	Closed = 'CLOSED',
	Failed = 'FAILED'
}

export interface ChannelOptions {
	commandTimeout: number;
	verifyTimeout: number;
	readErrorBackoff: number;
}

export interface SessionOptions extends ChannelOptions {
	smsMode: SmsMode;
	sendTimeout: number;
}

export interface CommandExchange {
	command: string;
	response: string;
	elapsedMs: number;
}

/*
 * Records returned by a session
 */

export interface ModemIdentity {
	manufacturer?: string;
	model?: string;
	imei?: string;
	imsi?: string;
	operator?: string;
	accessTechnology?: number;
	phoneNumber?: string;
}

export interface SignalReading {
	rssi: number;
	quality: number;
	/**
	 * Power in dBm, e.g. `-51 dBm`, or `unknown` when the RSSI is out of range.
	 */
	dbm: string;
	/**
	 * Signal bars from 0 to 5.
	 */
	level: number;
}

export interface SendSmsSuccess {
	success: true;
	data: {
		message: string;
		recipient: string;
		parts: number;
	};
}

export interface SendSmsFailed {
	success: false;
	data: {
		message: string;
		recipient: string;
		parts: number;
	};
	error: Error;
}

export interface DeleteResult {
	deleted: number[];
	failed: number[];
}

export interface PortStatus {
	identifier: string;
	connected: boolean;
}

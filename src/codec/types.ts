import type { CodecError } from '../utils/errors';

/**
 * SMS message format selected with `AT+CMGF`.
 */
export enum SmsMode {
	PDU = 'PDU',
	TEXT = 'TEXT'
}

export enum Alphabet {
	GSM7 = 'GSM7',
	UCS2 = 'UCS2'
}

/*
 * Concatenation metadata carried by the user data header
 */

export interface ConcatInfo {
	reference: number;
	total: number;
	sequence: number;
}

export interface DecodedText extends ConcatInfo {
	text: string;
	/**
	 * Set when the payload could not be decoded and `text` holds the raw payload.
	 */
	error?: CodecError;
}

export interface DecodedPdu extends DecodedText {
	sender: string;
	timestamp: string;
}

/*
 * Messages as stored on the device and as reported to callers
 */

export interface SmsFragment extends ConcatInfo {
	index: number;
	status: string;
	sender: string;
	timestamp: string;
	text: string;
}

export interface LogicalSms {
	index: number;
	status: string;
	number: string;
	time: string;
	message: string;
	/**
	 * Every storage index this message occupies, ascending.
	 */
	indexes: number[];
}

/*
 * Encoded submissions
 */

export interface PduSubmission {
	mode: SmsMode.PDU;
	alphabet: Alphabet;
	/**
	 * Full PDU in hex, starting with an empty service center address.
	 */
	pdu: string;
	/**
	 * TPDU length in octets, as expected by `AT+CMGS=<length>`.
	 */
	length: number;
}

export interface TextSubmission {
	mode: SmsMode.TEXT;
	alphabet: Alphabet.UCS2;
	/**
	 * Destination number in UCS2 hex.
	 */
	destination: string;
	/**
	 * User data in UCS2 hex, prefixed with the concatenation header when present.
	 */
	payload: string;
	hasHeader: boolean;
}

export type Submission = PduSubmission | TextSubmission;

import { decodeFragment } from '../codec/decodeFragment';
import { decodePdu } from '../codec/decodePdu';
import { DecodedPdu, SmsFragment, SmsMode } from '../codec/types';
import { Ucs2 } from '../codec/Ucs2';
import { CodecError } from './errors';
import { SignalReading } from './types';
import { extractValue } from './utils';

const PDU_STATUS = ['REC UNREAD', 'REC READ', 'STO UNSENT', 'STO SENT'];

/**
 * Maps the numeric `<stat>` of a PDU mode listing to its text mode name.
 */
export function statusName(stat: number) {
	return PDU_STATUS[stat] ?? 'UNKNOWN';
}

/**
 * Signal bars as shown by handsets.
 */
export function signalLevel(rssi: number) {
	if (rssi < 0 || rssi > 31) {
		return 0;
	}

	if (rssi >= 20) {
		return 5;
	}

	if (rssi >= 15) {
		return 4;
	}

	if (rssi >= 10) {
		return 3;
	}

	if (rssi >= 5) {
		return 2;
	}

	return rssi >= 1 ? 1 : 0;
}

/**
 * Parses a `+CSQ: <rssi>,<ber>` response.
 *
 * @returns The reading, or `null` if the response does not contain one.
 */
export function parseSignal(response: string): SignalReading | null {
	const match = /\+CSQ:\s*(\d+)\s*,\s*(\d+)/.exec(extractValue(response));

	if (match === null) {
		return null;
	}

	const rssi = Number(match[1]);
	const quality = Number(match[2]);

	return {
		rssi,
		quality,
		dbm: rssi >= 0 && rssi <= 31 ? `${-113 + rssi * 2} dBm` : 'unknown',
		level: signalLevel(rssi)
	};
}

/**
 * Parses a `+COPS: <mode>[,<format>,"<oper>"[,<act>]]` response.
 */
export function parseOperator(response: string) {
	const name = /"([^"]+)"/.exec(response)?.[1];
	const act = /\+COPS:\s*\d+\s*,\s*\d+\s*,\s*"[^"]*"\s*,\s*(\d+)/.exec(response)?.[1];

	return {
		name,
		accessTechnology: act !== undefined ? Number(act) : undefined
	};
}

/**
 * Parses the own number from a `+CNUM: "<alpha>","<number>",<type>` response.
 * Numbers reported in the UCS2 character set are decoded.
 */
export function parsePhoneNumber(response: string) {
	const number = /\+CNUM:.*,"([^"]+)"/.exec(response)?.[1];

	return number !== undefined ? Ucs2.decodeNumber(number) : undefined;
}

function unquote(value: string | undefined) {
	return (value ?? '').trim().replace(/^"|"$/g, '');
}

export interface ListingResult {
	fragments: SmsFragment[];
	errors: CodecError[];
}

/**
 * Splits a `+CMGL` listing into records and decodes each of them.
 * A record that cannot be decoded is kept with its raw payload as text; its error is reported alongside.
 *
 * @param response The full listing response.
 * @param mode The message format the listing was requested in.
 */
export function parseSmsListing(response: string, mode: SmsMode): ListingResult {
	const fragments: SmsFragment[] = [];
	const errors: CodecError[] = [];

	for (const chunk of response.split('+CMGL: ').slice(1)) {
		const lineBreak = chunk.indexOf('\n');

		if (lineBreak === -1) {
			continue;
		}

		const fields = chunk.substring(0, lineBreak).trim().split(',');
		const payload = chunk
			.substring(lineBreak + 1)
			.trim()
			.replace(/(?:\r?\n)?OK$/, '')
			.trim();
		const index = Number(fields[0]);

		if (fields.length < 2 || !Number.isInteger(index)) {
			continue;
		}

		let decoded: DecodedPdu;

		if (mode === SmsMode.PDU) {
			decoded = decodePdu(payload);
		} else {
			const time = fields.length > 5 ? `${unquote(fields[4])},${unquote(fields[5])}` : unquote(fields[4]);
			decoded = { ...decodeFragment(payload), sender: Ucs2.decodeNumber(unquote(fields[2])), timestamp: time };
		}

		if (decoded.error !== undefined) {
			errors.push(decoded.error);
		}

		fragments.push({
			index,
			status: mode === SmsMode.PDU ? statusName(Number(fields[1])) : unquote(fields[1]),
			sender: decoded.sender,
			timestamp: decoded.timestamp,
			text: decoded.text,
			reference: decoded.reference,
			total: decoded.total,
			sequence: decoded.sequence
		});
	}

	return { fragments, errors };
}

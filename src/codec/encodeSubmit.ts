import { CodecError } from '../utils/errors';
import { Gsm7 } from './Gsm7';
import { Alphabet, ConcatInfo, SmsMode, Submission } from './types';
import { Ucs2 } from './Ucs2';

// SMS-SUBMIT, relative validity period, optional UDHI
const FIRST_OCTET = 0x11;
const FIRST_OCTET_UDHI = 0x51;
// 24 hours
const VALIDITY_PERIOD = 0xa7;

const DCS_GSM7 = 0x00;
const DCS_UCS2 = 0x08;

const SEMI_OCTETS: Record<string, string> = { '*': 'A', '#': 'B', A: 'C', B: 'D', C: 'E' };

function toHex(value: number) {
	return value.toString(16).padStart(2, '0').toUpperCase();
}

/**
 * Picks the alphabet a message is sent with. Text mode always runs with the UCS2 character set.
 */
export function pickAlphabet(text: string, mode: SmsMode) {
	return mode === SmsMode.PDU && Gsm7.isEncodable(text) ? Alphabet.GSM7 : Alphabet.UCS2;
}

/**
 * Builds the 6-octet concatenation header (8-bit reference).
 */
export function concatHeader({ reference, total, sequence }: ConcatInfo) {
	if (total < 1 || total > 0xff || sequence < 1 || sequence > total) {
		throw new CodecError(`Invalid concatenation ${sequence}/${total}`, '');
	}

	return Buffer.from([0x05, 0x00, 0x03, reference & 0xff, total, sequence]);
}

/**
 * Encodes a destination address: length in digits, type of address and swapped semi-octets.
 */
export function encodeAddress(number: string) {
	const international = number.startsWith('+');
	const digits = (international ? number.substring(1) : number).toUpperCase();

	if (!/^[0-9*#ABC]+$/.test(digits)) {
		throw new CodecError(`Invalid phone number "${number}"`, number);
	}

	const semiOctets = Array.from(digits, (digit) => SEMI_OCTETS[digit] ?? digit);

	if (semiOctets.length % 2 !== 0) {
		semiOctets.push('F');
	}

	let swapped = '';

	for (let i = 0; i < semiOctets.length; i += 2) {
		swapped += semiOctets[i + 1] + semiOctets[i];
	}

	return toHex(digits.length) + (international ? '91' : '81') + swapped;
}

/**
 * Splits a text into the parts that each fit one submission.
 * Escape sequences and surrogate pairs are never split.
 *
 * @returns A single part when the text fits one message, otherwise the parts of a concatenated message.
 */
export function splitMessage(text: string, mode: SmsMode) {
	const alphabet = pickAlphabet(text, mode);
	const sizeOf = (chunk: string) => (alphabet === Alphabet.GSM7 ? Gsm7.septetLength(chunk) : chunk.length);
	const single = alphabet === Alphabet.GSM7 ? Gsm7.limitSingle : Ucs2.limitSingle;
	const max = alphabet === Alphabet.GSM7 ? Gsm7.limitConcatenated : Ucs2.limitConcatenated;

	if (sizeOf(text) <= single) {
		return [text];
	}

	const parts: string[] = [];
	let current = '';
	let size = 0;

	for (const char of text) {
		const charSize = sizeOf(char);

		if (size + charSize > max) {
			parts.push(current);
			current = '';
			size = 0;
		}

		current += char;
		size += charSize;
	}

	if (current.length > 0) {
		parts.push(current);
	}

	return parts;
}

/**
 * Encodes one physical submission. Long texts have to be split with {@link splitMessage} first.
 *
 * @param number Destination number, `+` prefixed when international.
 * @param text The text of this part.
 * @param mode The message format the modem runs in.
 * @param concat Concatenation metadata when the part belongs to a multi-part message.
 */
export function encodeSubmit(number: string, text: string, mode: SmsMode, concat?: ConcatInfo): Submission {
	const alphabet = pickAlphabet(text, mode);
	const header = concat !== undefined ? concatHeader(concat) : null;

	if (alphabet === Alphabet.UCS2) {
		const limit = header === null ? Ucs2.limitSingle : Ucs2.limitConcatenated;

		if (text.length > limit) {
			throw new CodecError(`Text of ${text.length} UCS2 characters does not fit one message (max ${limit})`, text);
		}
	} else {
		const limit = header === null ? Gsm7.limitSingle : Gsm7.limitConcatenated;
		const length = Gsm7.septetLength(text);

		if (length > limit) {
			throw new CodecError(`Text of ${length} septets does not fit one message (max ${limit})`, text);
		}
	}

	if (mode === SmsMode.TEXT) {
		const userData = Buffer.concat([header ?? Buffer.alloc(0), Ucs2.encode(text)]);

		return {
			mode: SmsMode.TEXT,
			alphabet: Alphabet.UCS2,
			destination: Ucs2.toHex(number),
			payload: userData.toString('hex').toUpperCase(),
			hasHeader: header !== null
		};
	}

	let userData: Buffer;
	let userDataLength: number;

	if (alphabet === Alphabet.GSM7) {
		const septets = Gsm7.toSeptets(text);

		if (header === null) {
			userData = Gsm7.pack(septets);
			userDataLength = septets.length;
		} else {
			// align the text on the next septet boundary after the header
			const headerSeptets = Math.ceil((header.length * 8) / 7);
			userData = Buffer.concat([header, Gsm7.pack(septets, headerSeptets * 7 - header.length * 8)]);
			userDataLength = headerSeptets + septets.length;
		}
	} else {
		userData = Buffer.concat([header ?? Buffer.alloc(0), Ucs2.encode(text)]);
		userDataLength = userData.length;
	}

	const pdu =
		'00' +
		toHex(header === null ? FIRST_OCTET : FIRST_OCTET_UDHI) +
		'00' +
		encodeAddress(number) +
		'00' +
		toHex(alphabet === Alphabet.GSM7 ? DCS_GSM7 : DCS_UCS2) +
		toHex(VALIDITY_PERIOD) +
		toHex(userDataLength) +
		userData.toString('hex').toUpperCase();

	return {
		mode: SmsMode.PDU,
		alphabet,
		pdu,
		length: pdu.length / 2 - 1
	};
}

import { CodecError } from '../utils/errors';
import { DecodedText } from './types';
import { Ucs2 } from './Ucs2';

/**
 * Decodes a UCS2 hex payload as listed by the modem in text mode.
 *
 * A leading concatenation header (`05 00 03 ref total seq` or `06 08 04 refHi refLo total seq`)
 * is stripped and reported. Payloads that are not even-length hex are returned as literal text
 * so that one bad record never fails a whole listing.
 */
export function decodeFragment(payload: string): DecodedText {
	const content = payload.trim();

	const literal = (reason: string): DecodedText => ({
		text: content,
		reference: 0,
		total: 1,
		sequence: 1,
		error: new CodecError(reason, content)
	});

	if (content.length % 2 !== 0 || !/^[0-9A-Fa-f]*$/.test(content)) {
		return literal('Payload is not valid hex');
	}

	const bytes = Buffer.from(content, 'hex');
	let offset = 0;
	let reference = 0;
	let total = 1;
	let sequence = 1;

	if (bytes.length > 6 && bytes[0] === 0x05 && bytes[1] === 0x00 && bytes[2] === 0x03) {
		offset = 6;
		reference = bytes[3];
		total = bytes[4];
		sequence = bytes[5];
	} else if (bytes.length > 7 && bytes[0] === 0x06 && bytes[1] === 0x08 && bytes[2] === 0x04) {
		offset = 7;
		reference = (bytes[3] << 8) | bytes[4];
		total = bytes[5];
		sequence = bytes[6];
	}

	if ((bytes.length - offset) % 2 !== 0) {
		return literal('Payload has an odd number of UCS2 octets');
	}

	return {
		text: Ucs2.decode(bytes.subarray(offset)),
		reference,
		total,
		sequence
	};
}

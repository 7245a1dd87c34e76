import { Deliver, Report, parse as parsePdu, utils as pduUtils } from 'node-pdu';
import { CodecError } from '../utils/errors';
import { Gsm7 } from './Gsm7';
import { DecodedPdu } from './types';

/**
 * Decodes a full SMS-DELIVER, SMS-SUBMIT or status report PDU as listed by the modem in PDU mode.
 * A PDU that cannot be parsed comes back as literal text carrying the raw payload.
 */
export function decodePdu(payload: string): DecodedPdu {
	const content = payload.trim();

	const literal = (reason: string): DecodedPdu => ({
		sender: '',
		timestamp: '',
		text: content,
		reference: 0,
		total: 1,
		sequence: 1,
		error: new CodecError(`PDU could not be decoded: ${reason}`, content)
	});

	if (!/^(?:[0-9A-Fa-f]{2})+$/.test(content)) {
		return literal('not a hex string');
	}

	try {
		const pdu = parsePdu(content);
		const phone = pdu.address.phone;
		const sender =
			phone === null ? '' : pdu.address.type.type === pduUtils.SCAType.TYPE_INTERNATIONAL && !phone.startsWith('+') ? `+${phone}` : phone;

		if (pdu instanceof Report) {
			return { sender, timestamp: '', text: '', reference: 0, total: 1, sequence: 1 };
		}

		const part = pdu.data.parts[0];
		const header = part?.header;
		let text = pdu.data.getText();

		// 7-bit user data is unpacked with the project's own alphabet table
		if (part !== undefined && pdu.dataCodingScheme.textAlphabet === pduUtils.DCS.ALPHABET_DEFAULT) {
			const headerOctets = header ? 1 + header.getSize() : 0;
			const headerSeptets = Math.ceil((headerOctets * 8) / 7);

			text = Gsm7.unpack(Buffer.from(part.data, 'hex'), part.size - headerSeptets, headerSeptets * 7 - headerOctets * 8);
		}

		return {
			sender,
			timestamp: pdu instanceof Deliver ? pdu.serviceCenterTimeStamp.getIsoString() : '',
			text,
			reference: header?.getPointer() ?? 0,
			total: header?.getSegments() ?? 1,
			sequence: header?.getCurrent() ?? 1
		};
	} catch (error) {
		return literal(error instanceof Error ? error.message : String(error));
	}
}

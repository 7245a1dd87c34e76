import { describe, expect, it } from 'vitest';
import { decodeFragment } from '../../src/codec/decodeFragment';
import { decodePdu } from '../../src/codec/decodePdu';
import { concatHeader, encodeAddress, encodeSubmit, pickAlphabet, splitMessage } from '../../src/codec/encodeSubmit';
import { reassemble } from '../../src/codec/reassemble';
import { Alphabet, SmsFragment, SmsMode, Submission } from '../../src/codec/types';
import { CodecError } from '../../src/utils/errors';

function pduOf(submission: Submission) {
	if (submission.mode !== SmsMode.PDU) {
		throw new Error('expected a PDU submission');
	}

	return submission;
}

function textOf(submission: Submission) {
	if (submission.mode !== SmsMode.TEXT) {
		throw new Error('expected a text mode submission');
	}

	return submission;
}

/**
 * Encodes every part of a text and decodes the parts again.
 */
function roundTrip(number: string, text: string) {
	const parts = splitMessage(text, SmsMode.PDU);
	const fragments: SmsFragment[] = parts.map((part, i) => {
		const concat = parts.length > 1 ? { reference: 42, total: parts.length, sequence: i + 1 } : undefined;
		const decoded = decodePdu(pduOf(encodeSubmit(number, part, SmsMode.PDU, concat)).pdu);

		expect(decoded.error).toBeUndefined();

		return { ...decoded, index: i + 1, status: 'STO UNSENT' };
	});

	return { parts, fragments, messages: reassemble(fragments) };
}

describe('encodeAddress', () => {
	it('encodes international numbers with swapped semi-octets', () => {
		expect(encodeAddress('+491234567890')).toBe('0C91942143658709');
	});

	it('pads odd numbers and keeps national numbers unknown-type', () => {
		expect(encodeAddress('12345')).toBe('05812143F5');
	});

	it('maps * and # to their semi-octets', () => {
		expect(encodeAddress('*100#')).toBe('05811A00FB');
	});

	it('rejects numbers with other characters', () => {
		expect(() => encodeAddress('123-456')).toThrow(CodecError);
		expect(() => encodeAddress('')).toThrow(CodecError);
	});
});

describe('concatHeader', () => {
	it('builds the 8-bit reference header', () => {
		expect(concatHeader({ reference: 0x12a, total: 3, sequence: 2 }).toString('hex')).toBe('0500032a0302');
	});

	it('rejects sequences outside of the total', () => {
		expect(() => concatHeader({ reference: 1, total: 2, sequence: 3 })).toThrow(CodecError);
		expect(() => concatHeader({ reference: 1, total: 2, sequence: 0 })).toThrow(CodecError);
	});
});

describe('splitMessage', () => {
	it('keeps texts that fit one message whole', () => {
		expect(splitMessage('a'.repeat(160), SmsMode.PDU)).toEqual(['a'.repeat(160)]);
		expect(splitMessage('Привет', SmsMode.PDU)).toEqual(['Привет']);
	});

	it('splits GSM 7-bit text into parts of 153 septets', () => {
		const parts = splitMessage('a'.repeat(161), SmsMode.PDU);

		expect(parts.map((part) => part.length)).toEqual([153, 8]);
	});

	it('never splits an escape sequence', () => {
		const parts = splitMessage('a'.repeat(152) + '€' + 'b'.repeat(10), SmsMode.PDU);

		expect(parts).toEqual(['a'.repeat(152), '€' + 'b'.repeat(10)]);
	});

	it('never splits a surrogate pair', () => {
		const parts = splitMessage('😀'.repeat(40), SmsMode.PDU);

		expect(parts).toEqual(['😀'.repeat(33), '😀'.repeat(7)]);
	});

	it('uses UCS2 limits in text mode', () => {
		expect(pickAlphabet('hello', SmsMode.TEXT)).toBe(Alphabet.UCS2);
		expect(splitMessage('a'.repeat(71), SmsMode.TEXT).map((part) => part.length)).toEqual([67, 4]);
	});
});

describe('encodeSubmit', () => {
	it('builds a GSM 7-bit SMS-SUBMIT PDU', () => {
		const submission = pduOf(encodeSubmit('+491234567890', 'hellohello', SmsMode.PDU));

		expect(submission.alphabet).toBe(Alphabet.GSM7);
		expect(submission.pdu).toBe('0011000C919421436587090000A70AE8329BFD4697D9EC37');
		expect(submission.length).toBe(23);
	});

	it('aligns text after the concatenation header', () => {
		const submission = pduOf(encodeSubmit('+491234567890', 'hi', SmsMode.PDU, { reference: 42, total: 2, sequence: 1 }));

		expect(submission.pdu).toBe('0051000C919421436587090000A7090500032A0201D069');
	});

	it('falls back to UCS2 for text outside the GSM alphabet', () => {
		const submission = pduOf(encodeSubmit('12345', 'Привет', SmsMode.PDU));

		expect(submission.alphabet).toBe(Alphabet.UCS2);
		expect(submission.pdu).toBe('00110005812143F50008A70C041F04400438043204350442');
	});

	it('produces the UCS2 payload and destination in text mode', () => {
		const submission = textOf(encodeSubmit('+491234567890', 'Hi', SmsMode.TEXT));

		expect(submission.destination).toBe('002B003400390031003200330034003500360037003800390030');
		expect(submission.payload).toBe('00480069');
		expect(submission.hasHeader).toBe(false);
	});

	it('prefixes the text mode payload with the concatenation header', () => {
		const submission = textOf(encodeSubmit('+491234567890', 'Hi', SmsMode.TEXT, { reference: 7, total: 2, sequence: 1 }));

		expect(submission.payload).toBe('05000307020100480069');
		expect(submission.hasHeader).toBe(true);
		expect(decodeFragment(submission.payload)).toEqual({ text: 'Hi', reference: 7, total: 2, sequence: 1 });
	});

	it('rejects text that does not fit one submission', () => {
		expect(() => encodeSubmit('12345', 'a'.repeat(161), SmsMode.PDU)).toThrow(CodecError);
		expect(() => encodeSubmit('12345', 'a'.repeat(154), SmsMode.PDU, { reference: 1, total: 2, sequence: 1 })).toThrow(CodecError);
		expect(() => encodeSubmit('12345', 'ж'.repeat(71), SmsMode.TEXT)).toThrow(CodecError);
	});
});

describe('encoding round trip', () => {
	it('decodes a single GSM 7-bit message', () => {
		const { fragments } = roundTrip('+491234567890', 'Meet at 10:30 {room 4} for 5€?');

		expect(fragments).toHaveLength(1);
		expect(fragments[0].text).toBe('Meet at 10:30 {room 4} for 5€?');
		expect(fragments[0].sender).toBe('+491234567890');
	});

	it('keeps the section sign and form feed', () => {
		const { fragments } = roundTrip('+491234567890', 'Price § 5_00\fpage 2');

		expect(fragments[0].text).toBe('Price § 5_00\fpage 2');
	});

	it('keeps the section sign and form feed across parts', () => {
		const text = '§ and form\ffeed '.repeat(12);
		const { parts, messages } = roundTrip('+491234567890', text);

		expect(parts).toHaveLength(2);
		expect(messages).toHaveLength(1);
		expect(messages[0].message).toBe(text);
	});

	it('decodes a single UCS2 message', () => {
		const { fragments } = roundTrip('12345', 'Привет, мир!');

		expect(fragments[0].text).toBe('Привет, мир!');
		expect(fragments[0].sender).toBe('12345');
	});

	it('reassembles a multi-part GSM 7-bit message', () => {
		const text = 'The quick brown fox jumps over the lazy dog. '.repeat(8);
		const { parts, fragments, messages } = roundTrip('+491234567890', text);

		expect(parts).toHaveLength(3);
		expect(fragments.map((fragment) => [fragment.reference, fragment.total, fragment.sequence])).toEqual([
			[42, 3, 1],
			[42, 3, 2],
			[42, 3, 3]
		]);
		expect(messages).toHaveLength(1);
		expect(messages[0].message).toBe(text);
		expect(messages[0].indexes).toEqual([1, 2, 3]);
	});

	it('reassembles a multi-part UCS2 message', () => {
		const text = 'Съешь же ещё этих мягких французских булок, да выпей чаю. '.repeat(3);
		const { parts, messages } = roundTrip('+491234567890', text);

		expect(parts).toHaveLength(3);
		expect(messages).toHaveLength(1);
		expect(messages[0].message).toBe(text);
	});
});

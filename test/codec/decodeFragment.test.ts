import { describe, expect, it } from 'vitest';
import { decodeFragment } from '../../src/codec/decodeFragment';
import { decodePdu } from '../../src/codec/decodePdu';
import { CodecError } from '../../src/utils/errors';

// SMS-DELIVER from +31612345678, 2023-10-18 10:00:00 +01:00, "hellohello"
const DELIVER = '07911326040000F0040B911316325476F8000032018101000040' + '0A' + 'E8329BFD4697D9EC37';

describe('decodeFragment', () => {
	it('decodes a payload without header', () => {
		expect(decodeFragment('00480069')).toEqual({ text: 'Hi', reference: 0, total: 1, sequence: 1 });
	});

	it('strips the 8-bit reference header', () => {
		expect(decodeFragment('0500030702020057006F0072006C0064')).toEqual({ text: 'World', reference: 7, total: 2, sequence: 2 });
	});

	it('strips the 16-bit reference header', () => {
		expect(decodeFragment('06080401020302' + '0041')).toEqual({ text: 'A', reference: 0x0102, total: 3, sequence: 2 });
	});

	it('returns malformed hex as literal text', () => {
		const decoded = decodeFragment('not hex at all');

		expect(decoded.text).toBe('not hex at all');
		expect(decoded.total).toBe(1);
		expect(decoded.error).toBeInstanceOf(CodecError);
	});

	it('returns odd-length payloads as literal text', () => {
		const decoded = decodeFragment('0048006');

		expect(decoded.text).toBe('0048006');
		expect(decoded.total).toBe(1);
		expect(decoded.sequence).toBe(1);
	});

	it('returns an odd number of octets after the header as literal text', () => {
		const decoded = decodeFragment('050003070201004800');

		expect(decoded.text).toBe('050003070201004800');
		expect(decoded.total).toBe(1);
		expect(decoded.error).toBeInstanceOf(CodecError);
	});

	it('degrades to literal text when the PDU is truncated', () => {
		const decoded = decodePdu('07911326040000F0040B91');

		expect(decoded.text).toBe('07911326040000F0040B91');
		expect(decoded.error).toBeInstanceOf(CodecError);
	});
});

describe('decodePdu', () => {
	it('decodes an SMS-DELIVER', () => {
		const decoded = decodePdu(DELIVER);

		expect(decoded.error).toBeUndefined();
		expect(decoded.sender).toBe('+31612345678');
		expect(decoded.text).toBe('hellohello');
		expect(decoded.timestamp).toBe('2023-10-18T10:00:00+01:00');
		expect([decoded.reference, decoded.total, decoded.sequence]).toEqual([0, 1, 1]);
	});

	it('reports the concatenation header of a part', () => {
		const decoded = decodePdu('07911326040000F0440B911316325476F8000832018101000040' + '12' + '050003070201' + '00480065006C006C006F0020');

		expect(decoded.text).toBe('Hello ');
		expect([decoded.reference, decoded.total, decoded.sequence]).toEqual([7, 2, 1]);
	});

	it('degrades to literal text when the PDU cannot be parsed', () => {
		const decoded = decodePdu('ZZ');

		expect(decoded.text).toBe('ZZ');
		expect(decoded.total).toBe(1);
		expect(decoded.error).toBeInstanceOf(CodecError);
	});

	it('degrades to literal text when the PDU is truncated', () => {
		const decoded = decodePdu('07911326040000F0040B91');

		expect(decoded.text).toBe('07911326040000F0040B91');
		expect(decoded.error).toBeInstanceOf(CodecError);
	});
});

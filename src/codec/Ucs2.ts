/**
 * UCS2 helpers. Text is carried as UTF-16 code units, big-endian.
 */
export class Ucs2 {
	static readonly limitSingle = 70;
	static readonly limitConcatenated = 67;

	static encode(text: string) {
		return Buffer.from(text, 'utf16le').swap16();
	}

	/**
	 * @param bytes Big-endian code units; the length must be even.
	 */
	static decode(bytes: Uint8Array) {
		return Buffer.from(bytes).swap16().toString('utf16le');
	}

	static toHex(text: string) {
		return Ucs2.encode(text).toString('hex').toUpperCase();
	}

	/**
	 * Decodes a value the modem reported in the UCS2 character set, such as a phone number.
	 * Values that do not look like UCS2 hex of a dialable number are returned unchanged.
	 */
	static decodeNumber(value: string) {
		if (!/^(?:[0-9A-Fa-f]{4})+$/.test(value)) {
			return value;
		}

		const decoded = Ucs2.decode(Buffer.from(value, 'hex'));

		return /^\+?[0-9*#]+$/.test(decoded) ? decoded : value;
	}
}

import { CodecError } from '../utils/errors';
import alphabet from './gsm7.json';

/**
 * GSM 03.38 default alphabet: septet mapping and packing.
 */
export class Gsm7 {
	static readonly ESCAPE = 0x1b;

	static readonly limitSingle = 160;
	static readonly limitConcatenated = 153;

	private static readonly basic = new Map(Array.from(alphabet.basic, (char, septet) => [char, septet] as const));
	private static readonly extension = new Map<string, number>(Object.entries(alphabet.extension));

	private static readonly basicChars = Array.from(alphabet.basic);
	private static readonly extensionChars = new Map(Object.entries(alphabet.extension).map(([char, septet]) => [septet, char] as const));

	/**
	 * Returns the septets for one character, two for characters of the extension table.
	 *
	 * @returns The septets, or `null` if the character is not part of the alphabet.
	 */
	static septetsOf(char: string) {
		const septet = Gsm7.basic.get(char);

		if (septet !== undefined && septet !== Gsm7.ESCAPE) {
			return [septet];
		}

		const extended = Gsm7.extension.get(char);

		if (extended !== undefined) {
			return [Gsm7.ESCAPE, extended];
		}

		return null;
	}

	static isEncodable(text: string) {
		for (const char of text) {
			if (Gsm7.septetsOf(char) === null) {
				return false;
			}
		}

		return true;
	}

	/**
	 * Number of septets the text occupies once encoded.
	 */
	static septetLength(text: string) {
		let length = 0;

		for (const char of text) {
			length += Gsm7.septetsOf(char)?.length ?? 1;
		}

		return length;
	}

	static toSeptets(text: string) {
		const septets: number[] = [];

		for (const char of text) {
			const mapped = Gsm7.septetsOf(char);

			if (mapped === null) {
				throw new CodecError(`Character "${char}" is not part of the GSM 7-bit alphabet`, text);
			}

			septets.push(...mapped);
		}

		return septets;
	}

	/**
	 * Packs septets into octets, least significant bit first.
	 *
	 * @param septets The septets to pack.
	 * @param fillBits Leading zero bits, used to align the text on a septet boundary after a user data header.
	 */
	static pack(septets: number[], fillBits = 0) {
		const octets: number[] = [];
		let buffer = 0;
		let bufferLength = fillBits;

		for (const septet of septets) {
			buffer |= (septet & 0x7f) << bufferLength;
			bufferLength += 7;

			while (bufferLength >= 8) {
				octets.push(buffer & 0xff);
				buffer >>>= 8;
				bufferLength -= 8;
			}
		}

		if (bufferLength > 0) {
			octets.push(buffer & 0xff);
		}

		return Buffer.from(octets);
	}

	/**
	 * Unpacks septets from octets and maps them back to text.
	 * An escape followed by a septet without extension character yields the basic character.
	 *
	 * @param octets The packed user data, without header.
	 * @param septetCount Number of septets to read.
	 * @param fillBits Leading bits to skip before the first septet.
	 */
	static unpack(octets: Uint8Array, septetCount: number, fillBits = 0) {
		const septets: number[] = [];
		let buffer = 0;
		let bufferLength = 0;
		let skip = fillBits;

		for (const octet of octets) {
			buffer |= octet << bufferLength;
			bufferLength += 8;

			if (skip > 0) {
				buffer >>>= skip;
				bufferLength -= skip;
				skip = 0;
			}

			while (bufferLength >= 7 && septets.length < septetCount) {
				septets.push(buffer & 0x7f);
				buffer >>>= 7;
				bufferLength -= 7;
			}
		}

		let text = '';

		for (let i = 0; i < septets.length; i++) {
			if (septets[i] === Gsm7.ESCAPE && i + 1 < septets.length) {
				const next = septets[++i];
				text += Gsm7.extensionChars.get(next) ?? Gsm7.basicChars[next];
				continue;
			}

			text += septets[i] === Gsm7.ESCAPE ? ' ' : Gsm7.basicChars[septets[i]];
		}

		return text;
	}
}

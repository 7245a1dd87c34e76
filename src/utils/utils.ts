import type { Command } from './Command';

export type ResultCode = 'OK' | 'ERROR' | 'PROMPT' | 'NONE';

const ERROR_LINE = /^(?:ERROR|\+CM[ES] ERROR\b.*|COMMAND NOT SUPPORT)$/;

/**
 * Splits a response into trimmed lines. The trailing segment is dropped unless `includePartial` is set,
 * because a line is only complete once its line break arrived.
 */
function responseLines(response: string, includePartial: boolean) {
	const lines = response.split(/\r?\n|\r/);

	if (!includePartial) {
		lines.pop();
	}

	return lines.map((line) => line.trim().toUpperCase());
}

/**
 * Checks whether an accumulated response ends the exchange: a complete success or error line, or the input prompt.
 */
export function hasTerminalToken(buffer: string) {
	const lines = responseLines(buffer, false);

	if (lines.some((line) => line === 'OK' || ERROR_LINE.test(line))) {
		return true;
	}

	return buffer.trimEnd().endsWith('>');
}

/**
 * Determines the result code of a complete modem response.
 *
 * @param response The response from the modem, as returned by the channel.
 * @returns 'ERROR' if an error line is present, 'OK' for a success line, 'PROMPT' when the modem waits for input.
 */
export function resultCode(response: string): ResultCode {
	const lines = responseLines(response, true);

	if (lines.some((line) => ERROR_LINE.test(line))) {
		return 'ERROR';
	}

	if (lines.includes('OK')) {
		return 'OK';
	}

	if (response.trimEnd().endsWith('>')) {
		return 'PROMPT';
	}

	return 'NONE';
}

/**
 * Returns the first line of a response carrying data: not empty, not the success token and not an echo of the command.
 */
export function extractValue(response: string) {
	for (const raw of response.split(/\r?\n|\r/)) {
		const line = raw.trim();

		if (line !== '' && line !== 'OK' && !line.toUpperCase().startsWith('AT')) {
			return line;
		}
	}

	return '';
}

/**
 * Tests a device path against wildcard patterns such as `/dev/ttyUSB*`.
 */
export function matchesPattern(path: string, patterns: string[]) {
	return patterns.some((pattern) => {
		const source = pattern
			.split('*')
			.map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
			.join('.*');

		return new RegExp(`^${source}$`).test(path);
	});
}

/**
 * Defines the structure for a command stack that can be sent to the modem.
 * A command stack is a collection of commands that are executed in sequence while holding the link.
 */
export type CmdStack = {
	cmds: Command[];
	cancelOnFailure: boolean;
};

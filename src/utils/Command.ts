/**
 * Represents a command that can be sent to a modem.
 */
export class Command {
	/**
	 * Constructs a new instance of the Command class.
	 *
	 * @param ATCommand The AT command string (or raw payload) to be sent to the device.
	 * @param timeout The maximum time in milliseconds to wait for a terminal token. Falls back to the channel default.
	 * @param terminator Appended to the command on the wire: CR LF for commands, Ctrl-Z for SMS payloads.
	 * @param check Called with the response; throwing from it fails the command.
	 */
	constructor(
		readonly ATCommand: string,
		readonly timeout?: number,
		readonly terminator = '\r\n',
		readonly check?: (response: string) => void
	) {}
}

/**
 * Base class for every failure raised by the engine.
 * The message is prefixed with the identifier of the device that raised it.
 */
export class ModemError extends Error {
	/**
	 * Creates an instance of ModemError.
	 *
	 * @param device The identifier of the device that encountered the error.
	 * @param message The error message.
	 */
	constructor(
		readonly device: string,
		message: string
	) {
		super(`${device}: ${message}`);
		this.name = new.target.name;
	}
}

/**
 * The physical link could not be opened, written to, or was closed underneath a command.
 */
export class TransportError extends ModemError {}

/**
 * No terminal token was seen before the command deadline.
 */
export class CommandTimeoutError extends ModemError {
	constructor(
		device: string,
		readonly command: string,
		readonly timeout: number
	) {
		super(device, `Command "${command.trim()}" timed out after ${timeout}ms`);
	}
}

/**
 * The modem answered with an error token, or with something that could not be parsed.
 */
export class ProtocolError extends ModemError {
	constructor(
		device: string,
		message: string,
		readonly response: string
	) {
		super(device, message);
	}
}

/**
 * The requested identifier is not registered in the connection pool.
 */
export class NotConnectedError extends ModemError {
	constructor(identifier: string) {
		super(identifier, 'Port not connected');
	}
}

/**
 * A payload could not be encoded or decoded.
 */
export class CodecError extends Error {
	constructor(
		message: string,
		readonly payload: string
	) {
		super(`codec: ${message}`);
		this.name = new.target.name;
	}
}

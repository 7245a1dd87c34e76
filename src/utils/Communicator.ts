/**
 * Interface representing a communication channel with a modem.
 *
 * The Communicator interface defines the low-level link used by the CommandChannel
 * to talk to the physical modem. It abstracts the transport, so a session can be driven
 * over a serial port or over anything else that moves bytes.
 */
export interface Communicator {
	/**
	 * Unique identifier for the communication device, usually the port path.
	 */
	deviceIdentifier: string;

	/**
	 * Indicates whether the communicator is currently connected.
	 */
	isConnected: boolean;

	/**
	 * Establishes a connection to the communication device.
	 * Returns a Promise that resolves when the connection is successfully established.
	 */
	connect: () => Promise<void>;

	/**
	 * Disconnects the communicator from the communication device.
	 * Returns a Promise that resolves when the disconnection is completed.
	 */
	disconnect: () => Promise<void>;

	/**
	 * Discards input that was received but not read yet.
	 */
	flush: () => Promise<void>;

	/**
	 * Writes data to the communication device.
	 * Resolves once the data was handed to the device, rejects on a write failure.
	 */
	write: (data: string) => Promise<void>;

	/**
	 * Sets a callback function to handle received data.
	 * @param func Called with every chunk read from the device.
	 */
	onData: (func: (data: string) => void) => void;

	/**
	 * Sets a callback function to handle link errors.
	 */
	onError: (func: (error: Error) => void) => void;

	/**
	 * Sets a callback function called when the link closes, expectedly or not.
	 */
	onClose: (func: () => void) => void;
}

import { SerialPortCommunicator } from './Communicators/SerialPortCommunicator';

/**
 * Retrieves a list of available serial ports.
 * @see https://serialport.io/docs/api-bindings-cpp#list
 */
export async function listSerialDevices() {
	return SerialPortCommunicator.listDevices();
}

export * as codec from './codec';
export { Config } from './config';
export { ConnectionPool } from './ConnectionPool';
export type { CommunicatorFactory, DeviceDiscovery, PoolOptions } from './ConnectionPool';
export { SerialPortCommunicator } from './Communicators/SerialPortCommunicator';
export type { SerialPortOptions } from './Communicators/SerialPortCommunicator';
export { DeviceSession, DEFAULT_SESSION_OPTIONS } from './DeviceSession';
export { EventBus, Subscription } from './EventBus';
export { CodecError, CommandTimeoutError, ModemError, NotConnectedError, ProtocolError, TransportError } from './utils/errors';
export { configureLogging } from './utils/logger';
export * as types from './types';

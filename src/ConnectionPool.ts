import { SerialPortCommunicator } from './Communicators/SerialPortCommunicator';
import { DeviceSession } from './DeviceSession';
import type { EventBus } from './EventBus';
import type { Communicator } from './utils/Communicator';
import { NotConnectedError } from './utils/errors';
import { errorLogger, logger } from './utils/logger';
import { PortStatus, SessionOptions } from './utils/types';
import { matchesPattern } from './utils/utils';

/**
 * Lists the port paths that may have a modem attached.
 */
export type DeviceDiscovery = () => Promise<string[]>;

/**
 * Creates the link for a port path.
 */
export type CommunicatorFactory = (path: string) => Communicator;

export interface PoolOptions {
	/**
	 * Wildcard patterns a port path has to match, e.g. `/dev/ttyUSB*`.
	 */
	patterns: string[];
	baudRate: number;
	session: Partial<SessionOptions>;
}

const DEFAULT_POOL_OPTIONS: PoolOptions = {
	patterns: ['/dev/ttyUSB*', '/dev/ttyACM*'],
	baudRate: 115200,
	session: {}
};

/**
 * Registry of the opened device sessions, keyed by port path.
 */
export class ConnectionPool {
	private readonly options: PoolOptions;
	private readonly bus: EventBus | null;
	private readonly discover: DeviceDiscovery;
	private readonly createCommunicator: CommunicatorFactory;

	private readonly sessions = new Map<string, DeviceSession>();
	private readonly opening = new Set<string>();
	private scanning: Promise<void> | null = null;

	constructor(
		bus: EventBus | null = null,
		options: Partial<PoolOptions> = {},
		discover?: DeviceDiscovery,
		createCommunicator?: CommunicatorFactory
	) {
		this.options = { ...DEFAULT_POOL_OPTIONS, ...options };
		this.bus = bus;
		this.discover = discover ?? (() => this.listSerialPorts());
		this.createCommunicator = createCommunicator ?? ((path) => new SerialPortCommunicator(path, { baudRate: this.options.baudRate }));
	}

	/*
	 * ================================================
	 *                      Getter
	 * ================================================
	 */

	get size() {
		return this.sessions.size;
	}

	/**
	 * Whether a scan is running at the moment.
	 */
	get isScanning() {
		return this.scanning !== null;
	}

	/*
	 * ================================================
	 *                Private functions
	 * ================================================
	 */

	private async listSerialPorts() {
		const ports = await SerialPortCommunicator.listDevices();

		return ports.map((port) => port.path).filter((path) => matchesPattern(path, this.options.patterns));
	}

	private async runScan() {
		let paths: string[];

		try {
			paths = await this.discover();
		} catch (error) {
			errorLogger.error(`[Pool] Device discovery failed: ${error instanceof Error ? error.message : String(error)}`);
			return;
		}

		const candidates = [...new Set(paths)].filter((path) => !this.sessions.has(path) && !this.opening.has(path));

		if (candidates.length === 0) {
			logger.debug('[Pool] No new devices found');
			return;
		}

		const results = await Promise.allSettled(candidates.map((path) => this.openSession(path)));

		results.forEach((result, i) => {
			if (result.status === 'rejected') {
				const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
				logger.warn(`[Pool] Skipping ${candidates[i]}: ${reason}`);
			}
		});
	}

	private async openSession(path: string) {
		this.opening.add(path);

		try {
			const session = new DeviceSession(this.createCommunicator(path), this.options.session, this.bus);

			try {
				await session.open();
			} catch (error) {
				// the link may be open even though setup failed
				await session.close().catch((closeError: unknown) => {
					errorLogger.error(`[Pool] Closing ${path} failed: ${closeError instanceof Error ? closeError.message : String(closeError)}`);
				});
				throw error;
			}

			this.sessions.set(path, session);
			logger.info(`[Pool] Registered ${path}`);
		} finally {
			this.opening.delete(path);
		}
	}

	/*
	 * ================================================
	 *                 Public functions
	 * ================================================
	 */

	/**
	 * Discovers ports and opens a session on every new one that answers like a modem.
	 * Registered sessions are left untouched. Concurrent calls share the scan that is running.
	 *
	 * @returns The registry after the scan.
	 */
	async scan() {
		if (this.scanning === null) {
			this.scanning = this.runScan().finally(() => {
				this.scanning = null;
			});
		}

		await this.scanning;
		return this.list();
	}

	/**
	 * The registered devices, ordered by identifier.
	 */
	list(): PortStatus[] {
		return [...this.sessions.values()]
			.map((session) => ({ identifier: session.identifier, connected: session.isConnected }))
			.sort((a, b) => a.identifier.localeCompare(b.identifier));
	}

	/**
	 * Looks up a registered session. Sessions are never reopened implicitly.
	 *
	 * @throws NotConnectedError if no session is registered under the identifier.
	 */
	get(identifier: string) {
		const session = this.sessions.get(identifier);

		if (session === undefined) {
			throw new NotConnectedError(identifier);
		}

		return session;
	}

	has(identifier: string) {
		return this.sessions.has(identifier);
	}

	/**
	 * Closes and deregisters one session. The path is picked up again by the next scan.
	 */
	async close(identifier: string) {
		const session = this.get(identifier);

		this.sessions.delete(identifier);
		await session.close();
	}

	/**
	 * Closes every registered session.
	 */
	async closeAll() {
		if (this.scanning !== null) {
			await this.scanning;
		}

		const sessions = [...this.sessions.values()];
		this.sessions.clear();

		const results = await Promise.allSettled(sessions.map((session) => session.close()));

		results.forEach((result, i) => {
			if (result.status === 'rejected') {
				const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
				errorLogger.error(`[Pool] Closing ${sessions[i].identifier} failed: ${reason}`);
			}
		});
	}
}

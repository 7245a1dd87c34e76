import { beforeEach, describe, expect, it, vi } from 'vitest';
import { EventBus } from '../src/EventBus';
import { Command } from '../src/utils/Command';
import { CommandChannel } from '../src/utils/CommandChannel';
import { CommandTimeoutError, ProtocolError, TransportError } from '../src/utils/errors';
import { Events } from '../src/utils/Events';
import { ChannelState } from '../src/utils/types';
import { resultCode } from '../src/utils/utils';
import { basicModem, FakeCommunicator, OK, scripted } from './helpers/FakeCommunicator';

const PORT = '/dev/ttyUSB0';
const OPTIONS = { commandTimeout: 200, verifyTimeout: 200, readErrorBackoff: 20 };

function sleep(ms: number) {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('CommandChannel', () => {
	let fake: FakeCommunicator;
	let events: Events;
	let bus: EventBus;
	let channel: CommandChannel;
	let states: ChannelState[];

	beforeEach(() => {
		fake = new FakeCommunicator(PORT, basicModem);
		events = new Events();
		bus = new EventBus();
		channel = new CommandChannel(fake, events, OPTIONS, bus);
		states = [];
		events.on('onStateChange', (state) => states.push(state));
	});

	async function activate() {
		await channel.open();
		await channel.initialize(['ATE0']);
		channel.activate();
		fake.written.length = 0;
	}

	describe('opening', () => {
		it('verifies the modem and walks through the states', async () => {
			await activate();

			expect(states).toEqual([ChannelState.Verifying, ChannelState.Initialized, ChannelState.Active]);
			expect(channel.state).toBe(ChannelState.Active);
		});

		it('sends AT first and the setup commands after it', async () => {
			await channel.open();
			await channel.initialize(['ATE0', 'AT+CMGF=0']);

			expect(fake.written).toEqual(['AT\r\n', 'ATE0\r\n', 'AT+CMGF=0\r\n']);
		});

		it('fails and releases the link when AT is not answered with OK', async () => {
			fake.responder = scripted({ AT: '\r\nERROR\r\n' });

			await expect(channel.open()).rejects.toBeInstanceOf(ProtocolError);
			expect(channel.state).toBe(ChannelState.Failed);
			expect(fake.isConnected).toBe(false);
		});

		it('fails when the device stays silent', async () => {
			fake.responder = () => undefined;

			await expect(channel.open()).rejects.toBeInstanceOf(CommandTimeoutError);
			expect(channel.state).toBe(ChannelState.Failed);
			expect(fake.isConnected).toBe(false);
		});

		it('reports a port that cannot be opened as transport failure', async () => {
			fake.connectError = new Error('Permission denied');

			await expect(channel.open()).rejects.toThrow(`${PORT}: Failed to open: Permission denied`);
			expect(channel.state).toBe(ChannelState.Failed);
		});

		it('keeps going when a setup command fails', async () => {
			fake.responder = scripted({ AT: OK, 'AT+CSCS="UCS2"': '\r\nERROR\r\n', ATE0: OK });

			await channel.open();
			await channel.initialize(['AT+CSCS="UCS2"', 'ATE0']);

			expect(fake.commands).toEqual(['AT', 'AT+CSCS="UCS2"', 'ATE0']);
			expect(channel.state).toBe(ChannelState.Initialized);
		});
	});

	describe('sendCommand', () => {
		it('accumulates chunks until the result line', async () => {
			fake.responder = scripted({ 'AT+CSQ': ['\r\n+CSQ: 2', '0,99\r\n', '\r\nOK\r\n'] }, basicModem);
			await activate();

			expect(await channel.sendCommand('AT+CSQ')).toBe('\r\n+CSQ: 20,99\r\n\r\nOK\r\n');
			expect(fake.written).toEqual(['AT+CSQ\r\n']);
			expect(fake.flushCount).toBeGreaterThan(0);
		});

		it('returns the prompt as response', async () => {
			fake.responder = scripted({ 'AT+CMGS=23': '\r\n> ' }, basicModem);
			await activate();

			expect(resultCode(await channel.sendCommand('AT+CMGS=23'))).toBe('PROMPT');
		});

		it('runs one exchange at a time in call order', async () => {
			fake.responder = scripted({ 'AT+B': '\r\nB\r\nOK\r\n' }, basicModem);
			await activate();

			const first = channel.sendCommand('AT+A');
			const second = channel.sendCommand('AT+B');

			await vi.waitFor(() => expect(fake.commands).toEqual(['AT+A']));
			await sleep(10);
			expect(fake.commands).toEqual(['AT+A']);
			expect(channel.queueLength).toBe(1);

			fake.emitData('\r\nA\r\nOK\r\n');

			expect(await first).toBe('\r\nA\r\nOK\r\n');
			expect(await second).toBe('\r\nB\r\nOK\r\n');
			expect(fake.commands).toEqual(['AT+A', 'AT+B']);
		});

		it('fails with a timeout when the modem never answers', async () => {
			await activate();

			const started = Date.now();
			const error = await channel.sendCommand('AT+SILENT', 50).catch((reason: unknown) => reason);

			expect(error).toBeInstanceOf(CommandTimeoutError);
			expect(error).toMatchObject({ command: 'AT+SILENT', timeout: 50 });
			expect(Date.now() - started).toBeLessThan(1000);
		});

		it('times out when flushing the input never completes', async () => {
			await activate();
			fake.flushHangs = true;

			const error = await channel.sendCommand('AT+CSQ', 50).catch((reason: unknown) => reason);

			expect(error).toBeInstanceOf(CommandTimeoutError);
			expect(fake.written).toEqual([]);
		});

		it('accepts commands again after a timeout', async () => {
			fake.responder = scripted({ 'AT+CGMI': '\r\nQuectel\r\n\r\nOK\r\n' }, basicModem);
			await activate();

			await expect(channel.sendCommand('AT+SILENT', 30)).rejects.toBeInstanceOf(CommandTimeoutError);
			expect(await channel.sendCommand('AT+CGMI')).toBe('\r\nQuectel\r\n\r\nOK\r\n');
			expect(channel.state).toBe(ChannelState.Active);
		});

		it('moves to FAILED when a write fails', async () => {
			await activate();
			fake.writeError = new Error('EIO');

			await expect(channel.sendCommand('AT+CSQ')).rejects.toThrow(`${PORT}: Write failed: EIO`);
			expect(channel.state).toBe(ChannelState.Failed);
			await expect(channel.sendCommand('AT')).rejects.toBeInstanceOf(TransportError);
		});
	});

	describe('executeStack', () => {
		const expectPrompt = (response: string) => {
			if (resultCode(response) !== 'PROMPT') {
				throw new ProtocolError(PORT, 'no prompt', response);
			}
		};

		it('runs the commands back to back', async () => {
			fake.responder = scripted({ 'AT+CMGS=5': '\r\n> ', '0011AA': '\r\n+CMGS: 3\r\n\r\nOK\r\n' }, basicModem);
			await activate();

			const exchanges = await channel.executeStack({
				cmds: [new Command('AT+CMGS=5', undefined, '\r', expectPrompt), new Command('0011AA', 1000, '\x1a')],
				cancelOnFailure: true
			});

			expect(fake.written).toEqual(['AT+CMGS=5\r', '0011AA\x1a']);
			expect(exchanges.map((exchange) => exchange.response)).toEqual(['\r\n> ', '\r\n+CMGS: 3\r\n\r\nOK\r\n']);
		});

		it('stops at the first failing check', async () => {
			fake.responder = scripted({ 'AT+CMGS=5': '\r\n+CMS ERROR: 304\r\n' }, basicModem);
			await activate();

			const stack = channel.executeStack({
				cmds: [new Command('AT+CMGS=5', undefined, '\r', expectPrompt), new Command('0011AA', 1000, '\x1a')],
				cancelOnFailure: true
			});

			await expect(stack).rejects.toBeInstanceOf(ProtocolError);
			expect(fake.commands).toEqual(['AT+CMGS=5']);
		});

		it('continues after a failure unless asked to cancel', async () => {
			fake.responder = scripted({ 'AT+CMGS=5': '\r\nERROR\r\n', 'AT+CSQ': '\r\n+CSQ: 9,99\r\n\r\nOK\r\n' }, basicModem);
			await activate();

			const exchanges = await channel.executeStack({
				cmds: [new Command('AT+CMGS=5', undefined, '\r', expectPrompt), new Command('AT+CSQ')],
				cancelOnFailure: false
			});

			expect(exchanges.map((exchange) => exchange.command)).toEqual(['AT+CSQ']);
		});
	});

	describe('listener', () => {
		it('broadcasts data read outside an exchange', async () => {
			await activate();
			const subscription = bus.subscribe();

			fake.emitData('\r\nRING\r\n');

			expect(await subscription.next()).toEqual({ value: `[${PORT}] \r\nRING\r\n`, done: false });
		});

		it('keeps data read during an exchange off the bus', async () => {
			await activate();
			const subscription = bus.subscribe();

			const pending = channel.sendCommand('AT+CPMS?');
			await vi.waitFor(() => expect(fake.commands).toEqual(['AT+CPMS?']));

			fake.emitData('\r\n+CPMS: 1,30');
			fake.emitData(',1,30\r\n\r\nOK\r\n');

			expect(await pending).toBe('\r\n+CPMS: 1,30,1,30\r\n\r\nOK\r\n');
			expect(subscription.pending).toBe(0);
		});

		it('drops data read before the channel is active', async () => {
			await channel.open();
			const subscription = bus.subscribe();

			fake.emitData('\r\nRDY\r\n');

			expect(subscription.pending).toBe(0);
		});

		it('reports new message indications', async () => {
			await activate();
			const received: number[] = [];
			events.on('onNewSms', (index) => received.push(index));

			fake.emitData('\r\n+CMTI: "SM",');
			fake.emitData('5\r\n');
			fake.emitData('\r\n+CMTI: "ME",12\r\n');

			expect(received).toEqual([5, 12]);
		});

		it('reports new message indications read during an exchange', async () => {
			await activate();
			const received: number[] = [];
			events.on('onNewSms', (index) => received.push(index));

			const pending = channel.sendCommand('AT+CSQ');
			await vi.waitFor(() => expect(fake.commands).toEqual(['AT+CSQ']));

			fake.emitData('\r\n+CMTI: "SM",');
			fake.emitData('3\r\n\r\n+CSQ: 20,99\r\n\r\nOK\r\n');

			expect(await pending).toBe('\r\n+CMTI: "SM",3\r\n\r\n+CSQ: 20,99\r\n\r\nOK\r\n');
			expect(received).toEqual([3]);
		});

		it('holds data during the backoff after a read error and forwards it in order', async () => {
			await activate();
			const subscription = bus.subscribe();

			fake.emitError(new Error('framing error'));
			fake.emitData('one');
			fake.emitData('two');

			expect(subscription.pending).toBe(0);

			await vi.waitFor(() => expect(subscription.pending).toBe(2));
			expect(await subscription.next()).toEqual({ value: `[${PORT}] one`, done: false });
			expect(await subscription.next()).toEqual({ value: `[${PORT}] two`, done: false });
			expect(channel.state).toBe(ChannelState.Active);
		});
	});

	describe('closing', () => {
		it('returns the data read so far when the link closes mid exchange', async () => {
			await activate();

			const pending = channel.sendCommand('AT+CMGL=4');
			await vi.waitFor(() => expect(fake.commands).toEqual(['AT+CMGL=4']));

			fake.emitData('\r\n+CMGL: 1,1,,20\r\n');
			fake.emitClose();

			expect(await pending).toBe('\r\n+CMGL: 1,1,,20\r\n');
			expect(channel.state).toBe(ChannelState.Failed);
			await expect(channel.sendCommand('AT')).rejects.toBeInstanceOf(TransportError);
		});

		it('fails the exchange when the link closes before any data', async () => {
			await activate();

			const pending = channel.sendCommand('AT+CSQ');
			await vi.waitFor(() => expect(fake.commands).toEqual(['AT+CSQ']));

			fake.emitClose();

			await expect(pending).rejects.toBeInstanceOf(TransportError);
			expect(channel.state).toBe(ChannelState.Failed);
		});

		it('rejects running and queued commands on close', async () => {
			await activate();

			const running = channel.sendCommand('AT+WAIT');
			const queued = channel.sendCommand('AT+NEXT');
			const runningResult = expect(running).rejects.toBeInstanceOf(TransportError);
			const queuedResult = expect(queued).rejects.toBeInstanceOf(TransportError);

			await vi.waitFor(() => expect(fake.commands).toEqual(['AT+WAIT']));
			await channel.close();

			await runningResult;
			await queuedResult;
			expect(channel.state).toBe(ChannelState.Closed);
			expect(fake.isConnected).toBe(false);
			expect(fake.commands).toEqual(['AT+WAIT']);
		});

		it('refuses commands once closed', async () => {
			await activate();
			await channel.close();
			await channel.close();

			await expect(channel.sendCommand('AT')).rejects.toThrow(`${PORT}: Channel is closed`);
			expect(states.filter((state) => state === ChannelState.Closed)).toHaveLength(1);
		});
	});
});

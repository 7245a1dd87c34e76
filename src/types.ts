/*
 * Session options and records
 */

export type {
	ChannelOptions,
	CommandExchange,
	DeleteResult,
	ModemIdentity,
	PortStatus,
	SendSmsFailed,
	SendSmsSuccess,
	SessionOptions,
	SignalReading
} from './utils/types';

export { ChannelState } from './utils/types';

/*
 * Messages and submissions
 */

export type { ConcatInfo, DecodedPdu, DecodedText, LogicalSms, PduSubmission, SmsFragment, Submission, TextSubmission } from './codec/types';

export { Alphabet, SmsMode } from './codec/types';

/*
 * Event types
 */

export type { EventTypes } from './utils/Events';

/*
 * Types to build your own `Communicator`
 */

export type { Communicator } from './utils/Communicator';

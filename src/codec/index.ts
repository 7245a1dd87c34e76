export { decodeFragment } from './decodeFragment';
export { decodePdu } from './decodePdu';
export { concatHeader, encodeAddress, encodeSubmit, pickAlphabet, splitMessage } from './encodeSubmit';
export { Gsm7 } from './Gsm7';
export { reassemble } from './reassemble';
export { Alphabet, SmsMode } from './types';
export type { ConcatInfo, DecodedPdu, DecodedText, LogicalSms, PduSubmission, SmsFragment, Submission, TextSubmission } from './types';
export { Ucs2 } from './Ucs2';

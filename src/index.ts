export type * from './types';

export * from './asserts';
export {FAILURE_EVENT} from './telemetry';
export {equal, hashCode, hashString, sign, stringify} from './utils';

export type { Key, Value, Attrs, Pairs, StoreChange, Observer, TerminationReason, CallOptions } from './types';
export { createStore, StoreHandle } from './handle';
export { Mailbox, MailboxError, observe } from './observer';
export type { CallbackObserver } from './observer';
export { UpdateFunctionError, StoreTerminatedError } from './errors';
export { Metrics, metrics } from './metrics';
export type { Labels } from './metrics';
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';
export type { StoreOptions } from './config';

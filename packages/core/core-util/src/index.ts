/**
 * @wind/core-util
 *
 * Lowest-level utilities shared by every wind package: error normalization,
 * byte encoding, the response write buffer and the logging sink.
 *
 * @packageDocumentation
 */

export { toError } from './lib/errorUtils';
export { Encodable, toBytes, toText } from './lib/codec';
export { WriteBuffer } from './WriteBuffer';
export { LogType, WindLogger, LOGGER_TOKEN, ConsoleLogger, MemoryLogger, LogEntry } from './Logger';

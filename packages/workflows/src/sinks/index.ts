/**
 * Result Sinks
 * ============
 * ResultSinkPort implementations that perform I/O.
 */

export * from './json-file-sink.js';

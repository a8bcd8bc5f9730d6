/**
 * Asset Document Router
 *
 * Routes inbound email attachments to the right asset and document category,
 * learning from human feedback through four knowledge partitions guarded by a
 * deduplication and conflict-resolution gate.
 */

export * from './models/index.js';
export * from './services/index.js';
export * from './repository/index.js';
export * from './errors.js';
export { loadConfig, initEnv, type AppConfig } from './config.js';
export { logger, createLogger, setLogLevel } from './logger.js';
export { MemoryDocumentSink, type HeldDocument } from './adapters/memory-sink.js';
export { SignatureScanner } from './adapters/signature-scanner.js';

/**
 * Public entry point of the plugin SDK.
 */

export const VERSION = '0.1.0';

export * from './types/index.js';

export {
  PluginClient,
  type PluginClientOptions,
  type StateDefinition,
  type StateValue,
} from './core/plugin-client.js';
export {
  ConnectionManager,
  type ConnectionManagerOptions,
  type ConnectionState,
  type DisconnectReason,
} from './core/connection-manager.js';
export {
  MessageDispatcher,
  type Handler,
  type MessageDispatcherOptions,
} from './core/message-dispatcher.js';
export { decodeMessage, findDataValue, resolveKind } from './core/message-decoder.js';
export { StateStore, type RuntimeStateRecord, type StateOrigin } from './core/state-store.js';
export { NetSocketFactory } from './core/net-socket-factory.js';

export {
  ClientError,
  DescriptorValidationError,
  isClientError,
  type ClientErrorOptions,
} from './core/client-error.js';

export {
  validateDescriptor,
  validateDescriptorText,
  assertValidDescriptor,
  formatViolation,
  type ValidateOptions,
  type ValidationReport,
} from './core/descriptor-validator.js';
export {
  generateDescriptor,
  serializeDescriptor,
  type GenerateOptions,
  type GenerateResult,
} from './core/descriptor-generator.js';
export { loadDeclaration, parseDeclaration, parseDeclarationText } from './core/declaration-loader.js';
export { descriptorToDeclaration, serializeDeclaration } from './core/declaration-converter.js';
export {
  encodeImage,
  DEFAULT_IMAGE_FORMATS,
  type EncodeImageOptions,
  type ImageSource,
} from './core/image-value.js';
export { attributesFor, requiredAttributes, lookupAttribute } from './core/entity-model.js';

export { loadConfig, applyLoggingConfig } from './core/config-loader.js';
export {
  createLogger,
  configureLogging,
  resetLogging,
  createFileLogSink,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogSink,
} from './core/logger.js';

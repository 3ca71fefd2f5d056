export {
  DEFAULT_HOST,
  DEFAULT_PORT,
  MAX_LINE_BYTES,
  DEFAULT_MAX_SEND_BUFFER_BYTES,
  CONNECTOR_ID_PREFIX,
  CONNECTOR_ID_MAX_LENGTH,
  INBOUND_KINDS,
  INBOUND_KIND_ALIASES,
  type InboundKind,
  type ActionDataItem,
  type InfoMessage,
  type ActionMessage,
  type ListChangeMessage,
  type ConnectorChangeMessage,
  type SettingsMessage,
  type BroadcastMessage,
  type NotificationOptionClickedMessage,
  type ClosePluginMessage,
  type UnknownMessage,
  type InboundMessageMap,
  type InboundMessage,
  type DecodedKind,
  type DecodedMessage,
  type ErrorEvent,
  type HandlerEventMap,
  type HandlerKind,
  type PairMessage,
  type StateUpdateMessage,
  type CreateStateMessage,
  type RemoveStateMessage,
  type ChoiceUpdateMessage,
  type SettingUpdateMessage,
  type ConnectorUpdateMessage,
  type NotificationOption,
  type ShowNotificationMessage,
  type UpdateActionDataMessage,
  type OutboundMessage,
  type SendableMessage,
} from './protocol.js';

export {
  ErrorCode,
  type ErrorCodeValue,
  type ErrorPayload,
} from './errors.js';

export {
  DESCRIPTOR_FILE_NAME,
  type DataType,
  type StateType,
  type SettingType,
  type ActionType,
  type ActionDataDescriptor,
  type ActionDescriptor,
  type ConnectorDescriptor,
  type StateDescriptor,
  type EventDescriptor,
  type CategoryDescriptor,
  type SettingDescriptor,
  type PluginDescriptor,
  type ViolationRule,
  type Violation,
} from './descriptor.js';

export type {
  EntityDeclaration,
  DataDeclaration,
  DataDeclarations,
  ActionDeclaration,
  ConnectorDeclaration,
  StateDeclaration,
  EventDeclaration,
  SettingDeclaration,
  CategoryDeclaration,
  PluginInfoDeclaration,
  PluginDeclaration,
} from './declaration.js';

export {
  ENTITY_KINDS,
  VALUE_KINDS,
  SDK_RULES,
  SDK_VERSIONS,
  DEFAULT_SDK_VERSION,
  isEntityKind,
  type EntityKind,
  type ValueKind,
  type RuleDefault,
  type AttributeRule,
  type RuleTable,
} from './entity-rules.js';

export {
  CONFIG_FILE_NAME,
  DEFAULT_CLIENT_OPTIONS,
  DEFAULT_CONFIG,
  parseConfig,
  resolveClientOptions,
  resolveConfigPath,
  validateClientOptions,
  type ClientOptions,
  type ClientOptionsInput,
  type ClientConfig,
  type LoggingConfig,
  type SdkConfig,
} from './config.js';

export type {
  DataHandler,
  CloseHandler,
  SocketErrorHandler,
  StreamSocket,
  SocketFactory,
} from './socket.js';

export {
  isRecord,
  isJsonObject,
  type JsonPrimitive,
  type JsonValue,
  type JsonObject,
} from './json.js';

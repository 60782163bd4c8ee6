// Main entry point
export { CloudnsClient, DEFAULT_BASE_URL } from './CloudnsClient.js';
export type { CloudnsClientConfig } from './CloudnsClient.js';

// Endpoint groups and their argument types
export { ZoneApi } from './application/endpoints/ZoneApi.js';
export type { ZoneArgs, ZoneCreateArgs, ZoneListArgs, ZonePageCountArgs } from './application/endpoints/ZoneApi.js';
export { RecordApi } from './application/endpoints/RecordApi.js';
export type {
  RecordCopyArgs,
  RecordCreateArgs,
  RecordKeyArgs,
  RecordListArgs,
  RecordTransferArgs,
  RecordUpdateArgs,
} from './application/endpoints/RecordApi.js';
export { SoaApi } from './application/endpoints/SoaApi.js';
export type { SoaUpdateArgs } from './application/endpoints/SoaApi.js';
export type { Patchable } from './application/patchUpdate.js';

// Domain model
export { ApiResponse, HTTP_OK } from './domain/model/ApiResponse.js';
export type { ApiResult, ApiSuccess, ApiFailure, ApiResponseOptions, FailureInit } from './domain/model/ApiResponse.js';
export { ApiError, RecordNotFoundError, ConfigurationError } from './domain/model/ApiError.js';
export { TransportError, TransportTimeoutError, TransportNetworkError } from './domain/model/TransportError.js';
export type { TransportErrorKind } from './domain/model/TransportError.js';
export { ValidationError, ValidationErrorsBatch } from './domain/model/ValidationResult.js';
export type { FieldErrorDetail, ValidationErrorList, FieldCheck } from './domain/model/ValidationResult.js';
export { ValidatedField, field } from './domain/model/FieldDefinition.js';
export type {
  Field,
  ParamValue,
  ParameterFields,
  RequestParams,
  ValidationRule,
  ValidatorKind,
} from './domain/model/FieldDefinition.js';
export { DnsRecordType } from './domain/model/DnsRecordType.js';
export { ZoneType } from './domain/model/ZoneType.js';
export { TTL_LABELS } from './domain/model/Ttl.js';
export type { AuthParams, Credentials } from './domain/model/ClientConfig.js';

// Domain services
export { checkField, validate, ValidationSession } from './domain/services/FieldValidator.js';
export { Parameters } from './domain/services/Parameters.js';
export type { ParametersOptions } from './domain/services/Parameters.js';
export { buildRecordFields } from './domain/services/RecordParameters.js';
export type { RecordFields, RecordParameterInput } from './domain/services/RecordParameters.js';

// Ports (for custom implementations)
export type { HttpTransport, HttpMethod, TransportRequest, TransportResponse } from './domain/ports/HttpTransport.js';
export type { Logger, LogLevel } from './domain/ports/Logger.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  RequestStartedEvent,
  RequestCompletedEvent,
  RequestFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { FetchTransport, encodeParams } from './infrastructure/transport/FetchTransport.js';
export type { FetchTransportOptions } from './infrastructure/transport/FetchTransport.js';
export { createLogger } from './infrastructure/logging/JsonLogger.js';
export type { JsonLoggerOptions, LogThreshold } from './infrastructure/logging/JsonLogger.js';
export { loadEnvSettings } from './infrastructure/config/envConfig.js';
export type { EnvSettings } from './infrastructure/config/envConfig.js';

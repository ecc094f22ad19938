/**
 * @lakehouse/impala-rpc
 *
 * Wire layer for the Impala client: binary protocol, service contracts and
 * typed request/response records for the rich (HiveServer2) and legacy
 * (Beeswax) protocols.
 *
 * @example
 * ```typescript
 * import { encodeCall, decodeReply, getRichService, RichMethod } from '@lakehouse/impala-rpc';
 *
 * const service = getRichService();
 * const bytes = encodeCall(service, RichMethod.OPEN_SESSION, 1, { req: { client_protocol: 5 } });
 * ```
 */

// Binary protocol
export {
  WireType,
  MessageKind,
  BinaryReader,
  BinaryWriter,
  InputBufferUnderrunError,
  ProtocolDecodeError,
} from './binary.js';

export type { MessageHeader, FieldHeader, MapHeader, ListHeader } from './binary.js';

// Codec
export {
  ApplicationException,
  ApplicationExceptionType,
  ServiceException,
  SchemaMismatchError,
  isWireList,
  isWireMap,
  isWireStruct,
  encodeCall,
  decodeReply,
  decodeCall,
  encodeReply,
  encodeApplicationException,
  failedReplyLength,
} from './serialization.js';

export type {
  ScalarTypeName,
  TypeRef,
  FieldDef,
  StructDef,
  MethodDef,
  ServiceDef,
  WireValue,
  WireStruct,
  DecodedReply,
  DecodedCall,
  ReplyBody,
} from './serialization.js';

// Service contracts
export { loadServiceDefinition, getRichService, getLegacyService } from './idl.js';

// Protocol enums
export {
  ProtocolVersion,
  StatusCode,
  OperationState,
  TypeId,
  FetchOrientation,
  RuntimeProfileFormat,
  ExecState,
  QueryState,
  ErrorCode,
  QueryOptionLevel,
  RichMethod,
  LegacyMethod,
  LegacyException,
  isSuccessStatus,
  parseQueryOptionLevel,
} from './protocol.js';

export type { RichMethodName, LegacyMethodName } from './protocol.js';

// Records
export {
  MalformedResponseError,
  parseResponse,
  statusSchema,
  handleIdentifierSchema,
  sessionHandleSchema,
  operationHandleSchema,
  statusOnlyResponseSchema,
  openSessionResponseSchema,
  executeStatementResponseSchema,
  operationStatusResponseSchema,
  columnDescSchema,
  tableSchemaSchema,
  resultSetMetadataResponseSchema,
  columnSchema,
  rowSetSchema,
  fetchResultsResponseSchema,
  getLogResponseSchema,
  pingResponseSchema,
  dmlResultSchema,
  closeImpalaOperationResponseSchema,
  runtimeProfileResponseSchema,
  execSummarySchema,
  execSummaryResponseSchema,
  beeswaxQueryHandleSchema,
  beeswaxResultsSchema,
  beeswaxResultsMetadataSchema,
  queryStateSchema,
  logTextSchema,
  configVariablesSchema,
  beeswaxStatusSchema,
  beeswaxPingResponseSchema,
  createOpenSessionRequest,
  createExecuteStatementRequest,
  createFetchResultsRequest,
  createBeeswaxQuery,
} from './messages.js';

export type {
  TStatus,
  THandleIdentifier,
  TSessionHandle,
  TOperationHandle,
  TColumnDesc,
  TTableSchema,
  TColumn,
  TDmlResult,
  TExecSummary,
  TOpenSessionReq,
  TExecuteStatementReq,
  TFetchResultsReq,
  TOperationReq,
  TQueryAttemptsReq,
  BeeswaxQueryHandle,
  BeeswaxStatus,
  BeeswaxQuery,
} from './messages.js';

/**
 * AIStore client
 *
 * A typed client for the AIStore REST API:
 * - Object handles with head, get, put and delete
 * - Streamed downloads in fixed-size chunks
 * - Bucket creation, deletion and bulk directory uploads
 * - Mock transport and in-memory cluster for tests
 *
 * @module aistore-client
 * @example
 * ```typescript
 * import { createClient } from 'aistore-client';
 *
 * const client = createClient({ endpoint: 'http://localhost:8080' });
 * const object = client.bucket('images').object('cat.png');
 *
 * await object.putObject('./cat.png');
 * const stream = await object.getObject();
 * console.log(stream.contentLength, stream.eTagType, stream.eTag);
 * const data = await stream.readAll();
 *
 * await client.close();
 * ```
 */

// ============================================================================
// Client API
// ============================================================================

export {
  AisClient,
  createClient,
  createClientFromEnv,
  buildUrl,
  type CreateClientOptions,
  type HttpMethod,
  type QueryParams,
  type RequestOptions,
  type RequestDispatcher,
} from './client/index.js';

// ============================================================================
// Buckets and objects
// ============================================================================

export {
  Bucket,
  formatNamespace,
  PROVIDERS,
  type Provider,
  type Namespace,
  type BucketOptions,
  type PutFilesOptions,
  type PutFilesResult,
  type UploadedFile,
  type FailedUpload,
} from './bucket/index.js';

export {
  AisObject,
  ObjectStream,
  HEADER_CHECKSUM_TYPE,
  HEADER_CHECKSUM_VALUE,
  QPARAM_ARCHPATH,
  type GetObjectOptions,
} from './objects/index.js';

// ============================================================================
// Configuration
// ============================================================================

export type { AisConfig, NormalizedAisConfig } from './config/index.js';

export {
  DEFAULT_TIMEOUT,
  MAX_TIMEOUT,
  DEFAULT_DOWNLOAD_CHUNK_SIZE,
  DEFAULT_UPLOAD_CONCURRENCY,
  DEFAULT_USER_AGENT,
  MAX_UPLOAD_CONCURRENCY,
  validateConfig,
  normalizeConfig,
  AisConfigBuilder,
  createConfigFromEnv,
} from './config/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  AisError,
  BucketError,
  ConfigError,
  NetworkError,
  ObjectError,
  ServerError,
  TransferError,
  ValidationError,
  mapHttpStatusToError,
  isAisError,
  isRetryableError,
  isNotFoundError,
  type AisErrorParams,
} from './errors/index.js';

// ============================================================================
// Transport
// ============================================================================

export {
  FetchTransport,
  createFetchTransport,
  type FetchTransportOptions,
  type HttpTransport,
  type HttpRequest,
  type HttpResponse,
  type StreamingHttpResponse,
  type RequestBody,
} from './transport/index.js';

// ============================================================================
// Observability
// ============================================================================

export {
  ConsoleLogger,
  NoOpLogger,
  configureLogging,
  getLogger,
  type Logger,
  type LogLevel,
} from './observability/index.js';

// ============================================================================
// Testing support
// ============================================================================

export {
  MockTransport,
  InMemoryCluster,
  createInMemoryCluster,
  type RecordedRequest,
  type MockResponse,
  type MockHandler,
} from './simulation/index.js';

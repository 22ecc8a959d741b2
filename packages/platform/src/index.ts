/**
 * @satkit/platform
 *
 * The client engine: server configuration, the HTTP wrapper, structured
 * logging, and the entity base with its capability layers.
 */

// Config
export {
  ServerConfig,
  compareVersions,
  configSearchPaths,
  findConfigFile,
  serverConfigSchema,
  CONFIG_DIR,
  CONFIG_FILE,
  type ClientOptions,
  type ServerConfigInit,
} from "./core/config/index.js";

// Logging
export { createLogger, currentLogLevel } from "./core/logging/index.js";

// HTTP
export {
  request,
  get,
  head,
  post,
  put,
  patch,
  del,
  withQuery,
  setTransport,
  resetTransport,
  getTransport,
  HttpResponse,
  UndiciTransport,
  type RequestOptions,
  type FileUpload,
  type HttpMethod,
  type Transport,
  type TransportBody,
  type TransportRequest,
} from "./core/http/index.js";

// Entities
export * from "./core/entity/index.js";

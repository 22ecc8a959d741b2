/**
 * @satkit/contracts
 *
 * Public API: the shared vocabulary of the platform and the entity catalogue.
 * Both sides import from this package. It performs no I/O.
 */

// Field descriptors
export {
  Field,
  ScalarField,
  BooleanField,
  EmailField,
  FloatField,
  IntegerField,
  DictField,
  ListField,
  DateField,
  DateTimeField,
  StringField,
  IPAddressField,
  NetmaskField,
  MACAddressField,
  URLField,
  STRING_TYPES,
  genString,
  prefixToNetmask,
} from "./field-types.js";
export type {
  FieldOptions,
  IntegerFieldOptions,
  DateFieldOptions,
  StringFieldOptions,
  StringType,
} from "./field-types.js";

// Errors
export {
  SatkitError,
  NoSuchFieldError,
  BadValueError,
  MissingValueError,
  UnsupportedFilterError,
  RelationRequiredError,
  EntityNotRegisteredError,
  NoSuchPathError,
  HttpError,
  APIResponseError,
  HostCreateMissingError,
  ConfigFileError,
  TaskTimedOutError,
  TaskFailedError,
} from "./errors.js";

// Wire shapes
export {
  entityIdSchema,
  identifiedSchema,
  resultsSchema,
  taskSchema,
  isJsonObject,
} from "./wire.js";
export type { JsonObject, EntityId, SearchResults, TaskInfo } from "./wire.js";

// Logging
export { LOG_LEVELS } from "./context.js";
export type { Logger, LogLevel } from "./context.js";

/**
 * Entity layer: the base class, capability layers, relation fields,
 * payload translation and task polling.
 */

export {
  Entity,
  type EntityClass,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ServerMode,
} from "./entity.js";
export {
  ReadableEntity,
  DeletableEntity,
  CreatableEntity,
  UpdatableEntity,
  type CreateOptions,
  type SynchronousCreateOptions,
  type DeleteOptions,
  type ReadOptions,
  type SearchOptions,
} from "./capabilities.js";
export { RelationField, OneToOneField, OneToManyField } from "./fields.js";
export {
  payload,
  getEntityId,
  getEntityIds,
  lookupEntityId,
  lookupEntityIds,
  expectJsonObject,
  responseId,
} from "./payload.js";
export {
  pollTask,
  pollAcceptedTask,
  handleResponse,
  taskPath,
  sleep,
  DEFAULT_POLL_RATE,
  DEFAULT_POLL_TIMEOUT,
  type PollOptions,
} from "./tasks.js";
export {
  registerEntity,
  registerEntities,
  getEntityClass,
  resolveEntity,
  getEntityNames,
  clearEntityRegistry,
} from "./registry.js";

/**
 * Errors
 *
 * Every failure raised by the client is a SatkitError subclass, so callers
 * can tell library errors apart from bugs with a single instanceof check.
 * Transport failures (DNS, refused connections) are not wrapped.
 */

export class SatkitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// ---------------------------------------------------------------------------
// Schema errors
// ---------------------------------------------------------------------------

/** A value or filter names a field that is not in the entity's schema. */
export class NoSuchFieldError extends SatkitError {
  constructor(
    readonly validFields: string[],
    readonly receivedFields: string[]
  ) {
    super(
      `Valid fields are [${validFields.join(", ")}], but received [${receivedFields.join(", ")}] instead.`
    );
  }
}

/** An inappropriate value was assigned to a field or passed to a helper. */
export class BadValueError extends SatkitError {}

/** A server payload holds no value for a field that must be read. */
export class MissingValueError extends SatkitError {
  constructor(
    readonly field: string,
    readonly searchedKeys: string[],
    readonly availableKeys: string[]
  ) {
    super(
      `Cannot find a value for the "${field}" field. Searched for keys named [${searchedKeys.join(", ")}], but available keys are [${availableKeys.join(", ")}].`
    );
  }
}

/** Search results cannot be filtered locally on relation fields. */
export class UnsupportedFilterError extends SatkitError {
  constructor(readonly field: string, readonly fieldType: string) {
    super(
      `Search results cannot be locally filtered by relation fields. "${field}" is a ${fieldType}.`
    );
  }
}

/** An entity whose URL hangs off a parent was built without that parent. */
export class RelationRequiredError extends SatkitError {
  constructor(readonly entity: string, readonly field: string) {
    super(`${entity} requires a value for the "${field}" field.`);
  }
}

/** A relation field names an entity class nobody registered. */
export class EntityNotRegisteredError extends SatkitError {
  constructor(readonly entity: string) {
    super(`Entity "${entity}" is not registered.`);
  }
}

// ---------------------------------------------------------------------------
// Path errors
// ---------------------------------------------------------------------------

export class NoSuchPathError extends SatkitError {
  constructor(readonly which?: string) {
    super(
      which === undefined
        ? "A path to this entity cannot be built without an id."
        : `No path named "${which}" can be built for this entity.`
    );
  }
}

// ---------------------------------------------------------------------------
// Transport and server errors
// ---------------------------------------------------------------------------

/** Raised by HttpResponse.raiseForStatus for 4xx and 5xx responses. */
export class HttpError extends SatkitError {
  constructor(
    readonly status: number,
    readonly url: string,
    readonly body: string
  ) {
    super(`HTTP ${status} ${status >= 500 ? "server" : "client"} error for url: ${url}`);
  }
}

/** The server answered, but not with what was expected. */
export class APIResponseError extends SatkitError {}

export class HostCreateMissingError extends SatkitError {}

export class ConfigFileError extends SatkitError {}

// ---------------------------------------------------------------------------
// Asynchronous task errors
// ---------------------------------------------------------------------------

export class TaskTimedOutError extends SatkitError {
  constructor(
    readonly taskId: string | number,
    readonly task: Record<string, unknown> | undefined
  ) {
    super(
      `Timed out polling task ${taskId}. Task information: ${JSON.stringify(task ?? null)}`
    );
  }
}

export class TaskFailedError extends SatkitError {
  constructor(
    readonly taskId: string | number,
    readonly task: Record<string, unknown>,
    readonly errors: string[] = []
  ) {
    super(
      `Task ${taskId} did not succeed. Task information: ${JSON.stringify(task)}`
    );
  }
}

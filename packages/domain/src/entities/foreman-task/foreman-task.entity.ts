/**
 * Foreman Task Entity
 *
 * An asynchronous server job. Every path except bulk_search is the task
 * itself.
 */

import { NoSuchPathError, type TaskInfo } from "@satkit/contracts";
import {
  ReadableEntity,
  pollTask,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type PollOptions,
} from "@satkit/platform";

export class ForemanTask extends ReadableEntity<ForemanTask> {
  protected defineFields(): FieldMap {
    return {};
  }

  get meta(): EntityMeta {
    return { apiPath: "foreman_tasks/api/tasks", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): ForemanTask {
    return new ForemanTask(this.config, values);
  }

  path(which?: string): string {
    if (which === "bulk_search") {
      return `${super.path("base")}/bulk_search`;
    }
    return super.path("self");
  }

  /** Waits for the task to finish. See pollTask. */
  async poll(options?: PollOptions): Promise<TaskInfo> {
    const id = this.id;
    if (id === undefined) throw new NoSuchPathError();
    return pollTask(id, this.config, options);
  }
}

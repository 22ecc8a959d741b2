/**
 * Task Polling
 *
 * Long-running server operations answer 202 Accepted with the id of a
 * foreman task. pollTask() follows that task until it leaves the "running"
 * state or the deadline passes.
 */

import { StatusCodes } from "http-status-codes";
import {
  APIResponseError,
  TaskFailedError,
  TaskTimedOutError,
  identifiedSchema,
  taskSchema,
  type EntityId,
  type TaskInfo,
} from "@satkit/contracts";
import type { ServerConfig } from "../config/index.js";
import { get, type HttpResponse } from "../http/index.js";
import { createLogger } from "../logging/index.js";

const logger = createLogger("tasks");

export interface PollOptions {
  /** Milliseconds between polls (default 5 s) */
  pollRate?: number;
  /** Milliseconds before giving up (default 300 s) */
  timeout?: number;
}

export const DEFAULT_POLL_RATE = 5_000;
export const DEFAULT_POLL_TIMEOUT = 300_000;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function taskPath(config: ServerConfig, taskId: EntityId): string {
  return `${config.url.replace(/\/+$/, "")}/foreman_tasks/api/tasks/${taskId}`;
}

/**
 * GETs `url`, giving up after `ms`. Resolves with undefined when the time runs
 * out first; the request is aborted.
 */
async function getWithin(
  url: string,
  config: ServerConfig,
  ms: number
): Promise<HttpResponse | undefined> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => {
      resolve(undefined);
      controller.abort();
    }, Math.max(ms, 0));
  });
  try {
    return await Promise.race([
      get(url, { ...config.getClientOptions(), signal: controller.signal }),
      expired,
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Polls a foreman task until it completes.
 *
 * Resolves with the task when its result is "success". Rejects with
 * TaskFailedError for any other result and TaskTimedOutError when the task
 * is still running at the deadline. The deadline also cuts short a poll
 * request that is still in flight.
 */
export async function pollTask(
  taskId: EntityId,
  config: ServerConfig,
  options: PollOptions = {}
): Promise<TaskInfo> {
  const pollRate = options.pollRate ?? DEFAULT_POLL_RATE;
  const deadline = Date.now() + (options.timeout ?? DEFAULT_POLL_TIMEOUT);
  const url = taskPath(config, taskId);
  let lastTask: TaskInfo | undefined;

  for (;;) {
    const response = await getWithin(url, config, deadline - Date.now());
    if (response === undefined) {
      throw new TaskTimedOutError(taskId, lastTask);
    }
    response.raiseForStatus();
    const parsed = taskSchema.safeParse(response.json());
    if (!parsed.success) {
      throw new APIResponseError(`Unexpected task payload for task ${taskId}: ${response.text}`);
    }
    const task = parsed.data;
    lastTask = task;
    logger.debug(`Polled task ${taskId}`, { state: task.state, result: task.result ?? null });

    if (task.state !== "running") {
      if (task.result === "success") return task;
      throw new TaskFailedError(taskId, task, task.humanized?.errors ?? []);
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new TaskTimedOutError(taskId, task);
    }
    await sleep(Math.min(pollRate, remaining));
  }
}

/** Polls the task named in the body of a 202 Accepted response. */
export function pollAcceptedTask(
  response: HttpResponse,
  config: ServerConfig,
  options: PollOptions = {}
): Promise<TaskInfo> {
  const accepted = identifiedSchema.safeParse(response.json());
  if (!accepted.success) {
    throw new APIResponseError(`Expected a task id in the 202 response: ${response.text}`);
  }
  return pollTask(accepted.data.id, config, options);
}

/**
 * Shared tail of every action helper: raises for 4xx/5xx, waits for the task
 * on 202 when `synchronous`, returns null on 204 and the decoded body
 * otherwise.
 */
export async function handleResponse(
  response: HttpResponse,
  config: ServerConfig,
  synchronous = false,
  options: PollOptions = {}
): Promise<unknown> {
  response.raiseForStatus();
  if (synchronous && response.status === StatusCodes.ACCEPTED) {
    return pollAcceptedTask(response, config, options);
  }
  if (response.status === StatusCodes.NO_CONTENT) {
    return null;
  }
  return response.json();
}

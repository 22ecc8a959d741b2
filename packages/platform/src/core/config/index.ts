/**
 * Server Configuration
 *
 * The connection facts for one server: its URL, credentials, whether to
 * verify TLS, and optionally the server version. A single ServerConfig is
 * usually shared by every entity that talks to that server.
 *
 * Configurations can be loaded from the environment (fromEnv) or kept in a
 * JSON file keyed by label:
 *
 *   {
 *     "default": { "url": "https://sat.example.com", "auth": ["admin", "changeme"], "verify": false },
 *     "staging": { "url": "https://sat-stage.example.com", "version": "6.0" }
 *   }
 *
 * Every read-modify-write of that file runs on one process-wide serial queue,
 * so concurrent save/delete calls cannot interleave.
 */

import { readFileSync } from "node:fs";
import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import dotenv from "dotenv";
import PQueue from "p-queue";
import { z } from "zod";
import { ConfigFileError } from "@satkit/contracts";
import { createLogger } from "../logging/index.js";
import { compareVersions } from "./version.js";

export { compareVersions } from "./version.js";

const logger = createLogger("config");

/** Directory searched for under each XDG configuration directory */
export const CONFIG_DIR = "satkit";

/** Name of the configuration file inside CONFIG_DIR */
export const CONFIG_FILE = "server_configs.json";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const serverConfigSchema = z.object({
  url: z.string().min(1),
  auth: z.tuple([z.string(), z.string()]).optional(),
  verify: z.boolean().optional(),
  version: z.string().optional(),
});

const configFileSchema = z.record(serverConfigSchema);

export type ServerConfigInit = z.infer<typeof serverConfigSchema>;

type ConfigFile = z.infer<typeof configFileSchema>;

/** What the HTTP wrapper needs from a configuration */
export interface ClientOptions {
  auth?: [string, string];
  verify?: boolean;
}

// ---------------------------------------------------------------------------
// File location
// ---------------------------------------------------------------------------

/**
 * The directories searched for CONFIG_FILE, most specific first:
 * $XDG_CONFIG_HOME (default ~/.config), then each of $XDG_CONFIG_DIRS
 * (default /etc/xdg).
 */
export function configSearchPaths(env: NodeJS.ProcessEnv = process.env): string[] {
  const home = env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  const dirs = (env.XDG_CONFIG_DIRS || "/etc/xdg").split(":").filter(Boolean);
  return [home, ...dirs].map((dir) => path.join(dir, CONFIG_DIR, CONFIG_FILE));
}

/**
 * Returns the first configuration file that exists.
 * Throws ConfigFileError when there is none.
 */
export async function findConfigFile(env: NodeJS.ProcessEnv = process.env): Promise<string> {
  for (const candidate of configSearchPaths(env)) {
    try {
      await access(candidate);
      return candidate;
    } catch {
      continue;
    }
  }
  throw new ConfigFileError(
    `No configuration files could be located after searching for a file named "${CONFIG_FILE}" in the standard XDG configuration paths, such as "~/.config/${CONFIG_DIR}/".`
  );
}

function savePath(env: NodeJS.ProcessEnv = process.env): string {
  return configSearchPaths(env)[0];
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readConfigFile(file: string): Promise<ConfigFile> {
  const raw = await readFile(file, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigFileError(
      `Configuration file "${file}" is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigFileError(
      `Configuration file "${file}" is malformed: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`
    );
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// ServerConfig
// ---------------------------------------------------------------------------

export class ServerConfig {
  private static readonly fileQueue = new PQueue({ concurrency: 1 });

  readonly url: string;
  readonly auth?: [string, string];
  readonly verify?: boolean;
  readonly version?: string;

  constructor(init: ServerConfigInit) {
    this.url = init.url;
    this.auth = init.auth;
    this.verify = init.verify;
    this.version = init.version;
  }

  /** Options for the HTTP wrapper. URL and version are not included. */
  getClientOptions(): ClientOptions {
    const options: ClientOptions = {};
    if (this.auth !== undefined) options.auth = this.auth;
    if (this.verify !== undefined) options.verify = this.verify;
    return options;
  }

  /**
   * Is the server older than `version`?
   * A configuration without a version is assumed to target the newest server.
   */
  versionBelow(version: string): boolean {
    return this.version !== undefined && compareVersions(this.version, version) < 0;
  }

  toJSON(): ServerConfigInit {
    const json: ServerConfigInit = { url: this.url };
    if (this.auth !== undefined) json.auth = this.auth;
    if (this.verify !== undefined) json.verify = this.verify;
    if (this.version !== undefined) json.version = this.version;
    return json;
  }

  // -------------------------------------------------------------------------
  // Environment
  // -------------------------------------------------------------------------

  /**
   * Builds a configuration from SATKIT_* variables.
   *
   * When `envFile` is given it is parsed with dotenv; variables already
   * present in `env` win over the file.
   */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    options: { envFile?: string } = {}
  ): ServerConfig {
    const fileVars = options.envFile
      ? dotenv.parse(readFileSync(options.envFile))
      : {};
    const vars: NodeJS.ProcessEnv = { ...fileVars, ...env };

    const url = vars.SATKIT_URL;
    if (!url) {
      throw new ConfigFileError(
        "SATKIT_URL environment variable is required to build a server configuration."
      );
    }

    const init: ServerConfigInit = { url };
    if (vars.SATKIT_USERNAME !== undefined) {
      init.auth = [vars.SATKIT_USERNAME, vars.SATKIT_PASSWORD ?? ""];
    }
    if (vars.SATKIT_VERIFY !== undefined) {
      init.verify = !["false", "0", "no"].includes(vars.SATKIT_VERIFY.toLowerCase());
    }
    if (vars.SATKIT_VERSION) {
      init.version = vars.SATKIT_VERSION;
    }
    return new ServerConfig(init);
  }

  // -------------------------------------------------------------------------
  // File store
  // -------------------------------------------------------------------------

  /** Reads the configuration identified by `label`. */
  static async get(label = "default", file?: string): Promise<ServerConfig> {
    const target = file ?? (await findConfigFile());
    const configs = await ServerConfig.fileQueue.add(() => readConfigFile(target), {
      throwOnTimeout: true,
    });
    const entry = configs[label];
    if (entry === undefined) {
      throw new ConfigFileError(
        `No configuration labelled "${label}" in "${target}". Available labels: [${Object.keys(configs).join(", ")}].`
      );
    }
    return new ServerConfig(entry);
  }

  /** Lists every label in the configuration file. */
  static async getLabels(file?: string): Promise<string[]> {
    const target = file ?? (await findConfigFile());
    const configs = await ServerConfig.fileQueue.add(() => readConfigFile(target), {
      throwOnTimeout: true,
    });
    return Object.keys(configs);
  }

  /** Removes the configuration identified by `label`. */
  static async delete(label = "default", file?: string): Promise<void> {
    const target = file ?? (await findConfigFile());
    await ServerConfig.fileQueue.add(
      async () => {
        const configs = await readConfigFile(target);
        if (!(label in configs)) {
          throw new ConfigFileError(`No configuration labelled "${label}" in "${target}".`);
        }
        delete configs[label];
        await writeFile(target, JSON.stringify(configs, null, 2));
        logger.debug("Deleted server configuration", { label, file: target });
      },
      { throwOnTimeout: true }
    );
  }

  /**
   * Saves this configuration under `label`, replacing any existing entry.
   * The file (and its directory) is created when missing.
   */
  async save(label = "default", file?: string): Promise<void> {
    const target = file ?? savePath();
    await ServerConfig.fileQueue.add(
      async () => {
        let configs: ConfigFile = {};
        try {
          configs = await readConfigFile(target);
        } catch (error) {
          if (!isMissingFile(error)) throw error;
          await mkdir(path.dirname(target), { recursive: true });
        }
        configs[label] = this.toJSON();
        await writeFile(target, JSON.stringify(configs, null, 2));
        logger.debug("Saved server configuration", { label, file: target });
      },
      { throwOnTimeout: true }
    );
  }
}

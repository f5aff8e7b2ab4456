/**
 * Project configuration for the pile CLI.
 *
 * Looked up at the repository root as `patchpile.config.yaml`,
 * `patchpile.config.yml` or `patchpile.config.json`, or taken from an explicit
 * path (`--config`, `PATCHPILE_CONFIG`). All three are read with the YAML
 * parser, which accepts JSON as well.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { CliError, CLI_ERROR_CODES, errnoCode } from "./errors";

export const CONFIG_FILE_NAMES = [
  "patchpile.config.yaml",
  "patchpile.config.yml",
  "patchpile.config.json",
] as const;

export const DEFAULT_LINK_MACRO = "linkstg";

const ConfigSchema = z
  .object({
    commandDirs: z.array(z.string().min(1)).default([]),
    cache: z
      .object({
        enabled: z.boolean().default(true),
        path: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    docs: z
      .object({
        linkMacro: z
          .string()
          .regex(/^[A-Za-z][\w-]*$/, "linkMacro must be an AsciiDoc macro name")
          .default(DEFAULT_LINK_MACRO),
      })
      .strict()
      .default({}),
  })
  .strict();

export interface PileConfig {
  /** Absolute command directories, in lookup order. */
  commandDirs: string[];
  cache: {
    enabled: boolean;
    /** Absolute cache file path; unset means the packaged default. */
    path?: string;
  };
  docs: {
    linkMacro: string;
  };
  /** File the configuration came from, if any. */
  source?: string;
}

export interface LoadConfigOptions {
  cwd?: string;
  repoRoot?: string;
  /** Explicit config file; takes precedence over `PATCHPILE_CONFIG`. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export function detectRepoRoot(start: string): string {
  let cur = path.resolve(start);
  while (true) {
    if (existsSync(path.join(cur, ".git"))) {
      return cur;
    }
    const parent = path.dirname(cur);
    if (parent === cur) {
      return path.resolve(start);
    }
    cur = parent;
  }
}

function findConfigFile(dir: string): string | undefined {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(dir, name);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

function isTruthyEnv(value: string | undefined): boolean {
  return value !== undefined && value !== "" && value !== "0" && value.toLowerCase() !== "false";
}

export function parseConfig(raw: unknown, baseDir: string, source?: string): PileConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new CliError(
      CLI_ERROR_CODES.E_CONFIG,
      `Invalid configuration${source ? ` in ${source}` : ""}: ${issues.join("; ")}`,
      { source, issues },
    );
  }
  const data = result.data;
  return {
    commandDirs: data.commandDirs.map((dir) => path.resolve(baseDir, dir)),
    cache: {
      enabled: data.cache.enabled,
      ...(data.cache.path ? { path: path.resolve(baseDir, data.cache.path) } : {}),
    },
    docs: { linkMacro: data.docs.linkMacro },
    ...(source ? { source } : {}),
  };
}

export async function loadConfig(opts: LoadConfigOptions = {}): Promise<PileConfig> {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const repoRoot = opts.repoRoot ?? detectRepoRoot(cwd);

  const explicit = opts.configPath ?? env.PATCHPILE_CONFIG;
  const file = explicit ? path.resolve(cwd, explicit) : findConfigFile(repoRoot);

  let config: PileConfig;
  if (!file) {
    config = parseConfig({}, repoRoot);
  } else {
    let text: string;
    try {
      text = await readFile(file, "utf8");
    } catch (error) {
      // a config file named on purpose has to exist
      throw new CliError(
        errnoCode(error) === "ENOENT" ? CLI_ERROR_CODES.E_CONFIG : CLI_ERROR_CODES.E_IO_READ,
        `Cannot read config file ${file}: ${error instanceof Error ? error.message : String(error)}`,
        { path: file },
        { cause: error },
      );
    }

    let raw: unknown;
    try {
      raw = parseYaml(text);
    } catch (error) {
      throw new CliError(
        CLI_ERROR_CODES.E_CONFIG,
        `Malformed config file ${file}: ${error instanceof Error ? error.message : String(error)}`,
        { path: file },
        { cause: error },
      );
    }
    config = parseConfig(raw, path.dirname(file), file);
  }

  if (isTruthyEnv(env.PATCHPILE_NO_CACHE)) {
    config.cache.enabled = false;
  }
  return config;
}

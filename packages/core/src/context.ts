import type { Presenter } from "./presenter/types";
import type { Logger } from "./logger";
import { createNoOpLogger } from "./logger";
import { detectRepoRoot, parseConfig, type PileConfig } from "./config";

export interface CliContext {
  repoRoot: string;
  cwd: string;
  logger: Logger;
  presenter: Presenter;
  env: NodeJS.ProcessEnv;
  config: PileConfig;
  diagnostics: string[];
}

export interface CreateContextOptions {
  presenter: Presenter;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  repoRoot?: string;
  config?: PileConfig;
}

export function createContext({
  presenter,
  logger,
  env,
  cwd,
  repoRoot,
  config,
}: CreateContextOptions): CliContext {
  const resolvedCwd = cwd ?? process.cwd();
  const resolvedRepoRoot = repoRoot ?? detectRepoRoot(resolvedCwd);

  return {
    presenter,
    logger: logger ?? createNoOpLogger(),
    env: env ?? process.env,
    cwd: resolvedCwd,
    repoRoot: resolvedRepoRoot,
    config: config ?? parseConfig({}, resolvedRepoRoot),
    diagnostics: [],
  };
}

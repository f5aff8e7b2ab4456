import {
  createContext,
  createJsonPresenter,
  createTextPresenter,
  detectRepoRoot,
  EXIT_CODES,
  getLogger,
  isCliError,
  loadConfig,
  mapCliErrorToExitCode,
  parseArgs,
  setLogLevel,
  type GlobalFlags,
  type Presenter,
  type TextSink,
} from "@patchpile/cli-core";
import {
  BUILTIN_COMMANDS,
  buildCommandTable,
  createCommandLoader,
  createCommandSource,
  findCommand,
  getCommands,
  type CommandContext,
  type ModuleRegistry,
} from "@patchpile/cli-commands";

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Command output in text mode; stdout by default. */
  out?: TextSink;
  builtins?: ModuleRegistry;
}

interface Dispatch {
  word: string;
  argv: string[];
}

/**
 * `--version` and a bare `pile` are the version and help commands;
 * `pile <command> --help` is `pile help <command>`.
 */
function resolveDispatch(cmdPath: string[], rest: string[], global: GlobalFlags): Dispatch {
  const [word] = cmdPath;
  if (global.version) {
    return { word: "version", argv: [] };
  }
  if (word === undefined) {
    return { word: "help", argv: [] };
  }
  if (global.help) {
    return { word: "help", argv: [word] };
  }
  return { word, argv: rest };
}

function reportError(error: unknown, presenter: Presenter, ctx?: CommandContext): number {
  const warnings = ctx && ctx.diagnostics.length > 0 ? { warnings: ctx.diagnostics } : {};

  if (isCliError(error)) {
    if (presenter.isJSON) {
      presenter.json({
        ok: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details != null && { details: error.details }),
        },
        ...warnings,
      });
    } else {
      presenter.error(`${error.code}: ${error.message}`);
    }
    return mapCliErrorToExitCode(error.code);
  }

  const msg = error instanceof Error ? error.message : String(error);
  if (presenter.isJSON) {
    presenter.json({ ok: false, error: { message: msg }, ...warnings });
  } else {
    presenter.error(msg);
  }
  return EXIT_CODES.GENERIC;
}

export async function run(argv: string[], opts: RunOptions = {}): Promise<number> {
  const out = opts.out ?? process.stdout;
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const builtins = opts.builtins ?? BUILTIN_COMMANDS;

  let parsed: ReturnType<typeof parseArgs>;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    return reportError(error, createTextPresenter(false, out));
  }
  const { cmdPath, rest, global, flagsObj } = parsed;

  const presenter = global.json ? createJsonPresenter() : createTextPresenter(global.quiet, out);
  if (global.logLevel) {
    setLogLevel(global.logLevel);
  }
  const logger = getLogger("cli");

  let ctx: CommandContext | undefined;
  try {
    const repoRoot = detectRepoRoot(cwd);
    const config = await loadConfig({ cwd, repoRoot, env, configPath: global.config });
    const sourceOptions = { builtins, directories: config.commandDirs };
    const loader = createCommandLoader(sourceOptions);

    const commands = await getCommands({
      source: createCommandSource(sourceOptions),
      allowCached: config.cache.enabled && !global.noCache,
      cachePath: config.cache.path,
    });

    ctx = {
      ...createContext({ presenter, logger, env, cwd, repoRoot, config }),
      commands,
      loadCommand: (module) => loader.load(module),
      discoverCommands: () => buildCommandTable(createCommandSource(sourceOptions)),
    };

    const dispatch = resolveDispatch(cmdPath, rest, global);
    const cmd = findCommand(commands, dispatch.word);
    logger.debug("Dispatching command", { command: cmd.name, module: cmd.module });
    const unit = await loader.load(cmd.module);

    const result = await unit.run(ctx, dispatch.argv, { ...global, ...flagsObj });

    if (global.json) {
      presenter.json({
        ok: true,
        data: result ?? null,
        ...(ctx.diagnostics.length > 0 && { warnings: ctx.diagnostics }),
      });
    }
    return typeof result === "number" ? result : 0;
  } catch (error) {
    return reportError(error, presenter, ctx);
  }
}

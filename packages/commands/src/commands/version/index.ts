import type { CommandUnit } from "../../registry/types";
import { PROGRAM_NAME } from "../../presentation/command-help";

export const CLI_VERSION = "0.1.0";

export function getVersion(env: NodeJS.ProcessEnv = process.env): string {
  return env.PATCHPILE_VERSION || CLI_VERSION;
}

const version: CommandUnit = {
  usage: [""],
  kind: "repo",
  help: "Print version information",
  run(ctx) {
    const v = getVersion(ctx.env);
    if (ctx.presenter.isJSON) {
      return { version: v };
    }
    ctx.presenter.write(`${PROGRAM_NAME} ${v}`);
    return 0;
  },
};

export default version;

import type { Presenter, TextSink } from "./types";

export function createTextPresenter(
  isQuiet: boolean = false,
  out: TextSink = process.stdout,
): Presenter {
  const isTTY = process.stdout.isTTY === true;
  return {
    isTTY,
    isQuiet,
    isJSON: false,
    out,
    write: (line) => {
      if (!isQuiet) {
        console.log(line);
      }
    },
    warn: (line) => {
      if (!isQuiet) {
        console.warn(line);
      }
    },
    error: (line) => console.error(line),
    json: (payload) => {
      console.log(JSON.stringify(payload));
    },
  };
}

import { createBufferSink } from "./sink";
import type { Presenter } from "./types";

export function createJsonPresenter(): Presenter {
  return {
    isTTY: false,
    isQuiet: false,
    isJSON: true,
    // raw command output would break the JSON document on stdout
    out: createBufferSink(),
    write: (_line) => { },                           // the run result is the document
    warn: (_line) => { },
    error: (line) =>
      console.log(JSON.stringify({ ok: false, error: { message: line } })),
    json: (payload) => {
      console.log(JSON.stringify(payload));
    },
  };
}

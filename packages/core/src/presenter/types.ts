/** Anything text can be written to: process.stdout, a file stream, a buffer. */
export interface TextSink {
  write(chunk: string): unknown;
}

export interface Presenter {
  isTTY: boolean;
  isQuiet: boolean;
  isJSON: boolean;
  /** Where commands write their own output (listings, generated text). */
  out: TextSink;
  write(line: string): void;
  warn(line: string): void;
  error(line: string): void;
  json(payload: unknown): void;
}

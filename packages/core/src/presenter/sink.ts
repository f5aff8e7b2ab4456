import type { TextSink } from "./types";

export interface BufferSink extends TextSink {
  write(chunk: string): true;
  toString(): string;
}

export function createBufferSink(): BufferSink {
  const chunks: string[] = [];
  return {
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
    toString() {
      return chunks.join("");
    },
  };
}

import { createReadStream as fsCreateReadStream, createWriteStream as fsCreateWriteStream } from "node:fs";
import type { ReadStream, WriteStream } from "node:fs";
import { once } from "node:events";
import type { Readable, Writable } from "node:stream";

const READ_HIGH_WATER_MARK = 64 * 1024;
const WRITE_HIGH_WATER_MARK = 16 * 1024;

const abortError = () => new Error("Operation aborted");

const attachAbortHandler = (stream: ReadStream | WriteStream, signal?: AbortSignal): void => {
  if (!signal) {
    return;
  }

  if (signal.aborted) {
    stream.destroy(abortError());
    return;
  }

  signal.addEventListener(
    "abort",
    () => {
      stream.destroy(abortError());
    },
    { once: true }
  );
};

/** Opens `path` for reading raw bytes; chunks are Buffers. */
export const createReadStream = (path: string, signal?: AbortSignal): ReadStream => {
  const stream = fsCreateReadStream(path, {
    highWaterMark: READ_HIGH_WATER_MARK,
    signal,
  });

  attachAbortHandler(stream, signal);
  return stream;
};

export const createWriteStream = (path: string, signal?: AbortSignal): WriteStream => {
  const stream = fsCreateWriteStream(path, {
    highWaterMark: WRITE_HIGH_WATER_MARK,
    signal,
  });

  attachAbortHandler(stream, signal);
  return stream;
};

/** Drains a readable into a single buffer. */
export const readAll = async (stream: Readable): Promise<Buffer> => {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
};

/** Writes `text`, ends the stream and waits until it has flushed. */
export const writeAll = async (stream: Writable, text: string): Promise<void> => {
  if (!stream.write(text, "utf8")) {
    await once(stream, "drain");
  }
  stream.end();
  await once(stream, "finish");
};

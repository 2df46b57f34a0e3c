import {
  closeSync,
  fstatSync,
  mkdtempSync,
  openSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SyncFileStream } from "../file_stream_sync.ts";
import { copyAll, readAll, readExactly } from "../stream_transfer.ts";
import { SyncMemoryStream } from "../memory_stream_sync.ts";
import { patternBytes } from "./test_streams.ts";

describe("SyncFileStream", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "sync-stream-transfer-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes and reads back a file it opened", () => {
    const path = join(dir, "payload.bin");
    const data = patternBytes(10000);

    const output = SyncFileStream.open(path, "w");
    copyAll(new SyncMemoryStream(data), output, 1024);
    output.close();

    expect(new Uint8Array(readFileSync(path))).toEqual(data);

    const input = SyncFileStream.open(path, "r");
    try {
      expect(readAll(input)).toEqual(data);
    } finally {
      input.close();
    }
  });

  it("reads exact-length headers from a file", () => {
    const path = join(dir, "framed.bin");
    writeFileSync(path, new Uint8Array([0, 3, 7, 8, 9]));

    const input = SyncFileStream.open(path, "r");
    try {
      expect(readExactly(input, 2)).toEqual(new Uint8Array([0, 3]));
      expect(readExactly(input, 3)).toEqual(new Uint8Array([7, 8, 9]));
      expect(() => readExactly(input, 1)).toThrow(
        "End of stream reached with 1 byte left to read.",
      );
    } finally {
      input.close();
    }
  });

  it("leaves a caller-owned descriptor open", () => {
    const path = join(dir, "owned.bin");
    writeFileSync(path, patternBytes(16));
    const fd = openSync(path, "r");

    const stream = new SyncFileStream(fd);
    expect(stream.fd).toBe(fd);
    stream.close();

    expect(fstatSync(fd).size).toBe(16);
    closeSync(fd);
  });

  it("rejects use after close", () => {
    const path = join(dir, "closed.bin");
    const stream = SyncFileStream.open(path, "w");
    stream.close();
    expect(() => stream.write(new Uint8Array([1]), 0, 1)).toThrow(
      "Cannot use a closed file stream",
    );
  });
});

import { describe, expect, it } from "vitest";
import { SyncMemoryStream } from "../memory_stream_sync.ts";
import { IndexOutOfRangeError } from "../stream_errors.ts";
import { captureError, RecordingWritableStream } from "./test_streams.ts";

describe("SyncMemoryStream", () => {
  it("starts empty", () => {
    const stream = new SyncMemoryStream();
    expect(stream.length).toBe(0);
    expect(stream.position).toBe(0);
    expect(stream.read(new Uint8Array(4), 0, 4)).toBe(0);
  });

  it("copies its initial contents", () => {
    const initial = new Uint8Array([1, 2, 3]);
    const stream = new SyncMemoryStream(initial);
    initial[0] = 99;

    expect(stream.length).toBe(3);
    expect(stream.toArray()).toEqual(new Uint8Array([1, 2, 3]));
  });

  it("reads back what was written after seeking", () => {
    const stream = new SyncMemoryStream();
    stream.write(new Uint8Array([0, 5, 6, 7, 0]), 1, 3);
    expect(stream.position).toBe(3);

    stream.position = 0;
    const target = new Uint8Array(5);
    expect(stream.read(target, 1, 4)).toBe(3);
    expect(target).toEqual(new Uint8Array([0, 5, 6, 7, 0]));
    expect(stream.read(target, 0, 5)).toBe(0);
  });

  it("doubles its capacity as it grows", () => {
    const stream = new SyncMemoryStream();
    stream.write(new Uint8Array([1]), 0, 1);
    expect(stream.capacity()).toBe(256);

    stream.write(new Uint8Array(300), 0, 300);
    expect(stream.capacity()).toBe(512);
    expect(stream.length).toBe(301);
    expect(stream.toArray().length).toBe(301);
  });

  it("overwrites in place without changing the length", () => {
    const stream = new SyncMemoryStream(new Uint8Array([1, 2, 3, 4]));
    stream.position = 1;
    stream.write(new Uint8Array([9, 9]), 0, 2);

    expect(stream.toArray()).toEqual(new Uint8Array([1, 9, 9, 4]));
    expect(stream.position).toBe(3);
    expect(stream.length).toBe(4);
  });

  it("zero-fills a gap left by seeking past the end", () => {
    const stream = new SyncMemoryStream(new Uint8Array([1, 2]));
    stream.position = 4;
    stream.write(new Uint8Array([7]), 0, 1);

    expect(stream.toArray()).toEqual(new Uint8Array([1, 2, 0, 0, 7]));
  });

  it("returns 0 when reading past the end", () => {
    const stream = new SyncMemoryStream(new Uint8Array([1, 2]));
    stream.position = 10;
    expect(stream.read(new Uint8Array(2), 0, 2)).toBe(0);
  });

  it("rejects invalid positions", () => {
    const stream = new SyncMemoryStream();
    for (const position of [-1, 1.5]) {
      const error = captureError(() => {
        stream.position = position;
      });
      expect(error).toBeInstanceOf(IndexOutOfRangeError);
      expect(error).toMatchObject({ argumentName: "position" });
    }
  });

  it("rejects windows outside the caller's buffer", () => {
    const stream = new SyncMemoryStream(new Uint8Array([1, 2, 3]));
    expect(captureError(() => stream.read(new Uint8Array(2), 1, 2)))
      .toMatchObject({ argumentName: "count" });
    expect(captureError(() => stream.write(new Uint8Array(2), -1, 1)))
      .toMatchObject({ argumentName: "offset" });
    expect(stream.position).toBe(0);
  });

  it("writes its whole contents to another stream", () => {
    const stream = new SyncMemoryStream(new Uint8Array([4, 5, 6]));
    stream.position = 2;
    const destination = new RecordingWritableStream();

    stream.writeTo(destination);

    expect(destination.writes).toEqual([new Uint8Array([4, 5, 6])]);
    expect(stream.position).toBe(2);
  });

  it("hands writeTo destinations a view limited to the contents", () => {
    const stream = new SyncMemoryStream();
    stream.write(new Uint8Array([1, 2, 3]), 0, 3);
    expect(stream.capacity()).toBe(256);
    const received: Uint8Array[] = [];

    stream.writeTo({
      write: (buffer) => {
        received.push(buffer);
      },
    });

    expect(received).toHaveLength(1);
    expect(received[0].length).toBe(3);
    expect(received[0]).toEqual(new Uint8Array([1, 2, 3]));
  });
});

// Example: iterate the lines of a UTF-8 byte stream lazily.
import { SyncChunkReadableStreamAdapter } from "../src/streams/chunk_stream_adapters_sync.ts";
import type { ISyncChunkSource } from "../src/streams/streams_sync.ts";
import { lines } from "../src/streams/stream_transfer.ts";
import { SyncStreamLineReader } from "../src/text/stream_line_reader_sync.ts";

const bytes = new TextEncoder().encode("alpha\r\nbeta\ngamma\n");

// A framing layer that releases the payload three bytes at a time, so line
// endings fall mid-read.
let offset = 0;
const framed: ISyncChunkSource = {
  readNext: () => {
    if (offset >= bytes.length) {
      return undefined;
    }
    const chunk = bytes.subarray(offset, offset + 3);
    offset += chunk.length;
    return chunk;
  },
  close: () => {},
};

const stream = new SyncChunkReadableStreamAdapter(framed);

let count = 0;
for (const line of lines(new SyncStreamLineReader(stream, { bufferSize: 16 }))) {
  count++;
  console.log(`${count}: ${line}`);
}
console.log(`Read ${count} lines`);

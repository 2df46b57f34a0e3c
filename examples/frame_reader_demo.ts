// Example: read length-prefixed frames from a byte stream with exact reads.
import { SyncMemoryStream } from "../src/streams/memory_stream_sync.ts";
import { readAll, readExactly } from "../src/streams/stream_transfer.ts";

/**
 * Each frame is a two-byte big-endian length followed by that many bytes of
 * payload. The stream below holds two frames and a trailing footer.
 */
const encoder = new TextEncoder();
const decoder = new TextDecoder();

function frame(text: string): Uint8Array {
  const payload = encoder.encode(text);
  const framed = new Uint8Array(2 + payload.length);
  framed[0] = payload.length >> 8;
  framed[1] = payload.length & 0xff;
  framed.set(payload, 2);
  return framed;
}

const stream = new SyncMemoryStream();
for (const part of [frame("hello"), frame("frames"), encoder.encode("EOF")]) {
  stream.write(part, 0, part.length);
}
stream.position = 0;

for (let index = 0; index < 2; index++) {
  const header = readExactly(stream, 2);
  const length = (header[0] << 8) | header[1];
  const payload = readExactly(stream, length);
  console.log(`Frame ${index}: ${decoder.decode(payload)}`);
}

console.log(`Footer: ${decoder.decode(readAll(stream))}`);

// Transfer helpers
export {
  copyAll,
  DEFAULT_BUFFER_SIZE,
  lines,
  readAll,
  readExactly,
  WRITE_TO_BUFFER_SIZE,
  writeTo,
} from "./streams/stream_transfer.ts";

// Errors
export {
  IndexOutOfRangeError,
  InvalidArgumentError,
  UnexpectedEndOfStreamError,
} from "./streams/stream_errors.ts";

// Stream capabilities
export type {
  ISyncChunkSink,
  ISyncChunkSource,
  ISyncLineReader,
  ISyncReadableStream,
  ISyncSeekableStream,
  ISyncWritableStream,
} from "./streams/streams_sync.ts";

// Streams
export { SyncMemoryStream } from "./streams/memory_stream_sync.ts";
export { SyncFileStream } from "./streams/file_stream_sync.ts";
export {
  SyncChunkReadableStreamAdapter,
  SyncChunkWritableStreamAdapter,
} from "./streams/chunk_stream_adapters_sync.ts";

// Line readers
export { StringLineReader } from "./text/string_line_reader.ts";
export type { SyncStreamLineReaderOptions } from "./text/stream_line_reader_sync.ts";
export { SyncStreamLineReader } from "./text/stream_line_reader_sync.ts";

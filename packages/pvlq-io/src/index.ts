// @pvlq/pvlq-io - byte-source/sink adapters for the pvlq codecs.
// They move exactly the bytes of each encoded value and add no framing.

export { ByteReader, ByteWriter, concat } from "./buffer.ts";

export {
  StreamReader,
  StreamWriter,
  type StreamReaderOptions,
  type StreamWriterOptions,
} from "./stream.ts";

export {
  isEnabled,
  matchPattern,
  createValueLogger,
  type Direction,
  type LoggingOptions,
  type ValueLogger,
} from "./logging.ts";

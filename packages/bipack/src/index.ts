// Compact binary encoding: smartints, fixed-width integers, byte arrays and
// strings, written with a Sink and read back with a Source.

export { BipackError, BipackErrorCode, type DecodeOutcome } from "./errors.ts";

export {
  encodeVarint,
  decodeVarint,
  decodeVarintNumber,
  varintLength,
  zigzagEncode,
  zigzagDecode,
  encodeSignedVarint,
  decodeSignedVarint,
  decodeSignedVarintNumber,
  toBigInt,
  MAX_U64,
  MIN_I64,
  MAX_I64,
  MAX_VARINT_LENGTH,
  type DecodeResult,
} from "./binary/varint.ts";

export { concat, encodeUtf8, decodeUtf8, encodeString, encodeBytes } from "./binary/bytes.ts";

export { SliceInput, type ByteInput } from "./input.ts";
export { Source, type SourceOptions } from "./source.ts";
export { Sink, type SinkOptions } from "./sink.ts";
export { pack, unpack, type Packable } from "./pack.ts";

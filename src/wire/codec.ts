import { WireFormatError } from '../common/errors';
import { WireList, WireObject, WireScalar, WireType } from './types';

/**
 * Binary IPC message codec
 * Header: endianness, message type, compressed flag, reserved, int32 total length
 */
export const HEADER_SIZE = 8;

export enum MessageType {
  Async = 0,
  Sync = 1,
  Response = 2,
}

export interface DecodedMessage {
  messageType: MessageType;
  compressed: boolean;
  object: WireObject;
}

const TEXT_DECODER = new TextDecoder();
const TEXT_ENCODER = new TextEncoder();

interface ElementCodec {
  size: number;
  read(view: DataView, offset: number, littleEndian: boolean): WireScalar;
}

function readGuid(view: DataView, offset: number): string {
  let hex = '';
  for (let i = 0; i < 16; i++) {
    hex += view.getUint8(offset + i).toString(16).padStart(2, '0');
  }
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

const int32: ElementCodec = { size: 4, read: (v, o, le) => v.getInt32(o, le) };
const int64: ElementCodec = { size: 8, read: (v, o, le) => v.getBigInt64(o, le) };
const float64: ElementCodec = { size: 8, read: (v, o, le) => v.getFloat64(o, le) };

/** Fixed-width element layouts; symbols are variable width and handled separately */
const ELEMENT_CODECS = new Map<number, ElementCodec>([
  [WireType.Boolean, { size: 1, read: (v, o) => v.getUint8(o) !== 0 }],
  [WireType.Guid, { size: 16, read: (v, o) => readGuid(v, o) }],
  [WireType.Byte, { size: 1, read: (v, o) => v.getUint8(o) }],
  [WireType.Short, { size: 2, read: (v, o, le) => v.getInt16(o, le) }],
  [WireType.Int, int32],
  [WireType.Long, int64],
  [WireType.Real, { size: 4, read: (v, o, le) => v.getFloat32(o, le) }],
  [WireType.Float, float64],
  [WireType.Char, { size: 1, read: (v, o) => String.fromCharCode(v.getUint8(o)) }],
  [WireType.Timestamp, int64],
  [WireType.Month, int32],
  [WireType.Date, int32],
  [WireType.DateTime, float64],
  [WireType.Timespan, int64],
  [WireType.Minute, int32],
  [WireType.Second, int32],
  [WireType.Time, int32],
]);

/**
 * Cursor over one message body
 */
class WireReader {
  private readonly view: DataView;
  offset: number;

  constructor(
    private readonly buffer: Uint8Array,
    private readonly littleEndian: boolean,
    offset = HEADER_SIZE,
  ) {
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    this.offset = offset;
  }

  ensureAvailable(bytes: number): void {
    if (this.offset + bytes > this.buffer.length) {
      throw new WireFormatError(
        `Need ${bytes} bytes at offset ${this.offset}, only ${this.buffer.length - this.offset} available`,
      );
    }
  }

  readI8(): number {
    this.ensureAvailable(1);
    const value = this.view.getInt8(this.offset);
    this.offset += 1;
    return value;
  }

  readU8(): number {
    this.ensureAvailable(1);
    return this.buffer[this.offset++];
  }

  readI32(): number {
    this.ensureAvailable(4);
    const value = this.view.getInt32(this.offset, this.littleEndian);
    this.offset += 4;
    return value;
  }

  readSymbol(): string {
    const end = this.buffer.indexOf(0, this.offset);
    if (end < 0) {
      throw new WireFormatError(`Unterminated symbol at offset ${this.offset}`);
    }
    const text = TEXT_DECODER.decode(this.buffer.subarray(this.offset, end));
    this.offset = end + 1;
    return text;
  }

  readElement(type: number): WireScalar {
    if (type === WireType.Symbol) {
      return this.readSymbol();
    }
    const codec = ELEMENT_CODECS.get(type);
    if (!codec) {
      throw new WireFormatError(`Unknown wire type ${type} at offset ${this.offset - 1}`);
    }
    this.ensureAvailable(codec.size);
    const value = codec.read(this.view, this.offset, this.littleEndian);
    this.offset += codec.size;
    return value;
  }

  readObject(): WireObject {
    const type = this.readI8();

    if (type === WireType.Error) {
      return { kind: 'error', type: WireType.Error, message: this.readSymbol() };
    }
    if (type < 0) {
      return { kind: 'atom', type, value: this.readElement(-type) };
    }
    if (type === WireType.List) {
      return this.readList();
    }
    if (type <= WireType.Time) {
      return this.readVector(type);
    }

    switch (type) {
      case WireType.Table: {
        this.readU8(); // attribute
        const dict = this.readObject();
        if (dict.kind !== 'dict' || dict.keys.kind !== 'vector' || dict.values.kind !== 'list') {
          throw new WireFormatError('Malformed table: expected a dictionary of column names to columns');
        }
        return {
          kind: 'table',
          type: WireType.Table,
          columns: dict.keys.values.map(String),
          data: dict.values.items,
        };
      }
      case WireType.Dict:
      case WireType.SortedDict:
        return {
          kind: 'dict',
          type: type === WireType.SortedDict ? WireType.SortedDict : WireType.Dict,
          keys: this.readObject(),
          values: this.readObject(),
        };
      case WireType.Unary: {
        const primitive = this.readU8();
        if (primitive !== 0) {
          throw new WireFormatError(`Unsupported unary primitive ${primitive}`);
        }
        return { kind: 'null', type: WireType.Unary };
      }
      default:
        throw new WireFormatError(`Unknown wire type ${type} at offset ${this.offset - 1}`);
    }
  }

  private readList(): WireList {
    this.readU8(); // attribute
    const length = this.readI32();
    const items: WireObject[] = [];
    for (let i = 0; i < length; i++) {
      items.push(this.readObject());
    }
    return { kind: 'list', type: WireType.List, items };
  }

  private readVector(type: number): WireObject {
    const attribute = this.readU8();
    const length = this.readI32();
    const values: WireScalar[] = [];
    for (let i = 0; i < length; i++) {
      values.push(this.readElement(type));
    }
    return { kind: 'vector', type, attribute, values };
  }
}

/**
 * Total message length declared in a header
 */
export function messageLength(header: Uint8Array): number {
  if (header.length < HEADER_SIZE) {
    throw new WireFormatError(`Header needs ${HEADER_SIZE} bytes, got ${header.length}`);
  }
  const view = new DataView(header.buffer, header.byteOffset, HEADER_SIZE);
  return view.getInt32(4, header[0] === 1);
}

/**
 * Expand a compressed message into its uncompressed form, header included
 * Back references index a table of recent positions keyed by the xor of two adjacent bytes
 */
export function decompress(message: Uint8Array): Uint8Array {
  const littleEndian = message[0] === 1;
  const view = new DataView(message.buffer, message.byteOffset, message.byteLength);
  if (message.length < HEADER_SIZE + 4) {
    throw new WireFormatError('Compressed message is missing its uncompressed length');
  }
  const total = view.getInt32(HEADER_SIZE, littleEndian);
  const out = new Uint8Array(total);
  out.set(message.subarray(0, HEADER_SIZE));
  out[2] = 0;
  new DataView(out.buffer).setInt32(4, total, littleEndian);

  const positions = new Int32Array(256);
  let s = HEADER_SIZE;
  let p = HEADER_SIZE;
  let d = HEADER_SIZE + 4;
  let flags = 0;
  let bit = 0;

  while (s < total) {
    if (d >= message.length) {
      throw new WireFormatError('Compressed message ended early');
    }
    if (bit === 0) {
      flags = message[d++];
      bit = 1;
    }
    let run = 0;
    const backReference = (flags & bit) !== 0;
    if (backReference) {
      let r = positions[message[d++]];
      out[s++] = out[r++];
      out[s++] = out[r++];
      run = message[d++];
      for (let m = 0; m < run; m++) {
        out[s + m] = out[r + m];
      }
    } else {
      out[s++] = message[d++];
    }
    while (p < s - 1) {
      positions[out[p] ^ out[p + 1]] = p++;
    }
    if (backReference) {
      s += run;
      p = s;
    }
    bit = bit === 128 ? 0 : bit * 2;
  }
  return out;
}

function toMessageType(byte: number): MessageType {
  switch (byte) {
    case 0:
      return MessageType.Async;
    case 1:
      return MessageType.Sync;
    case 2:
      return MessageType.Response;
    default:
      throw new WireFormatError(`Unknown message type ${byte}`);
  }
}

export function decodeMessage(message: Uint8Array): DecodedMessage {
  if (message.length < HEADER_SIZE) {
    throw new WireFormatError(`Message shorter than its header: ${message.length} bytes`);
  }
  const littleEndian = message[0] === 1;
  const messageType = toMessageType(message[1]);
  const compressed = message[2] !== 0;
  const body = compressed ? decompress(message) : message;
  const reader = new WireReader(body, littleEndian);
  return { messageType, compressed, object: reader.readObject() };
}

/**
 * Frame query text as a char vector message
 */
export function encodeQuery(text: string, messageType: MessageType = MessageType.Sync): Uint8Array {
  const payload = TEXT_ENCODER.encode(text);
  const total = HEADER_SIZE + 6 + payload.length;
  const message = new Uint8Array(total);
  const view = new DataView(message.buffer);

  message[0] = 1; // little endian
  message[1] = messageType;
  view.setInt32(4, total, true);
  message[HEADER_SIZE] = WireType.Char;
  message[HEADER_SIZE + 1] = 0; // attribute
  view.setInt32(HEADER_SIZE + 2, payload.length, true);
  message.set(payload, HEADER_SIZE + 6);
  return message;
}

import { decodeMessage, decompress, encodeQuery, messageLength, MessageType } from './codec';
import { WireFormatError } from '../common/errors';
import { WireType } from './types';
import { ascii, int32le, responseMessage as response } from '../../test/utils/wire-messages';

describe('codec', () => {
  describe('decodeMessage', () => {
    it('should decode a long atom', () => {
      const decoded = decodeMessage(response([0xf9, 5, 0, 0, 0, 0, 0, 0, 0]));

      expect(decoded.messageType).toBe(MessageType.Response);
      expect(decoded.compressed).toBe(false);
      expect(decoded.object).toEqual({ kind: 'atom', type: -7, value: 5n });
    });

    it('should decode a symbol atom', () => {
      const decoded = decodeMessage(response([0xf5, ...ascii('GOOG'), 0]));

      expect(decoded.object).toEqual({ kind: 'atom', type: -11, value: 'GOOG' });
    });

    it('should decode a boolean vector with its attribute', () => {
      const decoded = decodeMessage(response([1, 1, ...int32le(3), 1, 0, 1]));

      expect(decoded.object).toEqual({
        kind: 'vector',
        type: WireType.Boolean,
        attribute: 1,
        values: [true, false, true],
      });
    });

    it('should decode a symbol vector', () => {
      const decoded = decodeMessage(response([11, 0, ...int32le(2), ...ascii('GOOG'), 0, ...ascii('MSFT'), 0]));

      expect(decoded.object).toEqual({ kind: 'vector', type: 11, attribute: 0, values: ['GOOG', 'MSFT'] });
    });

    it('should decode int, date and short vectors including null sentinels', () => {
      expect(decodeMessage(response([6, 0, ...int32le(2), ...int32le(42), 0, 0, 0, 0x80])).object).toEqual({
        kind: 'vector',
        type: WireType.Int,
        attribute: 0,
        values: [42, -2147483648],
      });
      expect(decodeMessage(response([14, 0, ...int32le(1), ...int32le(8780)])).object).toEqual({
        kind: 'vector',
        type: WireType.Date,
        attribute: 0,
        values: [8780],
      });
      expect(decodeMessage(response([5, 0, ...int32le(1), 0x00, 0x80])).object).toEqual({
        kind: 'vector',
        type: WireType.Short,
        attribute: 0,
        values: [-32768],
      });
    });

    it('should decode a float atom', () => {
      const decoded = decodeMessage(response([0xf7, 0, 0, 0, 0, 0, 0, 0xf8, 0x3f]));

      expect(decoded.object).toEqual({ kind: 'atom', type: -9, value: 1.5 });
    });

    it('should decode a char vector into single characters', () => {
      const decoded = decodeMessage(response([10, 0, ...int32le(2), ...ascii('hi')]));

      expect(decoded.object).toEqual({ kind: 'vector', type: 10, attribute: 0, values: ['h', 'i'] });
    });

    it('should decode a guid atom as text', () => {
      const bytes = Array.from({ length: 16 }, (_, i) => i);
      const decoded = decodeMessage(response([0xfe, ...bytes]));

      expect(decoded.object).toEqual({ kind: 'atom', type: -2, value: '00010203-0405-0607-0809-0a0b0c0d0e0f' });
    });

    it('should decode a general list', () => {
      const decoded = decodeMessage(response([0, 0, ...int32le(2), 0xfa, ...int32le(1), 0xf5, ...ascii('x'), 0]));

      expect(decoded.object).toEqual({
        kind: 'list',
        type: 0,
        items: [
          { kind: 'atom', type: -6, value: 1 },
          { kind: 'atom', type: -11, value: 'x' },
        ],
      });
    });

    it('should decode a table', () => {
      const decoded = decodeMessage(
        response([
          98, 0, 99,
          11, 0, ...int32le(2), ...ascii('sym'), 0, ...ascii('px'), 0,
          0, 0, ...int32le(2),
          11, 0, ...int32le(1), ...ascii('A'), 0,
          9, 0, ...int32le(1), 0, 0, 0, 0, 0, 0, 0xf8, 0x3f,
        ]),
      );

      expect(decoded.object).toEqual({
        kind: 'table',
        type: 98,
        columns: ['sym', 'px'],
        data: [
          { kind: 'vector', type: 11, attribute: 0, values: ['A'] },
          { kind: 'vector', type: 9, attribute: 0, values: [1.5] },
        ],
      });
    });

    it('should decode a dictionary', () => {
      const decoded = decodeMessage(
        response([99, 11, 0, ...int32le(1), ...ascii('a'), 0, 6, 0, ...int32le(1), ...int32le(7)]),
      );

      expect(decoded.object).toEqual({
        kind: 'dict',
        type: 99,
        keys: { kind: 'vector', type: 11, attribute: 0, values: ['a'] },
        values: { kind: 'vector', type: 6, attribute: 0, values: [7] },
      });
    });

    it('should decode generic null and errors', () => {
      expect(decodeMessage(response([101, 0])).object).toEqual({ kind: 'null', type: 101 });
      expect(decodeMessage(response([0x80, ...ascii('type'), 0])).object).toEqual({
        kind: 'error',
        type: -128,
        message: 'type',
      });
    });

    it('should decode big-endian messages', () => {
      const message = Uint8Array.from([0, 2, 0, 0, 0, 0, 0, 13, 0xfa, 0, 0, 0, 42]);

      expect(messageLength(message)).toBe(13);
      expect(decodeMessage(message).object).toEqual({ kind: 'atom', type: -6, value: 42 });
    });

    it('should reject unknown types', () => {
      expect(() => decodeMessage(response([0xfd, 0]))).toThrow(WireFormatError);
      expect(() => decodeMessage(response([100, 0]))).toThrow('Unknown wire type 100 at offset 8');
      expect(() => decodeMessage(response([101, 3]))).toThrow('Unsupported unary primitive 3');
    });

    it('should reject truncated bodies', () => {
      expect(() => decodeMessage(response([0xf9, 1, 2, 3]))).toThrow(WireFormatError);
      expect(() => decodeMessage(Uint8Array.from([1, 2, 0]))).toThrow('Message shorter than its header: 3 bytes');
    });

    it('should reject unknown message types', () => {
      expect(() => decodeMessage(Uint8Array.from([1, 7, 0, 0, 10, 0, 0, 0, 101, 0]))).toThrow('Unknown message type 7');
    });
  });

  describe('decompress', () => {
    const payload = [10, 0, ...int32le(8), ...ascii('abababab')];
    const uncompressed = response(payload);
    // 8 literals, then one back reference covering the remaining 6 bytes
    const compressed = Uint8Array.from([
      1, 2, 1, 0, ...int32le(24), ...int32le(22),
      0x00, ...payload.slice(0, 8),
      0x01, 0x03, 0x04,
    ]);

    it('should expand back references into the original bytes', () => {
      expect(decompress(compressed)).toEqual(uncompressed);
    });

    it('should decode compressed and uncompressed forms to the same object', () => {
      const fromCompressed = decodeMessage(compressed);

      expect(fromCompressed.compressed).toBe(true);
      expect(fromCompressed.object).toEqual(decodeMessage(uncompressed).object);
      expect(fromCompressed.object).toEqual({
        kind: 'vector',
        type: 10,
        attribute: 0,
        values: ['a', 'b', 'a', 'b', 'a', 'b', 'a', 'b'],
      });
    });

    it('should reject a compressed message that ends early', () => {
      expect(() => decompress(compressed.subarray(0, 20))).toThrow('Compressed message ended early');
    });
  });

  describe('encodeQuery', () => {
    it('should frame query text as a sync char vector', () => {
      const message = encodeQuery('count t');

      expect(Array.from(message)).toEqual([1, 1, 0, 0, 21, 0, 0, 0, 10, 0, 7, 0, 0, 0, ...ascii('count t')]);
    });

    it('should decode back to the query text', () => {
      const decoded = decodeMessage(encodeQuery('select from t', MessageType.Async));

      expect(decoded.messageType).toBe(MessageType.Async);
      expect(decoded.object).toEqual({
        kind: 'vector',
        type: 10,
        attribute: 0,
        values: [...'select from t'],
      });
    });
  });
});

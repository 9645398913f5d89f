import { MessageBuffer } from './message-buffer';
import { encodeQuery } from './codec';
import { WireFormatError } from '../common/errors';

describe('MessageBuffer', () => {
  let buffer: MessageBuffer;

  beforeEach(() => {
    buffer = new MessageBuffer();
  });

  it('should return a complete message from a single chunk', () => {
    const message = encodeQuery('count trades');

    expect(buffer.processChunk(message)).toEqual([message]);
    expect(buffer.remainingBytes).toBe(0);
  });

  it('should hold a message split across chunks until it is complete', () => {
    const message = encodeQuery('count trades');

    expect(buffer.processChunk(message.subarray(0, 5))).toEqual([]);
    expect(buffer.processChunk(message.subarray(5, 12))).toEqual([]);
    expect(buffer.remainingBytes).toBe(12);
    expect(buffer.processChunk(message.subarray(12))).toEqual([message]);
  });

  it('should split several messages arriving in one chunk', () => {
    const first = encodeQuery('a');
    const second = encodeQuery('bb');
    const chunk = new Uint8Array(first.length + second.length + 3);
    chunk.set(first);
    chunk.set(second, first.length);
    chunk.set(second.subarray(0, 3), first.length + second.length);

    expect(buffer.processChunk(chunk)).toEqual([first, second]);
    expect(buffer.remainingBytes).toBe(3);
  });

  it('should reject a header declaring a length shorter than itself', () => {
    const header = Uint8Array.from([1, 2, 0, 0, 0, 0, 0, 0]);

    expect(() => buffer.processChunk(header)).toThrow(WireFormatError);
    expect(() => new MessageBuffer().processChunk(header)).toThrow(
      'Message length 0 is shorter than the 8 byte header',
    );
  });

  it('should drop partial data on clear', () => {
    buffer.processChunk(encodeQuery('a').subarray(0, 4));
    buffer.clear();

    expect(buffer.remainingBytes).toBe(0);
  });
});

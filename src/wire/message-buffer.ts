import { WireFormatError } from '../common/errors';
import { HEADER_SIZE, messageLength } from './codec';

/**
 * Reassembles framed IPC messages from arbitrary socket chunks
 * Holds incomplete messages across chunk boundaries
 */
export class MessageBuffer {
  private buffer: Uint8Array = new Uint8Array(0);

  /**
   * Process a new chunk of socket data
   * @returns complete messages, header included, in arrival order
   * @throws WireFormatError when a header declares a length shorter than itself
   */
  processChunk(chunk: Uint8Array): Uint8Array[] {
    this.append(chunk);

    const messages: Uint8Array[] = [];
    while (this.buffer.length >= HEADER_SIZE) {
      const length = messageLength(this.buffer);
      if (length < HEADER_SIZE) {
        throw new WireFormatError(`Message length ${length} is shorter than the ${HEADER_SIZE} byte header`);
      }
      if (this.buffer.length < length) {
        break;
      }
      messages.push(this.buffer.slice(0, length));
      this.buffer = this.buffer.subarray(length);
    }
    return messages;
  }

  clear(): void {
    this.buffer = new Uint8Array(0);
  }

  get remainingBytes(): number {
    return this.buffer.length;
  }

  private append(chunk: Uint8Array): void {
    if (this.buffer.length === 0) {
      this.buffer = Uint8Array.from(chunk);
      return;
    }
    const combined = new Uint8Array(this.buffer.length + chunk.length);
    combined.set(this.buffer);
    combined.set(chunk, this.buffer.length);
    this.buffer = combined;
  }
}

/**
 * Append-only byte sink for the encoder.
 *
 * Capacity doubles (or jumps straight to the required size when doubling
 * is not enough). One instance per encode call.
 */

const DEFAULT_CAPACITY = 1024;

export class ByteBuffer {
  private buf: Uint8Array;
  private view: DataView;
  private pos = 0;

  constructor(initialCapacity: number = DEFAULT_CAPACITY) {
    this.buf = new Uint8Array(Math.max(1, initialCapacity));
    this.view = new DataView(this.buf.buffer);
  }

  /** Bytes written so far. */
  get length(): number {
    return this.pos;
  }

  /** Current backing-store size. */
  get capacity(): number {
    return this.buf.length;
  }

  private ensure(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buf.length) return;

    const next = new Uint8Array(Math.max(this.buf.length * 2, required));
    next.set(this.buf.subarray(0, this.pos));
    this.buf = next;
    this.view = new DataView(next.buffer);
  }

  write(bytes: Uint8Array): void {
    this.ensure(bytes.length);
    this.buf.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  writeUint8(value: number): void {
    this.ensure(1);
    this.view.setUint8(this.pos, value);
    this.pos += 1;
  }

  writeUint16(value: number): void {
    this.ensure(2);
    this.view.setUint16(this.pos, value);
    this.pos += 2;
  }

  writeUint32(value: number): void {
    this.ensure(4);
    this.view.setUint32(this.pos, value);
    this.pos += 4;
  }

  writeUint64(value: bigint): void {
    this.ensure(8);
    this.view.setBigUint64(this.pos, value);
    this.pos += 8;
  }

  writeFloat64(value: number): void {
    this.ensure(8);
    this.view.setFloat64(this.pos, value);
    this.pos += 8;
  }

  /** Copy of exactly the written prefix. */
  finalize(): Uint8Array {
    return this.buf.slice(0, this.pos);
  }
}

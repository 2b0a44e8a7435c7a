/**
 * ByteBuffer — growth and big-endian writers.
 */

import { describe, it, expect } from "vitest";
import { bytesToHex } from "@noble/hashes/utils";
import { ByteBuffer } from "../../src/byte-buffer.js";

describe("ByteBuffer", () => {
  it("writes big-endian", () => {
    const buf = new ByteBuffer();
    buf.writeUint8(0x01);
    buf.writeUint16(0x0203);
    buf.writeUint32(0x04050607);
    buf.writeUint64(0x08090a0b0c0d0e0fn);
    buf.writeFloat64(1.5);
    expect(bytesToHex(buf.finalize())).toBe(
      "01" + "0203" + "04050607" + "08090a0b0c0d0e0f" + "3ff8000000000000",
    );
  });

  it("doubles capacity, or jumps to the required size", () => {
    const buf = new ByteBuffer(4);
    buf.write(new Uint8Array([1, 2, 3]));
    expect(buf.capacity).toBe(4);

    buf.writeUint32(0);
    expect(buf.capacity).toBe(8);

    buf.write(new Uint8Array(100));
    expect(buf.capacity).toBe(107);
    expect(buf.length).toBe(107);
  });

  it("keeps earlier bytes across growth", () => {
    const buf = new ByteBuffer(1);
    for (let i = 0; i < 300; i++) buf.writeUint8(i & 0xff);
    const out = buf.finalize();
    expect(out).toHaveLength(300);
    expect(out[0]).toBe(0);
    expect(out[255]).toBe(255);
    expect(out[299]).toBe(43);
  });

  it("finalize returns a copy of the written prefix", () => {
    const buf = new ByteBuffer(16);
    buf.writeUint8(7);
    const first = buf.finalize();
    buf.writeUint8(8);
    expect(Array.from(first)).toEqual([7]);
    expect(Array.from(buf.finalize())).toEqual([7, 8]);
  });
});

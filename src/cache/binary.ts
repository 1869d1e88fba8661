// src/cache/binary.ts
import { decodeCp1252, encodeCp1252 } from "./cp1252.js";
import { OutOfBoundsError } from "./errors.js";

/**
 * Forward-only big-endian reader over a borrowed byte view.
 *
 * A cursor lives for a single decode call. After an {@link OutOfBoundsError}
 * its position is unspecified and it must not be read again.
 */
export class ByteCursor {
  private offset = 0;
  private readonly buf: Buffer;

  public constructor(bytes: Uint8Array) {
    this.buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  public position(): number {
    return this.offset;
  }

  public remaining(): number {
    return this.buf.length - this.offset;
  }

  public atEnd(): boolean {
    return this.offset >= this.buf.length;
  }

  public peekU8(): number {
    this.ensure(1);
    return this.buf.readUInt8(this.offset);
  }

  public readU8(): number {
    this.ensure(1);
    const v = this.buf.readUInt8(this.offset);
    this.offset += 1;
    return v;
  }

  public readI8(): number {
    this.ensure(1);
    const v = this.buf.readInt8(this.offset);
    this.offset += 1;
    return v;
  }

  public readU16(): number {
    this.ensure(2);
    const v = this.buf.readUInt16BE(this.offset);
    this.offset += 2;
    return v;
  }

  public readI16(): number {
    this.ensure(2);
    const v = this.buf.readInt16BE(this.offset);
    this.offset += 2;
    return v;
  }

  public readU24(): number {
    this.ensure(3);
    const v = this.buf.readUIntBE(this.offset, 3);
    this.offset += 3;
    return v;
  }

  public readI32(): number {
    this.ensure(4);
    const v = this.buf.readInt32BE(this.offset);
    this.offset += 4;
    return v;
  }

  public readU32(): number {
    this.ensure(4);
    const v = this.buf.readUInt32BE(this.offset);
    this.offset += 4;
    return v;
  }

  /** One byte below 0x80, otherwise two bytes minus 0x8000 (0..32767). */
  public readSmart(): number {
    return this.peekU8() < 0x80 ? this.readU8() : this.readU16() - 0x8000;
  }

  /** Two bytes when the high bit is clear, otherwise four bytes masked to 31 bits. */
  public readBigSmart(): number {
    return this.peekU8() < 0x80 ? this.readU16() : this.readU32() & 0x7fffffff;
  }

  /** Sum of smarts, continuing while a smart equals 32767. */
  public readExtendedSmart(): number {
    let total = 0;
    let part = this.readSmart();
    while (part === 0x7fff) {
      total += 0x7fff;
      part = this.readSmart();
    }
    return total + part;
  }

  /** NUL-terminated cp1252 string; the terminator is consumed. */
  public readString(): string {
    const end = this.buf.indexOf(0, this.offset);
    if (end === -1) {
      throw new OutOfBoundsError(this.offset, this.remaining() + 1, this.remaining());
    }
    const text = decodeCp1252(this.buf.subarray(this.offset, end));
    this.offset = end + 1;
    return text;
  }

  /** `length` bytes of cp1252 text, cut at the first NUL inside them. */
  public readFixedString(length: number): string {
    const bytes = this.readBytes(length);
    const end = bytes.indexOf(0);
    return decodeCp1252(end === -1 ? bytes : bytes.subarray(0, end));
  }

  public readBytes(n: number): Uint8Array {
    if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid read length: ${n}`);
    this.ensure(n);
    const out = this.buf.subarray(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }

  public skip(n: number): void {
    if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid skip length: ${n}`);
    this.ensure(n);
    this.offset += n;
  }

  private ensure(n: number): void {
    if (this.offset + n > this.buf.length) {
      throw new OutOfBoundsError(this.offset, n, this.remaining());
    }
  }
}

export class BinaryWriter {
  private readonly chunks: Buffer[] = [];

  public writeU8(v: number): this {
    if (!Number.isInteger(v) || v < 0 || v > 0xff) throw new Error(`U8 out of range: ${v}`);
    this.chunks.push(Buffer.of(v));
    return this;
  }

  public writeI8(v: number): this {
    if (!Number.isInteger(v) || v < -0x80 || v > 0x7f) throw new Error(`I8 out of range: ${v}`);
    return this.writeU8(v & 0xff);
  }

  public writeU16(v: number): this {
    if (!Number.isInteger(v) || v < 0 || v > 0xffff) throw new Error(`U16 out of range: ${v}`);
    const b = Buffer.alloc(2);
    b.writeUInt16BE(v, 0);
    this.chunks.push(b);
    return this;
  }

  public writeI16(v: number): this {
    if (!Number.isInteger(v) || v < -0x8000 || v > 0x7fff) throw new Error(`I16 out of range: ${v}`);
    return this.writeU16(v & 0xffff);
  }

  public writeU24(v: number): this {
    if (!Number.isInteger(v) || v < 0 || v > 0xffffff) throw new Error(`U24 out of range: ${v}`);
    const b = Buffer.alloc(3);
    b.writeUIntBE(v, 0, 3);
    this.chunks.push(b);
    return this;
  }

  public writeI32(v: number): this {
    if (!Number.isInteger(v) || v < -0x80000000 || v > 0x7fffffff) {
      throw new Error(`I32 out of range: ${v}`);
    }
    const b = Buffer.alloc(4);
    b.writeInt32BE(v, 0);
    this.chunks.push(b);
    return this;
  }

  public writeU32(v: number): this {
    if (!Number.isInteger(v) || v < 0 || v > 0xffffffff) throw new Error(`U32 out of range: ${v}`);
    const b = Buffer.alloc(4);
    b.writeUInt32BE(v >>> 0, 0);
    this.chunks.push(b);
    return this;
  }

  public writeSmart(v: number): this {
    if (!Number.isInteger(v) || v < 0 || v > 0x7fff) throw new Error(`Smart out of range: ${v}`);
    return v < 0x80 ? this.writeU8(v) : this.writeU16(v + 0x8000);
  }

  public writeBigSmart(v: number): this {
    if (!Number.isInteger(v) || v < 0 || v > 0x7fffffff) {
      throw new Error(`Big smart out of range: ${v}`);
    }
    return v < 0x8000 ? this.writeU16(v) : this.writeU32((v | 0x80000000) >>> 0);
  }

  public writeExtendedSmart(v: number): this {
    if (!Number.isInteger(v) || v < 0) throw new Error(`Extended smart out of range: ${v}`);
    let rest = v;
    while (rest >= 0x7fff) {
      this.writeSmart(0x7fff);
      rest -= 0x7fff;
    }
    return this.writeSmart(rest);
  }

  public writeString(text: string): this {
    const bytes = encodeCp1252(text);
    if (bytes.includes(0)) throw new Error("String must not contain NUL");
    this.chunks.push(Buffer.from(bytes));
    return this.writeU8(0);
  }

  public writeBytes(bytes: Uint8Array): this {
    this.chunks.push(Buffer.from(bytes));
    return this;
  }

  public toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

import { FormatError } from "./errors.js";

export class BinaryReader {
  private offset: number;

  public constructor(
    private readonly buf: Uint8Array,
    start = 0,
  ) {
    this.offset = start;
  }

  public position(): number {
    return this.offset;
  }

  public remaining(): number {
    return this.buf.length - this.offset;
  }

  public peekU8(): number | undefined {
    return this.buf[this.offset];
  }

  public readU8(): number {
    this.ensure(1);
    const v = this.buf[this.offset]!;
    this.offset += 1;
    return v;
  }

  public readU16BE(): number {
    this.ensure(2);
    const v = (this.buf[this.offset]! << 8) | this.buf[this.offset + 1]!;
    this.offset += 2;
    return v;
  }

  public readU24BE(): number {
    this.ensure(3);
    const v =
      (this.buf[this.offset]! << 16) | (this.buf[this.offset + 1]! << 8) | this.buf[this.offset + 2]!;
    this.offset += 3;
    return v;
  }

  public readBytes(n: number): Uint8Array {
    if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid read length: ${n}`);
    this.ensure(n);
    const out = this.buf.subarray(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }

  public rest(): Uint8Array {
    return this.buf.subarray(this.offset);
  }

  private ensure(n: number): void {
    if (this.offset + n > this.buf.length) {
      throw new FormatError(
        "SHORT_READ",
        `Unexpected end of data at ${this.offset}: need ${n} bytes, have ${this.remaining()}`,
      );
    }
  }
}

export class BinaryWriter {
  private readonly chunks: Uint8Array[] = [];

  public writeU8(v: number): void {
    if (!Number.isInteger(v) || v < 0 || v > 0xff) throw new Error(`U8 out of range: ${v}`);
    this.chunks.push(Uint8Array.of(v));
  }

  public writeBytes(bytes: ArrayLike<number>): void {
    this.chunks.push(Uint8Array.from(bytes));
  }

  public toBytes(): Uint8Array {
    return Buffer.concat(this.chunks);
  }
}

/**
 * Single-owner output image with a seekable cursor. Writing past the end grows
 * the buffer; bytes between the old end and the write position are zero.
 */
export class RomWriter {
  private buf: Uint8Array;
  private len: number;
  private pos = 0;

  public constructor(initial: Uint8Array) {
    this.buf = Uint8Array.from(initial);
    this.len = initial.length;
  }

  public position(): number {
    return this.pos;
  }

  public length(): number {
    return this.len;
  }

  public seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0) throw new Error(`Invalid seek offset: ${offset}`);
    this.pos = offset;
  }

  public skip(n: number): void {
    this.seek(this.pos + n);
  }

  public writeU8(v: number): void {
    if (!Number.isInteger(v) || v < 0 || v > 0xff) throw new Error(`U8 out of range: ${v}`);
    this.reserve(this.pos + 1);
    this.buf[this.pos] = v;
    this.pos += 1;
    this.len = Math.max(this.len, this.pos);
  }

  public writeBytes(bytes: Uint8Array): void {
    this.reserve(this.pos + bytes.length);
    this.buf.set(bytes, this.pos);
    this.pos += bytes.length;
    this.len = Math.max(this.len, this.pos);
  }

  public toBytes(): Uint8Array {
    return this.buf.slice(0, this.len);
  }

  private reserve(end: number): void {
    if (end <= this.buf.length) return;
    const next = new Uint8Array(Math.max(end, this.buf.length * 2));
    next.set(this.buf.subarray(0, this.len));
    this.buf = next;
  }
}

import { PacketFieldError } from "~/utils/errors";

/**
 * Bounds-checked big-endian cursor over a packet body
 *
 * Every read past the end throws {@link PacketFieldError} tagged with the
 * packet the body belongs to.
 */
export class ByteReader {
  private offset = 0;

  constructor(
    private readonly data: Uint8Array,
    readonly tag: number,
  ) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  u8(field: string): number {
    return this.take(1, field)[0] ?? 0;
  }

  u16(field: string): number {
    const b = this.take(2, field);
    return ((b[0] ?? 0) << 8) | (b[1] ?? 0);
  }

  u32(field: string): number {
    const b = this.take(4, field);
    // >>> 0 keeps the result unsigned
    return (
      (((b[0] ?? 0) << 24) | ((b[1] ?? 0) << 16) | ((b[2] ?? 0) << 8)
        | (b[3] ?? 0)) >>> 0
    );
  }

  bytes(length: number, field: string): Uint8Array {
    return this.take(length, field);
  }

  /** Multiprecision integer: 2-octet bit count, then the value */
  mpi(field: string): Uint8Array {
    const bits = this.u16(field);
    return this.take(Math.ceil(bits / 8), field);
  }

  rest(): Uint8Array {
    return this.take(this.remaining, "rest");
  }

  private take(length: number, field: string): Uint8Array {
    if (length < 0 || this.offset + length > this.data.length) {
      throw new PacketFieldError(`Truncated field: ${field}`, this.tag, {
        offset: this.offset,
        wanted: length,
        available: this.remaining,
      });
    }
    const slice = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }
}

import { assertExtent } from "./extent";

/**
 * Manages reading LE data from buffer and tracking offset position
 */
export class BufferReader {
  private pos: number;

  constructor(private buffer: Buffer, offset = 0) {
    assertExtent(buffer.length, offset, 0, "Reader start");
    this.pos = offset;
  }

  public readWord(): number {
    assertExtent(this.buffer.length, this.pos, 2, "Word");
    const value = this.buffer.readUInt16LE(this.pos);
    this.pos += 2;
    return value;
  }

  public readLong(): number {
    assertExtent(this.buffer.length, this.pos, 4, "Long");
    const value = this.buffer.readUInt32LE(this.pos);
    this.pos += 4;
    return value;
  }

  /** Read `count` consecutive longwords */
  public readLongs(count: number): number[] {
    const values: number[] = [];
    for (let i = 0; i < count; i++) {
      values.push(this.readLong());
    }
    return values;
  }

  public offset(): number {
    return this.pos;
  }
}

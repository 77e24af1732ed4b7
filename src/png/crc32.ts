export class CRC32 {
  private static TABLE: Uint32Array;

  static {
    CRC32.TABLE = new Uint32Array(256);
    for (let i = 0; i < 256; i += 1) {
      let value = i;
      for (let j = 0; j < 8; j += 1) {
        value = value & 1 ? 0xedb88320 ^ (value >>> 1) : value >>> 1;
      }
      CRC32.TABLE[i] = value >>> 0;
    }
  }

  private state = 0xffffffff;

  update(buffer: Uint8Array): this {
    let crc = this.state;
    const len = buffer.length;
    for (let i = 0; i < len; i++) {
      crc = CRC32.TABLE[(crc ^ buffer[i]) & 0xff] ^ (crc >>> 8);
    }
    this.state = crc >>> 0;
    return this;
  }

  digest(): number {
    return (this.state ^ 0xffffffff) >>> 0;
  }

  // CRC-32/ISO-HDLC over the concatenation of `buffers`.
  static calculate(...buffers: Uint8Array[]): number {
    const crc = new CRC32();
    for (const buffer of buffers) {
      crc.update(buffer);
    }
    return crc.digest();
  }
}

/**
 * XOR checksum used by tape data blocks
 *
 * The checksum byte following each 192-byte payload is the XOR of all
 * payload bytes.
 */

export class XorChecksum {
  /**
   * Calculate the XOR checksum for given data
   * @param data Input data as Uint8Array
   * @returns 8-bit checksum value
   */
  static calculate(data: Uint8Array): number {
    let x = 0;
    for (const byte of data) {
      x ^= byte;
    }
    return x & 0xFF;
  }

  /**
   * Verify data integrity using the XOR checksum
   * @param data Payload bytes
   * @param expected Checksum byte read from tape
   * @returns true if checksum matches
   */
  static verify(data: Uint8Array, expected: number): boolean {
    return XorChecksum.calculate(data) === expected;
  }
}

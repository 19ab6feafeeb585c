import { describe, it, expect } from 'vitest';
import { encodeMatrixNpy, encodeNpy } from '@/lib/pipeline/utils/npy';

function readHeader(buffer: Buffer) {
  const length = buffer.readUInt16LE(8);
  return { length, text: buffer.subarray(10, 10 + length).toString('latin1') };
}

describe('encodeNpy', () => {
  const buffer = encodeNpy([1, 2.5, -3], [3]);
  const header = readHeader(buffer);

  it('writes the v1.0 preamble', () => {
    expect([...buffer.subarray(0, 6)]).toEqual([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59]);
    expect(buffer[6]).toBe(1);
    expect(buffer[7]).toBe(0);
  });

  it('pads the header so data starts on a 64-byte boundary', () => {
    expect((10 + header.length) % 64).toBe(0);
    expect(header.text.startsWith("{'descr': '<f8', 'fortran_order': False, 'shape': (3,), }")).toBe(true);
    expect(header.text.endsWith('\n')).toBe(true);
  });

  it('stores little-endian float64 values', () => {
    const offset = 10 + header.length;
    expect(buffer.length).toBe(offset + 24);
    expect(buffer.readDoubleLE(offset)).toBe(1);
    expect(buffer.readDoubleLE(offset + 8)).toBe(2.5);
    expect(buffer.readDoubleLE(offset + 16)).toBe(-3);
  });

  it('rejects a shape that does not fit the values', () => {
    expect(() => encodeNpy([1, 2, 3], [2, 2])).toThrow('Shape (2, 2) does not match 3 values');
  });
});

describe('encodeMatrixNpy', () => {
  it('flattens rows in C order', () => {
    const buffer = encodeMatrixNpy(
      [
        [1, 2],
        [3, 4]
      ],
      2
    );
    const header = readHeader(buffer);

    expect(header.text).toContain("'shape': (2, 2)");
    expect(buffer.readDoubleLE(10 + header.length + 16)).toBe(3);
  });
});

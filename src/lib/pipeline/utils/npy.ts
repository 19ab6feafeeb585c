const MAGIC = Buffer.from([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59]);
const ALIGNMENT = 64;

function formatShape(shape: number[]) {
  return shape.length === 1 ? `(${shape[0]},)` : `(${shape.join(', ')})`;
}

/**
 * Serializes float64 values (C order) as a NumPy `.npy` v1.0 buffer.
 */
export function encodeNpy(values: ArrayLike<number>, shape: number[]): Buffer {
  const expected = shape.reduce((acc, dim) => acc * dim, 1);
  if (expected !== values.length) {
    throw new Error(`Shape ${formatShape(shape)} does not match ${values.length} values`);
  }

  const dict = `{'descr': '<f8', 'fortran_order': False, 'shape': ${formatShape(shape)}, }`;
  // magic + version + header length field, then the header padded so data starts aligned
  const prefixLength = MAGIC.length + 2 + 2;
  const padding = ALIGNMENT - ((prefixLength + dict.length + 1) % ALIGNMENT);
  const header = `${dict}${' '.repeat(padding % ALIGNMENT)}\n`;

  const preamble = Buffer.alloc(prefixLength);
  MAGIC.copy(preamble, 0);
  preamble.writeUInt8(1, 6);
  preamble.writeUInt8(0, 7);
  preamble.writeUInt16LE(header.length, 8);

  const data = Buffer.alloc(values.length * 8);
  for (let i = 0; i < values.length; i += 1) {
    data.writeDoubleLE(values[i], i * 8);
  }

  return Buffer.concat([preamble, Buffer.from(header, 'latin1'), data]);
}

export function encodeMatrixNpy(rows: number[][], columns: number): Buffer {
  return encodeNpy(rows.flat(), [rows.length, columns]);
}

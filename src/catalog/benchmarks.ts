import { open } from "node:fs/promises";

const IO_CHUNK_BYTES = 4 * 1024;

function randomInt(min: number, max: number): number {
  return min + Math.floor(Math.random() * (max - min + 1));
}

/** Naive O(n^3) product of two random n x n integer matrices. */
export function multiplyRandomMatrices(n: number): number[][] {
  const a = Array.from({ length: n }, () => Array.from({ length: n }, () => randomInt(-32_767, 32_767)));
  const b = Array.from({ length: n }, () => Array.from({ length: n }, () => randomInt(-32_767, 32_767)));
  const result = Array.from({ length: n }, () => new Array<number>(n).fill(0));

  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      let sum = 0;
      for (let k = 0; k < n; k++) sum += a[i][k] * b[k][j];
      result[i][j] = sum;
    }
  }
  return result;
}

/** Sieve of Eratosthenes; returns every prime <= maxN. */
export function primesUpTo(maxN: number): number[] {
  if (maxN < 2) return [];
  const composite = new Uint8Array(maxN + 1);
  const primes: number[] = [];
  for (let i = 2; i <= maxN; i++) {
    if (composite[i]) continue;
    primes.push(i);
    for (let j = i * i; j <= maxN; j += i) composite[j] = 1;
  }
  return primes;
}

export function sortRandomArray(size: number): Float64Array {
  const values = new Float64Array(size);
  for (let i = 0; i < size; i++) values[i] = Math.random();
  return values.sort();
}

/**
 * Reads a 4 KiB chunk at a random offset and writes it back reversed,
 * `operations` times. The file must already exist and hold at least one chunk.
 */
export async function randomFileIo(filePath: string, operations: number): Promise<number> {
  const handle = await open(filePath, "r+");
  try {
    const { size } = await handle.stat();
    if (size < IO_CHUNK_BYTES) {
      throw new Error(`${filePath} is smaller than one ${IO_CHUNK_BYTES}-byte chunk`);
    }
    const chunk = Buffer.alloc(IO_CHUNK_BYTES);
    let bytes = 0;
    for (let i = 0; i < operations; i++) {
      const offset = randomInt(0, size - IO_CHUNK_BYTES);
      const { bytesRead } = await handle.read(chunk, 0, IO_CHUNK_BYTES, offset);
      chunk.subarray(0, bytesRead).reverse();
      await handle.write(chunk, 0, bytesRead, offset);
      bytes += bytesRead;
    }
    return bytes;
  } finally {
    await handle.close();
  }
}

import { describe, it, expect } from 'vitest';
import { gzipSync, zlibSync } from 'fflate';
import {
  decodeLayerData,
  decodePayload,
  encodeLayerData,
  flatten,
  reshape,
  unpackGids,
} from './layer-data.js';
import { composeGid } from './gid.js';
import type { Logger, LogContext } from './logger.js';

// ── Helpers ───────────────────────────────────────────────────────────

function leBytes(values: number[]): Uint8Array {
  const bytes = new Uint8Array(values.length * 4);
  const view = new DataView(bytes.buffer);
  values.forEach((v, i) => view.setUint32(i * 4, v, true));
  return bytes;
}

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/** Single-segment zstd frame holding one raw (stored) block. */
function zstdRawFrame(payload: Uint8Array): Uint8Array {
  const header = [0x28, 0xb5, 0x2f, 0xfd, 0x20, payload.length];
  const blockHeader = 1 | (payload.length << 3);
  const block = [blockHeader & 0xff, (blockHeader >> 8) & 0xff, (blockHeader >> 16) & 0xff];
  return new Uint8Array([...header, ...block, ...payload]);
}

function recordingLogger(): Logger & { warnings: Array<[string, LogContext | undefined]> } {
  const warnings: Array<[string, LogContext | undefined]> = [];
  return {
    warnings,
    debug: () => {},
    info: () => {},
    warn: (message, context) => {
      warnings.push([message, context]);
    },
    error: () => {},
  };
}

const GIDS = [1, 2, 0, composeGid(3, true, false, true)];

// ── decodeLayerData ───────────────────────────────────────────────────

describe('decodeLayerData — base64', () => {
  it('decodes uncompressed little-endian GIDs', () => {
    const result = decodeLayerData(toBase64(leBytes(GIDS)), 'base64', undefined);
    expect(result.ok && Array.from(result.value)).toEqual(GIDS);
  });

  it('treats an empty compression attribute as none', () => {
    const result = decodeLayerData(toBase64(leBytes([9])), 'base64', '');
    expect(result.ok && Array.from(result.value)).toEqual([9]);
  });

  it('ignores surrounding whitespace in the payload', () => {
    const text = `\n   ${toBase64(leBytes([4, 5]))}\n  `;
    const result = decodeLayerData(text, 'base64', undefined);
    expect(result.ok && Array.from(result.value)).toEqual([4, 5]);
  });

  it('inflates zlib payloads', () => {
    const text = toBase64(zlibSync(leBytes(GIDS)));
    const result = decodeLayerData(text, 'base64', 'zlib');
    expect(result.ok && Array.from(result.value)).toEqual(GIDS);
  });

  it('inflates gzip payloads', () => {
    const text = toBase64(gzipSync(leBytes(GIDS)));
    const result = decodeLayerData(text, 'base64', 'gzip');
    expect(result.ok && Array.from(result.value)).toEqual(GIDS);
  });

  it('decompresses zstd payloads', () => {
    const text = toBase64(zstdRawFrame(leBytes([7, 8])));
    const result = decodeLayerData(text, 'base64', 'zstd');
    expect(result.ok && Array.from(result.value)).toEqual([7, 8]);
  });

  it('keeps flag bits in the decoded values', () => {
    const result = decodeLayerData(toBase64(leBytes([0x80000005])), 'base64', undefined);
    expect(result.ok && result.value[0]).toBe(0x80000005);
  });

  it('rejects an unknown compression', () => {
    const result = decodeLayerData(toBase64(leBytes([1])), 'base64', 'lzma');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('UnsupportedCompression');
      expect(result.error.message).toBe('Layer compression "lzma" is not supported');
    }
  });

  it('reports corrupt compressed data', () => {
    const result = decodeLayerData(toBase64(leBytes([1, 2, 3])), 'base64', 'zlib');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('CorruptLayerData');
  });

  it('drops trailing bytes that do not form a full GID and warns', () => {
    const logger = recordingLogger();
    const bytes = new Uint8Array([1, 0, 0, 0, 2, 0]);
    const result = decodeLayerData(toBase64(bytes), 'base64', undefined, { logger });
    expect(result.ok && Array.from(result.value)).toEqual([1]);
    expect(logger.warnings).toEqual([
      [
        'Layer data length is not a multiple of 4; dropping trailing bytes',
        { byteLength: 6, dropped: 2 },
      ],
    ]);
  });
});

describe('decodeLayerData — csv', () => {
  it('parses comma-separated integers across lines', () => {
    const result = decodeLayerData('\n1,2,\n3,4\n', 'csv', undefined);
    expect(result.ok && Array.from(result.value)).toEqual([1, 2, 3, 4]);
  });

  it('parses flagged values beyond the signed range', () => {
    const result = decodeLayerData('2147483649', 'csv', undefined);
    expect(result.ok && result.value[0]).toBe(0x80000001);
  });

  it('returns an empty sequence for blank text', () => {
    const result = decodeLayerData('  \n ', 'csv', undefined);
    expect(result.ok && result.value.length).toBe(0);
  });

  it('rejects a non-numeric cell', () => {
    const result = decodeLayerData('1,x,3', 'csv', undefined);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('CorruptLayerData');
      expect(result.error.message).toBe('Invalid CSV tile value "x" at index 1');
    }
  });
});

describe('decodeLayerData — encoding', () => {
  it('rejects an unknown encoding', () => {
    const result = decodeLayerData('abc', 'hex', undefined);
    expect(!result.ok && result.error.kind).toBe('UnsupportedEncoding');
  });

  it('rejects a missing encoding', () => {
    const result = decodeLayerData('1,2', undefined, undefined);
    expect(!result.ok && result.error.message).toBe('Layer data has no encoding');
  });
});

describe('decodePayload', () => {
  it('keeps the decompressed bytes for base64 data', () => {
    const bytes = leBytes([1, 2]);
    const result = decodePayload(toBase64(zlibSync(bytes)), 'base64', 'zlib');
    expect(result.ok && Array.from(result.value.raw)).toEqual(Array.from(bytes));
  });

  it('has no raw bytes for csv data', () => {
    const result = decodePayload('1,2', 'csv', undefined);
    expect(result.ok && result.value.raw.length).toBe(0);
  });
});

describe('unpackGids', () => {
  it('reads from a view that does not start at offset 0', () => {
    const backing = new Uint8Array([0xff, 0xff, 3, 0, 0, 0]);
    expect(Array.from(unpackGids(backing.subarray(2)))).toEqual([3]);
  });
});

// ── encodeLayerData ───────────────────────────────────────────────────

describe('encodeLayerData', () => {
  it('writes csv', () => {
    expect(encodeLayerData([1, 0, 5], 'csv')).toBe('1,0,5');
  });

  it('writes uncompressed base64', () => {
    expect(encodeLayerData([1], 'base64')).toBe('AQAAAA==');
  });

  it('produces payloads the decoder reads back', () => {
    for (const compression of [undefined, 'zlib', 'gzip'] as const) {
      const text = encodeLayerData(GIDS, 'base64', compression);
      const result = decodeLayerData(text, 'base64', compression);
      expect(result.ok && Array.from(result.value)).toEqual(GIDS);
    }
  });
});

// ── reshape / flatten ─────────────────────────────────────────────────

describe('reshape', () => {
  it('slices a flat sequence into rows', () => {
    expect(reshape([1, 2, 3, 4, 5, 6], 3)).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
  });

  it('leaves a short final row when the length is not a multiple of width', () => {
    expect(reshape([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('accepts typed arrays', () => {
    expect(reshape(new Uint32Array([7, 8]), 1)).toEqual([[7], [8]]);
  });

  it('returns no rows for an empty sequence', () => {
    expect(reshape([], 4)).toEqual([]);
  });

  it('inverts flatten for rectangular grids', () => {
    const grid = [
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 9],
    ];
    expect(reshape(flatten(grid), 3)).toEqual(grid);
  });
});

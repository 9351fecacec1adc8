import { describe, it, expect } from 'vitest';
import { pairLines, toWireLines } from '../../../src/domain/model/NjsonRecord.js';
import { lastLine } from '../../../src/domain/services/lastLine.js';
import { InputContractError } from '../../../src/domain/errors/LoaderErrors.js';

describe('pairLines', () => {
  it('should pair key and data lines in order', () => {
    expect(pairLines(['k1', 'd1', 'k2', 'd2'])).toEqual([
      { keyLine: 'k1', dataLine: 'd1' },
      { keyLine: 'k2', dataLine: 'd2' },
    ]);
  });

  it('should return no records for an empty list', () => {
    expect(pairLines([])).toEqual([]);
  });

  it('should reject an odd number of lines', () => {
    expect(() => pairLines(['k1', 'd1', 'k2'])).toThrow(InputContractError);
    expect(() => pairLines(['k1'])).toThrow('Data list size should be an even number.');
  });
});

describe('toWireLines', () => {
  it('should terminate both lines with a single newline', () => {
    expect(toWireLines({ keyLine: '{"index":{"_id":"1"}}', dataLine: '{"a":1}' })).toBe(
      '{"index":{"_id":"1"}}\n{"a":1}\n',
    );
  });
});

describe('lastLine', () => {
  it('should return the only line of a single-line body', () => {
    expect(lastLine('{"errors":false}')).toBe('{"errors":false}');
  });

  it('should ignore a trailing newline', () => {
    expect(lastLine('first\nsecond\n')).toBe('second');
  });

  it('should handle CRLF line endings', () => {
    expect(lastLine('first\r\nsecond\r\n')).toBe('second');
  });

  it('should return null for an empty or missing body', () => {
    expect(lastLine('')).toBeNull();
    expect(lastLine(null)).toBeNull();
    expect(lastLine(undefined)).toBeNull();
  });
});

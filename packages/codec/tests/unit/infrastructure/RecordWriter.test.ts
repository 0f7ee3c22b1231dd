import { describe, it, expect, vi, afterEach } from 'vitest';
import { EOL } from 'node:os';
import { RecordWriter, emit, formatRecord, formatValue } from '../../../src/infrastructure/serializers/RecordWriter.js';
import { MemorySink } from '../../helpers.js';

describe('formatValue', () => {
  it('should render plain objects as compact JSON', () => {
    expect(formatValue({ key: 'value', n: 1 })).toBe('{"key":"value","n":1}');
  });

  it('should render arrays as compact JSON', () => {
    expect(formatValue([1, 'two', { three: 3 }])).toBe('[1,"two",{"three":3}]');
  });

  it('should render maps as JSON objects', () => {
    expect(formatValue(new Map([['a', 1]]))).toBe('{"a":1}');
  });

  it('should render booleans as TRUE and FALSE', () => {
    expect(formatValue(true)).toBe('TRUE');
    expect(formatValue(false)).toBe('FALSE');
  });

  it('should render scalars as their natural string', () => {
    expect(formatValue(42)).toBe('42');
    expect(formatValue(1.5)).toBe('1.5');
    expect(formatValue('text')).toBe('text');
    expect(formatValue(null)).toBe('null');
    expect(formatValue(10n)).toBe('10');
  });

  it('should not treat class instances as structured values', () => {
    const date = new Date(0);
    expect(formatValue(date)).toBe(String(date));
  });
});

describe('formatRecord', () => {
  it('should join key and values with tabs by default', () => {
    expect(formatRecord('k', ['a', 1, true])).toBe(`k\ta\t1\tTRUE${EOL}`);
  });

  it('should use a custom value delimiter', () => {
    expect(formatRecord(100, ['A', 'B', 'C'], ',', '\n')).toBe('100\tA,B,C\n');
  });

  it('should write a key with no values', () => {
    expect(formatRecord('lonely', [], '\t', '\n')).toBe('lonely\t\n');
  });

  it('should accept any iterable of values', () => {
    function* values() {
      yield 'x';
      yield 'y';
    }
    expect(formatRecord('k', values(), '|', '\n')).toBe('k\tx|y\n');
  });
});

describe('RecordWriter', () => {
  it('should write a dict record', () => {
    const sink = new MemorySink();
    new RecordWriter({ stream: sink }).emit('dict', [{ key: 'value' }]);

    expect(sink.text()).toBe(`dict\t{"key":"value"}${EOL}`);
  });

  it('should write a boolean record', () => {
    const sink = new MemorySink();
    new RecordWriter({ stream: sink }).emit('boolean', [true, false]);

    expect(sink.text()).toBe(`boolean\tTRUE\tFALSE${EOL}`);
  });

  it('should write one line per emit and count them', () => {
    const sink = new MemorySink();
    const writer = new RecordWriter({ stream: sink, delimiter: ',', lineEnding: '\n' });

    writer.emit('a', [1, 2]);
    writer.emit('b', [[3, 4]]);

    expect(sink.chunks).toEqual(['a\t1,2\n', 'b\t[3,4]\n']);
    expect(writer.linesWritten).toBe(2);
  });

  describe('default stream', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should write to process.stdout', () => {
      const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      emit('k', ['v']);

      expect(write).toHaveBeenCalledWith(`k\tv${EOL}`);
    });
  });
});

describe('emit', () => {
  it('should write a single record to the given stream', () => {
    const sink = new MemorySink();

    emit('list', [['a', 'b']], { stream: sink, lineEnding: '\n' });

    expect(sink.text()).toBe('list\t["a","b"]\n');
  });
});

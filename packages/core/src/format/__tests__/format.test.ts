import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  formatCsv,
  formatJson,
  formatRaw,
  formatResponse,
  parseOutputFormat,
  toResultSet,
} from '../index.js';

const bruce = {
  numberOfRecordsUpdated: 0,
  columnMetadata: [{ name: 'id' }, { name: 'name' }],
  records: [[{ longValue: 1 }, { stringValue: 'Bruce' }]],
};

// ── ResultSet normalization ──────────────────────────────────────────

describe('toResultSet', () => {
  it('prefers column labels over names', () => {
    const result = toResultSet({ columnMetadata: [{ name: 'user_id', label: 'id' }, { name: 'email' }, {}] });
    assert.deepEqual(result.columns, ['id', 'email', '?']);
  });

  it('maps every field kind to a cell value', () => {
    const result = toResultSet({
      columnMetadata: [{ name: 'a' }, { name: 'b' }, { name: 'c' }, { name: 'd' }, { name: 'e' }, { name: 'f' }],
      records: [
        [
          { isNull: true },
          { booleanValue: false },
          { doubleValue: 2.5 },
          { blobValue: new Uint8Array([104, 105]) },
          { arrayValue: { longValues: [1, 2] } },
          { stringValue: '2024-01-02 03:04:05' },
        ],
      ],
    });
    assert.deepEqual(result.rows, [
      [null, false, 2.5, new Uint8Array([104, 105]), [1, 2], '2024-01-02 03:04:05'],
    ]);
  });

  it('marks responses without column metadata', () => {
    const result = toResultSet({ numberOfRecordsUpdated: 3 });
    assert.deepEqual(result, { columns: [], rows: [], numberOfRecordsUpdated: 3, hasColumnMetadata: false });
  });
});

// ── CSV ──────────────────────────────────────────────────────────────

describe('formatCsv', () => {
  it('writes a header line then one line per row', () => {
    assert.equal(formatCsv(toResultSet(bruce)), 'id,name\n1,Bruce\n');
  });

  it('renders null as empty and quotes special characters', () => {
    const csv = formatCsv(
      toResultSet({
        columnMetadata: [{ name: 'note' }, { name: 'missing' }, { name: 'ok' }],
        records: [[{ stringValue: 'say "hi", then\nleave' }, { isNull: true }, { booleanValue: true }]],
      }),
    );
    assert.equal(csv, 'note,missing,ok\n"say ""hi"", then\nleave",,true\n');
  });

  it('renders blobs as base64 and arrays as JSON', () => {
    const csv = formatCsv(
      toResultSet({
        columnMetadata: [{ name: 'bytes' }, { name: 'tags' }],
        records: [[{ blobValue: new Uint8Array([104, 105]) }, { arrayValue: { stringValues: ['a', 'b'] } }]],
      }),
    );
    assert.equal(csv, 'bytes,tags\naGk=,"[""a"",""b""]"\n');
  });

  it('reports updated records before the rows', () => {
    assert.equal(formatCsv(toResultSet({ numberOfRecordsUpdated: 2 })), 'number_of_records_updated: 2\n');
  });

  it('reports zero updates when there is no column metadata', () => {
    assert.equal(formatCsv(toResultSet({ numberOfRecordsUpdated: 0 })), 'number_of_records_updated: 0\n');
  });
});

// ── JSON ─────────────────────────────────────────────────────────────

describe('formatJson', () => {
  it('writes an array of objects keyed by column', () => {
    assert.equal(formatJson(toResultSet(bruce)), '[{"id":1,"name":"Bruce"}]');
  });

  it('keeps native JSON types and column order', () => {
    const json = formatJson(
      toResultSet({
        columnMetadata: [{ name: 'z' }, { name: 'a' }, { name: 'm' }, { name: 'b' }],
        records: [[{ isNull: true }, { doubleValue: 1.5 }, { booleanValue: true }, { blobValue: new Uint8Array([104, 105]) }]],
      }),
    );
    assert.equal(json, '[{"z":null,"a":1.5,"m":true,"b":"aGk="}]');
  });

  it('keeps numeric-looking, prototype and repeated column names in order', () => {
    const json = formatJson(
      toResultSet({
        columnMetadata: [{ name: 'name' }, { name: '1' }, { name: '__proto__' }, { name: 'name' }],
        records: [[{ stringValue: 'a' }, { longValue: 1 }, { longValue: 2 }, { stringValue: 'b' }]],
      }),
    );
    assert.equal(json, '[{"name":"a","1":1,"__proto__":2,"name":"b"}]');
  });

  it('writes an empty array when there are no rows', () => {
    assert.equal(formatJson(toResultSet({ columnMetadata: [{ name: 'id' }], records: [] })), '[]');
  });
});

// ── raw + dispatch ───────────────────────────────────────────────────

describe('formatRaw', () => {
  it('pretty-prints the whole response', () => {
    assert.equal(
      formatRaw({ numberOfRecordsUpdated: 0, records: [[{ longValue: 1 }]] }),
      '{\n  "numberOfRecordsUpdated": 0,\n  "records": [\n    [\n      {\n        "longValue": 1\n      }\n    ]\n  ]\n}',
    );
  });

  it('renders blobs as base64', () => {
    assert.equal(
      formatRaw({ records: [[{ blobValue: new Uint8Array([104, 105]) }]] }),
      '{\n  "records": [\n    [\n      {\n        "blobValue": "aGk="\n      }\n    ]\n  ]\n}',
    );
  });
});

describe('formatResponse', () => {
  it('ends every format with a newline', () => {
    assert.equal(formatResponse('csv', bruce), 'id,name\n1,Bruce\n');
    assert.equal(formatResponse('json', bruce), '[{"id":1,"name":"Bruce"}]\n');
    assert.equal(formatResponse('raw', bruce).endsWith('}\n'), true);
  });
});

describe('parseOutputFormat', () => {
  it('accepts known formats case-insensitively', () => {
    assert.equal(parseOutputFormat('CSV'), 'csv');
    assert.equal(parseOutputFormat('Json'), 'json');
    assert.equal(parseOutputFormat('raw'), 'raw');
  });

  it('rejects unknown formats', () => {
    assert.equal(parseOutputFormat('cooked'), null);
  });
});

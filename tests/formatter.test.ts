import { describe, expect, it } from 'vitest';

import { formatVersionRow, formatVersionTable, NO_VERSION_DATA } from '../src/output/formatter.js';
import type { VersionRecord } from '../src/types.js';

function record(overrides: Partial<VersionRecord>): VersionRecord {
  return { ref: 'main', category: 'main', golang: '', restApi: '', sdkGo: '', note: '', ...overrides };
}

describe('formatVersionTable', () => {
  it('returns the sentinel for no records', () => {
    expect(formatVersionTable([])).toBe(NO_VERSION_DATA);
    expect(NO_VERSION_DATA).toBe('No version data found.');
  });

  it('renders the header, separator and one row per record in order', () => {
    const output = formatVersionTable([
      record({ golang: '1.21', restApi: 'v1.20.1', sdkGo: 'v1.21.3' }),
      record({ ref: '4.18.0', category: 'release', golang: '1.20', note: 'EOL' }),
    ]);

    expect(output).toBe(
      [
        '| cloud-event-proxy | golang | rest-api | sdk-go | note |',
        '| ----------------- | ------ | -------- | ------ | ---- |',
        '| main | 1.21 | v1.20.1 | v1.21.3 |  |',
        '| 4.18.0 | 1.20 |  |  | EOL |',
      ].join('\n')
    );
  });
});

describe('formatVersionRow', () => {
  it('leaves empty cells for missing fields', () => {
    expect(formatVersionRow(record({ golang: '1.20' }))).toBe('| main | 1.20 |  |  |  |');
  });
});

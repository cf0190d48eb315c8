import { VersionRecord } from '../types.js';

export const NO_VERSION_DATA = 'No version data found.';

const HEADER = '| cloud-event-proxy | golang | rest-api | sdk-go | note |';
const SEPARATOR = '| ----------------- | ------ | -------- | ------ | ---- |';

export function formatVersionRow(record: VersionRecord): string {
  return `| ${record.ref} | ${record.golang} | ${record.restApi} | ${record.sdkGo} | ${record.note} |`;
}

export function formatVersionTable(records: readonly VersionRecord[]): string {
  if (records.length === 0) {
    return NO_VERSION_DATA;
  }

  const lines: string[] = [HEADER, SEPARATOR];
  records.forEach(record => lines.push(formatVersionRow(record)));

  return lines.join('\n');
}

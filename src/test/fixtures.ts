import type { MasterRecord } from '../types';

export const TEST_URL = 'https://data.example.test/master-detail.json';

export const rawRecords = [
  {
    name: 'Nora Flynn',
    account: 177000,
    calls: 24,
    minutes: 1266,
    callRecords: [
      { callId: 555, direction: 'Out', number: '(01) 2000 0001', duration: 72, switchCode: 'SW3' },
      { callId: 556, direction: 'In', number: '(01) 2000 0002', duration: 5000, switchCode: 'SW5' },
    ],
  },
  {
    name: 'Ivo Marsh',
    account: '177001',
    calls: '3',
    minutes: '1234',
    callRecords: [],
  },
];

export function jsonResponse(body: unknown) {
  const text = JSON.stringify(body);
  return {
    ok: true,
    status: 200,
    statusText: 'OK',
    text: () => Promise.resolve(text),
  };
}

export function textResponse(text: string, status = 200, statusText = 'OK') {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: () => Promise.resolve(text),
  };
}

export const makeMaster = (overrides: Partial<MasterRecord> = {}): MasterRecord => ({
  name: 'Test Account',
  account: '100',
  calls: 1,
  minutes: 10,
  details: [{ callId: 'c-1', direction: 'inbound', number: '555-0100', duration: 30, switchCode: 'SW1' }],
  ...overrides,
});

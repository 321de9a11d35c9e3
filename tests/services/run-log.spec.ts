import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createRunId, formatLocalTimestamp, RunLogWriter } from '../../src/services/run-log.js';

const HEADER = 'timestamp,phone,first_name,status,info,run_id,message';

describe('RunLogWriter', () => {
  let workDir: string;
  const fixedNow = () => new Date(2026, 9, 19, 18, 11, 5);

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), 'relay-runlog-spec-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('writes the header once and appends one row per record', async () => {
    const logPath = path.join(workDir, 'send_log.csv');
    const writer = new RunLogWriter({ logPath, runId: 'run-1', now: fixedNow });

    const first = await writer.append({ phone: '+15551234567', firstName: 'Ana', status: 'sent', info: 'ok', message: 'Hi Ana, bye' });
    await writer.append({ phone: '+15551234567', firstName: 'Ana', status: 'sms_sent', info: 'sms ok', message: 'Hi Ana, bye' });

    expect(await readFile(logPath, 'utf8')).toBe(
      [
        HEADER,
        '2026-10-19T18:11:05,+15551234567,Ana,sent,ok,run-1,"Hi Ana, bye"',
        '2026-10-19T18:11:05,+15551234567,Ana,sms_sent,sms ok,run-1,"Hi Ana, bye"',
        '',
      ].join('\n'),
    );
    expect(first).toEqual({
      timestamp: '2026-10-19T18:11:05',
      runId: 'run-1',
      phone: '+15551234567',
      firstName: 'Ana',
      status: 'sent',
      info: 'ok',
      message: 'Hi Ana, bye',
    });
  });

  it('reuses an existing non-empty log without repeating the header', async () => {
    const logPath = path.join(workDir, 'send_log.csv');
    await writeFile(logPath, `${HEADER}\n`, 'utf8');
    const writer = new RunLogWriter({ logPath, runId: 'run-2', now: fixedNow });

    await writer.append({ phone: '', firstName: 'Bo', status: 'failed', info: 'Unusable phone: "12"', message: '' });

    expect(await readFile(logPath, 'utf8')).toBe(
      `${HEADER}\n2026-10-19T18:11:05,,Bo,failed,"Unusable phone: ""12""",run-2,\n`,
    );
  });

  it('writes a header into an existing empty file and creates missing directories', async () => {
    const emptyPath = path.join(workDir, 'empty.csv');
    await writeFile(emptyPath, '', 'utf8');
    await new RunLogWriter({ logPath: emptyPath, runId: 'r', now: fixedNow }).append({
      phone: '+1',
      firstName: '',
      status: 'sent',
      info: 'x',
      message: 'm',
    });
    expect((await readFile(emptyPath, 'utf8')).split('\n')[0]).toBe(HEADER);

    const nestedPath = path.join(workDir, 'nested', 'dir', 'log.csv');
    await new RunLogWriter({ logPath: nestedPath, runId: 'r', now: fixedNow }).append({
      phone: '+1',
      firstName: '',
      status: 'sent',
      info: 'x',
      message: 'm',
    });
    expect(await readFile(nestedPath, 'utf8')).toBe(`${HEADER}\n2026-10-19T18:11:05,+1,,sent,x,r,m\n`);
  });
});

describe('formatLocalTimestamp', () => {
  it('formats local time to the second without an offset', () => {
    expect(formatLocalTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('2026-01-02T03:04:05');
  });
});

describe('createRunId', () => {
  it('combines the start time with a random hex suffix', () => {
    const runId = createRunId(new Date(2026, 0, 2, 3, 4, 5));

    expect(runId).toMatch(/^20260102-030405-[0-9a-f]{6}$/);
    expect(createRunId(new Date(2026, 0, 2, 3, 4, 5))).not.toBe(runId);
  });
});

import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { run } from '../index';
import { makeTempDir, removeTempDirs } from './helpers';

const WARN_CONF = 'ltm pool /Common/p {\n    monitor /Common/http\n        stray value\n}\n';

afterEach(() => {
  removeTempDirs();
  vi.restoreAllMocks();
});

describe('check', () => {
  it('reports PASS as JSON for clean input', async () => {
    const dir = makeTempDir({ 'bigip.conf': 'sys ntp { }\n' });
    const logs: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((msg: string) => logs.push(msg));

    const exitCode = await run(['check', dir, '--format', 'json', '--config', path.join(dir, 'conftree.json')]);

    expect(exitCode).toBe(0);
    expect(JSON.parse(logs[0])).toEqual({
      status: 'PASS',
      parsedFiles: ['bigip.conf'],
      skippedFiles: [],
      objects: 1,
      diagnostics: [],
    });
  });

  it('fails with exit code 1 on unexpected lines in CI mode', async () => {
    const dir = makeTempDir({ 'bigip.conf': WARN_CONF });
    const logs: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((msg: string) => logs.push(msg));
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const exitCode = await run(['check', dir, '--ci', '--config', path.join(dir, 'conftree.json')]);

    expect(exitCode).toBe(1);
    expect(logs).toContain('  [warn] 1 objects from 1 files, 1 unexpected lines');
  });

  it('reads failOnWarnings from the config file', async () => {
    const dir = makeTempDir({ 'bigip.conf': WARN_CONF });
    const config = path.join(dir, 'conftree.json');
    fs.writeFileSync(config, JSON.stringify({ failOnWarnings: true }));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(await run(['check', dir, '--config', config])).toBe(1);
  });

  it('passes without CI mode even when lines were unexpected', async () => {
    const dir = makeTempDir({ 'bigip.conf': WARN_CONF });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(await run(['check', dir, '--config', path.join(dir, 'conftree.json')])).toBe(0);
  });

  it('skips files matching --exclude', async () => {
    const dir = makeTempDir({ 'bigip.conf': 'sys ntp { }\n', 'extra.conf': 'sys dns { }\n' });
    const logs: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((msg: string) => logs.push(msg));

    await run(['check', dir, '--exclude', 'extra', '--format', 'json', '--config', path.join(dir, 'conftree.json')]);

    const report = JSON.parse(logs[0]) as { parsedFiles: string[]; skippedFiles: string[] };
    expect(report.parsedFiles).toEqual(['bigip.conf']);
    expect(report.skippedFiles).toEqual(['extra.conf']);
  });
});

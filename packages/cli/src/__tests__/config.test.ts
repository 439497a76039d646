import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { applyFlagOverrides, loadConfig } from '../config';
import { CLIError } from '../index';
import { makeTempDir, removeTempDirs } from './helpers';

const DEFAULTS = {
  extension: '.conf',
  exclude: ['Common_d', 'bigip_script.conf', '.license'],
  indent: 4,
  failOnWarnings: false,
};

afterEach(() => {
  removeTempDirs();
});

function writeConfig(content: string): string {
  const file = path.join(makeTempDir(), 'conftree.json');
  fs.writeFileSync(file, content);
  return file;
}

describe('loadConfig', () => {
  it('returns defaults when the file is missing', () => {
    expect(loadConfig(path.join(makeTempDir(), 'conftree.json'))).toEqual(DEFAULTS);
  });

  it('fills unset fields with defaults', () => {
    expect(loadConfig(writeConfig('{ "indent": 2, "extension": ".cfg" }'))).toEqual({
      ...DEFAULTS,
      indent: 2,
      extension: '.cfg',
    });
  });

  it('throws CLIError on invalid JSON', () => {
    const file = writeConfig('{ not json');
    expect(() => loadConfig(file)).toThrow(CLIError);
    expect(() => loadConfig(file)).toThrow(`Failed to read ${file}`);
  });

  it('lists every schema violation', () => {
    const file = writeConfig('{ "indent": -1, "bogus": true }');
    expect(() => loadConfig(file)).toThrow('indent: Number must be greater than or equal to 0');
    expect(() => loadConfig(file)).toThrow("(root): Unrecognized key(s) in object: 'bogus'");
  });
});

describe('applyFlagOverrides', () => {
  it('replaces excludes and indent and turns on failOnWarnings in CI mode', () => {
    const args = ['dir', '--exclude', 'a', '--exclude', 'b', '--indent', '0'];
    expect(applyFlagOverrides(DEFAULTS, args, true)).toEqual({
      extension: '.conf',
      exclude: ['a', 'b'],
      indent: 0,
      failOnWarnings: true,
    });
  });

  it('keeps config values when no flags are given', () => {
    expect(applyFlagOverrides(DEFAULTS, ['dir'], false)).toEqual(DEFAULTS);
  });

  it('rejects a non-numeric indent', () => {
    expect(() => applyFlagOverrides(DEFAULTS, ['--indent', 'wide'], false)).toThrow(
      'Invalid --indent value: wide. Use an integer from 0 to 10.'
    );
  });
});

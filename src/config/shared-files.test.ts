/**
 * Tests for shared file parsing and merging
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { SharedProfiles, loadSharedProfiles, parseIni } from './shared-files.js';

describe('parseIni', () => {
  it('should parse sections and keys', () => {
    const data = parseIni(
      ['[default]', 'region = us-east-1', '', '[profile ci]', 'role_arn=arn:aws:iam::123456789012:role/Ci'].join('\n')
    );

    expect(data).toEqual({
      default: { region: 'us-east-1' },
      'profile ci': { role_arn: 'arn:aws:iam::123456789012:role/Ci' },
    });
  });

  it('should skip comments and keys outside sections', () => {
    const data = parseIni(['orphan = 1', '# comment', '; another', '[a]', 'key = value'].join('\n'));
    expect(data).toEqual({ a: { key: 'value' } });
  });

  it('should split on the first equals sign', () => {
    const data = parseIni('[a]\npolicy = {"k":"v=1"}\n');
    expect(data['a']?.['policy']).toBe('{"k":"v=1"}');
  });

  it('should collapse whitespace in section names', () => {
    const data = parseIni('[ profile   spaced ]\nregion = eu-west-1\r\n');
    expect(data['profile spaced']).toEqual({ region: 'eu-west-1' });
  });

  it('should ignore lines without a key', () => {
    expect(parseIni('[a]\n= value\nnot a pair\n')).toEqual({ a: {} });
  });
});

describe('SharedProfiles', () => {
  it('should report credential directives', () => {
    const profiles = new SharedProfiles([
      { name: 'keys', values: { aws_access_key_id: 'AKID' }, origins: {} },
      { name: 'region-only', values: { region: 'us-west-2' }, origins: {} },
    ]);

    expect(profiles.hasCredentialDirectives('keys')).toBe(true);
    expect(profiles.hasCredentialDirectives('region-only')).toBe(false);
    expect(profiles.hasCredentialDirectives('missing')).toBe(false);
    expect(profiles.names()).toEqual(['keys', 'region-only']);
  });

  it('should freeze profile values', () => {
    const profiles = new SharedProfiles([{ name: 'a', values: { region: 'us-east-1' }, origins: {} }]);
    expect(Object.isFrozen(profiles.get('a')?.values)).toBe(true);
  });

  it('should start empty', () => {
    expect(SharedProfiles.empty().names()).toEqual([]);
  });
});

describe('loadSharedProfiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'shared-files-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function write(name: string, content: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content);
    return path;
  }

  it('should map config sections to profile names', async () => {
    const config = await write(
      'config',
      ['[default]', 'region = us-east-1', '[profile dev]', 'region = eu-west-1', '[sso-session corp]', 'sso_region = us-east-1'].join('\n')
    );

    const profiles = await loadSharedProfiles([config], []);

    expect(profiles.names()).toEqual(['default', 'dev']);
    expect(profiles.get('dev')?.values).toEqual({ region: 'eu-west-1' });
  });

  it('should let credentials files override config files', async () => {
    const config = await write('config', '[profile dev]\naws_access_key_id = CONFIGKEY\nregion = eu-west-1\n');
    const credentials = await write('credentials', '[dev]\naws_access_key_id = CREDKEY\naws_secret_access_key = test-secret\n');

    const profiles = await loadSharedProfiles([config], [credentials]);
    const dev = profiles.get('dev');

    expect(dev?.values).toEqual({
      aws_access_key_id: 'CREDKEY',
      aws_secret_access_key: 'test-secret',
      region: 'eu-west-1',
    });
    expect(dev?.origins['aws_access_key_id']).toBe(credentials);
    expect(dev?.origins['region']).toBe(config);
  });

  it('should let later files of one kind override earlier ones', async () => {
    const first = await write('credentials-1', '[default]\naws_access_key_id = FIRST\naws_secret_access_key = test-secret-1\n');
    const second = await write('credentials-2', '[default]\naws_access_key_id = SECOND\n');

    const profiles = await loadSharedProfiles([], [first, second]);

    expect(profiles.get('default')?.values).toEqual({
      aws_access_key_id: 'SECOND',
      aws_secret_access_key: 'test-secret-1',
    });
  });

  it('should skip missing files', async () => {
    const profiles = await loadSharedProfiles([join(dir, 'absent-config')], [join(dir, 'absent-credentials')]);
    expect(profiles.names()).toEqual([]);
  });

  it('should report unreadable paths as configuration errors', async () => {
    await expect(loadSharedProfiles([dir], [])).rejects.toMatchObject({ code: 'CONFIGURATION' });
  });
});

/**
 * Tests for user-agent construction
 */

import { describe, it, expect } from 'vitest';
import { buildUserAgent, formatProduct, normalizeOs } from './index.js';

const RUNTIME = { platform: 'linux', arch: 'x64', nodeVersion: '20.11.1' };

describe('normalizeOs', () => {
  it('should map Node platform names', () => {
    expect(normalizeOs('linux')).toBe('linux');
    expect(normalizeOs('win32')).toBe('windows');
    expect(normalizeOs('darwin')).toBe('macos');
    expect(normalizeOs('android')).toBe('android');
    expect(normalizeOs('freebsd')).toBe('other');
  });
});

describe('formatProduct', () => {
  it('should render name and version', () => {
    expect(formatProduct({ name: 'deployer', version: '2.1.0' })).toBe('deployer/2.1.0');
  });

  it('should render a bare name', () => {
    expect(formatProduct({ name: 'deployer' })).toBe('deployer');
  });

  it('should render extra comments', () => {
    expect(formatProduct({ name: 'deployer', version: '2.1.0', extra: ['ci', 'linux'] })).toBe(
      'deployer/2.1.0 (ci; linux)'
    );
  });
});

describe('buildUserAgent', () => {
  it('should build the base user agent', () => {
    expect(buildUserAgent([], undefined, RUNTIME)).toBe(
      'aws-credential-chain/0.1.0 os/linux lang/nodejs/20.11.1 md/platform/linux md/arch/x64'
    );
  });

  it('should prepend products and append the suffix', () => {
    expect(
      buildUserAgent([{ name: 'deployer', version: '2.1.0' }, { name: 'plugin', version: '0.3' }], 'ci/1', RUNTIME)
    ).toBe(
      'deployer/2.1.0 plugin/0.3 aws-credential-chain/0.1.0 os/linux lang/nodejs/20.11.1 md/platform/linux md/arch/x64 ci/1'
    );
  });

  it('should ignore a blank suffix', () => {
    expect(buildUserAgent([], '   ', { platform: 'win32', arch: 'arm64', nodeVersion: '20.0.0' })).toBe(
      'aws-credential-chain/0.1.0 os/windows lang/nodejs/20.0.0 md/platform/win32 md/arch/arm64'
    );
  });
});

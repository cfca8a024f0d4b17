/**
 * User-agent construction.
 *
 * @module useragent
 */

import type { UserAgentProduct } from '../types/config.js';

/** Name reported in the user agent. */
export const LIBRARY_NAME = 'aws-credential-chain';

/** Version reported in the user agent. */
export const LIBRARY_VERSION = '0.1.0';

/**
 * Runtime facts rendered into the user agent.
 */
export interface RuntimeInfo {
  platform: string;
  arch: string;
  nodeVersion: string;
}

export function currentRuntime(): RuntimeInfo {
  return {
    platform: process.platform,
    arch: process.arch,
    nodeVersion: process.versions.node,
  };
}

/**
 * Map a Node platform name to the normalized OS family.
 */
export function normalizeOs(platform: string): string {
  switch (platform) {
    case 'linux':
      return 'linux';
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    case 'android':
      return 'android';
    default:
      return 'other';
  }
}

/**
 * Render a product as `name/version (extra; ...)`.
 */
export function formatProduct(product: UserAgentProduct): string {
  let rendered = product.version ? `${product.name}/${product.version}` : product.name;
  if (product.extra && product.extra.length > 0) {
    rendered += ` (${product.extra.join('; ')})`;
  }
  return rendered;
}

/**
 * Build the user-agent string.
 *
 * Products come first, then the library and runtime entries, then the
 * appended suffix (usually `AWS_APPEND_USER_AGENT`).
 *
 * @example
 * ```typescript
 * buildUserAgent([{ name: 'deployer', version: '2.1.0' }], 'ci/1');
 * // 'deployer/2.1.0 aws-credential-chain/0.1.0 os/linux lang/nodejs/20.11.1 md/platform/linux md/arch/x64 ci/1'
 * ```
 */
export function buildUserAgent(
  products: readonly UserAgentProduct[],
  appended?: string,
  runtime: RuntimeInfo = currentRuntime()
): string {
  const parts = [
    ...products.map(formatProduct),
    `${LIBRARY_NAME}/${LIBRARY_VERSION}`,
    `os/${normalizeOs(runtime.platform)}`,
    `lang/nodejs/${runtime.nodeVersion}`,
    `md/platform/${runtime.platform}`,
    `md/arch/${runtime.arch}`,
  ];

  const userAgent = parts.join(' ');
  const suffix = appended?.trim();
  return suffix ? `${userAgent} ${suffix}` : userAgent;
}

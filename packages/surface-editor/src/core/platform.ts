export type HostPlatform = 'macos' | 'windows' | 'linux';

/**
 * Resolves the host platform from `navigator.platform` when the host reports one,
 * otherwise from `process.platform`.
 */
export function detectHostPlatform(): HostPlatform {
  const browserPlatform = typeof navigator !== 'undefined' ? navigator.platform : '';
  if (browserPlatform) {
    if (browserPlatform.includes('Mac')) return 'macos';
    if (browserPlatform.includes('Win')) return 'windows';
    return 'linux';
  }
  const nodePlatform = typeof process !== 'undefined' ? process.platform : '';
  if (nodePlatform === 'darwin') return 'macos';
  if (nodePlatform === 'win32') return 'windows';
  return 'linux';
}

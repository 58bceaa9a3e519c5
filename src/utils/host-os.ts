import { platform } from 'os';

const OS_NAMES: Record<string, string> = {
  darwin: 'Mac',
  linux: 'Linux',
  win32: 'Windows',
  freebsd: 'FreeBSD',
};

/**
 * Name of the host OS in the spelling manifests use (`Mac`, `Linux`, ...).
 */
export function detectHostOS(hostPlatform: string = platform()): string {
  return OS_NAMES[hostPlatform] ?? hostPlatform;
}

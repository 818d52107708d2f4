/**
 * Debian 아카이브가 Contents 인덱스를 제공하는 아키텍처 목록
 */

import { UnsupportedArchitectureError } from './errors';

export const ARCHITECTURES: ReadonlySet<string> = new Set([
  'all',
  'amd64',
  'arm64',
  'armel',
  'armhf',
  'i386',
  'mips64el',
  'mipsel',
  'ppc64el',
  's390x',
  'source',
  'udeb-all',
  'udeb-amd64',
  'udeb-arm64',
  'udeb-armel',
  'udeb-armhf',
  'udeb-i386',
  'udeb-mips64el',
  'udeb-mipsel',
  'udeb-ppc64el',
  'udeb-s390x',
]);

export function isSupportedArchitecture(
  architecture: string,
  supported: ReadonlySet<string> = ARCHITECTURES
): boolean {
  return supported.has(architecture);
}

export function assertSupportedArchitecture(
  architecture: string,
  supported: ReadonlySet<string> = ARCHITECTURES
): void {
  if (!supported.has(architecture)) {
    throw new UnsupportedArchitectureError(architecture, supported);
  }
}

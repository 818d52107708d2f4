import { describe, it, expect } from 'vitest';
import { ARCHITECTURES, isSupportedArchitecture, assertSupportedArchitecture } from './architectures';
import { UnsupportedArchitectureError } from './errors';

describe('architectures', () => {
  it('바이너리, source, udeb 아키텍처 포함', () => {
    expect(ARCHITECTURES.size).toBe(21);
    expect(isSupportedArchitecture('amd64')).toBe(true);
    expect(isSupportedArchitecture('source')).toBe(true);
    expect(isSupportedArchitecture('udeb-arm64')).toBe(true);
  });

  it('지원하지 않는 아키텍처', () => {
    expect(isSupportedArchitecture('x86_64')).toBe(false);
    expect(isSupportedArchitecture('AMD64')).toBe(false);
  });

  it('별도 목록 주입', () => {
    const custom = new Set(['riscv64']);
    expect(isSupportedArchitecture('riscv64', custom)).toBe(true);
    expect(isSupportedArchitecture('amd64', custom)).toBe(false);
  });

  it('assertSupportedArchitecture 에러 메시지에 지원 목록 포함', () => {
    expect(() => assertSupportedArchitecture('sparc', new Set(['amd64', 'arm64']))).toThrow(
      '지원하지 않는 아키텍처입니다: sparc\n지원 아키텍처: amd64 arm64'
    );
  });

  it('UnsupportedArchitectureError 타입', () => {
    expect(() => assertSupportedArchitecture('sparc')).toThrow(UnsupportedArchitectureError);
  });
});

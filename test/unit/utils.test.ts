/**
 * Unit Tests for shared utilities and ordered scales
 */
import { describe, it, expect, vi } from 'vitest';
import {
  PatternCompileError,
  assertNever,
  compilePattern,
  countChar,
  hash,
  lazy,
  resolveLogLevel,
  truncate,
} from '@warden/core';
import { isAtLeast, maxRisk, raiseRisk, riskRank, classificationRank } from '@warden/shield';

describe('lazy', () => {
  it('runs the factory once', () => {
    const factory = vi.fn(() => ({ built: true }));
    const get = lazy(factory);

    expect(factory).not.toHaveBeenCalled();
    expect(get()).toBe(get());
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('does not cache a failure', () => {
    const factory = vi.fn(() => {
      throw new Error('boom');
    });
    const get = lazy(factory);

    expect(get).toThrow('boom');
    expect(get).toThrow('boom');
    expect(factory).toHaveBeenCalledTimes(2);
  });
});

describe('string helpers', () => {
  it('truncates with a suffix', () => {
    expect(truncate('abcdefghij', 6)).toBe('abc...');
    expect(truncate('short', 10)).toBe('short');
  });

  it('counts characters before an offset', () => {
    expect(countChar('a\nb\nc', '\n')).toBe(2);
    expect(countChar('a\nb\nc', '\n', 2)).toBe(1);
    expect(countChar('abc', '\n')).toBe(0);
  });

  it('hashes with SHA-256', () => {
    expect(hash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});

describe('compilePattern', () => {
  it('compiles valid patterns', () => {
    expect(compilePattern('a+', 'g', 'test').flags).toBe('g');
  });

  it('names the pattern that failed', () => {
    expect(() => compilePattern('(', '', 'pii:custom:bad')).toThrow(PatternCompileError);
    expect(() => compilePattern('(', '', 'pii:custom:bad')).toThrow(/^Pattern "pii:custom:bad" failed to compile/);
  });
});

describe('assertNever', () => {
  type Shape = { kind: 'square' };

  function area(shape: Shape): number {
    switch (shape.kind) {
      case 'square':
        return 1;
      default:
        return assertNever(shape, 'shape');
    }
  }

  it('throws with the offending value', () => {
    expect(() => area(JSON.parse('{"kind":"circle"}'))).toThrow(
      'Unexpected shape: {"kind":"circle"}',
    );
  });
});

describe('resolveLogLevel', () => {
  it('prefers the explicit level, then the environment', () => {
    vi.stubEnv('WARDEN_LOG_LEVEL', 'debug');
    expect(resolveLogLevel('error')).toBe('error');
    expect(resolveLogLevel()).toBe('debug');
    vi.stubEnv('WARDEN_LOG_LEVEL', 'verbose');
    expect(resolveLogLevel()).toBe('info');
    vi.unstubAllEnvs();
  });
});

describe('risk scale', () => {
  it('orders levels', () => {
    expect(riskRank('none')).toBe(0);
    expect(riskRank('critical')).toBe(4);
    expect(classificationRank('restricted')).toBeGreaterThan(classificationRank('confidential'));
  });

  it('picks the worse level', () => {
    expect(maxRisk('low', 'high')).toBe('high');
    expect(maxRisk('critical', 'medium')).toBe('critical');
  });

  it('raises one step and stops at critical', () => {
    expect(raiseRisk('medium')).toBe('high');
    expect(raiseRisk('critical')).toBe('critical');
    expect(raiseRisk('low', 10)).toBe('critical');
  });

  it('compares against a floor', () => {
    expect(isAtLeast('high', 'high')).toBe(true);
    expect(isAtLeast('medium', 'high')).toBe(false);
  });
});

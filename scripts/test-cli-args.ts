import { describe, expect, it } from 'vitest';
import { errorMessage, getArgValue, hasFlag, isMainModule } from './cli-args';

describe('getArgValue', () => {
  const args = ['--seed', 'harbor', '--num-articles', '3', '--dry-run'];

  it('returns the value after a named option', () => {
    expect(getArgValue(args, '--seed')).toBe('harbor');
    expect(getArgValue(args, '--num-articles')).toBe('3');
  });

  it('returns null for a missing option or one followed by another flag', () => {
    expect(getArgValue(args, '--locale')).toBeNull();
    expect(getArgValue(['--seed', '--dry-run'], '--seed')).toBeNull();
    expect(getArgValue(['--seed'], '--seed')).toBeNull();
  });
});

describe('hasFlag', () => {
  it('detects bare flags', () => {
    expect(hasFlag(['--dry-run'], '--dry-run')).toBe(true);
    expect(hasFlag(['--dry-run'], '--help')).toBe(false);
  });
});

describe('errorMessage', () => {
  it('prefers Error messages and stringifies anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(new Error(''))).toBe('Unknown error');
  });
});

describe('isMainModule', () => {
  it('is false for a module that was not the entry script', () => {
    expect(isMainModule('file:///nowhere/not-the-entry.ts')).toBe(false);
  });
});

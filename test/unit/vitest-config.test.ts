/**
 * Unit Tests for the test runner configuration
 */
import { describe, it, expect } from 'vitest';
import config from '../../vitest.config.js';

describe('vitest projects', () => {
  it('leaves file selection to the projects', () => {
    expect(config.test?.include).toBeUndefined();
  });

  it('gives each project its own test directory', () => {
    const projects = (config.test?.projects ?? []).flatMap((project) =>
      typeof project === 'object' && !(project instanceof Promise) && project.test
        ? [[project.test.name, project.test.include]]
        : [],
    );

    expect(projects).toEqual([
      ['unit', ['test/unit/**/*.test.ts', 'packages/*/src/**/*.test.ts']],
      ['security', ['test/security/**/*.test.ts']],
    ]);
  });
});

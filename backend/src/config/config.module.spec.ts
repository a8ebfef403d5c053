import { describe, expect, it } from '@jest/globals';
import path from 'node:path';
import { ENV_FILE_PATHS } from './config.module.js';

describe('AppConfigModule', () => {
  it('looks for .env files at the repository root, then under backend/', () => {
    expect(ENV_FILE_PATHS).toEqual([
      '.env.local',
      '.env',
      'backend/.env.local',
      'backend/.env',
    ]);
  });

  it('never reads .env files outside the working directory', () => {
    const root = path.resolve('/srv/docquery');
    for (const file of ENV_FILE_PATHS) {
      const relative = path.relative(root, path.resolve(root, file));
      expect(relative.startsWith('..')).toBe(false);
    }
  });
});

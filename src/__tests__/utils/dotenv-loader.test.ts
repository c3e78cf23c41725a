import { describe, expect, test, afterEach } from '@jest/globals';
import path from 'path';
import { getDotenvCandidatePaths } from '../../utils/dotenv-loader.js';

describe('dotenv-loader', () => {
  afterEach(() => {
    delete process.env.DOTENV_PATH;
  });

  test('includes cwd .env and project root .env candidates', () => {
    const candidates = getDotenvCandidatePaths('/repo', '/work');

    expect(candidates).toEqual([path.resolve('/work', '.env'), path.resolve('/repo', '.env')]);
  });

  test('puts DOTENV_PATH first and drops duplicates', () => {
    process.env.DOTENV_PATH = '/etc/jamf/.env';

    const candidates = getDotenvCandidatePaths('/repo', '/repo');

    expect(candidates).toEqual(['/etc/jamf/.env', path.resolve('/repo', '.env')]);
  });
});

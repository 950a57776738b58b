import { describe, it, expect, vi, afterEach } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';

vi.mock('node:fs', () => ({
  mkdirSync: vi.fn(),
}));

import { mkdirSync } from 'node:fs';
import { ensureHome, resolvePaths } from './paths.js';

describe('resolvePaths', () => {
  it('places both files under ~/.repo-velocity by default', () => {
    const home = join(homedir(), '.repo-velocity');
    expect(resolvePaths({})).toEqual({
      home,
      configFile: join(home, 'config.json'),
      historyDb: join(home, 'history.db'),
    });
  });

  it('uses REPO_VELOCITY_HOME when set', () => {
    const paths = resolvePaths({ REPO_VELOCITY_HOME: '/srv/velocity' });
    expect(paths.configFile).toBe(join('/srv/velocity', 'config.json'));
    expect(paths.historyDb).toBe(join('/srv/velocity', 'history.db'));
  });

  it('ignores an empty REPO_VELOCITY_HOME', () => {
    expect(resolvePaths({ REPO_VELOCITY_HOME: '' }).home).toBe(join(homedir(), '.repo-velocity'));
  });
});

describe('ensureHome', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('creates the directory owner-only and returns it', () => {
    expect(ensureHome('/srv/velocity')).toBe('/srv/velocity');
    expect(mkdirSync).toHaveBeenCalledWith('/srv/velocity', { recursive: true, mode: 0o700 });
  });
});

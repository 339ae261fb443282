import { describe, expect, it } from 'vitest';

import { DEFAULT_RIGBUILD_CONFIG_FILES, manifest } from './index.js';

describe('@rigbuild/core', () => {
  it('exposes a frozen manifest', () => {
    expect(manifest.name).toBe('@rigbuild/core');
    expect(Object.isFrozen(manifest)).toBe(true);
  });

  it('searches module configuration files before JSON', () => {
    expect(DEFAULT_RIGBUILD_CONFIG_FILES).toEqual([
      'rigbuild.config.mjs',
      'rigbuild.config.js',
      'rigbuild.config.cjs',
      'rigbuild.config.json',
    ]);
  });
});

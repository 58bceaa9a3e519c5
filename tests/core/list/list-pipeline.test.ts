/**
 * Tests for listing the build plan
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { listShellTargets, runListPipeline, runListTargets } from '../../../src/core/list/list-pipeline.js';
import { MemoryFileSystem, createTestContext } from '../../test-helpers.js';

const MANIFEST = [
  'shell:',
  '  type: bash',
  'modules:',
  '  - name: path',
  '    file: path.sh',
  '    target: bash_profile',
  '  - name: aliases',
  '    file: aliases.sh',
  '    target: bashrc',
  '    priority: 70',
  '    description: Short commands',
  '  - name: prompt',
  '    file: prompt.sh',
  '    target: bashrc',
  '    requires: [path]',
  '  - name: brew',
  '    file: brew.sh',
  '    target: bash_profile',
  '    os: [Mac]',
  ''
].join('\n');

describe('runListPipeline', () => {
  it('should list targets and modules in build order without reading sources', async () => {
    const fs = new MemoryFileSystem({ '/cfg/manifest.yaml': MANIFEST });
    const result = await runListPipeline(
      { manifestPath: '/cfg/manifest.yaml', os: 'Linux', homeDir: '/home/u' },
      createTestContext(fs)
    );

    assert.equal(result.shellType, 'bash');
    assert.deepEqual(result.skipped, [{ name: 'brew', reason: 'os' }]);
    assert.deepEqual(result.targets, [
      {
        target: 'bash_profile',
        destPath: '.bash_profile',
        directory: false,
        description: 'Login shell configuration (PATH, environment setup)',
        modules: [{ name: 'path', priority: 50, description: undefined, requires: [] }]
      },
      {
        target: 'bashrc',
        destPath: '.bashrc',
        directory: false,
        description: 'Interactive non-login shell configuration',
        modules: [
          { name: 'prompt', priority: 50, description: undefined, requires: ['path'] },
          { name: 'aliases', priority: 70, description: 'Short commands', requires: [] }
        ]
      }
    ]);
  });
});

describe('listShellTargets', () => {
  it('should list the fish targets with home-relative paths', () => {
    assert.deepEqual(listShellTargets('fish'), [
      {
        target: 'config',
        path: '.config/fish/config.fish',
        directory: false,
        description: 'Fish shell configuration'
      },
      {
        target: 'conf.d',
        path: '.config/fish/conf.d',
        directory: true,
        description: 'Fish modular configs (auto-sourced .fish files in conf.d/)'
      }
    ]);
  });

  it('should reject unknown shells', () => {
    assert.throws(() => listShellTargets('csh'), {
      message: 'unsupported shell type: csh (expected one of zsh, bash, fish)'
    });
  });
});

describe('runListTargets', () => {
  it('should use the manifest shell when none is given', async () => {
    const fs = new MemoryFileSystem({ '/cfg/manifest.yaml': MANIFEST });
    const result = await runListTargets({ manifestPath: '/cfg/manifest.yaml' }, createTestContext(fs));

    assert.equal(result.shellType, 'bash');
    assert.deepEqual(result.targets.map(info => info.target), ['bashrc', 'bash_profile', 'profile', 'bash_login', 'bash_logout']);
  });

  it('should prefer an explicit shell and default without a manifest', async () => {
    const fs = new MemoryFileSystem({ '/cfg/manifest.yaml': MANIFEST });
    const explicit = await runListTargets({ manifestPath: '/cfg/manifest.yaml', shell: 'ZSH' }, createTestContext(fs));
    const fallback = await runListTargets({ manifestPath: '/nowhere.yaml' }, createTestContext(fs));

    assert.equal(explicit.shellType, 'zsh');
    assert.equal(fallback.shellType, 'zsh');
    assert.equal(fallback.targets[0].path, '.zshrc');
  });
});

/**
 * Tests for module loading and target rendering
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  loadModuleSource,
  loadModules,
  renderMergedTarget,
  renderModuleFile,
  type HeaderInfo
} from '../../../src/core/build/content-assembler.js';
import { FIXED_TIME, MemoryFileSystem, mod } from '../../test-helpers.js';

const header: HeaderInfo = { shellType: 'zsh', targetOS: 'Mac', generatedAt: FIXED_TIME };

describe('loadModuleSource', () => {
  it('should load existing sources', async () => {
    const fs = new MemoryFileSystem({ '/cfg/a.sh': 'echo a\n' });
    assert.deepEqual(await loadModuleSource(fs, '/cfg', mod('a')), { status: 'loaded', content: 'echo a\n' });
  });

  it('should mark missing sources', async () => {
    const fs = new MemoryFileSystem();
    assert.deepEqual(await loadModuleSource(fs, '/cfg', mod('a')), { status: 'missing', path: '/cfg/a.sh' });
  });

  it('should mark unreadable sources with the reason', async () => {
    const fs = new MemoryFileSystem({ '/cfg/a.sh': 'echo a' });
    fs.unreadable.add('/cfg/a.sh');
    assert.deepEqual(await loadModuleSource(fs, '/cfg', mod('a')), {
      status: 'unreadable',
      path: '/cfg/a.sh',
      reason: 'failed to read file /cfg/a.sh: permission denied'
    });
  });
});

describe('renderMergedTarget', () => {
  it('should render the header and one block per module', async () => {
    const fs = new MemoryFileSystem({
      '/cfg/a.sh': 'export A=1\n\n\n',
      '/cfg/b.sh': 'alias b=true'
    });
    const loaded = await loadModules(fs, '/cfg', [
      mod('a', { description: 'first module', priority: 10 }),
      mod('b')
    ]);

    assert.equal(renderMergedTarget('zshrc', loaded, header), [
      '# Generated by rcforge',
      '# Shell: zsh',
      '# Target: zshrc',
      '# OS: Mac',
      '# Modules: 2',
      '# Generated at: 2024-03-01T12:30:45Z',
      '',
      '# --- a ---',
      '# first module',
      '# Priority: 10',
      'export A=1',
      '',
      '# --- b ---',
      'alias b=true',
      ''
    ].join('\n'));
  });

  it('should render placeholders for missing and unreadable modules', async () => {
    const fs = new MemoryFileSystem({ '/cfg/locked.sh': 'x' });
    fs.unreadable.add('/cfg/locked.sh');
    const loaded = await loadModules(fs, '/cfg', [mod('gone'), mod('locked')]);

    const output = renderMergedTarget('zshrc', loaded, header).split('\n');
    assert.deepEqual(output.slice(6), [
      '',
      '# --- gone --- (FILE NOT FOUND: /cfg/gone.sh)',
      '',
      '# --- locked --- (READ ERROR: failed to read file /cfg/locked.sh: permission denied)',
      ''
    ]);
  });

  it('should end with exactly one newline when the last module is empty', async () => {
    const fs = new MemoryFileSystem({ '/cfg/empty.sh': '\n\n' });
    const loaded = await loadModules(fs, '/cfg', [mod('empty')]);
    const output = renderMergedTarget('zshrc', loaded, header);
    assert.ok(output.endsWith('# --- empty ---\n'));
  });
});

describe('multi-line descriptions', () => {
  it('should comment out every line of the description', async () => {
    const fs = new MemoryFileSystem({ '/cfg/a.sh': 'export A=1\n' });
    const loaded = await loadModules(fs, '/cfg', [mod('a', { description: 'Sets A.\n\nrm -rf /tmp/x\n' })]);

    const lines = renderMergedTarget('zshrc', loaded, header).split('\n');
    assert.deepEqual(lines.slice(6), [
      '',
      '# --- a ---',
      '# Sets A.',
      '#',
      '# rm -rf /tmp/x',
      'export A=1',
      ''
    ]);
  });
});

describe('renderModuleFile', () => {
  it('should render a standalone module file', async () => {
    const fs = new MemoryFileSystem({ '/cfg/abbr.fish': 'abbr -a g git\n' });
    const loaded = await loadModules(fs, '/cfg', [mod('Git Abbrs', { file: 'abbr.fish', description: 'git abbreviations' })]);

    assert.equal(renderModuleFile('conf.d', loaded[0], { ...header, shellType: 'fish' }), [
      '# Generated by rcforge',
      '# Shell: fish',
      '# Module: Git Abbrs',
      '# Target: conf.d',
      '# OS: Mac',
      '# Generated at: 2024-03-01T12:30:45Z',
      '',
      '# git abbreviations',
      'abbr -a g git',
      ''
    ].join('\n'));
  });

  it('should render a placeholder for a missing module', async () => {
    const loaded = await loadModules(new MemoryFileSystem(), '/cfg', [mod('gone', { file: 'gone.fish' })]);
    const lines = renderModuleFile('conf.d', loaded[0], header).split('\n');
    assert.deepEqual(lines.slice(6), ['', '# --- gone --- (FILE NOT FOUND: /cfg/gone.fish)', '']);
  });
});

/**
 * Tests for the build pipeline
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { ErrorCodes } from '../../../src/types/index.js';
import { runBuildPipeline, type BuildOptions } from '../../../src/core/build/build-pipeline.js';
import { parseBuildMetadata } from '../../../src/core/build/build-metadata.js';
import { isRcForgeError } from '../../../src/utils/errors.js';
import { MemoryFileSystem, createTestContext } from '../../test-helpers.js';

const ZSH_MANIFEST = `
shell:
  type: zsh
output:
  directory: /out
modules:
  - name: aliases
    file: aliases.zsh
    requires: [path]
    priority: 80
  - name: path
    file: path.zsh
    target: zshenv
  - name: brew
    file: brew.zsh
    os: [Mac]
    requires: [path]
    priority: 20
  - name: prompt
    file: prompt.zsh
`;

function zshFileSystem(): MemoryFileSystem {
  return new MemoryFileSystem({
    '/cfg/manifest.yaml': ZSH_MANIFEST,
    '/cfg/modules/aliases.zsh': "alias ll='ls -l'\n",
    '/cfg/modules/path.zsh': 'export PATH="$HOME/bin:$PATH"\n',
    '/cfg/modules/brew.zsh': 'eval "$(brew shellenv)"\n',
    '/cfg/modules/prompt.zsh': 'PROMPT="%~ %# "\n'
  });
}

function options(overrides: Partial<BuildOptions> = {}): BuildOptions {
  return {
    configDir: '/cfg/modules',
    manifestPath: '/cfg/manifest.yaml',
    os: 'Mac',
    homeDir: '/home/u',
    ...overrides
  };
}

describe('runBuildPipeline', () => {
  let savedXdg: string | undefined;

  beforeEach(() => {
    savedXdg = process.env.XDG_CONFIG_HOME;
    delete process.env.XDG_CONFIG_HOME;
  });

  afterEach(() => {
    if (savedXdg === undefined) {
      delete process.env.XDG_CONFIG_HOME;
    } else {
      process.env.XDG_CONFIG_HOME = savedXdg;
    }
  });

  it('should write one merged file per target plus metadata', async () => {
    const fs = zshFileSystem();
    const result = await runBuildPipeline(options(), createTestContext(fs));

    assert.equal(result.shellType, 'zsh');
    assert.equal(result.outputDir, '/out');
    assert.equal(result.moduleCount, 4);
    assert.deepEqual(result.files.map(file => [file.target, file.path, file.moduleNames]), [
      ['zshenv', '/out/.zshenv', ['path']],
      ['zshrc', '/out/.zshrc', ['brew', 'prompt', 'aliases']]
    ]);

    assert.equal(fs.get('/out/.zshrc'), [
      '# Generated by rcforge',
      '# Shell: zsh',
      '# Target: zshrc',
      '# OS: Mac',
      '# Modules: 3',
      '# Generated at: 2024-03-01T12:30:45Z',
      '',
      '# --- brew ---',
      '# Priority: 20',
      'eval "$(brew shellenv)"',
      '',
      '# --- prompt ---',
      'PROMPT="%~ %# "',
      '',
      '# --- aliases ---',
      '# Priority: 80',
      "alias ll='ls -l'",
      ''
    ].join('\n'));

    assert.equal(result.metadataPath, '/out/.rcforge-build.json');
    const metadata = parseBuildMetadata(fs.get('/out/.rcforge-build.json') ?? '');
    assert.deepEqual(metadata, {
      shell: 'zsh',
      os: 'Mac',
      generated_at: '2024-03-01T12:30:45Z',
      files: [
        { source: '.zshenv', target: 'zshenv', dest_path: '.zshenv' },
        { source: '.zshrc', target: 'zshrc', dest_path: '.zshrc' }
      ]
    });
  });

  it('should leave out modules for other operating systems', async () => {
    const fs = zshFileSystem();
    const result = await runBuildPipeline(options({ os: 'linux' }), createTestContext(fs));

    assert.deepEqual(result.skipped, [{ name: 'brew', reason: 'os' }]);
    assert.equal(result.moduleCount, 3);
    assert.ok(fs.get('/out/.zshrc')?.includes('# Modules: 2\n'));
    assert.equal(fs.get('/out/.zshrc')?.includes('brew'), false);
  });

  it('should write nothing on a dry run', async () => {
    const fs = zshFileSystem();
    const before = fs.files.size;
    const result = await runBuildPipeline(options({ dryRun: true }), createTestContext(fs));

    assert.equal(result.dryRun, true);
    assert.equal(result.metadataPath, undefined);
    assert.equal(result.files.length, 2);
    assert.equal(fs.files.size, before);
    assert.ok(result.files[1].content.startsWith('# Generated by rcforge\n# Shell: zsh\n# Target: zshrc\n'));
  });

  it('should build only the requested targets', async () => {
    const fs = zshFileSystem();
    const result = await runBuildPipeline(options({ targets: ['zshenv'] }), createTestContext(fs));

    assert.deepEqual(result.files.map(file => file.target), ['zshenv']);
    assert.equal(result.moduleCount, 1);
    assert.equal(fs.get('/out/.zshrc'), undefined);
  });

  it('should let options override the manifest output directory with ~ expansion', async () => {
    const fs = zshFileSystem();
    const result = await runBuildPipeline(options({ outputDir: '~/dotfiles' }), createTestContext(fs));

    assert.equal(result.outputDir, '/home/u/dotfiles');
    assert.ok(fs.get('/home/u/dotfiles/.zshenv'));
  });

  it('should write a placeholder for a missing module source', async () => {
    const fs = zshFileSystem();
    fs.files.delete('/cfg/modules/prompt.zsh');
    await runBuildPipeline(options(), createTestContext(fs));

    assert.ok(fs.get('/out/.zshrc')?.includes('\n# --- prompt --- (FILE NOT FOUND: /cfg/modules/prompt.zsh)\n'));
  });

  it('should fan a fish conf.d target out into one file per module', async () => {
    const fs = new MemoryFileSystem({
      '/cfg/manifest.yaml': [
        'shell:',
        '  type: fish',
        'output:',
        '  directory: ~/build',
        'modules:',
        '  - name: env',
        '    file: env.fish',
        '    target: config',
        '  - name: Git Abbrs',
        '    file: git.fish',
        '    target: conf.d',
        '  - name: x',
        '    file: x.fish',
        '    target: conf.d',
        '    priority: 10',
        ''
      ].join('\n'),
      '/cfg/modules/env.fish': 'set -gx EDITOR vim\n',
      '/cfg/modules/git.fish': 'abbr -a g git\n',
      '/cfg/modules/x.fish': 'set -g x 1\n'
    });

    const result = await runBuildPipeline(options({ os: 'Linux' }), createTestContext(fs));

    assert.deepEqual(result.files.map(file => file.path), [
      '/home/u/build/.config/fish/conf.d/x.fish',
      '/home/u/build/.config/fish/conf.d/git_abbrs.fish',
      '/home/u/build/.config/fish/config.fish'
    ]);
    assert.equal(fs.get('/home/u/build/.config/fish/conf.d/x.fish'), [
      '# Generated by rcforge',
      '# Shell: fish',
      '# Module: x',
      '# Target: conf.d',
      '# OS: Linux',
      '# Generated at: 2024-03-01T12:30:45Z',
      '',
      '# Priority: 10',
      'set -g x 1',
      ''
    ].join('\n'));
    assert.deepEqual(result.metadata.files[1], {
      source: '.config/fish/conf.d/git_abbrs.fish',
      target: 'conf.d',
      dest_path: '.config/fish/conf.d/git_abbrs.fish'
    });
  });

  it('should reject directory modules whose file names collide', async () => {
    const fs = new MemoryFileSystem({
      '/cfg/manifest.yaml': [
        'shell:',
        '  type: fish',
        'output:',
        '  directory: /out',
        'modules:',
        '  - name: Git',
        '    file: a.fish',
        '    target: conf.d',
        '  - name: git',
        '    file: b.fish',
        '    target: conf.d',
        ''
      ].join('\n'),
      '/cfg/modules/a.fish': 'echo A\n',
      '/cfg/modules/b.fish': 'echo B\n'
    });

    await assert.rejects(runBuildPipeline(options(), createTestContext(fs)), (error: unknown) =>
      isRcForgeError(error, ErrorCodes.VALIDATION_ERROR) &&
      error.message === "failed to validate targets: modules 'Git' and 'git' both map to 'git.fish' in target 'conf.d'"
    );
    assert.equal(fs.get('/out/.config/fish/conf.d/git.fish'), undefined);
    assert.equal(fs.get('/out/.rcforge-build.json'), undefined);
  });

  it('should let the shell option override the manifest', async () => {
    const fs = zshFileSystem();
    await assert.rejects(runBuildPipeline(options({ shell: 'bash' }), createTestContext(fs)), {
      message: "failed to validate targets: module 'path' has invalid target 'zshenv' for shell type 'bash'"
    });
  });

  it('should report a dependency cycle with its modules', async () => {
    const fs = new MemoryFileSystem({
      '/cfg/manifest.yaml': [
        'modules:',
        '  - name: A',
        '    file: a.zsh',
        '    requires: [B]',
        '  - name: B',
        '    file: b.zsh',
        '    requires: [A]',
        ''
      ].join('\n')
    });

    await assert.rejects(runBuildPipeline(options(), createTestContext(fs)), (error: unknown) =>
      isRcForgeError(error, ErrorCodes.CIRCULAR_DEPENDENCY) &&
      error.message === 'failed to resolve dependencies: circular dependency detected among modules: A, B'
    );
    assert.equal(fs.files.size, 1);
  });

  it('should report an unknown requirement as not found', async () => {
    const fs = new MemoryFileSystem({
      '/cfg/manifest.yaml': 'modules:\n  - name: a\n    file: a.zsh\n    requires: [ghost]\n'
    });

    await assert.rejects(runBuildPipeline(options(), createTestContext(fs)), (error: unknown) =>
      isRcForgeError(error, ErrorCodes.NOT_FOUND) &&
      error.message === "failed to build dependency graph: dependency 'ghost' of module 'a' not found"
    );
  });

  it('should report a missing manifest', async () => {
    await assert.rejects(runBuildPipeline(options(), createTestContext(new MemoryFileSystem())), {
      message: 'failed to parse manifest: manifest not found: /cfg/manifest.yaml'
    });
  });

  it('should report the first structural problem in the manifest', async () => {
    const fs = new MemoryFileSystem({ '/cfg/manifest.yaml': 'modules:\n  - name: a\n' });
    await assert.rejects(runBuildPipeline(options(), createTestContext(fs)), {
      message: "failed to parse manifest: module 'a' is missing 'file'"
    });
  });

  it('should name the target whose write failed', async () => {
    const fs = zshFileSystem();
    fs.unwritable.add('/out/.zshrc');

    await assert.rejects(runBuildPipeline(options(), createTestContext(fs)), (error: unknown) =>
      isRcForgeError(error, ErrorCodes.FILE_SYSTEM_ERROR) &&
      error.message === "failed to write target 'zshrc': failed to write file /out/.zshrc: read-only file system"
    );
    assert.ok(fs.get('/out/.zshenv'));
    assert.equal(fs.get('/out/.rcforge-build.json'), undefined);
  });

  it('should reject an unknown target filter', async () => {
    const fs = zshFileSystem();
    await assert.rejects(runBuildPipeline(options({ targets: ['bashrc'] }), createTestContext(fs)), {
      message: "failed to validate targets: invalid target filter 'bashrc' for shell type 'zsh'"
    });
  });
});

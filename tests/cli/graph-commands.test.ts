import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import {
  renderDump,
  renderShow,
  renderWatchlist,
  watchlistCommand
} from '../../packages/cli/src/commands/graph-commands.js';
import { createProgram } from '../../packages/cli/src/index.js';
import { buildFromRoot } from '../../packages/core/src/core/graph/graph-builder.js';
import { PackageNode } from '../../packages/core/src/core/graph/package-node.js';
import { PackageNotFoundError } from '../../packages/core/src/utils/errors.js';
import { createTempDir, removeTempDir, writeFiles, INDEX_HEADER } from '../test-helpers.js';

function sampleGraph() {
  const linked = new PackageNode('linked', '/src/linked', 'path');
  const cached = new PackageNode('cached', '/cache/cached', 'hosted');
  const root = new PackageNode('app', '/src/app', 'path', { isRoot: true }).addDependencies([linked, cached]);
  return buildFromRoot(root, { sdkPath: '/opt/toolchain' });
}

describe('graph commands', () => {
  it('renders one package', () => {
    assert.equal(
      renderShow(sampleGraph(), 'app'),
      '  app:\n    type: path\n    path: /src/app\n    dependencies: [linked, cached]\n'
    );
  });

  it('fails for a package outside the graph', () => {
    assert.throws(() => renderShow(sampleGraph(), 'missing'), PackageNotFoundError);
  });

  it('renders the watch list as name and path pairs', () => {
    assert.equal(renderWatchlist(sampleGraph()), 'app\t/src/app\nlinked\t/src/linked\n');
  });

  it('renders the dump with every package', () => {
    const dump = renderDump(sampleGraph());
    assert.equal(dump.split('\n').filter((line) => /^ {2}\S/.test(line)).length, 4);
  });

  describe('against a package tree on disk', () => {
    let dir: string;

    before(async () => {
      dir = await createTempDir();
      await writeFiles(dir, {
        'manifest.yaml': 'name: app\ndependencies:\n  local: any\n',
        'manifest.lock': 'packages:\n  local:\n    source: path\n',
        '.packages': `${INDEX_HEADER}\nlocal:packages/local/lib/\n`,
        'packages/local/manifest.yaml': 'name: local\n'
      });
    });

    after(async () => {
      await removeTempDir(dir);
    });

    it('builds the watch list from the directory', async () => {
      const output = await watchlistCommand(dir);
      assert.equal(output, `app\t${dir}\nlocal\t${path.join(dir, 'packages', 'local')}\n`);
    });

    it('wires the show command through commander', async () => {
      const chunks: string[] = [];
      const program = createProgram((text) => chunks.push(text));
      await program.parseAsync(['node', 'pkg-graph', '--cwd', dir, 'show', 'local']);
      assert.equal(
        chunks.join(''),
        `  local:\n    type: path\n    path: ${path.join(dir, 'packages', 'local')}\n    dependencies: []\n`
      );
    });
  });
});

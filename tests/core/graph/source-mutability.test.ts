import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  getSourceMutability,
  getWatchablePackages
} from '../../../packages/core/src/core/graph/source-mutability.js';
import { buildFromRoot } from '../../../packages/core/src/core/graph/graph-builder.js';
import { PackageNode } from '../../../packages/core/src/core/graph/package-node.js';

describe('source mutability', () => {
  it('classifies each dependency type', () => {
    assert.equal(getSourceMutability('git'), 'mutable');
    assert.equal(getSourceMutability('path'), 'mutable');
    assert.equal(getSourceMutability('hosted'), 'immutable');
    assert.equal(getSourceMutability('sdk'), 'immutable');
  });

  it('lists packages whose sources can change locally', () => {
    const checkout = new PackageNode('checkout', '/src/checkout', 'git');
    const download = new PackageNode('download', '/cache/download', 'hosted');
    const sibling = new PackageNode('sibling', '/src/sibling', 'path');
    const root = new PackageNode('app', '/src/app', 'path', { isRoot: true })
      .addDependencies([checkout, download, sibling]);

    const graph = buildFromRoot(root, { sdkPath: '/opt/toolchain' });
    assert.deepEqual(
      getWatchablePackages(graph).map((node) => node.name),
      ['app', 'checkout', 'sibling']
    );
  });
});

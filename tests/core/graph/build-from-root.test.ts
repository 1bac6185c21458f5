import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildFromRoot, collectReachable } from '../../../packages/core/src/core/graph/graph-builder.js';
import { PackageNode } from '../../../packages/core/src/core/graph/package-node.js';
import { defaultSdkPath } from '../../../packages/core/src/core/config.js';
import { PackageGraph } from '../../../packages/core/src/core/graph/package-graph.js';
import { SDK_PACKAGE_NAME } from '../../../packages/core/src/constants/index.js';
import { ErrorCodes } from '../../../packages/core/src/types/index.js';
import {
  DanglingDependencyError,
  DuplicatePackageNameError,
  DuplicateRootError,
  InvalidRootError
} from '../../../packages/core/src/utils/errors.js';

function rootNode(name = 'app'): PackageNode {
  return new PackageNode(name, '/work/app', 'path', { isRoot: true });
}

describe('buildFromRoot', () => {
  it('collects every node reachable from the root', () => {
    const c = new PackageNode('c', '/pkgs/c', 'hosted');
    const b = new PackageNode('b', '/pkgs/b', 'git').addDependencies([c]);
    const a = new PackageNode('a', '/pkgs/a', 'hosted');
    const root = rootNode().addDependencies([a, b]);

    const graph = buildFromRoot(root, { sdkPath: '/opt/toolchain' });

    assert.deepEqual([...graph.allPackages.keys()], ['app', 'a', 'b', 'c', SDK_PACKAGE_NAME]);
    assert.equal(graph.root, root);
    assert.equal(graph.get('c'), c);
    assert.equal(graph.get(SDK_PACKAGE_NAME)?.path, '/opt/toolchain');
  });

  it('visits a shared descendant once', () => {
    const shared = new PackageNode('shared', '/pkgs/shared', 'hosted');
    const a = new PackageNode('a', '/pkgs/a', 'hosted').addDependencies([shared]);
    const b = new PackageNode('b', '/pkgs/b', 'hosted').addDependencies([shared]);
    const root = rootNode().addDependencies([a, b]);

    const graph = buildFromRoot(root, { sdkPath: '/opt/toolchain' });

    assert.equal(graph.get('shared'), shared);
    assert.equal(graph.get('b')?.dependencies[0], shared);
    assert.equal(graph.allPackages.size, 5);
    assert.deepEqual(graph.cycles, []);
  });

  it('rejects two distinct nodes under one name', () => {
    const shared = new PackageNode('shared', '/pkgs/shared', 'hosted');
    const impostor = new PackageNode('shared', '/elsewhere/shared', 'path');
    const a = new PackageNode('a', '/pkgs/a', 'hosted').addDependencies([shared]);
    const b = new PackageNode('b', '/pkgs/b', 'hosted').addDependencies([impostor]);
    const root = rootNode().addDependencies([a, b]);

    assert.throws(
      () => buildFromRoot(root, { sdkPath: '/opt/toolchain' }),
      (error: unknown) => {
        assert.ok(error instanceof DuplicatePackageNameError);
        assert.equal(error.code, ErrorCodes.DUPLICATE_PACKAGE_NAME);
        assert.deepEqual(error.details, {
          packageName: 'shared',
          dependentName: 'b',
          paths: ['/pkgs/shared', '/elsewhere/shared']
        });
        return true;
      }
    );
  });

  it('keeps a caller-supplied toolchain node', () => {
    const sdk = new PackageNode(SDK_PACKAGE_NAME, '/custom/sdk', 'sdk');
    const root = rootNode().addDependencies([sdk]);

    const graph = buildFromRoot(root, { sdkPath: '/opt/toolchain' });
    assert.equal(graph.get(SDK_PACKAGE_NAME), sdk);
  });

  it('terminates on a genuine cycle and records it', () => {
    const a = new PackageNode('a', '/pkgs/a', 'path');
    const b = new PackageNode('b', '/pkgs/b', 'path');
    a.addDependencies([b]);
    b.addDependencies([a]);
    const root = rootNode().addDependencies([a]);

    const graph = buildFromRoot(root, { sdkPath: '/opt/toolchain' });
    assert.deepEqual([...graph.allPackages.keys()], ['app', 'a', 'b', SDK_PACKAGE_NAME]);
    assert.deepEqual(graph.cycles, [['a', 'b', 'a']]);
  });

  it('does not report a diamond as a cycle', () => {
    const c = new PackageNode('c', '/pkgs/c', 'hosted');
    const a = new PackageNode('a', '/pkgs/a', 'hosted').addDependencies([c]);
    const b = new PackageNode('b', '/pkgs/b', 'hosted').addDependencies([c]);
    const { allPackages, cycles } = collectReachable(rootNode().addDependencies([a, b]));
    assert.equal(allPackages.size, 4);
    assert.deepEqual(cycles, []);
  });

  it('rejects a root that does not indicate isRoot', () => {
    const notRoot = new PackageNode('app', '/work/app', 'path');
    assert.throws(() => buildFromRoot(notRoot, { sdkPath: '/opt/toolchain' }), InvalidRootError);
  });

  it('rejects a second node that indicates isRoot', () => {
    const other = new PackageNode('other', '/work/other', 'path', { isRoot: true });
    const root = rootNode().addDependencies([other]);
    assert.throws(
      () => buildFromRoot(root, { sdkPath: '/opt/toolchain' }),
      (error: unknown) => {
        assert.ok(error instanceof DuplicateRootError);
        assert.deepEqual(error.details?.packageNames, ['other']);
        return true;
      }
    );
  });

  it('ignores duplicate edges added to the same node', () => {
    const a = new PackageNode('a', '/pkgs/a', 'hosted');
    const root = rootNode().addDependencies([a, a]);
    assert.equal(root.dependencies.length, 1);
  });

  it('canonicalizes node paths', () => {
    const node = new PackageNode('a', '/pkgs/./x/../a/', 'hosted');
    assert.equal(node.path, '/pkgs/a');
  });
});

describe('PackageGraph', () => {
  it('rejects an edge to a node missing from the table', () => {
    const ghost = new PackageNode('ghost', '/pkgs/ghost', 'hosted');
    const root = rootNode().addDependencies([ghost]);
    assert.throws(() => new PackageGraph(root, new Map([[root.name, root]])), DanglingDependencyError);
  });

  it('rejects a table whose entry for the root name is another node', () => {
    const root = rootNode();
    const other = rootNode();
    assert.throws(() => new PackageGraph(root, new Map([[other.name, other]])), InvalidRootError);
  });

  it('rejects a table without the toolchain node', () => {
    const root = rootNode();
    assert.throws(
      () => new PackageGraph(root, new Map([[root.name, root]])),
      (error: unknown) => {
        assert.ok(error instanceof DanglingDependencyError);
        assert.equal(error.details?.dependencyName, SDK_PACKAGE_NAME);
        return true;
      }
    );
  });

  it('places the toolchain next to the running executable when no location is given', () => {
    const graph = buildFromRoot(rootNode());
    assert.equal(graph.sdk.path, defaultSdkPath());
  });

  it('exposes the toolchain node', () => {
    const graph = buildFromRoot(rootNode(), { sdkPath: '/opt/toolchain' });
    assert.equal(graph.sdk.name, SDK_PACKAGE_NAME);
    assert.equal(graph.sdk.path, '/opt/toolchain');
    assert.equal(graph.sdk.dependencyType, 'sdk');
  });
});

/**
 * File Ownership Index
 *
 * Resolves changed paths to the graph nodes that own them. The explicit
 * file -> node mapping supplied by discovery wins; otherwise node file
 * hints apply (exact path, or a directory when the hint ends in "/").
 * Nodes with neither own nothing and can only be reached downstream.
 *
 * A topology with no mapping and no hints at all is a plain folder layout:
 * there, a top-level directory named exactly like a node id owns its files.
 */

import { normalizePath } from '../../core/validation.js';
import { StructuralError } from '../../core/errors.js';
import { KnowledgeGraph, compareIds } from '../graph/knowledge-graph.js';

export interface OwnershipResolution {
  /** Owning node ids, ascending */
  entryNodes: string[];
  /** Changed paths no node owns, in change-set order */
  unmappedFiles: string[];
}

export class FileOwnershipIndex {
  private readonly explicit = new Map<string, Set<string>>();
  private readonly exactHints = new Map<string, Set<string>>();
  private readonly directoryHints: Array<{ prefix: string; nodeId: string }> = [];
  private readonly folderLayout: boolean;

  constructor(
    private readonly graph: KnowledgeGraph,
    fileOwners: Record<string, readonly string[]> = {}
  ) {
    for (const [rawPath, owners] of Object.entries(fileOwners)) {
      const path = normalizePath(rawPath);
      for (const owner of owners) {
        if (!graph.hasNode(owner)) {
          throw new StructuralError(`File ${path} is mapped to unknown node: ${owner}`, { path, owner });
        }
        addTo(this.explicit, path, owner);
      }
    }

    for (const node of graph.getNodes()) {
      for (const hint of node.files) {
        if (hint.endsWith('/')) {
          this.directoryHints.push({ prefix: hint, nodeId: node.id });
        } else {
          addTo(this.exactHints, hint, node.id);
        }
      }
    }

    this.folderLayout = this.explicit.size === 0 && this.exactHints.size === 0 && this.directoryHints.length === 0;
  }

  /**
   * Owners of a single normalized path, ascending
   */
  ownersOf(path: string): string[] {
    const explicit = this.explicit.get(path);
    if (explicit && explicit.size > 0) {
      return [...explicit].sort(compareIds);
    }

    const owners = new Set(this.exactHints.get(path) ?? []);
    for (const { prefix, nodeId } of this.directoryHints) {
      if (path.startsWith(prefix)) owners.add(nodeId);
    }
    if (owners.size > 0) {
      return [...owners].sort(compareIds);
    }

    const slash = path.indexOf('/');
    if (this.folderLayout && slash > 0) {
      const topLevel = path.slice(0, slash);
      if (this.graph.hasNode(topLevel)) return [topLevel];
    }
    return [];
  }

  /**
   * Maps a normalized change set onto entry nodes
   */
  resolve(changeSet: readonly string[]): OwnershipResolution {
    const entries = new Set<string>();
    const unmappedFiles: string[] = [];

    for (const path of changeSet) {
      const owners = this.ownersOf(path);
      if (owners.length === 0) {
        unmappedFiles.push(path);
        continue;
      }
      for (const owner of owners) entries.add(owner);
    }

    return {
      entryNodes: [...entries].sort(compareIds),
      unmappedFiles
    };
  }
}

function addTo(map: Map<string, Set<string>>, key: string, value: string): void {
  const existing = map.get(key);
  if (existing) {
    existing.add(value);
  } else {
    map.set(key, new Set([value]));
  }
}

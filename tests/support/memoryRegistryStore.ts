import { joinKeyPath, StoreError, type KeyHandle, type PropertyBag, type RegistryStore } from "../../src/store/types";

type Node = {
  path: string;
  properties: PropertyBag;
};

function norm(keyPath: string): string {
  return keyPath.replace(/\\+$/, "").toLowerCase();
}

function parentOf(keyPath: string): string {
  const normalized = norm(keyPath);
  return normalized.slice(0, normalized.lastIndexOf("\\"));
}

export class MemoryRegistryStore implements RegistryStore {
  private readonly nodes = new Map<string, Node>();
  readonly deleted: string[] = [];
  private readonly denied = new Set<string>();

  addKey(parentPath: string, name: string, properties: PropertyBag = {}): string {
    const keyPath = joinKeyPath(parentPath, name);
    this.nodes.set(norm(keyPath), { path: keyPath, properties });
    return keyPath;
  }

  denyDelete(keyPath: string): void {
    this.denied.add(norm(keyPath));
  }

  has(keyPath: string): boolean {
    return this.nodes.has(norm(keyPath));
  }

  async listChildren(parentPath: string): Promise<KeyHandle[]> {
    const parent = norm(parentPath);
    return [...this.nodes.values()]
      .filter((node) => parentOf(node.path) === parent)
      .map((node) => ({ name: node.path.slice(node.path.lastIndexOf("\\") + 1), path: node.path }));
  }

  async readProperties(handle: KeyHandle): Promise<PropertyBag> {
    const node = this.nodes.get(norm(handle.path));
    if (!node) {
      throw new StoreError("not-found", handle.path, `key not found: ${handle.path}`);
    }
    return { ...node.properties };
  }

  async deleteRecursive(keyPath: string): Promise<void> {
    const target = norm(keyPath);
    if (this.denied.has(target)) {
      throw new StoreError("access-denied", keyPath, `access denied: ${keyPath}`);
    }
    if (!this.nodes.has(target)) {
      throw new StoreError("not-found", keyPath, `key not found: ${keyPath}`);
    }

    for (const key of [...this.nodes.keys()]) {
      if (key === target || key.startsWith(`${target}\\`)) {
        this.nodes.delete(key);
      }
    }
    this.deleted.push(keyPath);
  }

  async exists(keyPath: string): Promise<boolean> {
    return this.has(keyPath);
  }
}

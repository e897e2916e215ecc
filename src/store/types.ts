export type KeyHandle = {
  name: string;
  path: string;
};

export type PropertyBag = Record<string, string>;

export interface RegistryStore {
  listChildren(parentPath: string): Promise<KeyHandle[]>;
  readProperties(handle: KeyHandle): Promise<PropertyBag>;
  deleteRecursive(keyPath: string): Promise<void>;
  exists(keyPath: string): Promise<boolean>;
}

export type StoreErrorCode = "not-found" | "access-denied" | "failed";

export class StoreError extends Error {
  readonly code: StoreErrorCode;
  readonly keyPath: string;

  constructor(code: StoreErrorCode, keyPath: string, message: string) {
    super(message);
    this.name = "StoreError";
    this.code = code;
    this.keyPath = keyPath;
  }
}

export function joinKeyPath(parentPath: string, childName: string): string {
  return `${parentPath.replace(/\\+$/, "")}\\${childName}`;
}

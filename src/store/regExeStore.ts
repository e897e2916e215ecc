import { describeCommandFailure, type CommandResult, type CommandRunner } from "../process/runCommand";
import { joinKeyPath, StoreError, type KeyHandle, type PropertyBag, type RegistryStore, type StoreErrorCode } from "./types";

const ROOT_ALIASES: Record<string, string> = {
  HKLM: "HKEY_LOCAL_MACHINE",
  HKCU: "HKEY_CURRENT_USER",
  HKCR: "HKEY_CLASSES_ROOT",
  HKU: "HKEY_USERS",
  HKCC: "HKEY_CURRENT_CONFIG",
};

// reg.exe separates name, type and data with four spaces; data may be absent.
const VALUE_LINE = /^ {4}(.*?) {4}(REG_[A-Z_]+)(?: {4}(.*))?$/;

function expandRoot(keyPath: string): string {
  const [root, ...rest] = keyPath.split("\\");
  const expanded = ROOT_ALIASES[root.toUpperCase()] ?? root;
  return [expanded, ...rest].join("\\");
}

function sameKey(a: string, b: string): boolean {
  const norm = (input: string) => expandRoot(input).replace(/\\+$/, "").toLowerCase();
  return norm(a) === norm(b);
}

export function parseSubKeyNames(queriedPath: string, stdout: string): string[] {
  return stdout
    .split(/\r?\n/)
    .filter((line) => line.startsWith("HKEY_"))
    .map((line) => line.trimEnd())
    .filter((line) => !sameKey(line, queriedPath))
    .map((line) => line.slice(line.lastIndexOf("\\") + 1));
}

export function parseValues(stdout: string): PropertyBag {
  const values: PropertyBag = {};
  for (const line of stdout.split(/\r?\n/)) {
    const match = line.match(VALUE_LINE);
    if (!match) continue;
    const [, name, , data] = match;
    values[name] = data ?? "";
  }
  return values;
}

export function classifyRegFailure(result: CommandResult): StoreErrorCode {
  const output = `${result.stderr}\n${result.stdout}`.toLowerCase();
  if (output.includes("unable to find")) return "not-found";
  if (output.includes("access is denied")) return "access-denied";
  return "failed";
}

export class RegExeRegistryStore implements RegistryStore {
  constructor(
    private readonly regExe: string,
    private readonly run: CommandRunner,
    private readonly consoleEncoding: string,
  ) {}

  private async query(keyPath: string): Promise<string> {
    const result = await this.run(this.regExe, ["query", keyPath], { encoding: this.consoleEncoding });
    if (result.status !== 0) {
      throw new StoreError(
        result.spawnError ? "failed" : classifyRegFailure(result),
        keyPath,
        `reg query ${keyPath} failed (${describeCommandFailure(result)})`,
      );
    }
    return result.stdout;
  }

  async listChildren(parentPath: string): Promise<KeyHandle[]> {
    const stdout = await this.query(parentPath);
    return parseSubKeyNames(parentPath, stdout).map((name) => ({
      name,
      path: joinKeyPath(parentPath, name),
    }));
  }

  async readProperties(handle: KeyHandle): Promise<PropertyBag> {
    return parseValues(await this.query(handle.path));
  }

  async deleteRecursive(keyPath: string): Promise<void> {
    const result = await this.run(this.regExe, ["delete", keyPath, "/f"], { encoding: this.consoleEncoding });
    if (result.status !== 0) {
      throw new StoreError(
        result.spawnError ? "failed" : classifyRegFailure(result),
        keyPath,
        `reg delete ${keyPath} failed (${describeCommandFailure(result)})`,
      );
    }
  }

  async exists(keyPath: string): Promise<boolean> {
    try {
      await this.query(keyPath);
      return true;
    } catch (error) {
      if (error instanceof StoreError && error.code === "not-found") {
        return false;
      }
      throw error;
    }
  }
}

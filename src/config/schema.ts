import { tmpdir } from "node:os";
import path from "node:path";
import { encodingExists } from "iconv-lite";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type ProfileDedupeConfig = {
  keys: {
    profileList: string;
    profileGuid: string;
  };
  backup: {
    dir: string;
    prefix: string;
    regExe: string;
  };
  // OEM code page reg.exe writes in when its output is redirected.
  console_encoding: string;
  log_level: LogLevel;
};

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

const DEFAULT_PROFILE_LIST_KEY = "HKLM\\SOFTWARE\\Microsoft\\Windows NT\\CurrentVersion\\ProfileList";
const DEFAULT_PROFILE_GUID_KEY = "HKLM\\SOFTWARE\\Microsoft\\Windows NT\\CurrentVersion\\ProfileGuid";

function readString(value: string | undefined, fallback: string, name: string): string {
  if (value === undefined) {
    return fallback;
  }
  if (value.trim().length === 0) {
    throw new Error(`${name} must not be empty`);
  }
  return value.trim();
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function defaultRegExe(env: NodeJS.ProcessEnv): string {
  const systemRoot = env.SystemRoot ?? env.SYSTEMROOT ?? "C:\\Windows";
  return path.win32.join(systemRoot, "System32", "reg.exe");
}

export function parseProfileDedupeConfig(env: NodeJS.ProcessEnv): ProfileDedupeConfig {
  const level = readString(env.PROFILE_DEDUPE_LOG_LEVEL, "info", "PROFILE_DEDUPE_LOG_LEVEL").toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`PROFILE_DEDUPE_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`);
  }

  const prefix = readString(env.PROFILE_DEDUPE_BACKUP_PREFIX, "ProfileDedupe", "PROFILE_DEDUPE_BACKUP_PREFIX");
  if (/[\\/:*?"<>|]/.test(prefix)) {
    throw new Error("PROFILE_DEDUPE_BACKUP_PREFIX must be usable in a file name");
  }

  const regExe = readString(env.PROFILE_DEDUPE_REG_EXE, defaultRegExe(env), "PROFILE_DEDUPE_REG_EXE");
  if (!path.win32.isAbsolute(regExe) && !path.posix.isAbsolute(regExe)) {
    throw new Error("PROFILE_DEDUPE_REG_EXE must be an absolute path");
  }

  const consoleEncoding = readString(env.PROFILE_DEDUPE_CONSOLE_ENCODING, "cp437", "PROFILE_DEDUPE_CONSOLE_ENCODING");
  if (!encodingExists(consoleEncoding)) {
    throw new Error(`PROFILE_DEDUPE_CONSOLE_ENCODING '${consoleEncoding}' is not a known encoding`);
  }

  return {
    keys: {
      profileList: readString(env.PROFILE_DEDUPE_PROFILE_LIST_KEY, DEFAULT_PROFILE_LIST_KEY, "PROFILE_DEDUPE_PROFILE_LIST_KEY"),
      profileGuid: readString(env.PROFILE_DEDUPE_PROFILE_GUID_KEY, DEFAULT_PROFILE_GUID_KEY, "PROFILE_DEDUPE_PROFILE_GUID_KEY"),
    },
    backup: {
      dir: readString(env.PROFILE_DEDUPE_BACKUP_DIR, tmpdir(), "PROFILE_DEDUPE_BACKUP_DIR"),
      prefix,
      regExe,
    },
    console_encoding: consoleEncoding,
    log_level: level,
  };
}

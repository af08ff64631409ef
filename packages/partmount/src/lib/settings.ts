// IMPLEMENTATION_VALIDATION
import { readFileSync, existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { homedir } from "node:os";
import * as jsonc from "jsonc-parser";

/**
 * Process-wide mount configuration. Built once per run and passed
 * explicitly to everything that needs it.
 */
export type MountConfig = Readonly<{
  /** Staging directory the installed root is mounted under */
  rootMountPoint: string;
  /** Options applied to every partition that does not set its own */
  defaultOptions: string;
  /** Subvolume mounted when an entry names none */
  defaultSubvolume: string;
  /** Create directories and run mount; false only plans */
  apply: boolean;
}>;

/**
 * User-level settings file. Every key is optional and falls back to
 * DEFAULT_MOUNT_CONFIG.
 */
export interface PartmountSettings {
  rootMountPoint?: string;
  defaultOptions?: string;
  defaultSubvolume?: string;
  apply?: boolean;
}

export const DEFAULT_MOUNT_CONFIG: MountConfig = Object.freeze({
  rootMountPoint: "/tmp/root",
  defaultOptions: "defaults,noatime",
  defaultSubvolume: "@",
  apply: false,
});

export class SettingsConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsConfigError";
  }
}

/**
 * Expand tilde (~) to the user's home directory.
 */
export function expandPath(path: string): string {
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path === "~") {
    return homedir();
  }
  return path;
}

/**
 * Expand tilde and resolve to absolute path.
 */
export function resolveSettingsPath(path: string): string {
  return resolve(expandPath(path));
}

/**
 * Find the settings.json file following the discovery order:
 * 1. PARTMOUNT_SETTINGS environment variable (file path)
 * 2. ~/.config/partmount/settings.json
 *
 * Returns the path if found, null otherwise.
 */
export function findSettingsConfig(): string | null {
  const envPath = process.env.PARTMOUNT_SETTINGS;
  if (envPath) {
    const resolved = resolveSettingsPath(envPath);
    if (existsSync(resolved)) {
      return resolved;
    }
    throw new SettingsConfigError(
      `PARTMOUNT_SETTINGS points to non-existent file: ${envPath}`,
    );
  }

  const xdgPath = join(homedir(), ".config", "partmount", "settings.json");
  if (existsSync(xdgPath)) {
    return xdgPath;
  }

  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(
  raw: Record<string, unknown>,
  key: keyof PartmountSettings,
): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value === "") {
    throw new SettingsConfigError(
      `Invalid settings.json: '${key}' must be a non-empty string`,
    );
  }
  return value;
}

/**
 * Read and parse a settings.json (JSONC) file.
 * Throws SettingsConfigError for unreadable files, parse errors and
 * values of the wrong type.
 */
export function readSettingsConfig(filePath: string): PartmountSettings {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new SettingsConfigError(`Cannot read settings file: ${filePath}`);
  }

  const errors: jsonc.ParseError[] = [];
  const raw: unknown = jsonc.parse(content, errors);

  if (errors.length > 0) {
    const first = errors[0];
    throw new SettingsConfigError(
      `Malformed settings.json at offset ${first.offset}: ${jsonc.printParseErrorCode(first.error)}`,
    );
  }
  if (!isRecord(raw)) {
    throw new SettingsConfigError("Invalid settings.json: expected an object");
  }

  const settings: PartmountSettings = {};
  const rootMountPoint = readString(raw, "rootMountPoint");
  if (rootMountPoint !== undefined) {
    settings.rootMountPoint = resolveSettingsPath(rootMountPoint);
  }
  const defaultOptions = readString(raw, "defaultOptions");
  if (defaultOptions !== undefined) settings.defaultOptions = defaultOptions;
  const defaultSubvolume = readString(raw, "defaultSubvolume");
  if (defaultSubvolume !== undefined) settings.defaultSubvolume = defaultSubvolume;

  if (raw.apply !== undefined) {
    if (typeof raw.apply !== "boolean") {
      throw new SettingsConfigError(
        "Invalid settings.json: 'apply' must be a boolean",
      );
    }
    settings.apply = raw.apply;
  }

  return settings;
}

/**
 * Load settings from an explicit path or the default locations.
 * Returns an empty settings object if no settings file exists.
 */
export function loadSettings(explicitPath?: string): PartmountSettings {
  const configPath = explicitPath
    ? resolveSettingsPath(explicitPath)
    : findSettingsConfig();
  if (!configPath) {
    return {};
  }
  return readSettingsConfig(configPath);
}

/**
 * Layer built-in defaults, settings-file values and command-line overrides
 * (later wins) into a frozen MountConfig.
 */
export function resolveMountConfig(
  settings: PartmountSettings = {},
  overrides: PartmountSettings = {},
): MountConfig {
  const pick = <K extends keyof PartmountSettings>(key: K) =>
    overrides[key] ?? settings[key];

  return Object.freeze({
    rootMountPoint: pick("rootMountPoint") ?? DEFAULT_MOUNT_CONFIG.rootMountPoint,
    defaultOptions: pick("defaultOptions") ?? DEFAULT_MOUNT_CONFIG.defaultOptions,
    defaultSubvolume:
      pick("defaultSubvolume") ?? DEFAULT_MOUNT_CONFIG.defaultSubvolume,
    apply: pick("apply") ?? DEFAULT_MOUNT_CONFIG.apply,
  });
}

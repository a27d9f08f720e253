import { mkdirSync } from "node:fs";
import os from "node:os";
import path from "node:path";

const FLOWGATE_HOME = "FLOWGATE_HOME";
const DIRECTORY_NAME = ".flowgate";

interface ResolvedPaths {
  readonly root: string;
  readonly config: string;
  readonly state: string;
  readonly logs: string;
}

let cachedPaths: ResolvedPaths | null = null;

function determineRoot(): string {
  const overrideHome = process.env[FLOWGATE_HOME];
  if (overrideHome && overrideHome.trim().length > 0) {
    return path.resolve(overrideHome.trim());
  }

  if (process.platform === "win32") {
    const appData = process.env.APPDATA ?? process.env.LOCALAPPDATA ?? path.join(os.homedir(), "AppData", "Roaming");
    return path.resolve(appData, DIRECTORY_NAME);
  }

  if (process.platform === "darwin") {
    return path.resolve(os.homedir(), "Library", "Application Support", DIRECTORY_NAME);
  }

  const xdgConfig = process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), ".config");
  return path.resolve(xdgConfig, DIRECTORY_NAME);
}

function ensureDirectory(target: string): string {
  mkdirSync(target, { recursive: true });
  return target;
}

function resolvePaths(): ResolvedPaths {
  if (cachedPaths) {
    return cachedPaths;
  }

  const root = ensureDirectory(determineRoot());
  cachedPaths = {
    root,
    config: ensureDirectory(path.join(root, "config")),
    state: ensureDirectory(path.join(root, "state")),
    logs: ensureDirectory(path.join(root, "logs"))
  };
  return cachedPaths;
}

export function getConfigDirectory(): string {
  return resolvePaths().config;
}

export function getStateDirectory(): string {
  return resolvePaths().state;
}

export function getLogsDirectory(): string {
  return resolvePaths().logs;
}

export function joinConfigPath(...segments: readonly string[]): string {
  return path.join(getConfigDirectory(), ...segments);
}

export function joinStatePath(...segments: readonly string[]): string {
  return path.join(getStateDirectory(), ...segments);
}

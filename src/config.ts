import { existsSync, mkdirSync, readFileSync, writeFileSync, watch, type FSWatcher } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigSchema, KNOWN_CONFIG_KEYS, formatZodErrors, type Config } from "./validation.js";

export type { Config } from "./validation.js";

// Hardcoded port (not configurable)
export const SERVER_PORT = 41780;

export const DEFAULT_CONFIG: Config = {
  logLevel: "info",
  maxItemsPerSession: 20,
  distractorCount: 3,
  idleTimeoutMinutes: 30,
  cleanupIntervalMinutes: 10,
  model: "haiku",
  claudeExecutablePath: "",
  generationRetries: 2,
  databasePath: "",
};

function readPackageVersion(): string {
  try {
    const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
  } catch (error) {
    console.warn("Could not read package version:", error);
  }
  return "0.0.0";
}

export const SERVER_VERSION = readPackageVersion();

// Split a parsed file into known keys and the names of the unknown ones
function filterUnknownFields(obj: object): { known: Record<string, unknown>; unknownKeys: string[] } {
  const known: Record<string, unknown> = {};
  const unknownKeys: string[] = [];

  for (const [key, value] of Object.entries(obj)) {
    if (KNOWN_CONFIG_KEYS.includes(key)) {
      known[key] = value;
    } else {
      unknownKeys.push(key);
    }
  }

  if (unknownKeys.length > 0) {
    console.info(`Removing unknown config fields: ${unknownKeys.join(", ")}`);
  }

  return { known, unknownKeys };
}

export function getConfigDir(): string {
  const xdgConfigHome = process.env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(xdgConfigHome, "recallkit");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

export function getDbPath(config: Config = getConfig()): string {
  return config.databasePath || join(getConfigDir(), "items.db");
}

export function ensureConfigDir(): void {
  const configDir = getConfigDir();
  if (!existsSync(configDir)) {
    try {
      mkdirSync(configDir, { recursive: true });
    } catch (error) {
      console.error(`Failed to create config directory ${configDir}:`, error);
      throw error;
    }
  }
}

export function loadConfig(): Config {
  ensureConfigDir();
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    saveConfig(DEFAULT_CONFIG);
    return { ...DEFAULT_CONFIG };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const raw: unknown = JSON.parse(content);
    if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
      console.error("Config file must contain a JSON object, using defaults");
      console.error("Please fix your config at:", configPath);
      return { ...DEFAULT_CONFIG };
    }

    const { known, unknownKeys } = filterUnknownFields(raw);

    const result = ConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...known });
    if (!result.success) {
      console.error("Config validation failed, using defaults. Errors:", formatZodErrors(result.error));
      console.error("Please fix your config at:", configPath);
      return { ...DEFAULT_CONFIG };
    }

    // Sync config file if unknown fields were removed or defaults were added
    const missingDefaults = Object.keys(DEFAULT_CONFIG).some((key) => !(key in known));
    if (unknownKeys.length > 0 || missingDefaults) {
      console.info("Syncing config file");
      saveConfig(result.data);
    }

    return result.data;
  } catch (error) {
    console.error("Failed to parse config:", error);
    console.error("Please fix your config at:", configPath);
    return { ...DEFAULT_CONFIG };
  }
}

export function saveConfig(config: Config): void {
  ensureConfigDir();
  const configPath = getConfigPath();
  try {
    writeFileSync(configPath, JSON.stringify(config, null, 2));
  } catch (error) {
    console.error(`Failed to save config to ${configPath}:`, error);
    throw error;
  }
}

let cachedConfig: Config | null = null;
let configWatcher: FSWatcher | null = null;
let debounceTimer: ReturnType<typeof setTimeout> | null = null;

type ConfigChangeCallback = (config: Config) => void;
const configChangeCallbacks = new Set<ConfigChangeCallback>();

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Validate, persist and cache a partial update. Returns the merged config.
 */
export function updateConfig(updates: Partial<Config>): Config {
  const merged = ConfigSchema.parse({ ...getConfig(), ...updates });
  saveConfig(merged);
  return applyConfig(merged);
}

export function reloadConfig(): Config {
  return applyConfig(loadConfig());
}

function applyConfig(next: Config): Config {
  const oldConfig = cachedConfig;
  cachedConfig = next;

  // Notify listeners if config actually changed
  if (oldConfig && JSON.stringify(oldConfig) !== JSON.stringify(next)) {
    console.info("Config reloaded:", next);
    for (const callback of configChangeCallbacks) {
      try {
        callback(next);
      } catch (error) {
        console.error("Error in config change callback:", error);
      }
    }
  }

  return next;
}

export function onConfigChange(callback: ConfigChangeCallback): () => void {
  configChangeCallbacks.add(callback);
  return () => {
    configChangeCallbacks.delete(callback);
  };
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export function startConfigWatcher(): void {
  if (configWatcher) return;

  ensureConfigDir();
  const configPath = getConfigPath();

  // Ensure config file exists
  if (!existsSync(configPath)) {
    saveConfig(DEFAULT_CONFIG);
  }

  configWatcher = watch(configPath, (eventType) => {
    if (eventType === "change") {
      // Debounce to avoid multiple reloads for a single save
      if (debounceTimer) {
        clearTimeout(debounceTimer);
      }
      debounceTimer = setTimeout(() => {
        reloadConfig();
        debounceTimer = null;
      }, 100);
    }
  });

  console.info(`Watching config file: ${configPath}`);
}

export function stopConfigWatcher(): void {
  if (debounceTimer) {
    clearTimeout(debounceTimer);
    debounceTimer = null;
  }

  if (configWatcher) {
    configWatcher.close();
    configWatcher = null;
    console.info("Config watcher stopped");
  }
  configChangeCallbacks.clear();
}

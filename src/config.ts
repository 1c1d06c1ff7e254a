/**
 * configuration system — zero-config with sensible defaults.
 * searches: ./scribe.config.json, ~/.config/scribe/config.json
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join, resolve } from "path";
import { homedir } from "os";
import { type } from "arktype";

const StorageSchema = type({
  "root?": "string",
  "assetsDir?": "string",
});

const FinalizeSchema = type({
  "validate?": "boolean",
});

const GitSchema = type({
  "recordHead?": "boolean",
  "manageIgnore?": "boolean",
});

const ConfigSchema = type({
  "storage?": StorageSchema,
  "finalize?": FinalizeSchema,
  "git?": GitSchema,
});

export type Config = typeof ConfigSchema.infer;

export interface ResolvedStorage {
  root: string;
  assetsDir: string;
}

export interface ResolvedFinalize {
  validate: boolean;
}

export interface ResolvedGit {
  recordHead: boolean;
  manageIgnore: boolean;
}

export interface ResolvedConfig {
  storage: ResolvedStorage;
  finalize: ResolvedFinalize;
  git: ResolvedGit;
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  storage: {
    root: ".scribe",
    assetsDir: "assets",
  },
  finalize: {
    validate: true,
  },
  git: {
    recordHead: true,
    manageIgnore: true,
  },
};

function findConfigFile(): string | null {
  const cwdConfig = join(process.cwd(), "scribe.config.json");
  if (existsSync(cwdConfig)) return cwdConfig;

  const homeConfig = join(homedir(), ".config", "scribe", "config.json");
  if (existsSync(homeConfig)) return homeConfig;

  return null;
}

export function loadConfig(): ResolvedConfig {
  const configPath = findConfigFile();
  if (!configPath) {
    return DEFAULT_CONFIG;
  }

  try {
    const text = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(text);
    const validated = ConfigSchema(parsed);

    if (validated instanceof type.errors) {
      console.warn(`config validation failed: ${validated.summary}, using defaults`);
      return DEFAULT_CONFIG;
    }

    return {
      storage: {
        root: validated.storage?.root ?? DEFAULT_CONFIG.storage.root,
        assetsDir: validated.storage?.assetsDir ?? DEFAULT_CONFIG.storage.assetsDir,
      },
      finalize: {
        validate: validated.finalize?.validate ?? DEFAULT_CONFIG.finalize.validate,
      },
      git: {
        recordHead: validated.git?.recordHead ?? DEFAULT_CONFIG.git.recordHead,
        manageIgnore: validated.git?.manageIgnore ?? DEFAULT_CONFIG.git.manageIgnore,
      },
    };
  } catch (e) {
    console.warn(`failed to load config: ${e instanceof Error ? e.message : String(e)}, using defaults`);
    return DEFAULT_CONFIG;
  }
}

export function expandPath(path: string): string {
  if (path.startsWith("~")) {
    return join(homedir(), path.slice(1));
  }
  return path;
}

/** store root as an absolute path; relative roots hang off the working directory. */
export function resolveRoot(config: ResolvedConfig): string {
  const root = expandPath(config.storage.root);
  return isAbsolute(root) ? root : resolve(process.cwd(), root);
}

export function resolveAssetsDir(config: ResolvedConfig): string {
  const dir = expandPath(config.storage.assetsDir);
  return isAbsolute(dir) ? dir : join(resolveRoot(config), dir);
}

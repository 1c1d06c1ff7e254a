/**
 * scribe service — wires every store over one root directory.
 */

import { createFileLogStore } from "./persist/filesystem.js";
import { createFileAssetStore } from "./persist/assets.js";
import { createIdentifierAllocator, type IdentifierAllocator } from "./id.js";
import { createIntegrityValidator, type IntegrityValidator } from "./validate.js";
import { createRecoveryController, type RecoveryController } from "./recovery.js";
import { createStagingArea, readPendingId, stagingPath, type StagingArea } from "./staging.js";
import type { AssetStore, LogStore } from "./persist/index.js";
import type { ExternalCommitProvider } from "./adapters/index.js";

export interface ScribeServiceOptions {
  rootDir: string;
  assetsDir: string;
  commitProvider?: ExternalCommitProvider;
  verify?: boolean;
}

export interface ScribeService {
  logs: LogStore;
  assets: AssetStore;
  allocator: IdentifierAllocator;
  staging: StagingArea;
  validator: IntegrityValidator;
  recovery: RecoveryController;
}

export function createScribeService(options: ScribeServiceOptions): ScribeService {
  const { rootDir, assetsDir, commitProvider, verify } = options;

  const logs = createFileLogStore({ rootDir });
  const assets = createFileAssetStore({ assetsDir });
  const allocator = createIdentifierAllocator(logs, () => readPendingId(stagingPath(rootDir)));
  const validator = createIntegrityValidator(logs, assets);

  const staging = createStagingArea({
    rootDir,
    allocator,
    logs,
    assets,
    validator,
    ...(commitProvider ? { commitProvider } : {}),
    ...(verify !== undefined ? { verify } : {}),
  });

  return {
    logs,
    assets,
    allocator,
    staging,
    validator,
    recovery: createRecoveryController(logs, assets),
  };
}

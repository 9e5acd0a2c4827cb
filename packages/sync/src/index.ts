// Sync package public API

export type {
  ViewSyncServiceOptions,
  RootReport,
  GeneratedRootReport,
  FailedRootReport,
  RootAssignment,
  ReloadReport,
} from "./service.js";
export { ViewSyncService } from "./service.js";

export type { ArtifactStore } from "./artifacts.js";
export { MemoryArtifactStore, FsArtifactStore } from "./artifacts.js";

export { SETTINGS_FILE_NAME, loadSettingsFile, parseGenerationOptions } from "./config.js";

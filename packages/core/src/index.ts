/**
 * @packpub/core
 *
 * Core package containing:
 * - Error taxonomy
 * - Configuration
 * - Pack version resolution
 * - Shared types
 */

// Errors
export {
  PublisherError,
  FetchError,
  ResolutionError,
  LookupError,
  ExternalToolError,
  ConfigError,
  ValidationError,
  stageOf,
  describeError,
  type PublishStage,
} from './errors/index.js';

// Configuration
export {
  loadConfig,
  loadEnvFile,
  withOverrides,
  requireSetting,
  archiveFileName,
  DEFAULT_MANIFEST_URL,
  DEFAULT_MCMETA_BASE_URL,
  DEFAULT_MODRINTH_API_URL,
  DEFAULT_USER_AGENT,
  type PublisherConfig,
  type MissingPackFormatPolicy,
  type UploadFailurePolicy,
  type VersionSourceKind,
} from './config/index.js';

// Pack version
export {
  resolvePackVersion,
  gitLatestTag,
  type PackVersionOptions,
  type PackVersionResult,
  type PackVersionOrigin,
} from './version/packVersion.js';

// Types
export type {
  ReleaseType,
  ManifestEntry,
  VersionManifest,
  VersionRecord,
  PackFormatGroup,
  SelectionPolicy,
} from './types/versions.js';

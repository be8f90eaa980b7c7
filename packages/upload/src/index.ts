/**
 * @packpub/upload
 *
 * Upload layer. One upload per pack format group.
 *
 * Supported targets:
 * - Modrinth API - default
 * - External uploader command
 */

export type { Uploader, UploadRequest, UploadOutcome } from './types.js';

// Modrinth API client
export {
  ModrinthClient,
  type ModrinthClientOptions,
  type ModrinthProject,
  type ModrinthVersion,
  type PublishedState,
  type CreateVersionData,
} from './modrinth/client.js';

// Targets
export { ModrinthUploader, type ModrinthUploaderConfig } from './targets/modrinth.js';
export { CommandUploader, type CommandUploaderConfig } from './targets/command.js';

// Planning and naming
export { planUploads, type UploadPlan } from './planner.js';
export { defaultVersionName, defaultChangelog } from './naming.js';

/**
 * @packpub/packaging
 *
 * Pack contents and archives.
 *
 * Responsibilities:
 * - Update pack.mcmeta for the targeted pack formats
 * - Run external pack updaters
 * - Zip the pack for upload
 */

export { Packager, PACK_ENTRIES, type PackageRequest, type PackageResult } from './packager.js';

export {
  updatePackMcmeta,
  baseDescriptionOf,
  AUTO_UPDATED_MARKER,
  DEFAULT_DESCRIPTION,
  type McmetaUpdate,
  type McmetaUpdateResult,
} from './mcmeta.js';

export {
  CommandPackUpdater,
  McmetaPackUpdater,
  type PackUpdater,
  type UpdateContext,
} from './updater.js';

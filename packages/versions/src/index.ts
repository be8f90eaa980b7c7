/**
 * @packpub/versions
 *
 * Version resolution: which game versions a run targets, grouped by pack format.
 */

export {
  VersionResolver,
  selectCandidates,
  DEFAULT_LATEST_COUNT,
  type ResolverOptions,
  type Resolution,
  type CandidateSelection,
} from './resolver.js';

export { groupByPackFormat, versionLabel, versionRange, displayName } from './grouping.js';

export {
  buildArtifact,
  groupsFromArtifact,
  serializeArtifact,
  parseArtifact,
  writeArtifact,
  readArtifact,
  formatGroupOutputs,
  versionsArtifactSchema,
  type ArtifactGroup,
  type VersionsArtifact,
} from './artifact.js';

export { getJson, type HttpOptions, type JsonResponse } from './http.js';

export { MojangManifestSource } from './sources/mojang.js';
export { McmetaPackFormatSource, McmetaSummarySource } from './sources/mcmeta.js';
export type { ManifestSource, PackFormatSource } from './sources/types.js';

export interface UploadRequest {
  archivePath: string;
  projectId: string;
  packFormat: number;
  /** Game versions covered by this upload, newest first */
  gameVersions: string[];
  /** `<base>-pf<packFormat>` */
  versionNumber: string;
  versionName: string;
  changelog: string;
  token: string;
}

export interface UploadOutcome {
  versionNumber: string;
  /** Platform id of the created version, when the target reports one */
  versionId?: string;
}

/**
 * Publishes one pack format group. Rejects with ExternalToolError on failure.
 */
export interface Uploader {
  readonly name: string;
  upload(request: UploadRequest): Promise<UploadOutcome>;
}

/**
 * Modrinth API Client
 *
 * Thin wrapper around undici for the Modrinth v2 API.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { FormData, request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { DEFAULT_MODRINTH_API_URL, ExternalToolError, FetchError } from '@packpub/core';
import { createLogger } from '@packpub/utils';

const log = createLogger({ module: 'modrinth' });

export interface ModrinthClientOptions {
  apiUrl?: string;
  userAgent: string;
  token?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

const projectSchema = z.object({
  id: z.string().min(1),
  slug: z.string().optional(),
});

const versionSchema = z.object({
  id: z.string(),
  version_number: z.string(),
  game_versions: z.array(z.string()),
});

export type ModrinthProject = z.infer<typeof projectSchema>;
export type ModrinthVersion = z.infer<typeof versionSchema>;

export interface PublishedState {
  /** Every game version any existing version covers */
  gameVersions: Set<string>;
  /** version_number -> game versions it covers */
  packVersions: Map<string, string[]>;
}

export interface CreateVersionData {
  name: string;
  version_number: string;
  changelog: string;
  dependencies: [];
  game_versions: string[];
  release_channel: 'release' | 'beta' | 'alpha';
  loaders: string[];
  featured: boolean;
  project_id: string;
  file_parts: string[];
  primary_file: string;
}

export class ModrinthClient {
  private readonly baseUrl: string;
  private readonly options: ModrinthClientOptions;

  constructor(options: ModrinthClientOptions) {
    this.baseUrl = (options.apiUrl ?? DEFAULT_MODRINTH_API_URL).replace(/\/+$/, '');
    this.options = options;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'user-agent': this.options.userAgent,
      accept: 'application/json',
    };
    if (this.options.token) {
      headers['authorization'] = this.options.token;
    }
    return headers;
  }

  private async get(path: string): Promise<{ statusCode: number; data: unknown }> {
    const url = `${this.baseUrl}${path}`;
    let response: Dispatcher.ResponseData;
    try {
      response = await request(url, {
        method: 'GET',
        headers: this.headers(),
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        dispatcher: this.options.dispatcher,
      });
    } catch (error) {
      throw new FetchError(url, error instanceof Error ? error.message : String(error));
    }

    const text = await response.body.text();
    if (response.statusCode === 404) {
      return { statusCode: 404, data: null };
    }
    if (response.statusCode >= 400) {
      throw new FetchError(url, `HTTP ${response.statusCode} ${text.slice(0, 200)}`.trim(), response.statusCode);
    }

    try {
      return { statusCode: response.statusCode, data: JSON.parse(text) };
    } catch {
      throw new FetchError(url, 'response is not valid JSON', response.statusCode);
    }
  }

  private parse<T>(schema: z.ZodType<T>, data: unknown, path: string): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new FetchError(`${this.baseUrl}${path}`, 'unexpected response shape');
    }
    return result.data;
  }

  /**
   * Resolve a project by id or slug; null when it does not exist yet
   */
  async getProject(idOrSlug: string): Promise<ModrinthProject | null> {
    const path = `/v2/project/${encodeURIComponent(idOrSlug)}`;
    const { statusCode, data } = await this.get(path);
    if (statusCode === 404) return null;
    return this.parse(projectSchema, data, path);
  }

  async listVersions(projectId: string): Promise<ModrinthVersion[]> {
    const path = `/v2/project/${encodeURIComponent(projectId)}/version`;
    const { statusCode, data } = await this.get(path);
    if (statusCode === 404) {
      throw new FetchError(`${this.baseUrl}${path}`, 'project versions not found', 404);
    }
    return this.parse(z.array(versionSchema), data, path);
  }

  /**
   * What is already published; empty for a project that does not exist yet
   */
  async getPublishedState(idOrSlug: string): Promise<PublishedState> {
    const state: PublishedState = { gameVersions: new Set(), packVersions: new Map() };

    const project = await this.getProject(idOrSlug);
    if (!project) {
      log.warn({ project: idOrSlug }, 'Project not found on Modrinth, treating every version as unpublished');
      return state;
    }

    for (const version of await this.listVersions(project.id)) {
      for (const gameVersion of version.game_versions) {
        state.gameVersions.add(gameVersion);
      }
      const covered = state.packVersions.get(version.version_number) ?? [];
      state.packVersions.set(version.version_number, [...covered, ...version.game_versions]);
    }

    log.info(
      { project: project.id, gameVersions: state.gameVersions.size, packVersions: state.packVersions.size },
      'Fetched published versions'
    );
    return state;
  }

  /**
   * Create a version with one zip file. Rejections surface as uploader failures.
   */
  async createVersion(
    data: Omit<CreateVersionData, 'file_parts' | 'primary_file'>,
    archivePath: string
  ): Promise<{ id: string; version_number: string }> {
    if (!this.options.token) {
      throw new ExternalToolError('uploader', 'A Modrinth token is required to create versions');
    }

    const fileName = basename(archivePath);
    const payload: CreateVersionData = { ...data, file_parts: ['file'], primary_file: 'file' };
    const form = new FormData();
    form.append('data', JSON.stringify(payload));
    form.append('file', new Blob([await readFile(archivePath)], { type: 'application/zip' }), fileName);

    const url = `${this.baseUrl}/v2/version`;
    let response: Dispatcher.ResponseData;
    try {
      response = await request(url, {
        method: 'POST',
        headers: {
          'user-agent': this.options.userAgent,
          authorization: this.options.token,
        },
        body: form,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        dispatcher: this.options.dispatcher,
      });
    } catch (error) {
      throw new ExternalToolError(
        'uploader',
        `Upload of ${data.version_number} failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const text = await response.body.text();
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new ExternalToolError(
        'uploader',
        `Modrinth rejected ${data.version_number} with HTTP ${response.statusCode}`,
        null,
        text
      );
    }

    let body: unknown = null;
    try {
      body = JSON.parse(text);
    } catch {
      throw new ExternalToolError('uploader', `Unparseable response for ${data.version_number}`, null, text);
    }

    const created = z.object({ id: z.string(), version_number: z.string() }).safeParse(body);
    if (!created.success) {
      throw new ExternalToolError('uploader', `Unexpected response for ${data.version_number}`, null, text);
    }
    return created.data;
  }
}

/**
 * pack.mcmeta Updater
 *
 * Stamps a pack format and an "auto-updated" description into pack.mcmeta,
 * keeping every other key as it was.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError } from '@packpub/core';
import { isErrnoException } from '@packpub/utils';

export const AUTO_UPDATED_MARKER = ' (Auto-updated';
export const DEFAULT_DESCRIPTION = 'Resource Pack';

const mcmetaSchema = z
  .object({
    pack: z
      .object({
        pack_format: z.number().optional(),
        description: z.unknown().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export interface McmetaUpdate {
  path: string;
  packFormat: number;
  minecraftVersion: string;
  /** Description text before the marker; defaults to the current one with any marker removed */
  baseDescription?: string;
  /** Range written to `supported_formats` when the pack spans several formats */
  supportedFormats?: { min: number; max: number };
}

export interface McmetaUpdateResult {
  packFormat: number;
  description: unknown;
}

/**
 * Strip a previous auto-update suffix from a description
 */
export function baseDescriptionOf(description: string): string {
  const [base = ''] = description.split(AUTO_UPDATED_MARKER);
  return base.trim() || DEFAULT_DESCRIPTION;
}

export async function updatePackMcmeta(update: McmetaUpdate): Promise<McmetaUpdateResult> {
  const { path, packFormat, minecraftVersion, baseDescription, supportedFormats } = update;

  if (!Number.isInteger(packFormat) || packFormat <= 0) {
    throw new ValidationError('pack_format', `must be a positive integer, got ${packFormat}`);
  }

  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ValidationError(path, 'pack.mcmeta not found');
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ValidationError(path, 'pack.mcmeta is not valid JSON');
  }

  const parsed = mcmetaSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(path, "invalid pack.mcmeta structure (missing 'pack' object)");
  }

  const data = parsed.data;
  const current = data.pack.description;

  // Text components (objects/arrays) are only replaced when a base description is given
  let description: unknown = current;
  if (baseDescription !== undefined || typeof current === 'string' || current === undefined) {
    const base = baseDescription ?? baseDescriptionOf(typeof current === 'string' ? current : '');
    description = `${base}${AUTO_UPDATED_MARKER} for Minecraft ${minecraftVersion})`;
  }

  data.pack.pack_format = packFormat;
  data.pack.description = description;
  if (supportedFormats) {
    data.pack['supported_formats'] = {
      min_inclusive: supportedFormats.min,
      max_inclusive: supportedFormats.max,
    };
  }

  await writeFile(path, `${JSON.stringify(data, null, 2)}\n`, 'utf8');

  return { packFormat, description };
}

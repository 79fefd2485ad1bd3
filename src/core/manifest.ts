/**
 * Structured release manifest (https://go.dev/dl/?mode=json&include=all)
 */

import { z } from 'zod';

export const ReleaseFileSchema = z.object({
  filename: z.string(),
  os: z.string().default(''),
  arch: z.string().default(''),
  version: z.string().default(''),
  sha256: z.string().default(''),
  size: z.number().default(0),
  kind: z.string().default(''),
});

export const ReleaseEntrySchema = z.object({
  version: z.string(),
  stable: z.boolean().default(false),
  files: z.array(ReleaseFileSchema).default([]),
});

export const ReleaseManifestSchema = z.array(ReleaseEntrySchema);

export type ReleaseFile = z.infer<typeof ReleaseFileSchema>;
export type ReleaseEntry = z.infer<typeof ReleaseEntrySchema>;
export type ReleaseManifest = z.infer<typeof ReleaseManifestSchema>;

/**
 * Parse manifest JSON text
 * @throws Error when the text is not JSON or does not have the manifest shape
 */
export function parseReleaseManifest(text: string): ReleaseManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`Release manifest is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = ReleaseManifestSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Unexpected release manifest shape${issue ? ` at ${issue.path.join('.')}: ${issue.message}` : ''}`);
  }
  return result.data;
}

/**
 * Strip the `go` prefix from a manifest version, e.g. go1.22.3 -> 1.22.3
 */
export function manifestVersionNumber(version: string): string {
  return version.startsWith('go') ? version.slice(2) : version;
}

export function findArtifactChecksum(manifest: ReleaseManifest, filename: string): string | null {
  for (const release of manifest) {
    for (const file of release.files) {
      if (file.filename === filename && file.sha256) {
        return file.sha256;
      }
    }
  }
  return null;
}

/**
 * Version numbers of stable releases that ship the given archive kind for a platform
 */
export function stableVersionsFor(manifest: ReleaseManifest, platformTag: string, extension: string): string[] {
  const versions: string[] = [];
  for (const release of manifest) {
    if (!release.stable) continue;
    const number = manifestVersionNumber(release.version);
    const wanted = `${release.version}.${platformTag}${extension}`;
    if (release.files.some((file) => file.filename === wanted)) {
      versions.push(number);
    }
  }
  return versions;
}

import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

export const CLI_PACKAGE_NAME = '@rigbuild/cli';

const manifestSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  description: z.string().optional(),
});

export type CliPackageManifest = z.infer<typeof manifestSchema>;

const readManifest = async (file: string): Promise<CliPackageManifest | undefined> => {
  try {
    const parsed = manifestSchema.safeParse(JSON.parse(await readFile(file, 'utf8')));
    return parsed.success ? parsed.data : undefined;
  } catch {
    // Missing or malformed manifests are skipped on the way up.
    return undefined;
  }
};

/**
 * Walks up from `startDirectory` to the CLI's own package.json. The entry point may run from
 * src/ or from an emitted copy, so the manifest is matched by name.
 *
 * @returns The manifest, or an empty one when the filesystem root is reached first.
 */
export async function findCliManifest(startDirectory: string): Promise<CliPackageManifest> {
  let directory = path.resolve(startDirectory);
  for (;;) {
    const manifest = await readManifest(path.join(directory, 'package.json'));
    if (manifest?.name === CLI_PACKAGE_NAME) {
      return manifest;
    }
    const parent = path.dirname(directory);
    if (parent === directory) {
      return {};
    }
    directory = parent;
  }
}

/**
 * @fileoverview Debug snapshot writer
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import YAML from 'yaml';
import type { SessionSnapshot } from '../session/snapshot.js';

/** Overwrite `path` with the snapshot as YAML. */
export async function writeSnapshot(path: string, snapshot: SessionSnapshot): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, YAML.stringify(snapshot), 'utf8');
}

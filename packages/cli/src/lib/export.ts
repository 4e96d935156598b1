import fs from 'node:fs/promises';
import path from 'node:path';
import AdmZip from 'adm-zip';

import { compareUtf8, errorMessage, sha256Hex, StagingError } from '@bundlekeeper/core';

export interface ExportReport {
  outPath: string;
  files: Array<{ path: string; size: number; sha256: string }>;
  /** The written archive was re-opened and holds exactly the listed entries. */
  validated: boolean;
}

/**
 * Writes the upload area to a zip for transfer to the publishing host. Entries are added
 * in sorted order so the same upload area always yields the same entry list.
 */
export async function exportUploadArchive(uploadDir: string, outPath: string): Promise<ExportReport> {
  let names: string[];
  try {
    const entries = await fs.readdir(uploadDir, { withFileTypes: true });
    names = entries
      .filter((e) => e.isFile())
      .map((e) => e.name)
      .sort(compareUtf8);
  } catch (err) {
    throw new StagingError(`Failed to read upload directory ${uploadDir}: ${errorMessage(err)}`, { uploadDir }, err);
  }

  const zip = new AdmZip();
  const files: ExportReport['files'] = [];
  for (const name of names) {
    const bytes = await fs.readFile(path.join(uploadDir, name));
    zip.addFile(name, bytes);
    files.push({ path: name, size: bytes.byteLength, sha256: sha256Hex(bytes) });
  }

  await fs.mkdir(path.dirname(outPath), { recursive: true });
  zip.writeZip(outPath);

  const reopened = new AdmZip(outPath).getEntries().map((e) => e.entryName);
  const validated = reopened.length === names.length && reopened.every((entry, i) => entry === names[i]);

  return { outPath, files, validated };
}

/**
 * Turns local files and directories into the multipart body of a file pin.
 */

import { readFile, readdir, stat } from 'fs/promises';
import path from 'path';
import FormData from 'form-data';
import { PinataError } from '../errors';
import { PinOptions } from '../types/common';
import { PinMetadata, serializeMetadata } from '../types/metadata';

/** Multipart field carrying file contents. */
export const FILE_FIELD = 'file';

/**
 * One file of an upload. `name` is the path the service sees, with `/`
 * separators.
 */
export interface FilePart {
  name: string;
  content: Buffer;
}

function byName(a: { name: string }, b: { name: string }): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Lists every non-directory entry below `dir`, depth first, in name order.
 * Symbolic links are resolved; links to directories are not descended into.
 */
async function listFiles(dir: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort(byName);

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await listFiles(fullPath, out);
    } else if (entry.isSymbolicLink()) {
      const target = await stat(fullPath);
      if (!target.isDirectory()) {
        out.push(fullPath);
      }
    } else {
      out.push(fullPath);
    }
  }
}

/**
 * Reads a file or a directory tree into named parts.
 *
 * A file yields one part named after its base name. A directory yields one
 * part per file below it, named `<directory name>/<relative path>`, so the
 * service can rebuild the tree. Files are read one after the other and the
 * first read failure rejects the whole call with the file-system error.
 */
export async function collectFileParts(target: string): Promise<FilePart[]> {
  const info = await stat(target);

  if (!info.isDirectory()) {
    return [{ name: path.basename(target), content: await readFile(target) }];
  }

  const root = path.resolve(target);
  const rootName = path.basename(root);
  const files: string[] = [];
  await listFiles(root, files);

  const parts: FilePart[] = [];
  for (const file of files) {
    const relative = path.relative(root, file).split(path.sep).join('/');
    parts.push({ name: `${rootName}/${relative}`, content: await readFile(file) });
  }
  return parts;
}

/**
 * Collects the parts of several paths, in order. Part names must be unique
 * within one request.
 */
export async function collectAllParts(paths: readonly string[]): Promise<FilePart[]> {
  const parts: FilePart[] = [];
  const seen = new Set<string>();

  for (const target of paths) {
    for (const part of await collectFileParts(target)) {
      if (seen.has(part.name)) {
        throw PinataError.validation(`Duplicate file part name "${part.name}"`, 'paths');
      }
      seen.add(part.name);
      parts.push(part);
    }
  }
  return parts;
}

/**
 * Builds the multipart form of a file pin.
 */
export function buildPinFileForm(
  parts: readonly FilePart[],
  metadata?: PinMetadata,
  options?: PinOptions
): FormData {
  const form = new FormData();

  for (const part of parts) {
    form.append(FILE_FIELD, part.content, { filepath: part.name });
  }

  if (metadata) {
    form.append('pinataMetadata', JSON.stringify(serializeMetadata(metadata)));
  }

  if (options) {
    form.append('pinataOptions', JSON.stringify(options));
  }

  return form;
}

/**
 * Whole-file text helpers over the streaming FilesApi.
 *
 * Reading a missing path yields no bytes rather than an error, so
 * presence is decided by `stats` before the content is read.
 */

import { randomUUID } from "node:crypto";
import { dirname, type FilesApi, joinPath } from "@statewalker/webrun-files";

export async function readText(files: FilesApi, path: string): Promise<string> {
  const chunks: Uint8Array[] = [];
  let totalLength = 0;
  for await (const chunk of files.read(path)) {
    chunks.push(chunk);
    totalLength += chunk.length;
  }
  const bytes = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, offset);
    offset += chunk.length;
  }
  return new TextDecoder().decode(bytes);
}

/**
 * Read a text file or return undefined if no file exists at the path.
 */
export async function tryReadText(files: FilesApi, path: string): Promise<string | undefined> {
  const stats = await files.stats(path);
  if (stats?.kind !== "file") {
    return undefined;
  }
  return readText(files, path);
}

export async function writeText(files: FilesApi, path: string, text: string): Promise<void> {
  await files.write(path, [new TextEncoder().encode(text)]);
}

/**
 * Write a file through a temporary sibling and a move, so readers see
 * either the previous content or the new one.
 */
export async function writeTextAtomic(files: FilesApi, path: string, text: string): Promise<void> {
  const temp = joinPath(dirname(path), `.${randomUUID()}.tmp`);
  await writeText(files, temp, text);
  try {
    const moved = await files.move(temp, path);
    if (!moved) {
      throw new Error(`Temporary file vanished before it could replace ${path}`);
    }
  } catch (error) {
    await files.remove(temp);
    throw error;
  }
}

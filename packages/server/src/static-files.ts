/**
 * Static file lookup for /static/*
 */

import { readFile } from "fs/promises";
import { extname, resolve, sep } from "path";

const CONTENT_TYPES: Record<string, string> = {
  ".css": "text/css; charset=utf-8",
  ".js": "text/javascript; charset=utf-8",
  ".html": "text/html; charset=utf-8",
  ".png": "image/png",
  ".svg": "image/svg+xml",
  ".ico": "image/x-icon",
};

export interface StaticFile {
  contentType: string;
  body: Buffer;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "EISDIR" || error.code === "ENOTDIR")
  );
}

/**
 * Read a file below the static root.
 *
 * @returns null when the file does not exist or the path leaves the root
 */
export async function readStaticFile(
  staticDir: string,
  relativePath: string
): Promise<StaticFile | null> {
  let decoded: string;
  try {
    decoded = decodeURIComponent(relativePath);
  } catch {
    return null;
  }

  // fs rejects paths with NUL bytes outright
  if (decoded.includes("\0")) {
    return null;
  }

  const root = resolve(staticDir);
  const filePath = resolve(root, decoded);
  if (!filePath.startsWith(root + sep)) {
    return null;
  }

  try {
    const body = await readFile(filePath);
    return {
      contentType: CONTENT_TYPES[extname(filePath).toLowerCase()] ?? "application/octet-stream",
      body,
    };
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

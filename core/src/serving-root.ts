/**
 * Serving root validation and request path resolution.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ConfigErrorCode, RequestErrorCode, createConfigError, createRangeServeError } from './errors/index.js';

/**
 * Resolves the directory to serve into an absolute path and checks that it is
 * a directory. Called once at startup.
 */
export async function resolveServingRoot(directory: string, cwd: string = process.cwd()): Promise<string> {
  const root = path.resolve(cwd, directory);
  let stat;
  try {
    stat = await fs.stat(root);
  } catch (error) {
    throw createConfigError(ConfigErrorCode.SERVING_ROOT_NOT_FOUND, `Directory to serve does not exist: ${root}`, {
      filePath: root,
      suggestion: 'Pass an existing directory with --directory.',
      cause: error,
    });
  }
  if (!stat.isDirectory()) {
    throw createConfigError(ConfigErrorCode.SERVING_ROOT_NOT_DIRECTORY, `Not a directory: ${root}`, {
      filePath: root,
    });
  }
  return root;
}

/**
 * Maps a request URL path onto a file path under `root`.
 *
 * The query string and fragment are dropped and the path is percent-decoded.
 * Throws Q004 for an undecodable path and Q003 when the result would leave the
 * root; the filesystem is not consulted.
 */
export function resolveRequestPath(root: string, requestUrl: string): string {
  const pathname = requestUrl.split(/[?#]/, 1)[0] ?? '';

  let decoded: string;
  try {
    decoded = decodeURIComponent(pathname);
  } catch (error) {
    throw createRangeServeError({
      code: RequestErrorCode.MALFORMED_PATH,
      message: 'Request path is not valid percent-encoding',
      location: { url: requestUrl },
      cause: error,
    });
  }
  if (decoded.includes('\0')) {
    throw createRangeServeError({
      code: RequestErrorCode.MALFORMED_PATH,
      message: 'Request path contains a NUL byte',
      location: { url: requestUrl },
    });
  }

  const resolved = path.resolve(root, `.${path.sep}${decoded}`);
  if (resolved !== root && !resolved.startsWith(root.endsWith(path.sep) ? root : `${root}${path.sep}`)) {
    throw createRangeServeError({
      code: RequestErrorCode.PATH_ESCAPES_ROOT,
      message: 'Request path escapes the serving root',
      location: { url: requestUrl },
    });
  }
  return resolved;
}

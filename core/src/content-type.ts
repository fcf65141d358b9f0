import path from 'node:path';
import mime from 'mime';

export const HDF5_CONTENT_TYPE = 'application/x-hdf5';
export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

const HDF5_EXTENSIONS = new Set(['.h5ad', '.hdf5', '.h5']);

/**
 * Guesses a Content-Type from the file extension. HDF5-family files are
 * matched first; everything else goes through the `mime` table.
 */
export function inferContentType(filePath: string): string {
  const extension = path.extname(filePath).toLowerCase();
  if (HDF5_EXTENSIONS.has(extension)) {
    return HDF5_CONTENT_TYPE;
  }
  return mime.getType(filePath) ?? DEFAULT_CONTENT_TYPE;
}

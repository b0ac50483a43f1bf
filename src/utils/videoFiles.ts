import fs from 'fs';
import path from 'path';

export const VIDEO_EXTENSIONS = new Set(['.mp4', '.mov', '.avi']);

export function isVideoFile(filename: string): boolean {
  return VIDEO_EXTENSIONS.has(path.extname(filename).toLowerCase());
}

/**
 * Absolute paths of the video files directly inside `dir`, sorted by name.
 * Missing directory gives an empty list.
 */
export function listVideoFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }

  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isVideoFile(entry.name))
    .map((entry) => path.join(path.resolve(dir), entry.name))
    .sort();
}

/**
 * Resolves `filename` inside `baseDir`, or null if it would escape it
 */
export function resolveInside(baseDir: string, filename: string): string | null {
  const base = path.resolve(baseDir);
  const target = path.resolve(base, filename);
  return target.startsWith(base + path.sep) ? target : null;
}

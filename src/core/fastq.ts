import path from "node:path";

import fg from "fast-glob";

export type LibraryFastqPaths = {
  id: string;
  r1: string | null;
  r2: string | null;
};

/**
 * Groups the gzipped FASTQ files directly inside `fastqDir` by library id,
 * the part of the file name before the first underscore.
 */
export async function listLibraryFastqPaths(
  fastqDir: string,
): Promise<Map<string, LibraryFastqPaths>> {
  const files = await fg("*.f*q.gz", {
    cwd: fastqDir,
    absolute: true,
    onlyFiles: true,
    followSymbolicLinks: true,
  });
  files.sort();

  const libraries = new Map<string, LibraryFastqPaths>();
  for (const file of files) {
    const basename = path.basename(file);
    const libraryId = basename.split("_")[0];

    let library = libraries.get(libraryId);
    if (!library) {
      library = { id: libraryId, r1: null, r2: null };
      libraries.set(libraryId, library);
    }

    if (basename.includes("_R1")) {
      library.r1 = file;
    } else if (basename.includes("_R2")) {
      library.r2 = file;
    }
  }

  return libraries;
}

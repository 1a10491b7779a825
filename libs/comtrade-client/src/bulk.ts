import { unzipSync } from 'fflate';

export interface ArchiveEntry {
  name: string;
  text: string;
}

/**
 * Returns the first file entry of a ZIP archive, in central-directory order,
 * decoded as UTF-8. Directory entries are skipped and only the chosen entry
 * is inflated.
 */
export function readFirstArchiveEntry(archive: Uint8Array): ArchiveEntry | undefined {
  const selected: string[] = [];
  const files = unzipSync(archive, {
    filter: (file) => {
      if (selected.length > 0 || file.name.endsWith('/')) {
        return false;
      }
      selected.push(file.name);
      return true;
    },
  });

  const name = selected[0];
  const data = name === undefined ? undefined : files[name];
  if (name === undefined || data === undefined) {
    return undefined;
  }
  return { name, text: Buffer.from(data).toString('utf-8') };
}

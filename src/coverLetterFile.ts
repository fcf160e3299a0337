import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';

export interface SaveOptions {
  directory: string;
  now?: Date;
}

/**
 * Turn a company name into a safe file name stem
 */
export function sanitizeFileName(name: string): string {
  const stem = name.trim().replace(/[<>:"/\\|?*\s]+/g, '_');
  return stem || 'cover_letter';
}

/**
 * Write a letter to `<Company>_<MMDD>.txt` and return the path, or null
 * when there is nothing to save.
 */
export async function saveCoverLetter(
  text: string,
  companyName: string,
  options: SaveOptions
): Promise<string | null> {
  const cleaned = text.trim();
  if (!cleaned) {
    return null;
  }

  const now = options.now ?? new Date();
  const mmdd = `${String(now.getMonth() + 1).padStart(2, '0')}${String(now.getDate()).padStart(2, '0')}`;
  const filePath = join(options.directory, `${sanitizeFileName(companyName)}_${mmdd}.txt`);

  await mkdir(options.directory, { recursive: true });
  await writeFile(filePath, cleaned, 'utf-8');
  return filePath;
}

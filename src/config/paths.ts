import { fileURLToPath } from 'url';
import path from 'path';

/**
 * Directory holding the JSON configuration shipped with the package
 */
export const CONFIG_DIR = fileURLToPath(new URL('../../config/', import.meta.url));

export function configPath(...segments: string[]): string {
  return path.join(CONFIG_DIR, ...segments);
}

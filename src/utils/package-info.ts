import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export interface PackageInfo {
  name: string;
  version: string;
  description?: string;
}

const PACKAGE_NAME = 'agentsync';

const packageJsonSchema = z.object({
  name: z.literal(PACKAGE_NAME),
  version: z.string(),
  description: z.string().optional(),
});

let cachedPackageInfo: PackageInfo | null = null;

function readPackageInfo(filePath: string): PackageInfo | null {
  try {
    const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
    return parsed.success ? parsed.data : null;
  }
  catch {
    return null;
  }
}

/**
 * Locate this package's package.json by walking up from the module's own
 * directory; works from both `src/` and the compiled `dist/src/`.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPackageInfo) {
    return cachedPackageInfo;
  }

  let dir = dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 5; depth++) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const info = readPackageInfo(candidate);
      if (info) {
        cachedPackageInfo = info;
        return info;
      }
    }
    dir = dirname(dir);
  }

  cachedPackageInfo = {
    name: PACKAGE_NAME,
    version: '0.0.0',
    description: 'Keep agent configuration files in sync with your AI tool directories',
  };
  return cachedPackageInfo;
}

export function getVersion(): string {
  return getPackageInfo().version;
}

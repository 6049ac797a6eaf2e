import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageVersion = z.object({ version: z.string().min(1) });

// src/version.ts sits one level below package.json; dist/src/version.js two
const CANDIDATE_PATHS = ['../package.json', '../../package.json'];

function readPackageVersion(): string {
  for (const candidate of CANDIDATE_PATHS) {
    try {
      const path = fileURLToPath(new URL(candidate, import.meta.url));
      const parsed = PackageVersion.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
      if (parsed.success) {
        return parsed.data.version;
      }
    } catch {
      // Not at this level; try the next one
    }
  }
  return '0.0.0';
}

/**
 * Service version reported by /healthz and the boot log.
 * SERVICE_VERSION in the environment overrides package.json.
 */
export const SERVICE_VERSION = process.env.SERVICE_VERSION ?? readPackageVersion();

export const SERVICE_NAME = 'speech-priming-service';

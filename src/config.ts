import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export interface Config {
  env: string;
  profile: string;
  profilesFile: string;
}

export interface PackageInfo {
  name: string;
  version: string;
}

/**
 * Walk up from this module until a directory holding package.json is found.
 * Works from both src/ (tsx, vitest) and dist/src/ (compiled).
 */
export function findProjectRoot(startDir: string = __dirname): string {
  let dir = startDir;
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      return path.resolve(__dirname, '..');
    }
    dir = parent;
  }
  return dir;
}

export function getConfig(): Config {
  const projectRoot = findProjectRoot();

  return {
    env: process.env.TOOLBOX_ENV || 'dev',
    profile: process.env.TOOLBOX_PROFILE || 'multi-tools',
    profilesFile:
      process.env.TOOLBOX_PROFILES_FILE || path.join(projectRoot, 'config', 'profiles.yaml'),
  };
}

export function getPackageInfo(): PackageInfo {
  try {
    const pkgPath = path.join(findProjectRoot(), 'package.json');
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'name' in pkg && 'version' in pkg) {
      return { name: String(pkg.name), version: String(pkg.version) };
    }
  } catch (err) {
    log(`Could not read package.json: ${err instanceof Error ? err.message : String(err)}`);
  }
  return { name: 'mcp-toolbox', version: '0.0.0' };
}

export function log(message: string, ...args: unknown[]): void {
  const config = getConfig();
  if (config.env === 'dev') {
    console.error(`[mcp-toolbox] ${message}`, ...args);
  }
}

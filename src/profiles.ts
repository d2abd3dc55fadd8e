// ============================================================================
// Provider Profiles: YAML-based provider selection
// ============================================================================
// A profile names the providers to compose into one server. Profiles are read
// from config/profiles.yaml (or TOOLBOX_PROFILES_FILE); when the file does not
// exist, the built-in multi-tools profile is used.
// ============================================================================

import { existsSync, readFileSync } from 'fs';
import YAML from 'yaml';
import { z } from 'zod';
import { log } from './config.js';
import { PROVIDER_IDS, ProviderId, isProviderId } from './tools/index.js';

// ============================================================================
// Schema
// ============================================================================

const ProfileSchema = z.object({
  description: z.string().optional(),
  providers: z.array(z.string()).min(1),
});

const ProfilesFileSchema = z.object({
  profiles: z.record(ProfileSchema),
});

export type Profile = z.infer<typeof ProfileSchema>;
export type Profiles = Record<string, Profile>;

export const DEFAULT_PROFILES: Profiles = {
  'multi-tools': {
    description: 'General purpose (math + strings + sysinfo)',
    providers: [...PROVIDER_IDS],
  },
};

export class ProfileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProfileError';
  }
}

// ============================================================================
// Load & Resolve
// ============================================================================

export function parseProfiles(raw: string, source = 'profiles'): Profiles {
  let document: unknown;
  try {
    document = YAML.parse(raw);
  } catch (err) {
    throw new ProfileError(`${source}: invalid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = ProfilesFileSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ProfileError(`${source}: ${issues}`);
  }
  return parsed.data.profiles;
}

/**
 * Load profiles from a YAML file, falling back to the built-in defaults when
 * the file is absent. A file that exists but is malformed is an error.
 */
export function loadProfiles(filePath: string): Profiles {
  if (!existsSync(filePath)) {
    log(`Profiles file not found at ${filePath}, using built-in profiles`);
    return DEFAULT_PROFILES;
  }
  return parseProfiles(readFileSync(filePath, 'utf-8'), filePath);
}

/**
 * Provider ids for a profile, in the order the profile lists them.
 */
export function resolveProfile(profiles: Profiles, name: string): ProviderId[] {
  const profile = Object.hasOwn(profiles, name) ? profiles[name] : undefined;
  if (!profile) {
    const known = Object.keys(profiles).join(', ') || '(none)';
    throw new ProfileError(`Unknown profile '${name}'. Known profiles: ${known}`);
  }

  const ids: ProviderId[] = [];
  for (const id of profile.providers) {
    if (!isProviderId(id)) {
      throw new ProfileError(
        `Profile '${name}' names unknown provider '${id}'. Known providers: ${PROVIDER_IDS.join(', ')}`
      );
    }
    if (ids.includes(id)) {
      throw new ProfileError(`Profile '${name}' lists provider '${id}' more than once`);
    }
    ids.push(id);
  }
  return ids;
}

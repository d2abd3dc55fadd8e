// ============================================================================
// Provider Registry
// ============================================================================
// Every provider this package ships, by id. Profiles and the kernel pick
// from here.
// ============================================================================

import type { ToolEnv, ToolProvider } from './types.js';
import { CALCULATOR_PROVIDER_ID, createCalculatorProvider } from './calculator/index.js';
import { STRING_UTILS_PROVIDER_ID, createStringUtilsProvider } from './stringUtils/index.js';
import { SYSTEM_INFO_PROVIDER_ID, createSystemInfoProvider } from './systemInfo/index.js';

export const PROVIDER_IDS = [
  CALCULATOR_PROVIDER_ID,
  STRING_UTILS_PROVIDER_ID,
  SYSTEM_INFO_PROVIDER_ID,
] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

const factories: Record<ProviderId, (env?: ToolEnv) => ToolProvider> = {
  [CALCULATOR_PROVIDER_ID]: createCalculatorProvider,
  [STRING_UTILS_PROVIDER_ID]: createStringUtilsProvider,
  [SYSTEM_INFO_PROVIDER_ID]: createSystemInfoProvider,
};

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

export function createProvider(id: ProviderId, env?: ToolEnv): ToolProvider {
  return factories[id](env);
}

export function createProviders(ids: readonly ProviderId[], env?: ToolEnv): ToolProvider[] {
  return ids.map((id) => createProvider(id, env));
}

export { createCalculatorProvider, createStringUtilsProvider, createSystemInfoProvider };
export type { ToolProvider, ToolSpec, ToolEnv } from './types.js';

/**
 * Service container
 *
 * Built once per process and handed to every route handler factory.
 * Tests build their own container with a fake fetch.
 */

import { loadConfig, type AppConfig } from './config';
import { createEnhancer, detectCapabilities, type Capabilities, type PredictionEnhancer } from './enhancers';
import { createDonkiProvider, type DonkiProvider } from './providers/donki';
import type { FetchLike } from './providers/fetchJson';
import { createSwpcProvider, type SwpcProvider } from './providers/swpc';
import { defaultScorers, type ScorerSet } from './scoring';

export interface Services {
  config: AppConfig;
  donki: DonkiProvider;
  swpc: SwpcProvider;
  scorers: ScorerSet;
  capabilities: Capabilities;
  enhancer: PredictionEnhancer;
  now: () => Date;
}

export interface ServiceOverrides {
  fetch?: FetchLike;
  now?: () => Date;
  timeoutMs?: number;
  scorers?: Partial<ScorerSet>;
  enhancer?: PredictionEnhancer;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const fetchImpl: FetchLike = overrides.fetch ?? ((url, init) => fetch(url, init));
  const now = overrides.now ?? (() => new Date());
  const capabilities = detectCapabilities(config);

  return {
    config,
    donki: createDonkiProvider({
      apiKey: config.nasaApiKey,
      fetch: fetchImpl,
      timeoutMs: overrides.timeoutMs,
      now,
    }),
    swpc: createSwpcProvider({ fetch: fetchImpl, timeoutMs: overrides.timeoutMs, now }),
    scorers: { ...defaultScorers, ...overrides.scorers },
    capabilities,
    enhancer: overrides.enhancer ?? createEnhancer(config, capabilities),
    now,
  };
}

let services: Services | null = null;

export function getServices(): Services {
  if (!services) {
    services = createServices(loadConfig());
    console.log('[Services] Initialized with capabilities:', services.capabilities);
  }
  return services;
}

import type { AddressData, PhoneData, RegistryData, WebPresenceData } from '../../domain/types.js';
import type { AppConfig } from '../../infrastructure/config.js';
import { createHttpClient, type HttpClient } from '../../infrastructure/http.js';
import { RetryPolicy } from '../../infrastructure/retry.js';
import { AddressValidator, LocationIqProvider, TomTomProvider } from './geocoder.js';
import { PhoneClient } from './phone.js';
import { RegistryClient } from './registry.js';
import type { SourceClient } from './types.js';
import { WebPresenceClient } from './web-presence.js';

export type { SourceClient, SourceClientDeps } from './types.js';
export { RegistryClient } from './registry.js';
export { AddressValidator, TomTomProvider, LocationIqProvider } from './geocoder.js';
export type { GeocodingProvider, GeocodeQuery } from './geocoder.js';
export { PhoneClient } from './phone.js';
export { WebPresenceClient } from './web-presence.js';

export interface SourceClients {
  registry: SourceClient<RegistryData>;
  address: SourceClient<AddressData>;
  phone: SourceClient<PhoneData>;
  web: SourceClient<WebPresenceData>;
}

export function createSourceClients(config: AppConfig, http?: HttpClient): SourceClients {
  const deps = {
    http: http ?? createHttpClient(config.http.timeoutMs),
    retry: new RetryPolicy({ maxAttempts: config.http.retryAttempts, baseDelayMs: config.http.retryDelayMs }),
  };

  return {
    registry: new RegistryClient(deps, config.npiRegistryUrl),
    address: new AddressValidator(
      new TomTomProvider(deps, config.apiKeys.tomtom),
      new LocationIqProvider(deps, config.apiKeys.locationIq),
    ),
    phone: new PhoneClient(deps, config.apiKeys.numVerify),
    web: new WebPresenceClient(deps),
  };
}

import type { ProviderCredentials } from '../../shared/config';
import { APP_CONFIG, PROVIDER_NAMES } from '../../../lib/config/constants';
import type { EnrichmentProvider } from './types';
import { IpApiProvider } from './ip-api-provider';
import { AbuseIpDbProvider } from './abuseipdb-provider';
import { ShodanProvider } from './shodan-provider';
import { VirusTotalProvider } from './virustotal-provider';

export type { EnrichmentProvider } from './types';
export { IpApiProvider, AbuseIpDbProvider, ShodanProvider, VirusTotalProvider };

export interface ProviderOptions {
  credentials: ProviderCredentials;
  disabledProviders?: string[];
  timeoutMs?: number;
}

/**
 * Providers in lookup order: geolocation, abuse reputation, exposure, engine
 * verdicts. A provider without credentials is left out.
 */
export function buildProviders(options: ProviderOptions): EnrichmentProvider[] {
  const disabled = new Set(options.disabledProviders ?? []);
  const timeoutMs = options.timeoutMs ?? APP_CONFIG.enrichment.providerTimeoutMs;
  const { abuseIpDbKey, shodanKey, virusTotalKey } = options.credentials;
  const providers: EnrichmentProvider[] = [];

  if (!disabled.has(PROVIDER_NAMES.IP_API)) {
    providers.push(new IpApiProvider(APP_CONFIG.providers.ipApi, timeoutMs));
  }
  if (abuseIpDbKey && !disabled.has(PROVIDER_NAMES.ABUSEIPDB)) {
    providers.push(new AbuseIpDbProvider(abuseIpDbKey, APP_CONFIG.providers.abuseIpDb, timeoutMs));
  }
  if (shodanKey && !disabled.has(PROVIDER_NAMES.SHODAN)) {
    providers.push(new ShodanProvider(shodanKey, APP_CONFIG.providers.shodan, timeoutMs));
  }
  if (virusTotalKey && !disabled.has(PROVIDER_NAMES.VIRUSTOTAL)) {
    providers.push(new VirusTotalProvider(virusTotalKey, APP_CONFIG.providers.virusTotal, timeoutMs));
  }

  return providers;
}

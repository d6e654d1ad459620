import { describe, it, expect, vi } from 'vitest';
import { ProviderError } from '../../../shared/errors';
import {
  AbuseIpDbProvider,
  buildProviders,
  IpApiProvider,
  ShodanProvider,
  VirusTotalProvider,
} from '..';

const IP = '198.51.100.7';

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi
    .fn()
    .mockResolvedValue(
      new Response(typeof body === 'string' ? body : JSON.stringify(body), { status })
    );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('IpApiProvider', () => {
  it('maps the geolocation response', async () => {
    const fetchMock = stubFetch({
      ip: IP,
      city: 'Johannesburg',
      region: 'Gauteng',
      country: 'ZA',
      country_name: 'South Africa',
      latitude: -26.2,
      longitude: 28.04,
      org: 'Example Networks',
      asn: 'AS64500',
    });

    const result = await new IpApiProvider('https://geo.example.test').lookup(IP);

    expect(fetchMock).toHaveBeenCalledWith(
      'https://geo.example.test/198.51.100.7/json/',
      expect.objectContaining({ headers: { Accept: 'application/json' } })
    );
    expect(result).toEqual({
      geoData: {
        latitude: -26.2,
        longitude: 28.04,
        city: 'Johannesburg',
        region: 'Gauteng',
        country: 'South Africa',
        countryCode: 'ZA',
        isp: 'Example Networks',
        asn: 'AS64500',
      },
    });
  });

  it('fails when the service flags the lookup as an error', async () => {
    stubFetch({ ip: '10.0.0.1', error: true, reason: 'Reserved IP Address' });

    await expect(new IpApiProvider().lookup('10.0.0.1')).rejects.toThrow(
      'ip-api: Reserved IP Address'
    );
  });
});

describe('AbuseIpDbProvider', () => {
  it('sends the key header and maps the abuse report', async () => {
    const fetchMock = stubFetch({
      data: {
        ipAddress: IP,
        abuseConfidenceScore: 87,
        totalReports: 31,
        lastReportedAt: '2026-02-28T09:15:00+00:00',
        countryCode: 'ZA',
        usageType: 'Data Center/Web Hosting/Transit',
        isPublic: true,
        isWhitelisted: null,
      },
    });

    const result = await new AbuseIpDbProvider('test-secret', 'https://abuse.example.test').lookup(IP);

    expect(fetchMock).toHaveBeenCalledWith(
      'https://abuse.example.test/check?ipAddress=198.51.100.7&maxAgeInDays=90',
      expect.objectContaining({ headers: { Key: 'test-secret', Accept: 'application/json' } })
    );
    expect(result).toEqual({
      abuseData: {
        abuseConfidenceScore: 87,
        totalReports: 31,
        lastReportedAt: '2026-02-28T09:15:00+00:00',
        countryCode: 'ZA',
        usageType: 'Data Center/Web Hosting/Transit',
        isPublic: true,
        isWhitelisted: false,
      },
    });
  });

  it('turns non-2xx responses into ProviderError', async () => {
    stubFetch({ errors: [{ detail: 'Daily rate limit exceeded' }] }, 429);

    const lookup = new AbuseIpDbProvider('test-secret').lookup(IP);
    await expect(lookup).rejects.toBeInstanceOf(ProviderError);
    await expect(new AbuseIpDbProvider('test-secret').lookup(IP)).rejects.toThrow(
      'abuseipdb: HTTP 429'
    );
  });
});

describe('ShodanProvider', () => {
  it('lists vulnerabilities keyed by CVE id', async () => {
    const fetchMock = stubFetch({
      ports: [22, 80],
      org: 'Example Hosting',
      hostnames: ['host.example.test'],
      vulns: { 'CVE-2023-0001': { cvss: 7.5 }, 'CVE-2023-0002': { cvss: 5 } },
    });

    const result = await new ShodanProvider('test-secret', 'https://shodan.example.test').lookup(IP);

    expect(fetchMock.mock.calls[0][0]).toBe('https://shodan.example.test/host/198.51.100.7?key=test-secret');
    expect(result).toEqual({
      exposureData: {
        ports: [22, 80],
        organization: 'Example Hosting',
        hostnames: ['host.example.test'],
        vulnerabilities: ['CVE-2023-0001', 'CVE-2023-0002'],
        vulnerabilityCount: 2,
      },
    });
  });

  it('accepts vulnerabilities as a list and tolerates missing fields', async () => {
    stubFetch({ vulns: ['CVE-2024-0003'] });

    const result = await new ShodanProvider('test-secret').lookup(IP);

    expect(result.exposureData).toEqual({
      ports: [],
      organization: undefined,
      hostnames: [],
      vulnerabilities: ['CVE-2024-0003'],
      vulnerabilityCount: 1,
    });
  });

  it('reports transport failures', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    await expect(new ShodanProvider('test-secret').lookup(IP)).rejects.toThrow(
      'shodan: request failed (fetch failed)'
    );
  });
});

describe('VirusTotalProvider', () => {
  it('maps the analysis stats', async () => {
    const fetchMock = stubFetch({
      data: {
        id: IP,
        attributes: {
          reputation: -12,
          last_analysis_stats: { malicious: 4, suspicious: 1, harmless: 60, undetected: 20 },
        },
      },
    });

    const result = await new VirusTotalProvider('test-secret', 'https://vt.example.test').lookup(IP);

    expect(fetchMock).toHaveBeenCalledWith(
      'https://vt.example.test/ip_addresses/198.51.100.7',
      expect.objectContaining({
        headers: { 'x-apikey': 'test-secret', Accept: 'application/json' },
      })
    );
    expect(result).toEqual({
      reputationData: { malicious: 4, suspicious: 1, harmless: 60, undetected: 20, reputation: -12 },
    });
  });

  it('rejects bodies that are not JSON', async () => {
    stubFetch('<html>gateway timeout</html>');

    await expect(new VirusTotalProvider('test-secret').lookup(IP)).rejects.toThrow(
      'virustotal: response was not valid JSON'
    );
  });

  it('rejects unexpected response shapes', async () => {
    stubFetch({ error: { code: 'NotFoundError' } });

    await expect(new VirusTotalProvider('test-secret').lookup(IP)).rejects.toThrow(
      'virustotal: unexpected response shape'
    );
  });
});

describe('buildProviders', () => {
  it('includes keyed providers in lookup order', () => {
    const providers = buildProviders({
      credentials: { abuseIpDbKey: 'test-secret', shodanKey: 'test-secret', virusTotalKey: 'test-secret' },
    });
    expect(providers.map((provider) => provider.name)).toEqual([
      'ip-api',
      'abuseipdb',
      'shodan',
      'virustotal',
    ]);
  });

  it('leaves out providers without a key or explicitly disabled', () => {
    const providers = buildProviders({
      credentials: { abuseIpDbKey: 'test-secret', shodanKey: 'test-secret' },
      disabledProviders: ['ip-api', 'shodan'],
    });
    expect(providers.map((provider) => provider.name)).toEqual(['abuseipdb']);
  });
});

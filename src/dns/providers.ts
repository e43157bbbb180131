export interface DnsProvider {
  readonly name: string;
  readonly primary: string;
  readonly secondary: string;
  readonly description: string;
}

export const DNS_PROVIDERS: readonly DnsProvider[] = Object.freeze([
  {
    name: "Cloudflare",
    primary: "1.1.1.1",
    secondary: "1.0.0.1",
    description: "Fast and privacy-focused DNS",
  },
  {
    name: "Google",
    primary: "8.8.8.8",
    secondary: "8.8.4.4",
    description: "Reliable Google DNS",
  },
  {
    name: "Quad9",
    primary: "9.9.9.9",
    secondary: "149.112.112.112",
    description: "Security-focused DNS",
  },
  {
    name: "OpenDNS",
    primary: "208.67.222.222",
    secondary: "208.67.220.220",
    description: "Family-safe DNS",
  },
]);

export function formatProviderLabel(provider: DnsProvider): string {
  return `${provider.name} - ${provider.description}`;
}

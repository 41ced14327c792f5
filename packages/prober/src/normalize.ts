const SCHEMES = ['http://', 'https://'] as const;

export function hasHttpScheme(endpoint: string): boolean {
  return SCHEMES.some((scheme) => endpoint.startsWith(scheme));
}

export function normalizeEndpoint(endpoint: string): string {
  if (hasHttpScheme(endpoint)) return endpoint;
  return `http://${endpoint}`;
}

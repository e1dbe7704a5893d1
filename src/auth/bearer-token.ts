export function extractBearerToken(authorization?: string): string | undefined {
  const [type, token] = authorization?.split(' ') ?? [];
  return type === 'Bearer' && token ? token : undefined;
}

import { BadRequestException } from '@nestjs/common';

const GITHUB_DOMAIN = 'github.com';

/**
 * Trims the input and rejects it when nothing is left.
 */
export function requireHandle(input: string, source: string): string {
  const handle = input.trim();
  if (!handle) {
    throw new BadRequestException(`A ${source} username is required`);
  }
  return handle;
}

/**
 * Accepts either a bare GitHub username or a profile URL
 * (`https://github.com/alice`, `github.com/alice/repo`) and returns the
 * bare username. No network access happens here.
 */
export function resolveGithubHandle(input: string): string {
  const trimmed = requireHandle(input, 'GitHub');
  if (!trimmed.toLowerCase().includes(GITHUB_DOMAIN)) {
    return trimmed;
  }

  const withScheme = /^[a-z][a-z\d+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let pathname: string;
  try {
    pathname = new URL(withScheme).pathname;
  } catch {
    throw new BadRequestException(`Could not parse GitHub profile URL: ${trimmed}`);
  }

  const handle = pathname.split('/').find((segment) => segment.length > 0);
  if (!handle) {
    throw new BadRequestException(`No GitHub username found in URL: ${trimmed}`);
  }
  return handle;
}

import { ValidationError } from '../errors.js';

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Parse a URL and ensure it uses http(s) without embedded credentials.
 */
export function parseHttpUrl(rawUrl: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    throw new ValidationError(`Invalid URL "${rawUrl}".`, 'portalUrl');
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError('Only http:// or https:// URLs can be opened.', 'portalUrl');
  }

  if (parsed.username || parsed.password) {
    throw new ValidationError('URLs with embedded credentials are not allowed.', 'portalUrl');
  }

  return parsed;
}

/**
 * Portal URLs are often saved without a scheme ("jobs.example.com/123");
 * assume https for those before validating.
 */
export function parsePortalUrl(rawUrl: string): URL {
  const trimmed = rawUrl.trim();
  if (!trimmed) {
    throw new ValidationError('This application has no portal URL.', 'portalUrl');
  }
  return parseHttpUrl(SCHEME_PATTERN.test(trimmed) ? trimmed : `https://${trimmed}`);
}

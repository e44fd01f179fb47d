import { ValidationError } from '../../shared/errors';

const HOST_PATTERN = /^(?=.{1,253}$)(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z0-9-]{2,63}$/;

/**
 * `" HTTPS://user@Example.COM:8080/about?x=1 "` -> `"example.com"`. Rejects
 * anything that is not a dotted host name afterwards.
 */
export const normalizeDomainName = (input: unknown): string => {
  if (typeof input !== 'string' || !input.trim()) {
    throw new ValidationError('domain_name is required');
  }

  const host = (
    input
      .trim()
      .toLowerCase()
      .replace(/^[a-z][a-z0-9+.-]*:\/\//, '')
      .split(/[/?#]/)[0] ?? ''
  )
    .replace(/^[^@]*@/, '')
    .replace(/:\d*$/, '')
    .replace(/\.$/, '');

  if (!HOST_PATTERN.test(host)) {
    throw new ValidationError(`Invalid domain name: ${input.trim()}`);
  }
  return host;
};

import { fetchWithTimeout, type FetchOptions } from '../http/fetchWithTimeout';

/**
 * Google News hands out indirection links (`/rss/articles/<token>`,
 * `/articles/<token>`, `/read/<token>`) instead of publisher URLs. These
 * helpers turn such a link into the publisher URL, or report that it could
 * not be resolved.
 */

export const GOOGLE_NEWS_HOST = 'news.google.com';

const base64UrlDecodeBinary = (value: string): string | null => {
  try {
    const normalized = value.replace(/-/g, '+').replace(/_/g, '/');
    const padding = '='.repeat((4 - (normalized.length % 4)) % 4);
    return atob(normalized + padding);
  } catch {
    return null;
  }
};

const hostOf = (rawUrl: string): string | null => {
  try {
    return new URL(rawUrl).hostname.toLowerCase();
  } catch {
    return null;
  }
};

export const isIndirectionHost = (rawUrl: string): boolean => hostOf(rawUrl) === GOOGLE_NEWS_HOST;

const extractWrapperToken = (rawUrl: string): string | null => {
  if (!isIndirectionHost(rawUrl)) return null;
  const parts = new URL(rawUrl).pathname.split('/').filter(Boolean);
  if (parts.length < 2) return null;
  const parent = parts[parts.length - 2];
  return parent === 'articles' || parent === 'read' ? parts[parts.length - 1] : null;
};

/** Older tokens carry the publisher URL inline, length-prefixed inside a small protobuf frame. */
const decodeDirectTokenUrl = (token: string): string | null => {
  const decoded = base64UrlDecodeBinary(token);
  if (!decoded) return null;

  let payload = decoded;
  const prefix = '\x08\x13\x22';
  const suffix = '\xD2\x01\x00';
  if (payload.startsWith(prefix)) payload = payload.slice(prefix.length);
  if (payload.endsWith(suffix)) payload = payload.slice(0, -suffix.length);
  if (!payload.length) return null;

  const length = payload.charCodeAt(0);
  const start = length >= 0x80 ? 2 : 1;
  const end = Math.min(payload.length, length + 1);
  if (end <= start) return null;
  const candidate = payload.slice(start, end);
  return /^https?:\/\//i.test(candidate) ? candidate : null;
};

interface DecodingParams {
  signature: string;
  timestamp: string;
}

const extractDecodingParams = (html: string): DecodingParams | null => {
  const signature =
    (html.match(/data-n-a-sg=["']([^"']+)["']/i) || [])[1] ||
    (html.match(/"data-n-a-sg"\s*:\s*"([^"]+)"/i) || [])[1] ||
    '';
  const timestamp =
    (html.match(/data-n-a-ts=["']([^"']+)["']/i) || [])[1] ||
    (html.match(/"data-n-a-ts"\s*:\s*"([^"]+)"/i) || [])[1] ||
    '';
  return signature && timestamp ? { signature, timestamp } : null;
};

const fetchDecodingParams = async (token: string, rawUrl: string, options: FetchOptions): Promise<DecodingParams | null> => {
  const paths = new Set<string>();
  const incoming = new URL(rawUrl);
  paths.add(`${incoming.pathname}${incoming.search}`);
  paths.add(`/articles/${token}`);

  for (const p of paths) {
    const res = await fetchWithTimeout(`https://${GOOGLE_NEWS_HOST}${p}`, {
      ...options,
      headers: { Referer: `https://${GOOGLE_NEWS_HOST}/` },
    });
    if (!res.ok) continue;
    const parsed = extractDecodingParams(await res.text());
    if (parsed) return parsed;
  }
  return null;
};

const decodeViaBatchExecute = async (token: string, params: DecodingParams, options: FetchOptions): Promise<string | null> => {
  const payload = [
    'Fbv4je',
    `["garturlreq",[["X","X",["X","X"],null,null,1,1,"US:en",null,1,null,null,null,null,null,0,1],"X","X",1,[1,1,1],1,1,null,0,0,null,0],"${token}",${params.timestamp},"${params.signature}"]`,
  ];
  const res = await fetchWithTimeout(`https://${GOOGLE_NEWS_HOST}/_/DotsSplashUi/data/batchexecute`, {
    ...options,
    method: 'POST',
    accept: '*/*',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded;charset=UTF-8',
      Referer: `https://${GOOGLE_NEWS_HOST}/`,
    },
    body: new URLSearchParams({ 'f.req': JSON.stringify([[payload]]) }),
  });
  if (!res.ok) return null;
  const bodyPart = (await res.text()).split('\n\n')[1];
  if (!bodyPart) return null;
  try {
    const parsed: unknown = JSON.parse(bodyPart);
    const raw = Array.isArray(parsed) && Array.isArray(parsed[0]) ? parsed[0][2] : undefined;
    if (typeof raw !== 'string') return null;
    const inner: unknown = JSON.parse(raw);
    const decodedUrl = Array.isArray(inner) ? inner[1] : null;
    return typeof decodedUrl === 'string' && /^https?:\/\//i.test(decodedUrl) ? decodedUrl : null;
  } catch {
    return null;
  }
};

/**
 * Publisher URL behind a Google News link. Non-wrapper URLs come back
 * unchanged; `null` means the link could not be resolved.
 */
export const resolveGoogleNewsWrapperUrl = async (rawUrl: string, options: FetchOptions): Promise<string | null> => {
  const token = extractWrapperToken(rawUrl);
  if (!token) return rawUrl;

  const direct = decodeDirectTokenUrl(token);
  if (direct) return direct;

  try {
    const params = await fetchDecodingParams(token, rawUrl, options);
    return params ? await decodeViaBatchExecute(token, params, options) : null;
  } catch {
    return null;
  }
};

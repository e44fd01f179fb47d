export const ELLIPSIS = '...';

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

// never leaves half of a surrogate pair at the end
const sliceWhole = (value: string, maxLength: number): string => {
  if (value.length <= maxLength) return value;
  const end = maxLength > 0 && isHighSurrogate(value.charCodeAt(maxLength - 1)) ? maxLength - 1 : maxLength;
  return value.slice(0, end);
};

/** Cuts to at most `maxLength` UTF-16 units and marks the cut; shorter input is returned as-is. */
export const truncateWithEllipsis = (value: string, maxLength: number): string =>
  value.length > maxLength ? `${sliceWhole(value, maxLength)}${ELLIPSIS}` : value;

export const clip = (value: string | null | undefined, maxLength: number): string =>
  value ? sliceWhole(value, maxLength) : '';

/** First label of a host, capitalised: `acme.co.uk` -> `Acme`. */
export const subjectNameFromDomain = (domainName: string): string => {
  const label = domainName.replace(/^www\./i, '').split('.')[0] ?? '';
  return label ? `${label.charAt(0).toUpperCase()}${label.slice(1)}` : domainName;
};

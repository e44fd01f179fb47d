import type { ProfessionalPresence } from '../../../shared/types';
import { fetchWithTimeout, type FetchOptions } from '../../http/fetchWithTimeout';
import { NOT_AVAILABLE } from './googleSearch';

const LINKEDIN_COMPANY_BASE = 'https://www.linkedin.com/company/';

export const buildProfileUrl = (domainName: string): string => {
  const label = domainName.replace(/^www\./i, '').split('.')[0] ?? domainName;
  return `${LINKEDIN_COMPANY_BASE}${encodeURIComponent(label.toLowerCase())}`;
};

export const absentPresence = (domainName: string): ProfessionalPresence => ({
  found: false,
  profileUrl: buildProfileUrl(domainName),
  employeeCount: NOT_AVAILABLE,
  industry: NOT_AVAILABLE,
});

/**
 * Reachability probe. The page is never parsed for attributes: anything
 * beyond `found` is reported as not available.
 */
export const probeProfessionalPresence = async (
  domainName: string,
  options: FetchOptions,
): Promise<ProfessionalPresence> => {
  const presence = absentPresence(domainName);
  const response = await fetchWithTimeout(presence.profileUrl, options);
  return { ...presence, found: response.status === 200 };
};

import { toASCII } from 'punycode/';
import { InvalidDomainError } from './errors';

/** Lowercase ASCII domain that passed `validateDomain`. */
export type Domain = string & { readonly __brand: 'Domain' };

const LABEL = '[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?';
const DOMAIN_RE = new RegExp(`^${LABEL}(?:\\.${LABEL})*$`);

/**
 * Validate and normalize a domain given on the command line.
 * Internationalised names are converted to punycode first.
 */
export function validateDomain(raw: string): Domain {
  const trimmed = typeof raw === 'string' ? raw.trim() : '';
  if (!trimmed) throw new InvalidDomainError(String(raw));

  let ascii: string;
  try {
    ascii = toASCII(trimmed.toLowerCase());
  } catch {
    throw new InvalidDomainError(trimmed);
  }

  if (!isDomainShape(ascii)) throw new InvalidDomainError(trimmed);
  return ascii;
}

function isDomainShape(value: string): value is Domain {
  return DOMAIN_RE.test(value);
}

export function isValidDomain(raw: string): boolean {
  try {
    validateDomain(raw);
    return true;
  } catch {
    return false;
  }
}

/** File-name stem for a domain's output files, e.g. `example_com`. */
export function domainFileStem(domain: string): string {
  return domain.replace(/\./g, '_').replace(/[<>:"/\\|?*]/g, '_');
}

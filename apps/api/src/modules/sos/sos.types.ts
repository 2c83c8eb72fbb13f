/**
 * Contact data shared by every stage of the SOS contacts pipeline
 */

export type ContactCategory = "national_emergency" | "crisis_hotline";

// Where a returned set came from; clients show a staleness hint for anything but "fresh"
export type ContactOrigin = "fresh" | "cached" | "default";

export interface ContactRecord {
  name: string;
  phoneNumber: string;
  category: ContactCategory;
  sourceUrl: string;
  country: string;
  description?: string;
}

export interface ContactSet {
  country: string;
  contacts: ContactRecord[];
  fetchedAt: string; // ISO-8601
  origin: ContactOrigin;
}

export const CONTACT_COUNT = 5;
export const NATIONAL_EMERGENCY_COUNT = 1;
export const CRISIS_HOTLINE_COUNT = CONTACT_COUNT - NATIONAL_EMERGENCY_COUNT;

export interface SearchSnippet {
  title: string;
  snippet: string;
  sourceUrl: string;
  query: string;
}

export interface RawSearchResults {
  country: string;
  queries: string[];
  snippets: SearchSnippet[];
}

export type ValidationReason = "count_mismatch" | "category_mismatch" | "missing_field" | "untrusted_source";

export interface ContactValidationError {
  reason: ValidationReason;
  detail: string;
  contactIndex?: number;
}

export type ValidationResult =
  | { valid: true; contactSet: ContactSet }
  | { valid: false; error: ContactValidationError };

/**
 * Normalize a country name into its cache key: trimmed, single-spaced, lower-cased
 */
export function normalizeCountryKey(country: string): string {
  return country.trim().replace(/\s+/g, " ").toLowerCase();
}

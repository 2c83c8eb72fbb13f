/**
 * SOS Policy Configuration
 *
 * Trusted source domains and search query templates used by the contacts pipeline.
 * These are policy data: the bundled defaults can be replaced with a JSON file
 * at SOS_POLICY_PATH without a code change.
 */

import { readFileSync } from "fs";
import * as path from "path";
import { z } from "zod";
import bundledPolicy from "./sos-policy.json";

export const sosPolicySchema = z.object({
  trustedDomainSuffixes: z.array(z.string().trim().min(1)).min(1),
  searchQueryTemplates: z.tuple([z.string().min(1), z.string().min(1), z.string().min(1)]),
  maxResultsPerQuery: z.number().int().positive().default(10),
  maxEvidenceSnippets: z.number().int().positive().default(15),
});

export type SosPolicy = z.infer<typeof sosPolicySchema>;

export const SOS_POLICY = Symbol("SOS_POLICY");

/**
 * Load the policy from a JSON file, or the bundled defaults when no path is given.
 * Throws on an unreadable or invalid file so a bad policy stops boot.
 */
export function loadSosPolicy(policyPath?: string): SosPolicy {
  if (!policyPath) {
    return sosPolicySchema.parse(bundledPolicy);
  }
  const file = path.isAbsolute(policyPath) ? policyPath : path.resolve(process.cwd(), policyPath);
  const content: unknown = JSON.parse(readFileSync(file, "utf-8"));
  return sosPolicySchema.parse(content);
}

/**
 * Fill a query template. Supported placeholders: {country}, {year}
 */
export function renderQueryTemplate(template: string, country: string, year: number): string {
  return template
    .replace(/\{country\}/g, country)
    .replace(/\{year\}/g, String(year))
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Check that a URL is http(s) and its host is, or is a subdomain of, a trusted suffix.
 * "who.int" matches "www.who.int"; "org" matches "samaritans.org" but not "example-blog.com".
 */
export function isTrustedSourceUrl(sourceUrl: string, trustedSuffixes: readonly string[]): boolean {
  let host: string;
  try {
    const url = new URL(sourceUrl.trim());
    if (url.protocol !== "http:" && url.protocol !== "https:") return false;
    host = url.hostname.toLowerCase().replace(/\.$/, "");
  } catch {
    return false;
  }
  if (!host) return false;

  return trustedSuffixes.some((raw) => {
    const suffix = raw.trim().toLowerCase().replace(/^\./, "");
    return host === suffix || host.endsWith(`.${suffix}`);
  });
}

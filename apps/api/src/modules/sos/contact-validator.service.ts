import { Inject, Injectable } from "@nestjs/common";
import { isTrustedSourceUrl, SOS_POLICY, SosPolicy } from "../../config/sos-policy.config";
import {
  CONTACT_COUNT,
  ContactSet,
  ContactValidationError,
  CRISIS_HOTLINE_COUNT,
  NATIONAL_EMERGENCY_COUNT,
  ValidationResult,
} from "./sos.types";

/**
 * Deterministic gate between the extraction model and the cache.
 * Checks run in a fixed order and the first failure rejects the whole set.
 */
@Injectable()
export class ContactValidatorService {
  constructor(@Inject(SOS_POLICY) private readonly policy: SosPolicy) {}

  validate(candidate: ContactSet): ValidationResult {
    const error =
      this.checkCount(candidate) ??
      this.checkCategories(candidate) ??
      this.checkRequiredFields(candidate) ??
      this.checkSources(candidate);

    return error ? { valid: false, error } : { valid: true, contactSet: candidate };
  }

  private checkCount({ contacts }: ContactSet): ContactValidationError | null {
    if (contacts.length === CONTACT_COUNT) return null;
    return { reason: "count_mismatch", detail: `Expected ${CONTACT_COUNT} contacts, got ${contacts.length}` };
  }

  private checkCategories({ contacts }: ContactSet): ContactValidationError | null {
    const national = contacts.filter((c) => c.category === "national_emergency").length;
    const hotlines = contacts.filter((c) => c.category === "crisis_hotline").length;
    if (national === NATIONAL_EMERGENCY_COUNT && hotlines === CRISIS_HOTLINE_COUNT) return null;
    return {
      reason: "category_mismatch",
      detail: `Expected ${NATIONAL_EMERGENCY_COUNT} national emergency and ${CRISIS_HOTLINE_COUNT} crisis hotlines, got ${national} and ${hotlines}`,
    };
  }

  private checkRequiredFields({ contacts }: ContactSet): ContactValidationError | null {
    for (const [index, contact] of contacts.entries()) {
      for (const field of ["name", "phoneNumber"] as const) {
        if (!contact[field].trim()) {
          return { reason: "missing_field", detail: `Contact ${index + 1} is missing ${field}`, contactIndex: index };
        }
      }
    }
    return null;
  }

  // Cached and default sets were accepted when written; only fresh fetches are checked
  private checkSources({ contacts, origin }: ContactSet): ContactValidationError | null {
    if (origin !== "fresh") return null;

    for (const [index, contact] of contacts.entries()) {
      if (!isTrustedSourceUrl(contact.sourceUrl, this.policy.trustedDomainSuffixes)) {
        return {
          reason: "untrusted_source",
          detail: `Contact ${index + 1} source "${contact.sourceUrl}" is not on a trusted domain`,
          contactIndex: index,
        };
      }
    }
    return null;
  }
}
